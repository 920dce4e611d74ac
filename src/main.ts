#!/usr/bin/env tsx
/**
 * Terminal mesh renderer - renders a shaded shape once, as a spinning
 * animation, or under keyboard control.
 */

import { animate, interactive } from "./animation";
import { buildWorld, parseArgs, toRadians, USAGE } from "./cli";
import { config } from "./config";
import { formatRenderMetrics } from "./metrics";
import { ForwardRenderer } from "./renderer";
import { Viewport } from "./scene/viewport";

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    console.log(USAGE);
    return;
  }

  const world = await buildWorld(args);
  const renderer = new ForwardRenderer({ xScale: args.xScale, ambient: args.ambient });
  const shapeId = config.scene.shapeId;

  if (args.interactive) {
    const viewport = new Viewport([0, 0, 0], Math.max(1, args.width), Math.max(1, args.height), Math.max(1, args.depth));
    await interactive({
      state: {
        world,
        viewport,
        shapeId,
        home: { rotation: toRadians(args.rotation), viewport },
        quit: false,
      },
      renderer,
      showMetrics: args.metrics,
    });
    return;
  }

  if (args.animate) {
    const playback = animate({
      world,
      shapeId,
      renderer,
      fps: args.fps,
      frames: args.frames ?? undefined,
      showMetrics: args.metrics,
    });
    process.once("SIGINT", () => playback.stop());
    await playback.done;
    return;
  }

  const result = renderer.render(world, world.placements());
  process.stdout.write(result.output + "\n");
  for (const line of result.diagnostics) {
    console.warn(line);
  }
  if (args.metrics) {
    console.log(formatRenderMetrics(result.metrics));
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
