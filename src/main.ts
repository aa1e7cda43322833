#!/usr/bin/env node
import { loadConfig } from "./config.js";
import { loadPalette } from "./palette.js";
import { loadAnimation } from "./frame_load.js";
import { effectiveFps, sampleFrames } from "./frame_sample.js";
import { synthesizeGraph } from "./assemble.js";
import { encodeBlueprint, toBlueprintDocument } from "./blueprint.js";
import { writeText } from "./util.js";

async function main() {
  const [imagePath, rulesPath, outText, outJson] = process.argv.slice(2);
  if (!imagePath || !rulesPath || !outText) {
    console.error("Usage: node dist/main.js <in.gif> <rules.yaml> <out.txt|-> [out.json]");
    process.exit(1);
  }
  const cfg = loadConfig(rulesPath);
  const palette = loadPalette(cfg.signals, cfg.qualities);
  const timed = await loadAnimation(imagePath, cfg.max_size);
  const fps = effectiveFps(timed.map((t) => t.delayMs), cfg.target_fps);
  const frames = sampleFrames(timed, fps);
  console.error(`frames: source=${timed.length} sampled=${frames.length} fps=${fps} signals=${palette.length}`);

  const result = synthesizeGraph(frames, palette, {
    fps,
    coverage: cfg.power.coverage,
    powerQuality: cfg.power.quality,
    grayscaleBits: cfg.grayscale_bits,
    onProgress: (percent, status) => console.error(`[${percent}%] ${status}`),
  });
  const doc = toBlueprintDocument(result.graph);
  const text = encodeBlueprint(doc);

  if (outText === "-") {
    process.stdout.write(`${text}\n`);
  } else {
    writeText(outText, text);
  }
  if (outJson) writeText(outJson, JSON.stringify(doc, null, 2));
  console.error(
    `summary: entities=${result.graph.components.length} wires=${result.graph.connections.length} groups=${result.groups.length} stop=${result.stop} frames/unit=${result.framesPerUnit}`,
  );
}

main().catch((e) => {
  console.error(e instanceof Error ? e.message : e);
  process.exit(1);
});
