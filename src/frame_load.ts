import sharp from "sharp";
import { EmptyInputError } from "./errors.js";
import { type TimedFrame, normalizeDelay } from "./frame_sample.js";
import type { Frame } from "./util.js";

export function fitWithin(width: number, height: number, maxSize: number): { width: number; height: number } {
  const scale = Math.min(maxSize / width, maxSize / height, 1);
  return {
    width: Math.max(1, Math.round(width * scale)),
    height: Math.max(1, Math.round(height * scale)),
  };
}

/**
 * Decodes every page of an animated GIF/WebP (or a still image as one page),
 * drops alpha and shrinks each page to fit in `maxSize` x `maxSize`.
 */
export async function loadAnimation(input: string | Buffer, maxSize: number): Promise<TimedFrame<Frame>[]> {
  const meta = await sharp(input, { animated: true }).metadata();
  const pages = meta.pages ?? 1;
  const width = meta.width ?? 0;
  const pageHeight = meta.pageHeight ?? meta.height ?? 0;
  if (width < 1 || pageHeight < 1) {
    throw new EmptyInputError(`image has no pixels (${width}x${pageHeight})`);
  }
  const target = fitWithin(width, pageHeight, maxSize);
  const delays = meta.delay ?? [];

  const out: TimedFrame<Frame>[] = [];
  for (let page = 0; page < pages; page += 1) {
    const { data, info } = await sharp(input, { page })
      .removeAlpha()
      .toColourspace("srgb")
      .resize(target.width, target.height, { fit: "fill" })
      .raw()
      .toBuffer({ resolveWithObject: true });
    out.push({
      frame: { width: info.width, height: info.height, data: new Uint8Array(data) },
      delayMs: normalizeDelay(delays[page]),
    });
  }
  return out;
}
