import { CapacityError } from "./errors.js";
import type { Frame, Signal } from "./util.js";

export type PixelSample = {
  address: number;
  signal: Signal;
  value: number;
};

export type Rgb = [number, number, number];

function channel(v: number, name: string): number {
  if (!Number.isInteger(v) || v < 0 || v > 255) {
    throw new RangeError(`${name} channel out of range: ${v}`);
  }
  return v;
}

export function packRgb(r: number, g: number, b: number): number {
  return channel(r, "red") * 65536 + channel(g, "green") * 256 + channel(b, "blue");
}

/** Splits a packed value back into channels, the way a lamp in RGB mode reads it. */
export function unpackRgb(value: number): Rgb {
  if (!Number.isInteger(value) || value < 0 || value > 0xffffff) {
    throw new RangeError(`packed colour out of range: ${value}`);
  }
  return [Math.floor(value / 65536) % 256, Math.floor(value / 256) % 256, value % 256];
}

export function pixelAt(frame: Frame, x: number, y: number): Rgb {
  const i = (y * frame.width + x) * 3;
  return [frame.data[i], frame.data[i + 1], frame.data[i + 2]];
}

export function cropColumns(frame: Frame, left: number, width: number): Frame {
  if (left < 0 || width < 0 || left + width > frame.width) {
    throw new RangeError(`column range [${left}, ${left + width}) outside frame of width ${frame.width}`);
  }
  const data = new Uint8Array(width * frame.height * 3);
  for (let y = 0; y < frame.height; y += 1) {
    const src = (y * frame.width + left) * 3;
    data.set(frame.data.subarray(src, src + width * 3), y * width * 3);
  }
  return { width, height: frame.height, data };
}

export function encodeFrame(frame: Frame, signals: Signal[]): PixelSample[] {
  const pixels = frame.width * frame.height;
  if (pixels > signals.length) {
    throw new CapacityError("frame pixel count exceeds available signals", pixels, signals.length);
  }
  const out: PixelSample[] = [];
  for (let i = 0; i < pixels; i += 1) {
    const o = i * 3;
    out.push({
      address: i + 1,
      signal: signals[i],
      value: packRgb(frame.data[o], frame.data[o + 1], frame.data[o + 2]),
    });
  }
  return out;
}

/** Bits per pixel of a packed grayscale frame. */
export type GrayscaleBits = 1 | 4 | 8;

export const GRAYSCALE_THRESHOLD = 128;

export function isGrayscaleBits(v: number): v is GrayscaleBits {
  return v === 1 || v === 4 || v === 8;
}

/** Frames that fit in one 32-bit signal value. */
export function framesPerValue(bits: GrayscaleBits): number {
  return 32 / bits;
}

/** Rec. 709 luma on integer channels, rounded down. */
export function luma([r, g, b]: Rgb): number {
  return Math.floor((2126 * r + 7152 * g + 722 * b) / 10000);
}

function quantize(level: number, bits: GrayscaleBits): number {
  if (bits === 1) return level >= GRAYSCALE_THRESHOLD ? 1 : 0;
  if (bits === 4) return level >> 4;
  return level;
}

/**
 * Packs up to `32 / bits` frames into one signed 32-bit value per pixel;
 * frame j sits at bit offset `j * bits`.
 */
export function packGrayscale(frames: Frame[], signals: Signal[], bits: GrayscaleBits): PixelSample[] {
  const first = frames[0];
  if (first === undefined) {
    throw new RangeError("no frames to pack");
  }
  if (frames.length > framesPerValue(bits)) {
    throw new RangeError(`${frames.length} frames do not fit in one value at ${bits} bits per pixel`);
  }
  const pixels = first.width * first.height;
  if (pixels > signals.length) {
    throw new CapacityError("frame pixel count exceeds available signals", pixels, signals.length);
  }
  const out: PixelSample[] = [];
  for (let i = 0; i < pixels; i += 1) {
    let value = 0;
    frames.forEach((frame, j) => {
      const o = i * 3;
      value |= quantize(luma([frame.data[o], frame.data[o + 1], frame.data[o + 2]]), bits) << (j * bits);
    });
    out.push({ address: i + 1, signal: signals[i], value });
  }
  return out;
}
