import type { Frame, Signal } from "../src/util.js";

export function solidFrame(width: number, height: number, rgb: [number, number, number]): Frame {
  const data = new Uint8Array(width * height * 3);
  for (let i = 0; i < width * height; i += 1) data.set(rgb, i * 3);
  return { width, height, data };
}

/** Builds a frame from rows of packed 0xRRGGBB values. */
export function frameFromRows(rows: number[][]): Frame {
  const height = rows.length;
  const width = rows[0]?.length ?? 0;
  const data = new Uint8Array(width * height * 3);
  rows.forEach((row, y) =>
    row.forEach((v, x) => {
      const o = (y * width + x) * 3;
      data[o] = (v >> 16) & 0xff;
      data[o + 1] = (v >> 8) & 0xff;
      data[o + 2] = v & 0xff;
    }),
  );
  return { width, height, data };
}

export function signals(count: number): Signal[] {
  return Array.from({ length: count }, (_, i) => ({ type: "item", name: `sig-${i + 1}` }));
}
