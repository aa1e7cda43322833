import { describe, it, expect } from "vitest";
import { effectiveFps, normalizeDelay, sampleFrames } from "../src/frame_sample.js";

const timed = (names: string[], delayMs: number) => names.map((frame) => ({ frame, delayMs }));

describe("normalizeDelay", () => {
  it("replaces missing or zero delays with 100 ms", () => {
    expect(normalizeDelay(undefined)).toBe(100);
    expect(normalizeDelay(0)).toBe(100);
    expect(normalizeDelay(-5)).toBe(100);
    expect(normalizeDelay(Number.NaN)).toBe(100);
    expect(normalizeDelay(40)).toBe(40);
  });
});

describe("effectiveFps", () => {
  it("keeps the target when the source is faster", () => {
    expect(effectiveFps([100, 100], 4)).toBe(4);
  });

  it("caps the target at the source rate", () => {
    expect(effectiveFps([500, 500], 4)).toBe(2);
    expect(effectiveFps([0, 0], 30)).toBe(10);
  });

  it("never drops below one frame per second", () => {
    expect(effectiveFps([2000], 4)).toBe(1);
  });

  it("floors the target when there are no delays", () => {
    expect(effectiveFps([], 4.7)).toBe(4);
  });
});

describe("sampleFrames", () => {
  const frames = timed(["a", "b", "c", "d"], 100);

  it("takes every other frame at half the source rate", () => {
    expect(sampleFrames(frames, 5)).toEqual(["a", "c"]);
  });

  it("takes every frame at the source rate", () => {
    expect(sampleFrames(frames, 10)).toEqual(["a", "b", "c", "d"]);
  });

  it("repeats frames above the source rate, clamped to the last frame", () => {
    expect(sampleFrames(frames, 20)).toEqual(["a", "b", "b", "c", "c", "d", "d", "d"]);
  });

  it("keeps the first frame of a clip shorter than one sample", () => {
    expect(sampleFrames(timed(["still"], 0), 4)).toEqual(["still"]);
  });

  it("returns nothing for an empty source", () => {
    expect(sampleFrames([], 4)).toEqual([]);
  });
});
