import fs from "fs";
import os from "os";
import path from "path";
import { describe, it, expect } from "vitest";
import { DEFAULT_PALETTE_PATH, loadPalette, parsePalette } from "../src/palette.js";

describe("parsePalette", () => {
  it("drops the timer signal and repeated entries", () => {
    const palette = parsePalette([
      { type: "virtual", name: "signal-T" },
      { type: "item", name: "iron-plate" },
      { name: "iron-plate" },
      { type: "virtual", name: "signal-A" },
    ]);
    expect(palette).toEqual([
      { type: "item", name: "iron-plate" },
      { type: "virtual", name: "signal-A" },
    ]);
  });

  it("expands every signal once per quality", () => {
    expect(parsePalette([{ name: "a" }, { name: "b" }], ["normal", "rare"])).toEqual([
      { name: "a", quality: "normal" },
      { name: "a", quality: "rare" },
      { name: "b", quality: "normal" },
      { name: "b", quality: "rare" },
    ]);
  });

  it("leaves the list alone for an empty quality list", () => {
    expect(parsePalette([{ name: "a" }], [])).toEqual([{ name: "a" }]);
  });

  it("reports where the input is malformed", () => {
    expect(() => parsePalette([{ type: "item" }])).toThrow(/^invalid signal palette at 0\.name: /);
    expect(() => parsePalette("signals")).toThrow(/^invalid signal palette at <root>: /);
  });
});

describe("loadPalette", () => {
  it("reads the bundled list without the timer signal", () => {
    const palette = loadPalette(DEFAULT_PALETTE_PATH);
    expect(palette).toHaveLength(107);
    expect(palette[0]).toEqual({ type: "virtual", name: "signal-0" });
    expect(palette.some((s) => s.name === "signal-T")).toBe(false);
  });

  it("names the file it could not parse", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "palette-"));
    const file = path.join(dir, "broken.json");
    fs.writeFileSync(file, "[{", "utf8");
    try {
      expect(() => loadPalette(file)).toThrow(`failed to read signal palette ${file}`);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
