import { describe, it, expect } from "vitest";
import { buildDisplayGrid } from "../src/display_grid.js";
import { CapacityError } from "../src/errors.js";
import { IdCounter } from "../src/id_counter.js";
import { toWire } from "../src/blueprint.js";
import { cellKey } from "../src/util.js";
import { signals } from "./helpers.js";

describe("buildDisplayGrid", () => {
  it("places one lamp per cell, row-major, offset from the origin", () => {
    const grid = buildDisplayGrid(new IdCounter(1), signals(6), 3, 2, { x: 10, y: 0 });
    expect(grid.components.map((c) => [c.id, c.position.x, c.position.y])).toEqual([
      [1, 10, 0],
      [2, 11, 0],
      [3, 12, 0],
      [4, 10, 1],
      [5, 11, 1],
      [6, 12, 1],
    ]);
    expect(grid.handle.firstCell).toBe(1);
  });

  it("binds each lamp to its own signal", () => {
    const grid = buildDisplayGrid(new IdCounter(1), signals(4), 2, 2, { x: 0, y: 0 });
    expect(grid.components.map((c) => (c.kind === "display" ? c.signal.name : null))).toEqual([
      "sig-1",
      "sig-2",
      "sig-3",
      "sig-4",
    ]);
  });

  it("links the top row across and every column down", () => {
    const grid = buildDisplayGrid(new IdCounter(1), signals(6), 3, 2, { x: 0, y: 0 });
    expect(grid.connections.map(toWire)).toEqual([
      [1, 1, 2, 1],
      [2, 1, 3, 1],
      [1, 1, 4, 1],
      [2, 1, 5, 1],
      [3, 1, 6, 1],
    ]);
  });

  it("needs one horizontal link for a 2x1 grid", () => {
    const grid = buildDisplayGrid(new IdCounter(7), signals(3), 2, 1, { x: 0, y: 0 });
    expect(grid.connections.map(toWire)).toEqual([[7, 1, 8, 1]]);
  });

  it("has no links for a single cell", () => {
    const grid = buildDisplayGrid(new IdCounter(1), signals(1), 1, 1, { x: 0, y: 0 });
    expect(grid.connections).toEqual([]);
  });

  it("refuses more cells than signals", () => {
    expect(() => buildDisplayGrid(new IdCounter(), signals(3), 2, 2, { x: 0, y: 0 })).toThrow(CapacityError);
  });

  it("reads packed colour by default and gray levels on request", () => {
    const rgb = buildDisplayGrid(new IdCounter(1), signals(1), 1, 1, { x: 0, y: 0 });
    const gray = buildDisplayGrid(new IdCounter(1), signals(1), 1, 1, { x: 0, y: 0 }, { colorMode: "gray" });
    expect(rgb.components.map((c) => (c.kind === "display" ? c.colorMode : null))).toEqual(["rgb"]);
    expect(gray.components.map((c) => (c.kind === "display" ? c.colorMode : null))).toEqual(["gray"]);
  });

  it("leaves blocked tiles empty and bridges the column across them", () => {
    const blocked = new Set([cellKey(1, 1), cellKey(1, 2)]);
    const grid = buildDisplayGrid(new IdCounter(1), signals(8), 2, 4, { x: 0, y: 0 }, { blocked });
    expect(grid.components.map((c) => [c.id, c.position.x, c.position.y, c.kind === "display" ? c.signal.name : null])).toEqual([
      [1, 0, 0, "sig-1"],
      [2, 1, 0, "sig-2"],
      [3, 0, 1, "sig-3"],
      [4, 0, 2, "sig-5"],
      [5, 0, 3, "sig-7"],
      [6, 1, 3, "sig-8"],
    ]);
    expect(grid.connections.map(toWire)).toEqual([
      [1, 1, 2, 1],
      [1, 1, 3, 1],
      [3, 1, 4, 1],
      [4, 1, 5, 1],
      [2, 1, 6, 1],
    ]);
  });

  it("offsets blocked tiles by the grid origin", () => {
    const grid = buildDisplayGrid(new IdCounter(1), signals(2), 2, 1, { x: 5, y: 0 }, { blocked: new Set([cellKey(1, 0)]) });
    expect(grid.components).toHaveLength(2);
  });
});
