import { Bus, endpoint } from "./bus.js";
import type { IdCounter } from "./id_counter.js";
import { type Component, type Connection, Connector, type Subgraph, cellKey } from "./util.js";

export type PowerHandle = {
  /** Tiles under a node, as `cellKey` strings. */
  occupied: ReadonlySet<string>;
  /** Every y that some node covers. */
  rows: ReadonlySet<number>;
};

export type LatticeSize = {
  cols: number;
  rows: number;
  /** Rows placed above the origin row to reach the selector stack. */
  rowsAbove: number;
};

/** Supply area edge length per substation quality. */
export const COVERAGE_BY_QUALITY: Record<string, number> = {
  normal: 18,
  uncommon: 20,
  rare: 22,
  epic: 24,
  legendary: 28,
};

/** Keeps the lamp top row and the timer rows (-3..-6) off node tiles. */
export const MIN_COVERAGE = 6;

export const POWER_ORIGIN = { x: -1, y: -1 } as const;

/** A node at (x, y) covers the 2x2 block ending at (x, y). */
const NODE_TILES: [number, number][] = [[-1, -1], [-1, 0], [0, -1], [0, 0]];

/**
 * `stackRows` is the height of the tallest selector column. Every lattice row
 * above the origin forces the selectors to step over its two tiles, so rows
 * are added until the stack, grown by those steps, is covered.
 */
export function powerLatticeSize(coverage: number, width: number, height: number, stackRows = 0): LatticeSize {
  const half = (coverage - 2) / 2;
  let rowsAbove = Math.max(0, Math.ceil((stackRows - half) / coverage));
  while (stackRows - half + rowsAbove * 2 > rowsAbove * coverage) rowsAbove += 1;
  return {
    cols: Math.ceil((width - half) / coverage) + 1,
    rows: Math.ceil((height - half) / coverage) + 1 + rowsAbove,
    rowsAbove,
  };
}

export function buildPowerGrid(
  ids: IdCounter,
  coverage: number,
  width: number,
  height: number,
  quality?: string,
  stackRows = 0,
): Subgraph<PowerHandle> {
  if (!Number.isInteger(coverage) || coverage < MIN_COVERAGE) {
    throw new RangeError(`power coverage must be an integer of at least ${MIN_COVERAGE}, got ${coverage}`);
  }
  const { cols, rows, rowsAbove } = powerLatticeSize(coverage, width, height, stackRows);
  const top = POWER_ORIGIN.y - rowsAbove * coverage;
  const components: Component[] = [];
  const connections: Connection[] = [];
  const bus = new Bus("power");
  const occupied = new Set<string>();
  const covered = new Set<number>();
  let above: number[] = [];

  for (let i = 0; i < rows; i += 1) {
    const row: number[] = [];
    const y = top + i * coverage;
    for (let j = 0; j < cols; j += 1) {
      const id = ids.next();
      const x = POWER_ORIGIN.x + j * coverage;
      components.push({
        id,
        kind: "power",
        position: { x, y },
        ...(quality && quality !== "normal" ? { quality } : {}),
      });
      for (const [dx, dy] of NODE_TILES) occupied.add(cellKey(x + dx, y + dy));
      if (i > 0) connections.push(bus.link(endpoint(id, Connector.Copper), endpoint(above[j], Connector.Copper)));
      if (j > 0) connections.push(bus.link(endpoint(id, Connector.Copper), endpoint(row[j - 1], Connector.Copper)));
      row.push(id);
    }
    covered.add(y - 1).add(y);
    above = row;
  }

  return { components, connections, handle: { occupied, rows: covered } };
}
