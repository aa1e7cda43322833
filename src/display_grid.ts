import { Bus, endpoint } from "./bus.js";
import { CapacityError } from "./errors.js";
import type { IdCounter } from "./id_counter.js";
import {
  type ColorMode,
  type Component,
  type Connection,
  Connector,
  type Endpoint,
  type Position,
  type Signal,
  type Subgraph,
  cellKey,
} from "./util.js";

export type DisplayHandle = {
  firstCell: number;
};

export type DisplayOptions = {
  /** Tiles (as `cellKey` strings) left without a lamp. */
  blocked?: ReadonlySet<string>;
  colorMode?: ColorMode;
};

/**
 * Lamp `r * width + c` reads `signals[r * width + c]`, whether or not its
 * neighbours were placed. Blocked tiles are bridged: each column links its
 * placed lamps top to bottom.
 */
export function buildDisplayGrid(
  ids: IdCounter,
  signals: Signal[],
  width: number,
  height: number,
  origin: Position,
  options: DisplayOptions = {},
): Subgraph<DisplayHandle> {
  if (width < 1 || height < 1) {
    throw new RangeError(`display grid needs at least one cell, got ${width}x${height}`);
  }
  if (width * height > signals.length) {
    throw new CapacityError("display grid has more cells than signals", width * height, signals.length);
  }
  const { blocked = new Set<string>(), colorMode = "rgb" } = options;

  const components: Component[] = [];
  const columns: Endpoint[][] = Array.from({ length: width }, () => []);
  const topRow: Endpoint[] = [];
  for (let r = 0; r < height; r += 1) {
    for (let c = 0; c < width; c += 1) {
      const position = { x: origin.x + c, y: origin.y + r };
      if (blocked.has(cellKey(position.x, position.y))) continue;
      const id = ids.next();
      components.push({ id, kind: "display", position, signal: signals[r * width + c], colorMode });
      columns[c].push(endpoint(id, Connector.Red));
      if (r === 0) topRow.push(endpoint(id, Connector.Red));
    }
  }
  const first = components[0];
  if (first === undefined) {
    throw new RangeError(`every cell of the ${width}x${height} grid at ${origin.x},${origin.y} is blocked`);
  }

  const bus = new Bus(`display@${origin.x},${origin.y}`);
  const connections: Connection[] = [];
  // Top row across, then every column down: one network for the whole grid.
  connections.push(...bus.chain(topRow));
  for (const column of columns) connections.push(...bus.chain(column));

  return { components, connections, handle: { firstCell: first.id } };
}
