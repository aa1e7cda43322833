import { Bus, endpoint } from "./bus.js";
import { EmptyInputError } from "./errors.js";
import type { IdCounter } from "./id_counter.js";
import type { PixelSample } from "./pixel_encode.js";
import {
  type Component,
  type Connection,
  Connector,
  DIRECTION_EAST,
  EVERYTHING_SIGNAL,
  type Subgraph,
  TIMER_SIGNAL,
} from "./util.js";

export type SelectorHandle = {
  firstGate: number;
  /** Green inputs of every gate. */
  clock: Bus;
  /** Red outputs of every gate. */
  output: Bus;
};

export type TickWindow = {
  lower: number;
  upper: number;
};

export type SelectorLayout = {
  originX: number;
  /** Row of the first pair; later pairs stack upwards. */
  baseY?: number;
  /** Pairs per column before the stack moves two tiles right. */
  rowsPerColumn?: number;
  /** Rows held by something else; a pair landing on one moves two rows up. */
  blockedRows?: ReadonlySet<number>;
  /** Upper bound of the last window, when the clock stops short of a full window. */
  stop?: number;
};

export const SELECTOR_BASE_Y = -3;

/**
 * Half-open tick range during which frame `index` is shown. Bounds stay
 * real-valued; the next window's lower bound is computed by the same product,
 * so neighbours always abut.
 */
export function frameWindow(index: number, ticksPerFrame: number): TickWindow {
  return { lower: index * ticksPerFrame, upper: (index + 1) * ticksPerFrame };
}

/**
 * One constant/gate pair per frame, stacked upwards from `baseY` in columns of
 * `rowsPerColumn`.
 *
 * Gates share two networks: the green inputs (clock) and the red outputs
 * (combined frame). Only one window is open per clock value, so at most one
 * gate drives the red output at a time. The first gate of each column links to
 * the first gate of the column before it.
 */
export function buildFrameSelector(
  ids: IdCounter,
  frames: PixelSample[][],
  ticksPerFrame: number,
  layout: SelectorLayout,
): Subgraph<SelectorHandle> {
  if (frames.length === 0) {
    throw new EmptyInputError("cannot build a frame selector without frames");
  }
  if (!(ticksPerFrame > 0) || !Number.isFinite(ticksPerFrame)) {
    throw new RangeError(`ticks per frame must be positive and finite, got ${ticksPerFrame}`);
  }
  const { originX, baseY = SELECTOR_BASE_Y, blockedRows = new Set<number>(), stop } = layout;
  const rowsPerColumn = layout.rowsPerColumn ?? frames.length;
  if (!Number.isInteger(rowsPerColumn) || rowsPerColumn < 1) {
    throw new RangeError(`rows per column must be a positive integer, got ${rowsPerColumn}`);
  }

  const components: Component[] = [];
  const connections: Connection[] = [];
  const clock = new Bus(`selector-clock@${originX}`);
  const output = new Bus(`selector-output@${originX}`);
  const gates: number[] = [];
  let columnHead: number | undefined;
  let row = 0;
  let skipped = 0;
  let shift = 0;

  frames.forEach((samples, i) => {
    let y = baseY - row - skipped;
    if (blockedRows.has(Math.floor(y))) {
      skipped += 2;
      y -= 2;
    }
    const sourceId = ids.next();
    const gateId = ids.next();
    const window = frameWindow(i, ticksPerFrame);
    const upper = stop !== undefined && i === frames.length - 1 ? Math.min(window.upper, stop) : window.upper;

    components.push({
      id: sourceId,
      kind: "constant",
      position: { x: originX + shift + 0.5, y },
      direction: DIRECTION_EAST,
      filters: samples.map((s) => ({ signal: s.signal, count: s.value })),
    });
    components.push({
      id: gateId,
      kind: "selector",
      position: { x: originX + shift + 1.5, y },
      direction: DIRECTION_EAST,
      conditions: [
        { first: { ...TIMER_SIGNAL }, constant: window.lower, comparator: ">=" },
        { first: { ...TIMER_SIGNAL }, constant: upper, comparator: "<", compareType: "and" },
      ],
      outputs: [{ ...EVERYTHING_SIGNAL }],
    });

    const feed = new Bus(`frame-${i}`);
    connections.push(feed.link(endpoint(sourceId, Connector.Red), endpoint(gateId, Connector.Red)));

    const previous = row === 0 ? columnHead : gates[gates.length - 1];
    if (previous !== undefined) {
      connections.push(clock.link(endpoint(previous, Connector.Green), endpoint(gateId, Connector.Green)));
      connections.push(output.link(endpoint(previous, Connector.RedOut), endpoint(gateId, Connector.RedOut)));
    }
    if (row === 0) columnHead = gateId;
    gates.push(gateId);

    row += 1;
    if (row >= rowsPerColumn) {
      row = 0;
      skipped = 0;
      shift += 2;
    }
  });

  return { components, connections, handle: { firstGate: gates[0], clock, output } };
}
