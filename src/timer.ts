import { Bus, endpoint } from "./bus.js";
import type { IdCounter } from "./id_counter.js";
import {
  type Component,
  Connector,
  DIRECTION_EAST,
  DIRECTION_WEST,
  EACH_SIGNAL,
  type Endpoint,
  SHIFT_SIGNAL,
  STOP_SIGNAL,
  type Subgraph,
  TIMER_SIGNAL,
} from "./util.js";

export type TimerHandle = {
  /** Carries the clock value on the green network. */
  output: Endpoint;
};

/** Turns the clock into the bit offset of the frame to show inside a packed value. */
export type PhaseStage = {
  /** Ticks one packed value stays selected. */
  ticksPerUnit: number;
  ticksPerFrame: number;
  bitsPerFrame: number;
};

export const TIMER_POSITIONS = {
  source: { x: -2.5, y: -4 },
  comparator: { x: -1.5, y: -4 },
  incrementer: { x: -1.5, y: -3 },
  remainder: { x: -1.5, y: -5 },
  frameIndex: { x: -2.5, y: -5.5 },
  offset: { x: -1.5, y: -6 },
} as const;

/**
 * Free-running clock: the comparator re-emits signal-T while it is below
 * signal-S and the incrementer feeds T + 1 back into it. The source seeds T with
 * 1 so the loop starts; once T reaches `stop` the comparator stops emitting and
 * the count restarts from the seed.
 */
export function buildTimer(ids: IdCounter, stop: number, phase?: PhaseStage): Subgraph<TimerHandle> {
  if (!(stop > 0) || !Number.isFinite(stop)) {
    throw new RangeError(`timer stop must be a positive finite number, got ${stop}`);
  }
  const sourceId = ids.next();
  const comparatorId = ids.next();
  const incrementerId = ids.next();

  const components: Component[] = [
    {
      id: sourceId,
      kind: "constant",
      position: { ...TIMER_POSITIONS.source },
      direction: DIRECTION_EAST,
      filters: [
        { signal: { ...TIMER_SIGNAL }, count: 1 },
        { signal: { ...STOP_SIGNAL }, count: stop },
      ],
    },
    {
      id: comparatorId,
      kind: "selector",
      position: { ...TIMER_POSITIONS.comparator },
      direction: DIRECTION_EAST,
      conditions: [{ first: { ...TIMER_SIGNAL }, second: { ...STOP_SIGNAL }, comparator: "<" }],
      outputs: [{ ...TIMER_SIGNAL }],
    },
    {
      id: incrementerId,
      kind: "combiner",
      position: { ...TIMER_POSITIONS.incrementer },
      direction: DIRECTION_WEST,
      first: { ...TIMER_SIGNAL },
      operation: "+",
      constant: 1,
      output: { ...TIMER_SIGNAL },
    },
  ];

  const seed = new Bus("timer-seed");
  seed.link(endpoint(sourceId, Connector.Red), endpoint(comparatorId, Connector.Red));
  const feedback = new Bus("timer-feedback");
  feedback.link(endpoint(comparatorId, Connector.Green), endpoint(incrementerId, Connector.GreenOut));
  const clock = new Bus("timer-clock");
  clock.link(endpoint(comparatorId, Connector.GreenOut), endpoint(incrementerId, Connector.Green));

  const connections = [...seed.connections(), ...feedback.connections(), ...clock.connections()];
  if (phase) {
    const stage = buildPhaseStage(ids, phase, clock, endpoint(comparatorId, Connector.GreenOut));
    components.push(...stage.components);
    connections.push(...stage.connections);
  }

  return {
    components,
    connections,
    handle: { output: endpoint(comparatorId, Connector.GreenOut) },
  };
}

/**
 * T % ticksPerUnit -> S, S / ticksPerFrame -> F, F * bitsPerFrame -> F.
 * The last combinator writes back onto the clock network, so every gate input
 * sees the offset next to signal-T.
 */
function buildPhaseStage(ids: IdCounter, phase: PhaseStage, clock: Bus, clockOut: Endpoint): Subgraph<undefined> {
  const { ticksPerUnit, ticksPerFrame, bitsPerFrame } = phase;
  for (const [name, v] of Object.entries(phase)) {
    if (!Number.isInteger(v) || v < 1) throw new RangeError(`${name} must be a positive integer, got ${v}`);
  }
  const remainderId = ids.next();
  const frameIndexId = ids.next();
  const offsetId = ids.next();

  const components: Component[] = [
    {
      id: remainderId,
      kind: "combiner",
      position: { ...TIMER_POSITIONS.remainder },
      direction: DIRECTION_WEST,
      first: { ...TIMER_SIGNAL },
      operation: "%",
      constant: ticksPerUnit,
      output: { ...STOP_SIGNAL },
    },
    {
      id: frameIndexId,
      kind: "combiner",
      position: { ...TIMER_POSITIONS.frameIndex },
      first: { ...STOP_SIGNAL },
      operation: "/",
      constant: ticksPerFrame,
      output: { ...SHIFT_SIGNAL },
    },
    {
      id: offsetId,
      kind: "combiner",
      position: { ...TIMER_POSITIONS.offset },
      direction: DIRECTION_EAST,
      first: { ...EACH_SIGNAL },
      operation: "*",
      constant: bitsPerFrame,
      output: { ...EACH_SIGNAL },
    },
  ];

  const remainder = new Bus("timer-remainder");
  const frameIndex = new Bus("timer-frame-index");
  const connections = [
    clock.link(clockOut, endpoint(remainderId, Connector.Green)),
    remainder.link(endpoint(remainderId, Connector.GreenOut), endpoint(frameIndexId, Connector.Green)),
    frameIndex.link(endpoint(frameIndexId, Connector.GreenOut), endpoint(offsetId, Connector.Green)),
    clock.link(endpoint(offsetId, Connector.GreenOut), clockOut),
  ];
  return { components, connections, handle: undefined };
}
