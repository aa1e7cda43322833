import fs from "fs";

export type Signal = {
  name: string;
  type?: string;
  quality?: string;
};

export type Position = {
  x: number;
  y: number;
};

// Circuit connection points as the game numbers them. Constants and lamps only
// have the first two.
export const Connector = {
  Red: 1,
  Green: 2,
  RedOut: 3,
  GreenOut: 4,
  Copper: 5,
} as const;

export type ConnectorId = (typeof Connector)[keyof typeof Connector];

export type Endpoint = {
  id: number;
  connector: ConnectorId;
};

export type Connection = {
  from: Endpoint;
  to: Endpoint;
};

export type Filter = {
  signal: Signal;
  count: number;
};

export type Comparator = "<" | ">" | "<=" | ">=" | "=" | "!=";

export type Condition = {
  first: Signal;
  comparator: Comparator;
  constant?: number;
  second?: Signal;
  compareType?: "and" | "or";
};

type ComponentBase = {
  id: number;
  position: Position;
  direction?: number;
};

export type ConstantSource = ComponentBase & {
  kind: "constant";
  filters: Filter[];
};

export type Selector = ComponentBase & {
  kind: "selector";
  conditions: Condition[];
  outputs: Signal[];
};

export type Operation = "+" | "-" | "*" | "/" | "%" | ">>" | "AND";

/** Right operand is `second` when set, otherwise `constant`. */
export type Combiner = ComponentBase & {
  kind: "combiner";
  first: Signal;
  operation: Operation;
  constant?: number;
  second?: Signal;
  output: Signal;
};

/** `rgb` reads one packed 24-bit value; `gray` feeds one 0..255 value to all three channels. */
export type ColorMode = "rgb" | "gray";

export type Display = ComponentBase & {
  kind: "display";
  signal: Signal;
  colorMode: ColorMode;
};

export type PowerNode = ComponentBase & {
  kind: "power";
  quality?: string;
};

export type Component = ConstantSource | Selector | Combiner | Display | PowerNode;

export type Graph = {
  components: Component[];
  connections: Connection[];
};

export type Subgraph<H> = {
  components: Component[];
  connections: Connection[];
  handle: H;
};

// RGB, row-major, three bytes per pixel.
export type Frame = {
  width: number;
  height: number;
  data: Uint8Array;
};

export const DIRECTION_EAST = 4;
export const DIRECTION_WEST = 12;

export const TIMER_SIGNAL: Signal = { type: "virtual", name: "signal-T" };
export const STOP_SIGNAL: Signal = { type: "virtual", name: "signal-S" };
export const EVERYTHING_SIGNAL: Signal = { type: "virtual", name: "signal-everything" };
export const EACH_SIGNAL: Signal = { type: "virtual", name: "signal-each" };
/** Bit offset of the frame to show inside a packed grayscale value. */
export const SHIFT_SIGNAL: Signal = { type: "virtual", name: "signal-F" };

/** Key of an integer tile in a set of occupied tiles. */
export function cellKey(x: number, y: number): string {
  return `${x},${y}`;
}

export function readText(path: string): string {
  return fs.readFileSync(path, "utf8");
}

export function writeText(path: string, data: string): void {
  fs.writeFileSync(path, data, "utf8");
}

export function asArray<T>(v: T | T[] | undefined | null): T[] {
  if (v === undefined || v === null) return [];
  return Array.isArray(v) ? v : [v];
}

export function asNum(v: unknown): number | undefined {
  if (typeof v === "number" && Number.isFinite(v)) return v;
  if (typeof v === "string" && v.trim().length > 0) {
    const n = Number(v);
    if (Number.isFinite(n)) return n;
  }
  return undefined;
}

export function asRecord(v: unknown): Record<string, unknown> {
  if (typeof v === "object" && v !== null && !Array.isArray(v)) {
    return Object.fromEntries(Object.entries(v));
  }
  return {};
}
