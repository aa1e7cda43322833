import { Bus, endpoint } from "./bus.js";
import { buildDisplayGrid } from "./display_grid.js";
import { EmptyInputError, FrameShapeError, SynthesisError } from "./errors.js";
import { SELECTOR_BASE_Y, buildFrameSelector } from "./frame_select.js";
import { buildFrameShifter, shifterRows } from "./frame_shift.js";
import { IdCounter } from "./id_counter.js";
import { type ColumnGroup, partitionColumns } from "./partition.js";
import {
  type GrayscaleBits,
  type PixelSample,
  cropColumns,
  encodeFrame,
  framesPerValue,
  isGrayscaleBits,
  packGrayscale,
} from "./pixel_encode.js";
import { buildPowerGrid } from "./power_grid.js";
import { buildTimer } from "./timer.js";
import {
  type Component,
  type Connection,
  Connector,
  type Frame,
  type Graph,
  SHIFT_SIGNAL,
  type Signal,
} from "./util.js";

export const TICKS_PER_SECOND = 60;

export type ProgressFn = (percent: number, status: string) => void;

export type SynthesisOptions = {
  fps: number;
  /** Power node spacing; null leaves the power grid out. */
  coverage: number | null;
  powerQuality?: string;
  /** 0 (the default) shows full colour; 1, 4 or 8 packs 32/bits grayscale frames per value. */
  grayscaleBits?: number;
  onProgress?: ProgressFn;
};

export type SynthesisResult = {
  graph: Graph;
  stop: number;
  ticksPerFrame: number;
  /** Frames carried by one selector pair. */
  framesPerUnit: number;
  /** Selector pairs per column before a group's stack wraps right. */
  rowsPerColumn: number;
  groups: ColumnGroup[];
};

type EncodedGroup = {
  group: ColumnGroup;
  signals: Signal[];
  /** One sample list per selector pair. */
  units: PixelSample[][];
};

function chunk<T>(items: T[], size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) out.push(items.slice(i, i + size));
  return out;
}

function checkBits(bits: number): 0 | GrayscaleBits {
  if (bits === 0) return 0;
  if (isGrayscaleBits(bits)) return bits;
  throw new RangeError(`grayscale bits must be 0, 1, 4 or 8, got ${bits}`);
}

function checkFrames(frames: Frame[]): { width: number; height: number } {
  if (frames.length === 0) {
    throw new EmptyInputError("no sampled frames");
  }
  const { width, height } = frames[0];
  if (width < 1 || height < 1) {
    throw new FrameShapeError(`frames must have at least one pixel, got ${width}x${height}`);
  }
  frames.forEach((f, i) => {
    if (f.width !== width || f.height !== height) {
      throw new FrameShapeError(`frame ${i} is ${f.width}x${f.height}, expected ${width}x${height}`);
    }
    if (f.data.length !== width * height * 3) {
      throw new FrameShapeError(`frame ${i} has ${f.data.length} bytes, expected ${width * height * 3}`);
    }
  });
  return { width, height };
}

/** Throws unless ids strictly increase and every wire lands on a known component. */
export function checkGraph(graph: Graph): void {
  const known = new Set<number>();
  let last = 0;
  for (const c of graph.components) {
    if (!Number.isInteger(c.id) || c.id <= last) {
      throw new SynthesisError(`component id ${c.id} does not follow ${last}`);
    }
    known.add(c.id);
    last = c.id;
  }
  graph.connections.forEach((w, i) => {
    for (const end of [w.from, w.to]) {
      if (!known.has(end.id)) {
        throw new SynthesisError(`connection ${i} references unknown component ${end.id}`);
      }
    }
  });
}

export function synthesizeGraph(frames: Frame[], palette: Signal[], options: SynthesisOptions): SynthesisResult {
  const report = options.onProgress ?? (() => undefined);
  const { width, height } = checkFrames(frames);
  if (!(options.fps > 0) || !Number.isFinite(options.fps)) {
    throw new RangeError(`fps must be positive and finite, got ${options.fps}`);
  }
  const bits = checkBits(options.grayscaleBits ?? 0);
  const framesPerUnit = bits === 0 ? 1 : framesPerValue(bits);
  // Packed frames are picked by whole ticks, so grayscale rounds the frame length down.
  const ticksPerFrame = bits === 0 ? TICKS_PER_SECOND / options.fps : Math.floor(TICKS_PER_SECOND / options.fps);
  if (bits !== 0 && ticksPerFrame < 1) {
    throw new RangeError(`grayscale needs at least one tick per frame, got ${options.fps} fps`);
  }
  // signal-F rides on every gate output in grayscale, so no lamp may read it.
  const usable = bits === 0 ? palette : palette.filter((s) => s.name !== SHIFT_SIGNAL.name);

  // Everything that can fail on capacity runs before the first id is taken.
  const groups = partitionColumns(width, height, usable.length);
  const encoded: EncodedGroup[] = groups.map((group) => {
    const signals = usable.slice(0, group.width * height);
    const crops = frames.map((f) => cropColumns(f, group.left, group.width));
    return {
      group,
      signals,
      units: bits === 0
        ? crops.map((f) => encodeFrame(f, signals))
        : chunk(crops, framesPerUnit).map((part) => packGrayscale(part, signals, bits)),
    };
  });
  const unitCount = Math.ceil(frames.length / framesPerUnit);
  const rowsPerColumn = Math.ceil(unitCount / Math.max(1, Math.floor(groups[0].width / 2)));
  const stackColumns = Math.ceil(unitCount / rowsPerColumn);
  const shifters = bits === 0 ? 0 : shifterRows(bits);

  report(0, "Starting blueprint update");
  const ticksPerUnit = ticksPerFrame * framesPerUnit;
  const stop = frames.length * ticksPerFrame;
  const ids = new IdCounter();
  const components: Component[] = [];
  const connections: Connection[] = [];

  const timer = buildTimer(ids, stop, bits === 0 ? undefined : { ticksPerUnit, ticksPerFrame, bitsPerFrame: bits });
  components.push(...timer.components);
  connections.push(...timer.connections);

  report(10, "Generating power grid");
  let blocked: ReadonlySet<string> = new Set<string>();
  let blockedRows: ReadonlySet<number> = new Set<number>();
  if (options.coverage !== null) {
    const last = groups[groups.length - 1];
    const footprint = Math.max(width, last.left + 2 * stackColumns);
    const power = buildPowerGrid(ids, options.coverage, footprint, height, options.powerQuality, rowsPerColumn + shifters);
    components.push(...power.components);
    connections.push(...power.connections);
    blocked = power.handle.occupied;
    blockedRows = power.handle.rows;
  }

  let previousFirstGate: number | undefined;
  for (const { group, signals, units } of encoded) {
    const selector = buildFrameSelector(ids, units, ticksPerUnit, {
      originX: group.left,
      baseY: SELECTOR_BASE_Y - shifters,
      rowsPerColumn,
      blockedRows,
      stop,
    });
    const shifter = bits === 0 ? undefined : buildFrameShifter(ids, bits, group.left);
    const display = buildDisplayGrid(ids, signals, group.width, height, { x: group.left, y: 0 }, {
      blocked,
      colorMode: bits === 0 ? "rgb" : "gray",
    });
    const { firstGate, clock, output } = selector.handle;
    const firstCell = endpoint(display.handle.firstCell, Connector.Red);

    const links: Connection[] = [];
    if (shifter) {
      links.push(output.link(endpoint(firstGate, Connector.RedOut), shifter.handle.input));
      links.push(new Bus(`levels@${group.left}`).link(firstCell, shifter.handle.output));
    } else {
      links.push(output.link(firstCell, endpoint(firstGate, Connector.RedOut)));
    }
    if (previousFirstGate === undefined) {
      links.push(clock.link(timer.handle.output, endpoint(firstGate, Connector.Green)));
    } else {
      links.push(clock.link(endpoint(firstGate, Connector.Green), endpoint(previousFirstGate, Connector.Green)));
    }
    previousFirstGate = firstGate;

    components.push(...selector.components, ...(shifter?.components ?? []), ...display.components);
    connections.push(...selector.connections, ...(shifter?.connections ?? []), ...links, ...display.connections);
    report(20 + Math.floor(((group.index + 1) * 50) / groups.length), `Processed chunk ${group.index + 1}/${groups.length}`);
  }

  const graph = { components, connections };
  checkGraph(graph);
  return { graph, stop, ticksPerFrame, framesPerUnit, rowsPerColumn, groups };
}
