import { Bus, endpoint } from "./bus.js";
import type { IdCounter } from "./id_counter.js";
import type { GrayscaleBits } from "./pixel_encode.js";
import { SELECTOR_BASE_Y } from "./frame_select.js";
import {
  type Combiner,
  type Component,
  type Connection,
  Connector,
  DIRECTION_EAST,
  EACH_SIGNAL,
  type Endpoint,
  SHIFT_SIGNAL,
  type Subgraph,
} from "./util.js";

export type ShifterHandle = {
  /** Takes the selected packed value together with signal-F. */
  input: Endpoint;
  /** One 0..255 level per pixel signal. */
  output: Endpoint;
};

type Step = Pick<Combiner, "operation" | "constant" | "second">;

function steps(bits: GrayscaleBits): Step[] {
  const out: Step[] = [
    { operation: ">>", second: { ...SHIFT_SIGNAL } },
    { operation: "AND", constant: 2 ** bits - 1 },
  ];
  if (bits !== 8) out.push({ operation: "*", constant: 255 / (2 ** bits - 1) });
  return out;
}

/** Rows the shifter takes above the lamps; the selector stack starts right above them. */
export function shifterRows(bits: GrayscaleBits): number {
  return steps(bits).length;
}

/**
 * Unpacks the frame at bit offset signal-F: shift, mask, then stretch 1- and
 * 4-bit levels to 0..255. Stacked upwards from the selector base row.
 */
export function buildFrameShifter(ids: IdCounter, bits: GrayscaleBits, originX: number): Subgraph<ShifterHandle> {
  const stages: Combiner[] = steps(bits).map((step, s) => ({
    id: ids.next(),
    kind: "combiner" as const,
    position: { x: originX + 1.5, y: SELECTOR_BASE_Y - s },
    direction: DIRECTION_EAST,
    first: { ...EACH_SIGNAL },
    ...step,
    output: { ...EACH_SIGNAL },
  }));
  const connections: Connection[] = [];
  for (let s = 1; s < stages.length; s += 1) {
    const link = new Bus(`shifter-${s}@${originX}`);
    connections.push(link.link(endpoint(stages[s - 1].id, Connector.GreenOut), endpoint(stages[s].id, Connector.Green)));
  }
  const components: Component[] = stages;
  return {
    components,
    connections,
    handle: {
      input: endpoint(stages[0].id, Connector.Red),
      output: endpoint(stages[stages.length - 1].id, Connector.RedOut),
    },
  };
}
