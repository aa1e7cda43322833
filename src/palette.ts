import { fileURLToPath } from "url";
import { z } from "zod";
import { TIMER_SIGNAL, type Signal, readText } from "./util.js";

const paletteSchema = z.array(
  z
    .object({
      name: z.string().min(1),
      type: z.string().optional(),
      quality: z.string().optional(),
    })
    .passthrough(),
);

export const DEFAULT_PALETTE_PATH = fileURLToPath(new URL("../data/signals.json", import.meta.url));

function signalKey(s: Signal): string {
  return `${s.type ?? "item"}/${s.name}/${s.quality ?? "normal"}`;
}

/**
 * Usable signals in addressing order: the reserved timer signal removed,
 * duplicates dropped (first wins), and each signal repeated once per quality
 * when `qualities` is given.
 */
export function parsePalette(raw: unknown, qualities?: string[]): Signal[] {
  const parsed = paletteSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`invalid signal palette at ${issue?.path.join(".") || "<root>"}: ${issue?.message ?? "unknown"}`);
  }
  const base = parsed.data.filter((s) => s.name !== TIMER_SIGNAL.name);
  const expanded =
    qualities && qualities.length > 0 ? base.flatMap((s) => qualities.map((quality) => ({ ...s, quality }))) : base;

  const seen = new Set<string>();
  const out: Signal[] = [];
  for (const s of expanded) {
    const key = signalKey(s);
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(s);
  }
  return out;
}

export function loadPalette(path: string, qualities?: string[]): Signal[] {
  let raw: unknown;
  try {
    raw = JSON.parse(readText(path));
  } catch (e) {
    throw new Error(`failed to read signal palette ${path}: ${e instanceof Error ? e.message : String(e)}`, { cause: e });
  }
  return parsePalette(raw, qualities);
}
