import path from "path";
import yaml from "js-yaml";
import { COVERAGE_BY_QUALITY, MIN_COVERAGE } from "./power_grid.js";
import { DEFAULT_PALETTE_PATH } from "./palette.js";
import { asArray, asNum, asRecord, readText } from "./util.js";

type PaletteRules = {
  qualities?: unknown;
};

type PowerRules = {
  quality?: unknown;
  coverage?: unknown;
};

export type BlueprintConfig = {
  target_fps: number;
  max_size: number;
  signals: string;
  qualities: string[];
  /** 0 for full colour, else bits per grayscale pixel (1, 4 or 8). */
  grayscale_bits: number;
  power: {
    /** null when the power grid is switched off. */
    coverage: number | null;
    quality: string;
  };
};

const defaultConfig: BlueprintConfig = {
  target_fps: 4,
  max_size: 30,
  signals: DEFAULT_PALETTE_PATH,
  qualities: [],
  grayscale_bits: 0,
  power: { coverage: COVERAGE_BY_QUALITY.normal, quality: "normal" },
};

function mergePower(raw: PowerRules): BlueprintConfig["power"] {
  const quality = typeof raw.quality === "string" ? raw.quality.trim().toLowerCase() : defaultConfig.power.quality;
  if (quality === "none") return { coverage: null, quality };
  const explicit = asNum(raw.coverage);
  const coverage: number | undefined = explicit !== undefined ? Math.max(MIN_COVERAGE, Math.round(explicit)) : COVERAGE_BY_QUALITY[quality];
  if (coverage === undefined) {
    throw new Error(`unknown power quality '${quality}' (expected one of ${[...Object.keys(COVERAGE_BY_QUALITY), "none"].join(", ")})`);
  }
  return { coverage, quality };
}

function mergeGrayscaleBits(raw: unknown): number {
  const bits = asNum(raw) ?? defaultConfig.grayscale_bits;
  if (![0, 1, 4, 8].includes(bits)) {
    throw new Error(`grayscale_bits must be 0, 1, 4 or 8, got ${bits}`);
  }
  return bits;
}

/** Merges a parsed rules document over the defaults. Relative paths resolve against `baseDir`. */
export function mergeConfig(rules: unknown, baseDir = process.cwd()): BlueprintConfig {
  const raw = asRecord(rules);
  const palette: PaletteRules = asRecord(raw.palette);
  const power: PowerRules = asRecord(raw.power);
  const signals = typeof raw.signals === "string" && raw.signals.trim().length > 0
    ? path.resolve(baseDir, raw.signals)
    : defaultConfig.signals;
  return {
    target_fps: Math.max(1, Math.floor(asNum(raw.target_fps) ?? defaultConfig.target_fps)),
    max_size: Math.max(1, Math.floor(asNum(raw.max_size) ?? defaultConfig.max_size)),
    signals,
    qualities: asArray<unknown>(palette.qualities).filter((q): q is string => typeof q === "string"),
    grayscale_bits: mergeGrayscaleBits(raw.grayscale_bits),
    power: mergePower(power),
  };
}

export function loadConfig(rulesPath?: string): BlueprintConfig {
  if (!rulesPath) return mergeConfig(undefined);
  const rules = yaml.load(readText(rulesPath));
  return mergeConfig(rules, path.dirname(path.resolve(rulesPath)));
}
