import fs from "fs";
import { pathToFileURL } from "url";
import { strFromU8, strToU8, unzlibSync, zlibSync } from "fflate";
import { z } from "zod";
import { SerializationError } from "./errors.js";
import type { Component, Condition, Connection, Graph, Signal } from "./util.js";

export const FORMAT_VERSION = "0";
export const BLUEPRINT_VERSION = 562949955518464;

const ENTITY_NAMES: Record<Component["kind"], string> = {
  constant: "constant-combinator",
  selector: "decider-combinator",
  combiner: "arithmetic-combinator",
  display: "small-lamp",
  power: "substation",
};

const signalSchema = z
  .object({
    type: z.string().optional(),
    name: z.string(),
    quality: z.string().optional(),
  })
  .passthrough();

const entitySchema = z
  .object({
    entity_number: z.number().int().positive(),
    name: z.string(),
    position: z.object({ x: z.number(), y: z.number() }),
    direction: z.number().int().optional(),
    control_behavior: z.record(z.unknown()).optional(),
    quality: z.string().optional(),
    always_on: z.boolean().optional(),
  })
  .passthrough();

const wireSchema = z.tuple([z.number().int(), z.number().int(), z.number().int(), z.number().int()]);

const documentSchema = z.object({
  blueprint: z
    .object({
      icons: z.array(z.object({ signal: signalSchema, index: z.number().int() })),
      entities: z.array(entitySchema),
      wires: z.array(wireSchema),
      item: z.string(),
      version: z.number().int(),
    })
    .passthrough(),
});

export type BlueprintEntity = z.infer<typeof entitySchema>;
export type BlueprintWire = z.infer<typeof wireSchema>;
export type BlueprintDocument = z.infer<typeof documentSchema>;

// Fresh copy per use so no two entities share a signal object.
function signalJson(s: Signal): Signal {
  return { ...s };
}

function conditionJson(c: Condition): Record<string, unknown> {
  return {
    first_signal: signalJson(c.first),
    ...(c.second ? { second_signal: signalJson(c.second) } : {}),
    ...(c.constant !== undefined ? { constant: c.constant } : {}),
    comparator: c.comparator,
    ...(c.compareType ? { compare_type: c.compareType } : {}),
  };
}

function controlBehavior(c: Component): Record<string, unknown> | undefined {
  switch (c.kind) {
    case "constant":
      return {
        sections: {
          sections: [
            {
              index: 1,
              filters: c.filters.map((f, i) => ({
                index: i + 1,
                comparator: "=",
                count: f.count,
                quality: "normal",
                ...signalJson(f.signal),
              })),
            },
          ],
        },
      };
    case "selector":
      return {
        decider_conditions: {
          conditions: c.conditions.map(conditionJson),
          outputs: c.outputs.map((s) => ({ signal: signalJson(s) })),
        },
      };
    case "combiner":
      return {
        arithmetic_conditions: {
          first_signal: signalJson(c.first),
          ...(c.second ? { second_signal: signalJson(c.second) } : { second_constant: c.constant ?? 0 }),
          operation: c.operation,
          output_signal: signalJson(c.output),
        },
      };
    case "display":
      if (c.colorMode === "gray") {
        const { signal } = c;
        return {
          use_colors: true,
          color_mode: 1,
          red_signal: signalJson(signal),
          green_signal: signalJson(signal),
          blue_signal: signalJson(signal),
        };
      }
      return { use_colors: true, rgb_signal: signalJson(c.signal), color_mode: 2 };
    case "power":
      return undefined;
  }
}

export function toEntity(c: Component): BlueprintEntity {
  const entity: BlueprintEntity = {
    entity_number: c.id,
    name: ENTITY_NAMES[c.kind],
    position: { x: c.position.x, y: c.position.y },
  };
  if (c.direction !== undefined) entity.direction = c.direction;
  const behavior = controlBehavior(c);
  if (behavior) entity.control_behavior = behavior;
  if (c.kind === "display") entity.always_on = true;
  if (c.kind === "power" && c.quality) entity.quality = c.quality;
  return entity;
}

export function toWire(w: Connection): BlueprintWire {
  return [w.from.id, w.from.connector, w.to.id, w.to.connector];
}

export function toBlueprintDocument(graph: Graph): BlueprintDocument {
  return {
    blueprint: {
      icons: [{ signal: { name: "decider-combinator" }, index: 1 }],
      entities: graph.components.map(toEntity),
      wires: graph.connections.map(toWire),
      item: "blueprint",
      version: BLUEPRINT_VERSION,
    },
  };
}

function finiteOnly(key: string, value: unknown): unknown {
  if (typeof value === "number" && !Number.isFinite(value)) {
    throw new TypeError(`non-finite number ${value} at "${key}"`);
  }
  return value;
}

/** `"0"` + base64(zlib level 9(UTF-8 JSON)). */
export function encodeBlueprint(doc: unknown): string {
  let json: string | undefined;
  try {
    json = JSON.stringify(doc, finiteOnly);
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new SerializationError(`blueprint cannot be rendered as JSON: ${msg}`, { cause: e });
  }
  if (json === undefined) {
    throw new SerializationError("blueprint rendered to nothing");
  }
  const compressed = zlibSync(strToU8(json), { level: 9 });
  return FORMAT_VERSION + Buffer.from(compressed).toString("base64");
}

export function decodeBlueprint(text: string): BlueprintDocument {
  const trimmed = text.trim();
  if (trimmed.slice(0, 1) !== FORMAT_VERSION) {
    throw new SerializationError(`unsupported blueprint string version "${trimmed.slice(0, 1)}"`);
  }
  const body = trimmed.slice(1);
  if (body.length % 4 !== 0 || !/^[A-Za-z0-9+/]*={0,2}$/.test(body)) {
    throw new SerializationError("blueprint string is not valid base64");
  }
  let json: string;
  try {
    json = strFromU8(unzlibSync(Buffer.from(body, "base64")));
  } catch (e) {
    throw new SerializationError("blueprint string does not inflate", { cause: e });
  }
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (e) {
    throw new SerializationError("blueprint payload is not JSON", { cause: e });
  }
  const parsed = documentSchema.safeParse(raw);
  if (!parsed.success) {
    throw new SerializationError(`blueprint payload has the wrong shape: ${parsed.error.issues[0]?.message ?? "unknown"}`);
  }
  return parsed.data;
}

const isMain = !!process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href;
if (isMain && process.argv.length >= 3) {
  const input = process.argv[2];
  const output = process.argv[3] ?? "-";
  try {
    const doc = decodeBlueprint(fs.readFileSync(input, "utf8"));
    const data = JSON.stringify(doc, null, 2);
    if (output === "-") {
      process.stdout.write(data);
    } else {
      fs.writeFileSync(output, data, "utf8");
    }
    console.error(`blueprint: entities=${doc.blueprint.entities.length} wires=${doc.blueprint.wires.length}`);
  } catch (e) {
    console.error(e instanceof Error ? e.message : String(e));
    process.exit(1);
  }
}
