/**
 * Engine classification for slow-query parsing.
 */

import type {
  Engine,
  EngineFamily,
  DurationUnit,
} from "../../../types/index.js";

/**
 * Map a raw control-plane engine name to a parser family.
 * Aurora variants share the log formats of their base engines.
 */
export function classifyEngineFamily(engine: string): EngineFamily {
  const lower = engine.toLowerCase();
  if (lower.includes("mysql")) return "mysql";
  if (lower.includes("postgres")) return "postgres";
  return "other";
}

export function toEngine(engine: string): Engine {
  switch (classifyEngineFamily(engine)) {
    case "mysql":
      return { kind: "mysql" };
    case "postgres":
      return { kind: "postgres" };
    case "other":
      return { kind: "unsupported", name: engine };
  }
}

export function durationUnitFor(
  engine: Exclude<Engine, { kind: "unsupported" }>,
): DurationUnit {
  return engine.kind === "mysql" ? "seconds" : "milliseconds";
}
