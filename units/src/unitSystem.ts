import { readFileSync } from "fs";
import { z } from "zod";
import type { Conversion, Dimension, UnitConverter, UnitSystemName } from "./types.js";

const conversionSchema = z.object({
  factor: z.number().positive(),
  offset: z.number().default(0),
});

const unitSystemSchema = z.object({
  name: z.enum(["METRIC", "FIELD", "LAB"]),
  description: z.string().optional(),
  dimensions: z.object({
    length: conversionSchema,
    pressure: conversionSchema,
    permeability: conversionSchema,
    temperature: conversionSchema,
    thermal_conductivity: conversionSchema,
  }),
});

const catalogSchema = z.object({ systems: z.array(unitSystemSchema).min(1) });

type UnitSystemEntry = z.infer<typeof unitSystemSchema>;

export class UnknownUnitSystemError extends Error {
  readonly system: string;

  constructor(system: string) {
    super(`Unknown unit system '${system}'`);
    this.name = "UnknownUnitSystemError";
    this.system = system;
  }
}

export class UnitSystem implements UnitConverter {
  readonly name: UnitSystemName;
  readonly description?: string;
  private readonly conversions: Record<Dimension, Conversion>;

  constructor(entry: UnitSystemEntry) {
    this.name = entry.name;
    this.description = entry.description;
    this.conversions = entry.dimensions;
  }

  convert(raw: number, dimension: Dimension | null): number {
    if (dimension === null) return raw;
    const { factor, offset } = this.conversions[dimension];
    return raw * factor + offset;
  }

  convertDifference(raw: number, dimension: Dimension | null): number {
    if (dimension === null) return raw;
    return raw * this.conversions[dimension].factor;
  }

  /** Inverse of `convert`, for reporting values back in deck units. */
  fromSi(value: number, dimension: Dimension | null): number {
    if (dimension === null) return value;
    const { factor, offset } = this.conversions[dimension];
    return (value - offset) / factor;
  }
}

let SYSTEM_CACHE: Map<UnitSystemName, UnitSystem> | null = null;

function loadSystems(): Map<UnitSystemName, UnitSystem> {
  if (SYSTEM_CACHE) return SYSTEM_CACHE;
  const raw: unknown = JSON.parse(readFileSync(new URL("../data/unit_systems.json", import.meta.url), "utf-8"));
  const catalog = catalogSchema.parse(raw);
  const systems = new Map<UnitSystemName, UnitSystem>();
  catalog.systems.forEach((entry) => systems.set(entry.name, new UnitSystem(entry)));
  SYSTEM_CACHE = systems;
  return systems;
}

export function listUnitSystems(): UnitSystem[] {
  return Array.from(loadSystems().values());
}

export function isUnitSystemName(name: string): name is UnitSystemName {
  return name === "METRIC" || name === "FIELD" || name === "LAB";
}

export function getUnitSystem(name: string): UnitSystem {
  const key = name.trim().toUpperCase();
  const system = isUnitSystemName(key) ? loadSystems().get(key) : undefined;
  if (!system) throw new UnknownUnitSystemError(name);
  return system;
}
