import { readFileSync } from "fs";
import { z } from "zod";
import { DIMENSIONS } from "grid-props-units";
import { TypeMismatchError, UnsupportedKeywordError } from "./errors.js";
import type { KeywordCatalog, PropertyDescriptor, PropertyKind } from "./types.js";

const descriptorSchema = z.object({
  name: z.string().min(1),
  kind: z.enum(["int", "double"]),
  default: z.number(),
  dimension: z.enum(DIMENSIONS).nullable(),
  regionEligible: z.boolean(),
});

const catalogSchema = z.object({
  defaultRegionKeyword: z.string().min(1),
  keywords: z.array(descriptorSchema),
});

export function normalizeKeyword(name: string): string {
  return name.trim().toUpperCase();
}

export class KeywordRegistry {
  readonly defaultRegionKeyword: string;
  private readonly byName = new Map<string, PropertyDescriptor>();

  constructor(descriptors: PropertyDescriptor[], defaultRegionKeyword: string) {
    for (const d of descriptors) {
      const name = normalizeKeyword(d.name);
      if (this.byName.has(name)) throw new Error(`Duplicate keyword '${name}' in property registry`);
      if (d.kind === "int" && !Number.isInteger(d.defaultValue)) {
        throw new Error(`Integer keyword '${name}' has non-integer default ${d.defaultValue}`);
      }
      this.byName.set(name, Object.freeze({ ...d, name }));
    }
    this.defaultRegionKeyword = normalizeKeyword(defaultRegionKeyword);
    const region = this.byName.get(this.defaultRegionKeyword);
    if (!region || region.kind !== "int" || !region.regionEligible) {
      throw new Error(`Default region keyword '${defaultRegionKeyword}' must be a region-eligible integer keyword`);
    }
  }

  supports(name: string): boolean {
    return this.byName.has(normalizeKeyword(name));
  }

  descriptorFor(name: string): PropertyDescriptor {
    const descriptor = this.byName.get(normalizeKeyword(name));
    if (!descriptor) throw new UnsupportedKeywordError(name);
    return descriptor;
  }

  descriptorForKind(name: string, kind: PropertyKind): PropertyDescriptor {
    const descriptor = this.descriptorFor(name);
    if (descriptor.kind !== kind) throw new TypeMismatchError(descriptor.name, kind, descriptor.kind);
    return descriptor;
  }

  descriptors(kind?: PropertyKind): PropertyDescriptor[] {
    const all = Array.from(this.byName.values());
    return kind ? all.filter((d) => d.kind === kind) : all;
  }
}

export function parseKeywordCatalog(raw: unknown): KeywordCatalog {
  const catalog = catalogSchema.parse(raw);
  return {
    defaultRegionKeyword: catalog.defaultRegionKeyword,
    descriptors: catalog.keywords.map((k) => ({
      name: k.name,
      kind: k.kind,
      defaultValue: k.default,
      dimension: k.dimension,
      regionEligible: k.regionEligible,
    })),
  };
}

let REGISTRY_CACHE: KeywordRegistry | null = null;

/** Shared registry built from `data/keywords.json` on first use. */
export function getKeywordRegistry(): KeywordRegistry {
  if (REGISTRY_CACHE) return REGISTRY_CACHE;
  const raw: unknown = JSON.parse(readFileSync(new URL("../data/keywords.json", import.meta.url), "utf-8"));
  const { descriptors, defaultRegionKeyword } = parseKeywordCatalog(raw);
  REGISTRY_CACHE = new KeywordRegistry(descriptors, defaultRegionKeyword);
  return REGISTRY_CACHE;
}
