import type { KeywordRegistry, PropertyKind } from "grid-props-registry";
import { normalizeKeyword } from "grid-props-registry";
import type { GridDims } from "./grid.js";
import { GridProperty } from "./gridProperty.js";
import { LazySequence } from "./sequence.js";

/** Materialized properties of one kind, keyed by normalized name in insertion order. */
export class PropertyCollection {
  readonly kind: PropertyKind;
  private readonly registry: KeywordRegistry;
  private readonly grid: GridDims;
  private readonly properties = new Map<string, GridProperty>();

  constructor(kind: PropertyKind, registry: KeywordRegistry, grid: GridDims) {
    this.kind = kind;
    this.registry = registry;
    this.grid = grid;
  }

  get size(): number {
    return this.properties.size;
  }

  has(name: string): boolean {
    return this.properties.has(normalizeKeyword(name));
  }

  get(name: string): GridProperty | undefined {
    return this.properties.get(normalizeKeyword(name));
  }

  getOrCreate(name: string): GridProperty {
    const existing = this.get(name);
    if (existing) return existing;
    const descriptor = this.registry.descriptorForKind(name, this.kind);
    const property = new GridProperty(descriptor, this.grid);
    this.properties.set(descriptor.name, property);
    return property;
  }

  names(): string[] {
    return Array.from(this.properties.keys());
  }

  iterate(): LazySequence<GridProperty> {
    return new LazySequence(() => this.properties.values());
  }
}
