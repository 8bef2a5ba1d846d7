import type { Dimension } from "grid-props-units";
import type { PropertyDescriptor, PropertyKind } from "grid-props-registry";
import { InvalidRecordError } from "./errors.js";
import type { GridDims } from "./grid.js";
import { LazySequence, filter, iota } from "./sequence.js";

/** Query-side view of a property: what the rest of the pipeline gets. */
export interface ReadonlyGridProperty {
  readonly name: string;
  readonly kind: PropertyKind;
  readonly defaultValue: number;
  readonly dimension: Dimension | null;
  readonly size: number;
  get(i: number, j: number, k: number): number;
  iget(index: number): number;
  values(): readonly number[];
  distinctValues(): number[];
}

export class GridProperty implements ReadonlyGridProperty {
  readonly name: string;
  readonly kind: PropertyKind;
  readonly defaultValue: number;
  readonly dimension: Dimension | null;
  private readonly grid: GridDims;
  private readonly data: number[];

  constructor(descriptor: PropertyDescriptor, grid: GridDims) {
    this.name = descriptor.name;
    this.kind = descriptor.kind;
    this.defaultValue = descriptor.defaultValue;
    this.dimension = descriptor.dimension;
    this.grid = grid;
    this.data = new Array<number>(grid.size).fill(descriptor.defaultValue);
  }

  get size(): number {
    return this.data.length;
  }

  get(i: number, j: number, k: number): number {
    return this.data[this.grid.globalIndex(i, j, k)];
  }

  set(i: number, j: number, k: number, value: number): void {
    this.iset(this.grid.globalIndex(i, j, k), value);
  }

  iget(index: number): number {
    this.checkIndex(index);
    return this.data[index];
  }

  iset(index: number, value: number): void {
    this.checkIndex(index);
    this.checkValue(value);
    this.data[index] = value;
  }

  values(): readonly number[] {
    return this.data;
  }

  /** Ascending, deduplicated cell values. */
  distinctValues(): number[] {
    return Array.from(new Set(this.data)).sort((a, b) => a - b);
  }

  indicesWhere(value: number): LazySequence<number> {
    return filter((idx) => this.data[idx] === value, iota(this.data.length));
  }

  /**
   * Writes `data` over `indices` in order. The whole block is checked before
   * any cell changes, so a bad record leaves the property untouched.
   */
  assignCells(indices: Iterable<number>, data: readonly number[], convert: (raw: number) => number): void {
    const targets = Array.from(indices);
    if (targets.length !== data.length) {
      throw new InvalidRecordError(this.name, `expected ${targets.length} values for the active box, got ${data.length}`);
    }
    const converted = data.map(convert);
    converted.forEach((value) => this.checkValue(value));
    targets.forEach((idx, n) => this.iset(idx, converted[n]));
  }

  /**
   * Replaces each listed cell with `fn(current)`. Every new value is checked
   * before the first write.
   */
  update(indices: Iterable<number>, fn: (current: number) => number): number {
    const targets = Array.from(indices);
    const next = targets.map((idx) => fn(this.iget(idx)));
    next.forEach((value) => this.checkValue(value));
    targets.forEach((idx, n) => {
      this.data[idx] = next[n];
    });
    return targets.length;
  }

  private checkIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.data.length) {
      throw new RangeError(`Cell index ${index} outside ${this.name} (${this.data.length} cells)`);
    }
  }

  private checkValue(value: number): void {
    if (!Number.isFinite(value)) throw new InvalidRecordError(this.name, `non-finite value ${value}`);
    if (this.kind === "int" && !Number.isInteger(value)) {
      throw new InvalidRecordError(this.name, `integer property cannot hold ${value}`);
    }
  }
}
