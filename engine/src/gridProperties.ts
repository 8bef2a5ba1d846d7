import { getUnitSystem } from "grid-props-units";
import type { UnitSystem } from "grid-props-units";
import { getKeywordRegistry, normalizeKeyword } from "grid-props-registry";
import type { KeywordRegistry } from "grid-props-registry";
import type { BoxState } from "./box.js";
import { BoxContext } from "./box.js";
import { resolveEngineConfig } from "./config.js";
import type { EngineConfig, Logger } from "./config.js";
import type { DeckKeyword, DeckRecord } from "./deck.js";
import { gridFromDeck, readDataBlock, readNumber, readOptionalNumber, readString } from "./deck.js";
import { InvalidRecordError, SealedPropertiesError, TypeMismatchError, UnsupportedKeywordError } from "./errors.js";
import type { Fault, FaceDirection } from "./faults.js";
import { FaultCollection } from "./faults.js";
import type { GridDims } from "./grid.js";
import type { ReadonlyGridProperty } from "./gridProperty.js";
import { PropertyCollection } from "./propertyCollection.js";
import type { RegionCopyRequest, RegionEditRequest, RegionScope } from "./regionOps.js";
import {
  applyRegionCopy,
  applyRegionEdit,
  isRegionEditKeyword,
  parseRegionOperator,
  propertyFor,
  regionCopyFromRecord,
  regionEditFromRecord,
} from "./regionOps.js";
import type { LazySequence } from "./sequence.js";

export interface GridPropertiesOptions extends Partial<EngineConfig> {
  registry?: KeywordRegistry;
  env?: Record<string, string | undefined>;
}

type BoxOperation = "EQUALS" | "ADD" | "MULTIPLY";

function isBoxOperation(name: string): name is BoxOperation {
  return name === "EQUALS" || name === "ADD" || name === "MULTIPLY";
}

const UNIT_KEYWORDS = new Set(["METRIC", "FIELD", "LAB"]);

/**
 * Builds the per-cell grid properties of one deck and answers queries about
 * them. Keywords are applied strictly in order; `seal()` ends construction.
 */
export class GridProperties {
  readonly grid: GridDims;
  private readonly registry: KeywordRegistry;
  private readonly logger: Logger;
  private readonly ignored: Set<string>;
  private readonly box: BoxContext;
  private readonly faultCollection: FaultCollection;
  private readonly ints: PropertyCollection;
  private readonly doubles: PropertyCollection;
  private units: UnitSystem;
  private regionKeyword: string;
  private sealed = false;

  constructor(grid: GridDims, options: GridPropertiesOptions = {}) {
    const { registry, env, ...overrides } = options;
    const config = resolveEngineConfig(overrides, env);
    this.grid = grid;
    this.registry = registry ?? getKeywordRegistry();
    this.logger = config.logger;
    this.ignored = new Set(config.ignoredKeywords.map(normalizeKeyword));
    this.box = new BoxContext(grid);
    this.faultCollection = new FaultCollection(grid);
    this.ints = new PropertyCollection("int", this.registry, grid);
    this.doubles = new PropertyCollection("double", this.registry, grid);
    this.units = getUnitSystem(config.unitSystem);
    this.regionKeyword = this.registry.defaultRegionKeyword;
  }

  /** Applies every keyword of `deck` and seals the result. */
  static fromDeck(deck: DeckKeyword[], grid?: GridDims, options: GridPropertiesOptions = {}): GridProperties {
    const props = new GridProperties(grid ?? gridFromDeck(deck), options);
    props.applyAll(deck);
    props.seal();
    return props;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  get unitSystem(): UnitSystem {
    return this.units;
  }

  get boxState(): BoxState {
    return this.box.state;
  }

  seal(): void {
    this.sealed = true;
  }

  applyAll(deck: Iterable<DeckKeyword>): void {
    for (const keyword of deck) this.apply(keyword);
  }

  apply(keyword: DeckKeyword): void {
    const name = normalizeKeyword(keyword.name);
    if (this.sealed) throw new SealedPropertiesError(name);

    if (isRegionEditKeyword(name)) {
      const operator = parseRegionOperator(name);
      keyword.records.forEach((record) => applyRegionEdit(regionEditFromRecord(name, record, operator), this.scope));
      return;
    }
    if (isBoxOperation(name)) {
      keyword.records.forEach((record) => this.applyBoxOperation(name, record));
      return;
    }
    if (UNIT_KEYWORDS.has(name)) {
      this.units = getUnitSystem(name);
      this.logger.info(`unit system set to ${this.units.name}`);
      return;
    }

    switch (name) {
      case "BOX":
        this.box.setBox(keyword.records[0] ?? [], name);
        return;
      case "ENDBOX":
        this.box.endBox();
        return;
      case "COPY":
        keyword.records.forEach((record) => this.applyCopy(record));
        return;
      case "COPYREG":
        keyword.records.forEach((record) => applyRegionCopy(regionCopyFromRecord(name, record), this.scope));
        return;
      case "FAULTS":
        keyword.records.forEach((record) => this.faultCollection.addFace(name, record));
        return;
      case "MULTFLT":
        keyword.records.forEach((record) => this.faultCollection.multiply(name, record));
        return;
      case "GRIDOPTS":
        this.applyGridOptions(keyword.records[0] ?? []);
        return;
    }

    if (this.registry.supports(name)) {
      this.assign(name, keyword);
    } else if (this.ignored.has(name)) {
      this.logger.debug(`skipping ${name}`);
    } else {
      throw new UnsupportedKeywordError(keyword.name);
    }
  }

  applyRegionEdit(request: RegionEditRequest): number {
    if (this.sealed) throw new SealedPropertiesError("region edit");
    return applyRegionEdit(request, this.scope);
  }

  applyRegionCopy(request: RegionCopyRequest): number {
    if (this.sealed) throw new SealedPropertiesError("region copy");
    return applyRegionCopy(request, this.scope);
  }

  supports(name: string): boolean {
    return this.registry.supports(name);
  }

  hasIntProperty(name: string): boolean {
    const descriptor = this.registry.descriptorFor(name);
    return descriptor.kind === "int" && this.ints.has(descriptor.name);
  }

  hasDoubleProperty(name: string): boolean {
    const descriptor = this.registry.descriptorFor(name);
    return descriptor.kind === "double" && this.doubles.has(descriptor.name);
  }

  /** Materializes the keyword with its default fill when it was never assigned. */
  getIntProperty(name: string): ReadonlyGridProperty {
    return this.ints.getOrCreate(name);
  }

  getDoubleProperty(name: string): ReadonlyGridProperty {
    return this.doubles.getOrCreate(name);
  }

  defaultRegionKeyword(): string {
    return this.regionKeyword;
  }

  /** Distinct values of an integer keyword, ascending; empty when never materialized. */
  regionsOf(name: string): number[] {
    const descriptor = this.registry.descriptorForKind(name, "int");
    return this.ints.get(descriptor.name)?.distinctValues() ?? [];
  }

  intProperties(): LazySequence<ReadonlyGridProperty> {
    return this.ints.iterate();
  }

  doubleProperties(): LazySequence<ReadonlyGridProperty> {
    return this.doubles.iterate();
  }

  faults(): Fault[] {
    return this.faultCollection.list();
  }

  faultMultiplier(name: string): number {
    return this.faultCollection.multiplier(name);
  }

  transmissibilityMultiplier(i: number, j: number, k: number, direction: FaceDirection): number {
    return this.faultCollection.transmissibilityMultiplier(i, j, k, direction);
  }

  private get scope(): RegionScope {
    return {
      registry: this.registry,
      intProperties: this.ints,
      doubleProperties: this.doubles,
      converter: this.units,
      defaultRegionKeyword: this.regionKeyword,
      logger: this.logger,
    };
  }

  private assign(name: string, keyword: DeckKeyword): void {
    const property = propertyFor(name, this.scope);
    const data = readDataBlock(keyword);
    property.assignCells(this.box.cellIndices(), data, (raw) => this.units.convert(raw, property.dimension));
  }

  private applyBoxOperation(operation: BoxOperation, record: DeckRecord): void {
    const property = propertyFor(readString(operation, record, 0), this.scope);
    const value = readNumber(operation, record, 1);
    const cells = this.box.cellIndices(this.box.resolveInlineWindow(operation, record, 2));
    switch (operation) {
      case "EQUALS": {
        const converted = this.units.convert(value, property.dimension);
        property.update(cells, () => converted);
        return;
      }
      case "ADD": {
        const shift = this.units.convertDifference(value, property.dimension);
        property.update(cells, (current) => current + shift);
        return;
      }
      case "MULTIPLY":
        property.update(cells, (current) => current * value);
        return;
    }
  }

  private applyCopy(record: DeckRecord): void {
    const source = propertyFor(readString("COPY", record, 0), this.scope);
    const target = propertyFor(readString("COPY", record, 1), this.scope);
    if (source.kind !== target.kind) {
      throw new TypeMismatchError(target.name, target.kind, source.kind, `Cannot copy ${source.kind} ${source.name} into ${target.kind} ${target.name}`);
    }
    const cells = this.box.cellIndices(this.box.resolveInlineWindow("COPY", record, 2));
    for (const idx of cells) target.iset(idx, source.iget(idx));
  }

  private applyGridOptions(record: DeckRecord): void {
    const nrmult = readOptionalNumber("GRIDOPTS", record, 1) ?? 0;
    if (!Number.isInteger(nrmult) || nrmult < 0) {
      throw new InvalidRecordError("GRIDOPTS", `NRMULT must be a non-negative integer, got ${nrmult}`);
    }
    if (nrmult > 0) {
      this.regionKeyword = this.registry.descriptorForKind("MULTNUM", "int").name;
      this.logger.info(`default region keyword set to ${this.regionKeyword}`);
    }
  }
}
