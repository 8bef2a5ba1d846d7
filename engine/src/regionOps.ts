import type { UnitConverter } from "grid-props-units";
import type { KeywordRegistry } from "grid-props-registry";
import { normalizeKeyword } from "grid-props-registry";
import type { Logger } from "./config.js";
import type { DeckRecord } from "./deck.js";
import { isDefaulted, readInteger, readNumber, readOptionalString, readString } from "./deck.js";
import { InvalidRecordError, TypeMismatchError } from "./errors.js";
import type { GridProperty } from "./gridProperty.js";
import type { PropertyCollection } from "./propertyCollection.js";

export type RegionOperator = "add" | "multiply" | "assign";

export interface RegionEditRequest {
  targetKeyword: string;
  value: number;
  regionId: number;
  operator: RegionOperator;
  /** Defaults to the run's default region keyword. */
  driverKeyword?: string;
}

export interface RegionCopyRequest {
  sourceKeyword: string;
  targetKeyword: string;
  regionId: number;
  driverKeyword?: string;
}

/** Everything a region edit reads or writes during one construction run. */
export interface RegionScope {
  registry: KeywordRegistry;
  intProperties: PropertyCollection;
  doubleProperties: PropertyCollection;
  converter: UnitConverter;
  defaultRegionKeyword: string;
  logger: Logger;
}

const REGION_OPERATORS: Record<string, RegionOperator> = {
  ADDREG: "add",
  MULTIREG: "multiply",
  EQUALREG: "assign",
};

const REGION_SETS: Record<string, string> = {
  M: "MULTNUM",
  F: "FLUXNUM",
  O: "OPERNUM",
};

export function isRegionEditKeyword(name: string): boolean {
  return Object.hasOwn(REGION_OPERATORS, normalizeKeyword(name));
}

export function parseRegionOperator(keyword: string): RegionOperator {
  const op = REGION_OPERATORS[normalizeKeyword(keyword)];
  if (!op) throw new InvalidRecordError(keyword, "not a region edit keyword");
  return op;
}

/**
 * Region-set item of ADDREG-style records: `M`, `F` or `O` pick MULTNUM,
 * FLUXNUM or OPERNUM, a longer token names the driver keyword directly.
 */
export function resolveRegionSet(keyword: string, selector: string | undefined): string | undefined {
  if (selector === undefined || selector === "") return undefined;
  const key = normalizeKeyword(selector);
  if (key.length > 1) return key;
  const driver = REGION_SETS[key];
  if (!driver) throw new InvalidRecordError(keyword, `unknown region set '${selector}'`);
  return driver;
}

/**
 * Driver of a region record: the region-set item at `setIndex`, then an
 * optional driver keyword right after it. Both may be given only when they
 * agree; nothing may follow them.
 */
export function regionDriverFromRecord(keyword: string, record: DeckRecord, setIndex: number): string | undefined {
  for (let idx = setIndex + 2; idx < record.length; idx++) {
    if (!isDefaulted(record, idx)) throw new InvalidRecordError(keyword, `unexpected item ${idx + 1}`);
  }
  const fromSet = resolveRegionSet(keyword, readOptionalString(keyword, record, setIndex));
  const named = readOptionalString(keyword, record, setIndex + 1);
  if (named === undefined || named === "") return fromSet;
  const driver = normalizeKeyword(named);
  if (fromSet !== undefined && fromSet !== driver) {
    throw new InvalidRecordError(keyword, `region set selects ${fromSet} but driver keyword is ${driver}`);
  }
  return driver;
}

export function regionEditFromRecord(keyword: string, record: DeckRecord, operator: RegionOperator): RegionEditRequest {
  return {
    targetKeyword: readString(keyword, record, 0),
    value: readNumber(keyword, record, 1),
    regionId: readInteger(keyword, record, 2),
    operator,
    driverKeyword: regionDriverFromRecord(keyword, record, 3),
  };
}

export function regionCopyFromRecord(keyword: string, record: DeckRecord): RegionCopyRequest {
  return {
    sourceKeyword: readString(keyword, record, 0),
    targetKeyword: readString(keyword, record, 1),
    regionId: readInteger(keyword, record, 2),
    driverKeyword: regionDriverFromRecord(keyword, record, 3),
  };
}

/** Fetches or materializes a property in the collection of its registered kind. */
export function propertyFor(name: string, scope: RegionScope): GridProperty {
  const descriptor = scope.registry.descriptorFor(name);
  const collection = descriptor.kind === "int" ? scope.intProperties : scope.doubleProperties;
  return collection.getOrCreate(descriptor.name);
}

export function regionDriver(name: string | undefined, scope: RegionScope): GridProperty {
  const descriptor = scope.registry.descriptorFor(name ?? scope.defaultRegionKeyword);
  if (descriptor.kind !== "int") {
    throw new TypeMismatchError(descriptor.name, "int", descriptor.kind, `Region driver '${descriptor.name}' must be an integer property`);
  }
  if (!descriptor.regionEligible) {
    throw new TypeMismatchError(descriptor.name, "int", descriptor.kind, `Keyword '${descriptor.name}' cannot classify regions`);
  }
  return scope.intProperties.getOrCreate(descriptor.name);
}

function editFunction(request: RegionEditRequest, target: GridProperty, converter: UnitConverter): (current: number) => number {
  switch (request.operator) {
    case "add": {
      const shift = converter.convertDifference(request.value, target.dimension);
      return (current) => current + shift;
    }
    case "multiply":
      return (current) => current * request.value;
    case "assign": {
      const value = converter.convert(request.value, target.dimension);
      return () => value;
    }
  }
}

/**
 * Mutates every target cell whose driver value equals `regionId`. The BOX
 * window is not consulted. Returns the number of cells changed.
 */
export function applyRegionEdit(request: RegionEditRequest, scope: RegionScope): number {
  const driver = regionDriver(request.driverKeyword, scope);
  const target = propertyFor(request.targetKeyword, scope);
  const fn = editFunction(request, target, scope.converter);
  const touched = target.update(driver.indicesWhere(request.regionId), fn);
  if (touched === 0) {
    scope.logger.warn(`${request.operator} on ${target.name}: no cell of ${driver.name} equals region ${request.regionId}`);
  }
  return touched;
}

export function applyRegionCopy(request: RegionCopyRequest, scope: RegionScope): number {
  const driver = regionDriver(request.driverKeyword, scope);
  const source = propertyFor(request.sourceKeyword, scope);
  const target = propertyFor(request.targetKeyword, scope);
  if (source.kind !== target.kind) {
    throw new TypeMismatchError(target.name, target.kind, source.kind, `Cannot copy ${source.kind} ${source.name} into ${target.kind} ${target.name}`);
  }
  let touched = 0;
  for (const idx of driver.indicesWhere(request.regionId)) {
    target.iset(idx, source.iget(idx));
    touched++;
  }
  if (touched === 0) {
    scope.logger.warn(`copy ${source.name} to ${target.name}: no cell of ${driver.name} equals region ${request.regionId}`);
  }
  return touched;
}
