export * from "./errors.js";
export { GridDims } from "./grid.js";
export type { CellIJK } from "./grid.js";
export { LazySequence, filter, iota, map } from "./sequence.js";
export * from "./deck.js";
export { BoxContext, validateWindow, wholeGrid, windowCellCount, windowIndices } from "./box.js";
export type { BoxState, BoxWindow } from "./box.js";
export { GridProperty } from "./gridProperty.js";
export type { ReadonlyGridProperty } from "./gridProperty.js";
export { PropertyCollection } from "./propertyCollection.js";
export {
  applyRegionCopy,
  applyRegionEdit,
  parseRegionOperator,
  regionEditFromRecord,
  resolveRegionSet,
} from "./regionOps.js";
export type { RegionCopyRequest, RegionEditRequest, RegionOperator, RegionScope } from "./regionOps.js";
export { FaultCollection, parseFaceDirection } from "./faults.js";
export type { FaceDirection, Fault, FaultFace } from "./faults.js";
export { defaultEngineConfig, defaultIgnoredKeywords, resolveEngineConfig, UNIT_SYSTEM_ENV } from "./config.js";
export type { EngineConfig, Logger } from "./config.js";
export { GridProperties } from "./gridProperties.js";
export type { GridPropertiesOptions } from "./gridProperties.js";
export { getKeywordRegistry, KeywordRegistry, normalizeKeyword } from "grid-props-registry";
export type { PropertyDescriptor, PropertyKind } from "grid-props-registry";
