export * from "./types.js";
export {
  UnitSystem,
  UnknownUnitSystemError,
  getUnitSystem,
  isUnitSystemName,
  listUnitSystems,
} from "./unitSystem.js";
