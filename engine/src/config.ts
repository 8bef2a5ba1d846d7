import { isUnitSystemName, UnknownUnitSystemError } from "grid-props-units";
import type { UnitSystemName } from "grid-props-units";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
}

export interface EngineConfig {
  /** Unit system in effect until a METRIC/FIELD/LAB keyword says otherwise. */
  unitSystem: UnitSystemName;
  /** Keywords skipped silently: section headers and records owned by other subsystems. */
  ignoredKeywords: string[];
  logger: Logger;
}

export const UNIT_SYSTEM_ENV = "GRID_PROPS_UNIT_SYSTEM";

export const defaultIgnoredKeywords: string[] = [
  "RUNSPEC",
  "GRID",
  "EDIT",
  "PROPS",
  "REGIONS",
  "SOLUTION",
  "SUMMARY",
  "SCHEDULE",
  "DIMENS",
  "START",
  "TITLE",
  "OIL",
  "GAS",
  "WATER",
  "DISGAS",
  "VAPOIL",
  "TABDIMS",
  "EQLDIMS",
  "REGDIMS",
  "WELLDIMS",
  "NOECHO",
  "ECHO",
  "END",
];

export const defaultEngineConfig: EngineConfig = {
  unitSystem: "METRIC",
  ignoredKeywords: defaultIgnoredKeywords,
  logger: console,
};

export function resolveEngineConfig(
  overrides: Partial<EngineConfig> = {},
  env: Record<string, string | undefined> = process.env
): EngineConfig {
  const fromEnv = env[UNIT_SYSTEM_ENV]?.trim().toUpperCase();
  let unitSystem = defaultEngineConfig.unitSystem;
  if (fromEnv) {
    if (!isUnitSystemName(fromEnv)) throw new UnknownUnitSystemError(fromEnv);
    unitSystem = fromEnv;
  }
  return {
    unitSystem: overrides.unitSystem ?? unitSystem,
    ignoredKeywords: overrides.ignoredKeywords ?? defaultEngineConfig.ignoredKeywords,
    logger: overrides.logger ?? defaultEngineConfig.logger,
  };
}
