export const DIMENSIONS = ["length", "pressure", "permeability", "temperature", "thermal_conductivity"] as const;

/** Physical dimension class of a property; `null` marks a dimensionless one. */
export type Dimension = (typeof DIMENSIONS)[number];

export type UnitSystemName = "METRIC" | "FIELD" | "LAB";

export interface Conversion {
  factor: number;
  offset: number;
}

/**
 * Converts raw deck magnitudes into the internal (SI) unit system.
 *
 * `convert` handles absolute values and applies the offset of affine units
 * such as temperature; `convertDifference` handles shifts and only scales.
 */
export interface UnitConverter {
  readonly name: string;
  convert(raw: number, dimension: Dimension | null): number;
  convertDifference(raw: number, dimension: Dimension | null): number;
}
