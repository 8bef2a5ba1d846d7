import type { Dimension } from "grid-props-units";

export type PropertyKind = "int" | "double";

export interface PropertyDescriptor {
  readonly name: string;
  readonly kind: PropertyKind;
  /** Fill value of a freshly materialized property, in internal units. */
  readonly defaultValue: number;
  readonly dimension: Dimension | null;
  /** Whether the keyword may classify cells for region edits. */
  readonly regionEligible: boolean;
}

export interface KeywordCatalog {
  defaultRegionKeyword: string;
  descriptors: PropertyDescriptor[];
}
