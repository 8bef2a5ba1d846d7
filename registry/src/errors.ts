import type { PropertyKind } from "./types.js";

export class GridPropertyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class UnsupportedKeywordError extends GridPropertyError {
  readonly keyword: string;

  constructor(keyword: string) {
    super(`Keyword '${keyword}' is not a supported grid property`);
    this.keyword = keyword;
  }
}

export class TypeMismatchError extends GridPropertyError {
  readonly keyword: string;
  readonly expected: PropertyKind;
  readonly actual: PropertyKind;

  constructor(keyword: string, expected: PropertyKind, actual: PropertyKind, detail?: string) {
    super(detail ?? `Keyword '${keyword}' is a ${actual} property, not ${expected}`);
    this.keyword = keyword;
    this.expected = expected;
    this.actual = actual;
  }
}
