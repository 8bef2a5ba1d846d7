import { GridPropertyError } from "grid-props-registry";
import type { BoxWindow } from "./box.js";

export { GridPropertyError, TypeMismatchError, UnsupportedKeywordError } from "grid-props-registry";

export class InvalidBoxError extends GridPropertyError {
  readonly window: BoxWindow;

  constructor(window: BoxWindow, detail: string) {
    super(
      `Invalid box ${window.i1 + 1}-${window.i2 + 1} ${window.j1 + 1}-${window.j2 + 1} ${window.k1 + 1}-${window.k2 + 1}: ${detail}`
    );
    this.window = window;
  }
}

export class InvalidRecordError extends GridPropertyError {
  readonly keyword: string;
  readonly detail: string;

  constructor(keyword: string, detail: string) {
    super(`${keyword}: ${detail}`);
    this.keyword = keyword;
    this.detail = detail;
  }
}

export class SealedPropertiesError extends GridPropertyError {
  constructor(keyword: string) {
    super(`Cannot apply ${keyword}: grid properties are sealed`);
  }
}
