import type { DeckRecord } from "./deck.js";
import { readOptionalNumber, readNumber } from "./deck.js";
import { InvalidBoxError } from "./errors.js";
import type { GridDims } from "./grid.js";
import { LazySequence } from "./sequence.js";

/** 0-based, inclusive cell window. */
export interface BoxWindow {
  i1: number;
  i2: number;
  j1: number;
  j2: number;
  k1: number;
  k2: number;
}

export type BoxState = { kind: "unclipped" } | { kind: "clipped"; window: BoxWindow };

export function wholeGrid(grid: GridDims): BoxWindow {
  return { i1: 0, i2: grid.nx - 1, j1: 0, j2: grid.ny - 1, k1: 0, k2: grid.nz - 1 };
}

export function windowCellCount(w: BoxWindow): number {
  return (w.i2 - w.i1 + 1) * (w.j2 - w.j1 + 1) * (w.k2 - w.k1 + 1);
}

export function validateWindow(window: BoxWindow, grid: GridDims): BoxWindow {
  const axes: Array<[number, number, number, string]> = [
    [window.i1, window.i2, grid.nx, "I"],
    [window.j1, window.j2, grid.ny, "J"],
    [window.k1, window.k2, grid.nz, "K"],
  ];
  for (const [lo, hi, n, axis] of axes) {
    if (!Number.isInteger(lo) || !Number.isInteger(hi)) throw new InvalidBoxError(window, `${axis} bounds must be integers`);
    if (lo < 0 || hi >= n) throw new InvalidBoxError(window, `${axis} range outside 1-${n}`);
    if (lo > hi) throw new InvalidBoxError(window, `${axis} lower bound above upper bound`);
  }
  return window;
}

/** Flat indices of `window`, i fastest. */
export function windowIndices(window: BoxWindow, grid: GridDims): LazySequence<number> {
  return new LazySequence(function* () {
    for (let k = window.k1; k <= window.k2; k++) {
      for (let j = window.j1; j <= window.j2; j++) {
        for (let i = window.i1; i <= window.i2; i++) {
          yield grid.globalIndex(i, j, k);
        }
      }
    }
  });
}

/**
 * BOX/ENDBOX state of one construction run. A new BOX replaces the active
 * one; there is no stack.
 */
export class BoxContext {
  private readonly grid: GridDims;
  private current: BoxState = { kind: "unclipped" };

  constructor(grid: GridDims) {
    this.grid = grid;
  }

  get state(): BoxState {
    return this.current;
  }

  get isClipped(): boolean {
    return this.current.kind === "clipped";
  }

  setBox(record: DeckRecord, keyword = "BOX"): BoxWindow {
    const [i1, i2, j1, j2, k1, k2] = [0, 1, 2, 3, 4, 5].map((idx) => readNumber(keyword, record, idx) - 1);
    const window = validateWindow({ i1, i2, j1, j2, k1, k2 }, this.grid);
    this.current = { kind: "clipped", window };
    return window;
  }

  endBox(): void {
    this.current = { kind: "unclipped" };
  }

  activeWindow(): BoxWindow {
    return this.current.kind === "clipped" ? this.current.window : wholeGrid(this.grid);
  }

  cellIndices(window: BoxWindow = this.activeWindow()): LazySequence<number> {
    return windowIndices(window, this.grid);
  }

  /**
   * Window for operations that carry their own optional box items
   * (EQUALS, ADD, MULTIPLY, COPY). Each defaulted bound falls back to the
   * matching bound of the active window.
   */
  resolveInlineWindow(keyword: string, record: DeckRecord, offset: number): BoxWindow {
    const active = this.activeWindow();
    const fallback = [active.i1, active.i2, active.j1, active.j2, active.k1, active.k2];
    const bounds = fallback.map((value, idx) => {
      const raw = readOptionalNumber(keyword, record, offset + idx);
      return raw === undefined ? value : raw - 1;
    });
    const [i1, i2, j1, j2, k1, k2] = bounds;
    return validateWindow({ i1, i2, j1, j2, k1, k2 }, this.grid);
  }
}
