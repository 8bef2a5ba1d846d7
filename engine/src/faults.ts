import type { BoxWindow } from "./box.js";
import { validateWindow } from "./box.js";
import type { DeckRecord } from "./deck.js";
import { readInteger, readNumber, readString } from "./deck.js";
import { InvalidRecordError } from "./errors.js";
import type { GridDims } from "./grid.js";

export type FaceDirection = "X" | "X-" | "Y" | "Y-" | "Z" | "Z-";

const FACE_ALIASES: Record<string, FaceDirection> = {
  X: "X",
  "X-": "X-",
  I: "X",
  "I-": "X-",
  Y: "Y",
  "Y-": "Y-",
  J: "Y",
  "J-": "Y-",
  Z: "Z",
  "Z-": "Z-",
  K: "Z",
  "K-": "Z-",
};

export interface FaultFace {
  readonly window: Readonly<BoxWindow>;
  readonly direction: FaceDirection;
}

export interface Fault {
  readonly name: string;
  readonly faces: readonly FaultFace[];
  readonly transMult: number;
}

interface MutableFault {
  name: string;
  faces: FaultFace[];
  transMult: number;
}

export function parseFaceDirection(keyword: string, token: string): FaceDirection {
  const direction = FACE_ALIASES[token.trim().toUpperCase()];
  if (!direction) throw new InvalidRecordError(keyword, `unknown face direction '${token}'`);
  return direction;
}

function snapshot(fault: MutableFault): Fault {
  return { name: fault.name, faces: [...fault.faces], transMult: fault.transMult };
}

function faceIsFlat(face: FaultFace): boolean {
  const { window: w, direction } = face;
  if (direction.startsWith("X")) return w.i1 === w.i2;
  if (direction.startsWith("Y")) return w.j1 === w.j2;
  return w.k1 === w.k2;
}

function faceTouches(face: FaultFace, i: number, j: number, k: number): boolean {
  const w = face.window;
  return i >= w.i1 && i <= w.i2 && j >= w.j1 && j <= w.j2 && k >= w.k1 && k <= w.k2;
}

/** Named faults and their cumulative transmissibility multipliers. */
export class FaultCollection {
  private readonly grid: GridDims;
  private readonly faults = new Map<string, MutableFault>();

  constructor(grid: GridDims) {
    this.grid = grid;
  }

  get size(): number {
    return this.faults.size;
  }

  addFace(keyword: string, record: DeckRecord): Fault {
    const name = readString(keyword, record, 0);
    const [i1, i2, j1, j2, k1, k2] = [1, 2, 3, 4, 5, 6].map((idx) => readInteger(keyword, record, idx) - 1);
    const face: FaultFace = {
      window: Object.freeze(validateWindow({ i1, i2, j1, j2, k1, k2 }, this.grid)),
      direction: parseFaceDirection(keyword, readString(keyword, record, 7)),
    };
    if (!faceIsFlat(face)) {
      throw new InvalidRecordError(keyword, `fault '${name}' face ${face.direction} must span a single layer along its axis`);
    }
    let fault = this.faults.get(name);
    if (!fault) {
      fault = { name, faces: [], transMult: 1 };
      this.faults.set(name, fault);
    }
    fault.faces.push(Object.freeze(face));
    return snapshot(fault);
  }

  /**
   * Multiplies the matching faults' transmissibility multipliers. A trailing
   * `*` matches by prefix. Returns the names that were updated.
   */
  multiply(keyword: string, record: DeckRecord): string[] {
    const pattern = readString(keyword, record, 0);
    const factor = readNumber(keyword, record, 1);
    const matched = this.match(pattern);
    if (matched.length === 0) throw new InvalidRecordError(keyword, `no fault named '${pattern}'`);
    matched.forEach((fault) => {
      fault.transMult *= factor;
    });
    return matched.map((f) => f.name);
  }

  /** Copies; faces are frozen. */
  get(name: string): Fault | undefined {
    const fault = this.faults.get(name);
    return fault ? snapshot(fault) : undefined;
  }

  list(): Fault[] {
    return Array.from(this.faults.values(), snapshot);
  }

  multiplier(name: string): number {
    const fault = this.faults.get(name);
    if (!fault) throw new InvalidRecordError("MULTFLT", `no fault named '${name}'`);
    return fault.transMult;
  }

  /** Product of the multipliers of every fault face on the given cell face. */
  transmissibilityMultiplier(i: number, j: number, k: number, direction: FaceDirection): number {
    if (!this.grid.contains(i, j, k)) throw new RangeError(`Cell (${i},${j},${k}) outside grid`);
    let product = 1;
    for (const fault of this.faults.values()) {
      if (fault.faces.some((face) => face.direction === direction && faceTouches(face, i, j, k))) {
        product *= fault.transMult;
      }
    }
    return product;
  }

  private match(pattern: string): MutableFault[] {
    if (pattern.endsWith("*")) {
      const prefix = pattern.slice(0, -1);
      return Array.from(this.faults.values()).filter((f) => f.name.startsWith(prefix));
    }
    const fault = this.faults.get(pattern);
    return fault ? [fault] : [];
  }
}
