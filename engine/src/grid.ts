export type CellIJK = [number, number, number];

/**
 * Structured grid dimensions. Owns the mapping between (i, j, k) and the
 * flat cell index; i varies fastest, then j, then k.
 */
export class GridDims {
  readonly nx: number;
  readonly ny: number;
  readonly nz: number;

  constructor(nx: number, ny: number, nz: number) {
    [nx, ny, nz].forEach((n) => {
      if (!Number.isInteger(n) || n < 1) throw new RangeError(`Grid dimensions must be positive integers, got ${nx}x${ny}x${nz}`);
    });
    this.nx = nx;
    this.ny = ny;
    this.nz = nz;
  }

  get size(): number {
    return this.nx * this.ny * this.nz;
  }

  contains(i: number, j: number, k: number): boolean {
    return i >= 0 && i < this.nx && j >= 0 && j < this.ny && k >= 0 && k < this.nz;
  }

  globalIndex(i: number, j: number, k: number): number {
    if (!this.contains(i, j, k)) {
      throw new RangeError(`Cell (${i},${j},${k}) outside ${this.nx}x${this.ny}x${this.nz} grid`);
    }
    return i + this.nx * (j + this.ny * k);
  }

  ijk(index: number): CellIJK {
    if (!Number.isInteger(index) || index < 0 || index >= this.size) {
      throw new RangeError(`Cell index ${index} outside grid of ${this.size} cells`);
    }
    const i = index % this.nx;
    const j = Math.floor(index / this.nx) % this.ny;
    const k = Math.floor(index / (this.nx * this.ny));
    return [i, j, k];
  }
}
