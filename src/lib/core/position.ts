/**
 * Represents one position (i, j, k) within a lattice.
 */
export class LatticeIndex {
  constructor(
    public readonly i: number,
    public readonly j: number,
    public readonly k: number
  ) {}

  /**
   * Create a string key for use in Sets or Maps.
   */
  toKey(): string {
    return `${this.i},${this.j},${this.k}`;
  }

  /**
   * Check equality with another position.
   */
  equals(other: LatticeIndex): boolean {
    return this.i === other.i && this.j === other.j && this.k === other.k;
  }

  toTuple(): readonly [number, number, number] {
    return [this.i, this.j, this.k];
  }

  toString(): string {
    return `LatticeIndex(${this.i}, ${this.j}, ${this.k})`;
  }

  static fromTuple([i, j, k]: readonly [number, number, number]): LatticeIndex {
    return new LatticeIndex(i, j, k);
  }
}

/**
 * Ascending lexicographic order on (i, j, k).
 */
export function compareIndices(a: LatticeIndex, b: LatticeIndex): number {
  return a.i - b.i || a.j - b.j || a.k - b.k;
}
