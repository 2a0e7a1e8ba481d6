/**
 * Rectangular N-dimensional array with a fixed shape.
 *
 * Backs `multiArray` descriptors (rank >= 2). Elements are stored row-major in
 * a flat buffer; the shape never changes after construction, so a decode that
 * needs different dimensions allocates a new instance (see the fixed-array
 * merge rules in the engine).
 *
 * Slots that were never written read as `undefined`.
 *
 * Example:
 * ```ts
 * const grid = new NdArray<number>([2, 3]);
 * grid.set([1, 2], 5);
 * grid.get([1, 2]);   // 5
 * grid.toNested();    // [[undefined, undefined, undefined], [undefined, undefined, 5]]
 * ```
 */
export class NdArray<T> {
  readonly #lengths: readonly number[];
  readonly #data: (T | undefined)[];

  /**
   * @param lengths Length of each dimension; the rank is `lengths.length`.
   * @throws RangeError on an empty shape or a negative / fractional length.
   */
  constructor(lengths: readonly number[]) {
    if (lengths.length === 0) {
      throw new RangeError('NdArray requires at least one dimension');
    }
    for (const length of lengths) {
      if (!Number.isInteger(length) || length < 0) {
        throw new RangeError(`Invalid dimension length: ${length}`);
      }
    }

    this.#lengths = [...lengths];
    this.#data = new Array<T | undefined>(
      lengths.reduce((product, length) => product * length, 1)
    ).fill(undefined);
  }

  /**
   * Zero-length array of the given rank (every dimension has length 0).
   */
  static empty<T>(rank: number): NdArray<T> {
    return new NdArray<T>(new Array<number>(rank).fill(0));
  }

  get rank(): number {
    return this.#lengths.length;
  }

  /** Total number of slots. */
  get size(): number {
    return this.#data.length;
  }

  /** Copy of the shape. */
  get lengths(): number[] {
    return [...this.#lengths];
  }

  getLength(dimension: number): number {
    const length = this.#lengths[dimension];
    if (length === undefined) {
      throw new RangeError(
        `Dimension ${dimension} is out of range for rank ${this.rank}`
      );
    }
    return length;
  }

  get(index: readonly number[]): T | undefined {
    return this.#data[this.#offset(index)];
  }

  set(index: readonly number[], value: T): void {
    this.#data[this.#offset(index)] = value;
  }

  /**
   * Nested-array view, outermost dimension first. Intended for inspection and
   * tests; the result is a copy.
   */
  toNested(): unknown[] {
    const build = (dimension: number, offset: number): unknown[] => {
      const length = this.getLength(dimension);
      const stride = this.#stride(dimension);
      const result: unknown[] = [];
      for (let i = 0; i < length; i++) {
        result.push(
          dimension === this.rank - 1
            ? this.#data[offset + i]
            : build(dimension + 1, offset + i * stride)
        );
      }
      return result;
    };
    return build(0, 0);
  }

  #stride(dimension: number): number {
    let stride = 1;
    for (let d = dimension + 1; d < this.#lengths.length; d++) {
      stride *= this.getLength(d);
    }
    return stride;
  }

  #offset(index: readonly number[]): number {
    if (index.length !== this.rank) {
      throw new RangeError(
        `Expected ${this.rank} indices but received ${index.length}`
      );
    }

    let offset = 0;
    for (const [dimension, position] of index.entries()) {
      const length = this.getLength(dimension);
      if (!Number.isInteger(position) || position < 0 || position >= length) {
        throw new RangeError(
          `Index ${position} is out of range for dimension ${dimension} (length ${length})`
        );
      }
      offset = offset * length + position;
    }
    return offset;
  }
}

/**
 * Guard used by the engine to decide whether an existing value can be reused
 * or partially copied.
 */
export function isNdArray(value: unknown): value is NdArray<unknown> {
  return value instanceof NdArray;
}
