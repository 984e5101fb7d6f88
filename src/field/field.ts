import {
  DEFAULT_CELL_VALUE, CONTINUE, HASH_SEED, HASH_MULTIPLIER, CELL_SEPARATOR, ROW_SEPARATOR,
} from "../constants";
import type { IField, Visitor } from "../types/field-types";
import { ConstructionError, DimensionMismatchError, OutOfBoundsError } from "./errors";

type CellOp = (current: number, operand: number) => number;

const replace: CellOp = (_current, operand) => operand;
const sum: CellOp = (current, operand) => current + operand;
const difference: CellOp = (current, operand) => current - operand;
const product: CellOp = (current, operand) => current * operand;
const quotient: CellOp = (current, operand) => current / operand;
const remainder: CellOp = (current, operand) => current % operand;

// Shared scratch for reading the bit pattern of a double.
const hashScratch = new Float64Array(1);
const hashWords = new Uint32Array(hashScratch.buffer);
const NAN_HIGH_WORD = 0x7ff80000;

function cellHash(value: number): number {
  if (Number.isNaN(value)) return NAN_HIGH_WORD;
  hashScratch[0] = value;
  return (hashWords[0] ^ hashWords[1]) >>> 0;
}

function validateDimensions(width: number, height: number): void {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new ConstructionError(width, height);
  }
}

/**
 * Dense 2D scalar field stored row-major in a single Float64Array.
 *
 * cells[x + y * width] holds the value of column x, row y. The shape is fixed
 * for the lifetime of the field; values are mutated in place.
 *
 * Per-cell operations throw OutOfBoundsError for coordinates outside the
 * field. Use isValid() first when the coordinates are not known to be in range.
 */
export class Field implements IField {
  readonly width: number;
  readonly height: number;
  /** Backing storage. Exposed for consumers that walk linear indices directly. */
  readonly cells: Float64Array;

  private constructor(cells: Float64Array, width: number, height: number) {
    this.cells = cells;
    this.width = width;
    this.height = height;
  }

  /** n columns by n rows, all zero. */
  static square(size: number): Field {
    return Field.sized(size, size);
  }

  static sized(width: number, height: number): Field {
    return Field.filled(DEFAULT_CELL_VALUE, width, height);
  }

  static filled(initialValue: number, width: number, height: number): Field {
    validateDimensions(width, height);
    return new Field(new Float64Array(width * height).fill(initialValue), width, height);
  }

  /**
   * Adopts `buffer` as the field's storage without copying it. The caller
   * hands the buffer over: writes through any other reference show up in
   * the field. Pass `buffer.slice()` to keep a separate copy.
   *
   * @throws ConstructionError if buffer.length !== width * height
   */
  static fromStorage(buffer: Float64Array, width: number, height: number): Field {
    validateDimensions(width, height);
    if (buffer.length !== width * height) {
      throw new ConstructionError(width, height, buffer.length);
    }
    return new Field(buffer, width, height);
  }

  /** Total number of cells, width * height. */
  get length(): number {
    return this.cells.length;
  }

  // ── Index conversion ──

  toIndex(x: number, y: number): number {
    return x + y * this.width;
  }

  toX(index: number): number {
    return index % this.width;
  }

  toY(index: number): number {
    return Math.floor(index / this.width);
  }

  /** True for integer coordinates inside the field, the ones per-cell operations accept. */
  isValid(x: number, y: number): boolean {
    return Number.isInteger(x) && Number.isInteger(y) && x >= 0 && x < this.width && y >= 0 && y < this.height;
  }

  // ── Per-cell access ──

  get(x: number, y: number): number {
    return this.cells[this.cellIndex(x, y)];
  }

  getAt(index: number): number {
    return this.cells[this.linearIndex(index)];
  }

  /** Returns the stored value. */
  setAt(index: number, value: number): number {
    const i = this.linearIndex(index);
    this.cells[i] = value;
    return this.cells[i];
  }

  // Every arithmetic method comes in three forms:
  //   op(x, y, value)  updates one cell and returns its new value
  //   op(value)        updates every cell and returns the field
  //   op(other)        combines cell by cell with a same-sized field and returns the field

  set(x: number, y: number, value: number): number;
  set(value: number): this;
  set(other: Field): this;
  set(xOrOperand: number | Field, y?: number, value?: number): number | this {
    return this.dispatch(replace, xOrOperand, y, value);
  }

  add(x: number, y: number, value: number): number;
  add(value: number): this;
  add(other: Field): this;
  add(xOrOperand: number | Field, y?: number, value?: number): number | this {
    return this.dispatch(sum, xOrOperand, y, value);
  }

  subtract(x: number, y: number, value: number): number;
  subtract(value: number): this;
  subtract(other: Field): this;
  subtract(xOrOperand: number | Field, y?: number, value?: number): number | this {
    return this.dispatch(difference, xOrOperand, y, value);
  }

  multiply(x: number, y: number, value: number): number;
  multiply(value: number): this;
  multiply(other: Field): this;
  multiply(xOrOperand: number | Field, y?: number, value?: number): number | this {
    return this.dispatch(product, xOrOperand, y, value);
  }

  /** Division by zero follows IEEE-754: ±Infinity, or NaN for 0 / 0. */
  divide(x: number, y: number, value: number): number;
  divide(value: number): this;
  divide(other: Field): this;
  divide(xOrOperand: number | Field, y?: number, value?: number): number | this {
    return this.dispatch(quotient, xOrOperand, y, value);
  }

  /** Truncated remainder (sign of the dividend), NaN for a zero modulus. */
  modulo(x: number, y: number, modulus: number): number;
  modulo(modulus: number): this;
  modulo(xOrOperand: number, y?: number, modulus?: number): number | this {
    return this.dispatch(remainder, xOrOperand, y, modulus);
  }

  negate(): this {
    const cells = this.cells;
    for (let i = 0; i < cells.length; i++) {
      cells[i] = -cells[i];
    }
    return this;
  }

  // ── Iteration ──

  forEachAll(visitor: Visitor<Field>): void {
    this.iterate(visitor, 0, this.length);
  }

  forEachFrom(visitor: Visitor<Field>, fromX: number, fromY: number): void {
    this.iterate(visitor, this.toIndex(fromX, fromY), this.length);
  }

  /** Visits [toIndex(fromX, fromY), toIndex(toX, toY)). The end cell is excluded. */
  forEachRange(visitor: Visitor<Field>, fromX: number, fromY: number, toX: number, toY: number): void {
    this.iterate(visitor, this.toIndex(fromX, fromY), this.toIndex(toX, toY));
  }

  // ── Value semantics ──

  /**
   * Same width and the same cell values, compared with Object.is (NaN equals
   * NaN, 0 differs from -0). Equal width and equal cell count imply equal
   * height, since every field holds exactly width * height cells.
   * Runs in O(width * height).
   */
  equals(other: unknown): boolean {
    if (other === this) return true;
    if (!(other instanceof Field)) return false;
    if (other.width !== this.width || other.length !== this.length) return false;
    for (let i = 0; i < this.length; i++) {
      if (!Object.is(this.cells[i], other.cells[i])) return false;
    }
    return true;
  }

  /** 32-bit hash over the cell values, consistent with equals(). O(width * height). */
  hashCode(): number {
    let hash = HASH_SEED;
    for (let i = 0; i < this.length; i++) {
      hash = (Math.imul(hash, HASH_MULTIPLIER) + cellHash(this.cells[i])) | 0;
    }
    return hash;
  }

  copy(): Field {
    return new Field(this.cells.slice(), this.width, this.height);
  }

  /** Debug dump: one `[x,y|value]` entry per cell, one line per row. Negative zero prints as -0. */
  toString(): string {
    let out = "";
    this.forEachAll((field, x, y, value) => {
      out += `[${x},${y}|${Object.is(value, -0) ? "-0" : value}]`;
      out += x === field.width - 1 ? ROW_SEPARATOR : CELL_SEPARATOR;
      return CONTINUE;
    });
    return out;
  }

  private dispatch(op: CellOp, xOrOperand: number | Field, y: number | undefined, value: number | undefined): number | this {
    if (xOrOperand instanceof Field) return this.combine(op, xOrOperand);
    if (y === undefined || value === undefined) return this.apply(op, xOrOperand);
    const i = this.cellIndex(xOrOperand, y);
    this.cells[i] = op(this.cells[i], value);
    return this.cells[i];
  }

  private apply(op: CellOp, operand: number): this {
    const cells = this.cells;
    for (let i = 0; i < cells.length; i++) {
      cells[i] = op(cells[i], operand);
    }
    return this;
  }

  /** Validates the shape before touching any cell, so a mismatch leaves this field unchanged. */
  private combine(op: CellOp, other: Field): this {
    if (other.width !== this.width || other.height !== this.height) {
      throw new DimensionMismatchError(
        { width: this.width, height: this.height },
        { width: other.width, height: other.height },
      );
    }
    const cells = this.cells;
    const otherCells = other.cells;
    for (let i = 0; i < cells.length; i++) {
      cells[i] = op(cells[i], otherCells[i]);
    }
    return this;
  }

  private iterate(visitor: Visitor<Field>, fromIndex: number, toIndex: number): void {
    if (!(fromIndex < toIndex)) return;
    if (fromIndex < 0 || !Number.isInteger(fromIndex)) throw OutOfBoundsError.atIndex(fromIndex, this.length);
    if (toIndex > this.length || !Number.isInteger(toIndex)) throw OutOfBoundsError.atIndex(toIndex, this.length);

    for (let i = fromIndex; i < toIndex; i++) {
      if (visitor(this, this.toX(i), this.toY(i), this.cells[i])) break;
    }
  }

  private cellIndex(x: number, y: number): number {
    if (!this.isValid(x, y)) {
      throw OutOfBoundsError.atCell(x, y, this);
    }
    return this.toIndex(x, y);
  }

  private linearIndex(index: number): number {
    if (!Number.isInteger(index) || index < 0 || index >= this.length) {
      throw OutOfBoundsError.atIndex(index, this.length);
    }
    return index;
  }
}
