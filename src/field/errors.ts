import type { Dimensions } from "../types/field-types";

/** Base class for every failure raised by a field. */
export class FieldError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Dimensions are not positive integers, or adopted storage has the wrong length. */
export class ConstructionError extends FieldError {
  readonly width: number;
  readonly height: number;
  readonly length: number | undefined;

  constructor(width: number, height: number, length?: number) {
    super(
      length === undefined
        ? `Invalid field dimensions ${width}x${height}: width and height must be positive integers.`
        : `Storage of length ${length} cannot hold a field with ${width} columns and ${height} rows.`,
    );
    this.width = width;
    this.height = height;
    this.length = length;
  }
}

/** A pairwise operation was given a field of a different shape. */
export class DimensionMismatchError extends FieldError {
  readonly expected: Dimensions;
  readonly actual: Dimensions;

  constructor(expected: Dimensions, actual: Dimensions) {
    super(
      `Field sizes do not match: expected ${expected.width}x${expected.height}, got ${actual.width}x${actual.height}.`,
    );
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * A coordinate pair or linear index outside the field. Guard with
 * `isValid` when the input is not known to be in range.
 */
export class OutOfBoundsError extends FieldError {
  readonly index: number | undefined;
  readonly x: number | undefined;
  readonly y: number | undefined;

  constructor(message: string, index?: number, x?: number, y?: number) {
    super(message);
    this.index = index;
    this.x = x;
    this.y = y;
  }

  static atCell(x: number, y: number, { width, height }: Dimensions): OutOfBoundsError {
    return new OutOfBoundsError(`Cell (${x}, ${y}) is outside a ${width}x${height} field.`, undefined, x, y);
  }

  static atIndex(index: number, length: number): OutOfBoundsError {
    return new OutOfBoundsError(`Index ${index} is outside [0, ${length}).`, index);
  }
}
