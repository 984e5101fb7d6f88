/**
 * Read-only view of a field.
 * Used by code that samples a field without modifying it.
 */
export interface IField {
  readonly width: number;
  readonly height: number;
  readonly length: number;
  readonly cells: Float64Array;
  get(x: number, y: number): number;
  isValid(x: number, y: number): boolean;
}

/**
 * Called once per visited cell, in ascending linear-index order.
 * Returning `true` (STOP) halts the traversal; `false` (CONTINUE) moves on.
 */
export type Visitor<F extends IField = IField> = (field: F, x: number, y: number, value: number) => boolean;

export interface Dimensions {
  width: number;
  height: number;
}
