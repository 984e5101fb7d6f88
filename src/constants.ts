// ── Field ──

/** Value every cell starts with when a field is created without an explicit fill. */
export const DEFAULT_CELL_VALUE = 0;

// ── Iteration ──

/** Visitor result that halts traversal after the current cell. */
export const STOP = true;

/** Visitor result that moves on to the next cell. */
export const CONTINUE = false;

// ── Hashing ──

/** Starting accumulator for the cell-sequence hash. */
export const HASH_SEED = 1;

/** Multiplier applied to the accumulator before each cell hash is added. */
export const HASH_MULTIPLIER = 31;

// ── Rendering ──

/** Placed between `[x,y|value]` entries within one row. */
export const CELL_SEPARATOR = " ";

/** Placed after the last entry of every row. */
export const ROW_SEPARATOR = "\n";
