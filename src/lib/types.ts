// --- Errors ---

export type ErrorCode =
  | 'INVALID_DIMENSIONS'   // width or height not a positive integer
  | 'INVALID_MINE_COUNT'   // negative or fractional mine count
  | 'TOO_MANY_MINES'       // more than width * height - 1
  | 'INVALID_LAYOUT'       // fixed layout length does not match the grid
  | 'OUT_OF_BOUNDS'        // coordinates outside the grid
  | 'MINE_ALREADY_PLACED'  // placement is not idempotent
  | 'CELL_NOT_REVEALED'    // adjacent count read on a hidden cell
  | 'INVALID_PHASE';       // action not legal in the current phase

