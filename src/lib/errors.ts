import type { ErrorCode } from './types';

export class MinesweeperError extends Error {
  constructor(message: string, public code: ErrorCode, public status: number = 400) {
    super(message);
    this.name = 'MinesweeperError';
  }
}

export function isMinesweeperError(value: unknown): value is MinesweeperError {
  return value instanceof MinesweeperError;
}

// Pre-built error helpers for common cases

export function invalidDimensions(width: number, height: number) {
  return new MinesweeperError(`Invalid board size: ${width}x${height}`, 'INVALID_DIMENSIONS');
}

export function invalidMineCount(mineCount: number) {
  return new MinesweeperError(`Invalid mine count: ${mineCount}`, 'INVALID_MINE_COUNT');
}

export function tooManyMines(mineCount: number, totalCells: number) {
  return new MinesweeperError(
    `Too many mines: ${mineCount} (at most ${totalCells - 1} for ${totalCells} cells)`,
    'TOO_MANY_MINES',
  );
}

export function invalidLayout(length: number, expected: number) {
  return new MinesweeperError(
    `Mine layout has ${length} entries, expected ${expected}`,
    'INVALID_LAYOUT',
  );
}

export function outOfBounds(x: number, y: number) {
  return new MinesweeperError(`Coordinates out of range: (${x}, ${y})`, 'OUT_OF_BOUNDS');
}

export function mineAlreadyPlaced(index: number) {
  return new MinesweeperError(`Mine already exists at cell ${index}`, 'MINE_ALREADY_PLACED', 500);
}

export function cellNotRevealed(index: number) {
  return new MinesweeperError(`Cell ${index} is not yet revealed`, 'CELL_NOT_REVEALED', 500);
}

export function invalidPhase(phase: string) {
  return new MinesweeperError(`Invalid action for current phase: ${phase}`, 'INVALID_PHASE', 409);
}
