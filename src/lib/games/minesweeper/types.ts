import type { RandomSource } from '@/lib/utils';

export type CellState =
  | 'hidden'
  | 'flagged'
  | 'questioned'
  | 'revealed'   // number (or blank) showing
  | 'exploded'   // the mine the player hit
  | 'mine'       // mine shown at game end
  | 'mismarked'; // flagged mine shown at game end

export type Phase = 'start' | 'in_progress' | 'win' | 'lose';

export interface Cell {
  index: number;         // row-major: y * width + x
  x: number;
  y: number;
  state: CellState;
  hasMine: boolean;
  adjacentMines: number;
  neighbours: number[];  // flat indices, wired once at construction
}

export interface MinesweeperBoard {
  width: number;
  height: number;
  mineCount: number;

  cells: Cell[];

  // Cells still in a hidden-family state (hidden, flagged, questioned)
  hiddenCount: number;

  phase: Phase;

  // Used for deferred mine placement on the first sweep
  random: RandomSource;
}

export interface ClickResult {
  revealed: number;
  state: CellState;
}

export interface BoardOptions {
  random?: RandomSource;
}

export type MinesweeperCommand =
  | { type: 'mark'; x: number; y: number }
  | { type: 'sweep'; x: number; y: number }
  | { type: 'help' };
