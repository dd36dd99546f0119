import {
  invalidDimensions,
  invalidLayout,
  invalidMineCount,
  invalidPhase,
  tooManyMines,
} from '@/lib/errors';
import { shuffle } from '@/lib/utils';
import { cellAdjacentMines, clickCell, placeMine, revealCell, toggleCellMark } from './cell';
import { cellAt, createCells } from './helpers';
import type { BoardOptions, CellState, MinesweeperBoard, Phase } from './types';

// --- Construction ---

function validateDimensions(width: number, height: number): void {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw invalidDimensions(width, height);
  }
}

function validateMineCount(mineCount: number, totalCells: number): void {
  if (!Number.isInteger(mineCount) || mineCount < 0) {
    throw invalidMineCount(mineCount);
  }
  if (mineCount > totalCells - 1) {
    throw tooManyMines(mineCount, totalCells);
  }
}

function createBoard(
  width: number,
  height: number,
  mineCount: number,
  options: BoardOptions,
): MinesweeperBoard {
  return {
    width,
    height,
    mineCount,
    cells: createCells(width, height),
    hiddenCount: width * height,
    phase: 'start',
    random: options.random ?? Math.random,
  };
}

/**
 * Board whose mines are placed on the first sweep, never under that sweep.
 */
export function newRandomBoard(
  width: number,
  height: number,
  mineCount: number,
  options: BoardOptions = {},
): MinesweeperBoard {
  validateDimensions(width, height);
  validateMineCount(mineCount, width * height);
  return createBoard(width, height, mineCount, options);
}

/**
 * Board with a known layout: row-major, any nonzero entry is a mine.
 * Play starts immediately in 'in_progress'.
 */
export function newFixedBoard(
  width: number,
  height: number,
  mineLayout: readonly number[],
): MinesweeperBoard {
  validateDimensions(width, height);
  const totalCells = width * height;
  if (mineLayout.length !== totalCells) {
    throw invalidLayout(mineLayout.length, totalCells);
  }
  const mineCount = mineLayout.filter((v) => v !== 0).length;
  validateMineCount(mineCount, totalCells);

  const board = createBoard(width, height, mineCount, {});
  mineLayout.forEach((v, i) => {
    if (v !== 0) placeMine(board.cells, i);
  });
  board.phase = 'in_progress';
  return board;
}

// --- Mine placement ---

export function initializeMines(board: MinesweeperBoard, initX: number, initY: number): void {
  if (board.phase !== 'start') {
    throw invalidPhase(board.phase);
  }

  const safeIndex = cellAt(board, initX, initY).index;
  const order = shuffle(board.cells.map((c) => c.index), board.random);
  let toPlace = board.mineCount;
  for (const index of order) {
    if (toPlace === 0) break;
    if (index === safeIndex) continue;
    placeMine(board.cells, index);
    toPlace--;
  }
}

// --- Actions ---

export function sweep(board: MinesweeperBoard, x: number, y: number): Phase {
  const cell = cellAt(board, x, y);
  if (isGameOver(board)) return board.phase;

  if (board.phase === 'start') {
    initializeMines(board, x, y);
    board.phase = 'in_progress';
  }

  const result = clickCell(board.cells, cell.index);
  board.hiddenCount -= result.revealed;

  if (result.state === 'exploded') {
    revealAllCells(board);
    board.phase = 'lose';
  } else if (board.hiddenCount === board.mineCount) {
    revealAllCells(board);
    board.phase = 'win';
  }
  return board.phase;
}

export function toggleMark(board: MinesweeperBoard, x: number, y: number): CellState {
  const cell = cellAt(board, x, y);
  return toggleCellMark(board.cells, cell.index);
}

export function revealAllCells(board: MinesweeperBoard): void {
  for (const cell of board.cells) {
    revealCell(board.cells, cell.index);
  }
}

// --- Accessors ---

export function cellState(board: MinesweeperBoard, x: number, y: number): CellState {
  return cellAt(board, x, y).state;
}

export function adjacentMines(board: MinesweeperBoard, x: number, y: number): number {
  return cellAdjacentMines(cellAt(board, x, y));
}

export function boardWidth(board: MinesweeperBoard): number {
  return board.width;
}

export function boardHeight(board: MinesweeperBoard): number {
  return board.height;
}

export function boardPhase(board: MinesweeperBoard): Phase {
  return board.phase;
}

export function hiddenCount(board: MinesweeperBoard): number {
  return board.hiddenCount;
}

export function flagCount(board: MinesweeperBoard): number {
  return board.cells.filter((c) => c.state === 'flagged').length;
}

export function isGameOver(board: MinesweeperBoard): boolean {
  return board.phase === 'win' || board.phase === 'lose';
}
