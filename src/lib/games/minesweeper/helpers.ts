import { outOfBounds } from '@/lib/errors';
import type { Cell, MinesweeperBoard } from './types';

export function toXY(index: number, width: number): [number, number] {
  return [index % width, Math.floor(index / width)];
}

export function toIndex(x: number, y: number, width: number): number {
  return y * width + x;
}

export function getNeighbours(index: number, width: number, height: number): number[] {
  const [x, y] = toXY(index, width);
  const neighbours: number[] = [];
  for (let dy = -1; dy <= 1; dy++) {
    for (let dx = -1; dx <= 1; dx++) {
      if (dx === 0 && dy === 0) continue;
      const nx = x + dx;
      const ny = y + dy;
      if (nx >= 0 && nx < width && ny >= 0 && ny < height) {
        neighbours.push(toIndex(nx, ny, width));
      }
    }
  }
  return neighbours;
}

export function createCells(width: number, height: number): Cell[] {
  return Array.from({ length: width * height }, (_, i): Cell => {
    const [x, y] = toXY(i, width);
    return {
      index: i,
      x,
      y,
      state: 'hidden',
      hasMine: false,
      adjacentMines: 0,
      neighbours: getNeighbours(i, width, height),
    };
  });
}

export function isInBounds(board: MinesweeperBoard, x: number, y: number): boolean {
  return Number.isInteger(x) && Number.isInteger(y)
    && x >= 0 && x < board.width
    && y >= 0 && y < board.height;
}

/** Resolves (x, y) to the cell, throwing OUT_OF_BOUNDS outside the grid. */
export function cellAt(board: MinesweeperBoard, x: number, y: number): Cell {
  if (!isInBounds(board, x, y)) {
    throw outOfBounds(x, y);
  }
  return board.cells[toIndex(x, y, board.width)];
}
