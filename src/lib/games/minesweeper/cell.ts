import { cellNotRevealed, mineAlreadyPlaced } from '@/lib/errors';
import { HIDDEN_STATES } from './constants';
import type { Cell, CellState, ClickResult } from './types';

export function isHiddenState(state: CellState): boolean {
  return HIDDEN_STATES.has(state);
}

/**
 * Player click on a single cell. Flagged and already-revealed cells are
 * immune. A safe cell with no adjacent mines opens its blank region.
 */
export function clickCell(cells: Cell[], index: number): ClickResult {
  const cell = cells[index];
  if (!isHiddenState(cell.state) || cell.state === 'flagged') {
    return { revealed: 0, state: cell.state };
  }

  if (cell.hasMine) {
    cell.state = 'exploded';
    return { revealed: 1, state: cell.state };
  }

  cell.state = 'revealed';
  let revealed = 1;
  if (cell.adjacentMines === 0) {
    revealed += floodFillReveal(cells, index, new Set([index]));
  }
  return { revealed, state: cell.state };
}

/**
 * Reveals the region reachable from `startIndex` through blank cells, plus
 * its numbered border. `visited` is shared by the whole traversal so each
 * cell is examined at most once. Flags stop the fill; mines are never opened.
 * Blank cells that are already open still carry the fill but are not counted.
 *
 * @returns number of cells newly revealed (excluding the start cell)
 */
export function floodFillReveal(cells: Cell[], startIndex: number, visited: Set<number>): number {
  let revealed = 0;
  const stack: number[] = [startIndex];

  while (stack.length > 0) {
    const idx = stack.pop();
    if (idx === undefined) break;

    for (const n of cells[idx].neighbours) {
      if (visited.has(n)) continue;
      visited.add(n);

      const neighbour = cells[n];
      if (neighbour.hasMine || neighbour.state === 'flagged') continue;

      if (isHiddenState(neighbour.state)) {
        neighbour.state = 'revealed';
        revealed++;
      }
      if (neighbour.adjacentMines === 0) {
        stack.push(n);
      }
    }
  }

  return revealed;
}

export function toggleCellMark(cells: Cell[], index: number): CellState {
  const cell = cells[index];
  switch (cell.state) {
    case 'hidden':
      cell.state = 'flagged';
      break;
    case 'flagged':
      cell.state = 'questioned';
      break;
    case 'questioned':
      cell.state = 'hidden';
      break;
    default:
      break;
  }
  return cell.state;
}

/** End-of-game reveal. Never explodes and never flood-fills. */
export function revealCell(cells: Cell[], index: number): void {
  const cell = cells[index];
  if (!isHiddenState(cell.state)) return;

  if (!cell.hasMine) {
    cell.state = 'revealed';
  } else if (cell.state === 'flagged') {
    // Flagged mines are shown as mismarked regardless of the flag being right
    cell.state = 'mismarked';
  } else {
    cell.state = 'mine';
  }
}

export function placeMine(cells: Cell[], index: number): void {
  const cell = cells[index];
  if (cell.hasMine) {
    throw mineAlreadyPlaced(index);
  }
  cell.hasMine = true;
  for (const n of cell.neighbours) {
    cells[n].adjacentMines++;
  }
}

export function cellAdjacentMines(cell: Cell): number {
  if (isHiddenState(cell.state)) {
    throw cellNotRevealed(cell.index);
  }
  return cell.adjacentMines;
}
