import { describe, it, expect } from 'vitest';
import { isMinesweeperError } from '@/lib/errors';
import {
  cellAdjacentMines,
  clickCell,
  floodFillReveal,
  isHiddenState,
  placeMine,
  revealCell,
  toggleCellMark,
} from './cell';
import { createCells } from './helpers';
import type { Cell } from './types';

function errorCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (isMinesweeperError(err)) return err.code;
    throw err;
  }
  return undefined;
}

function cellsWithMines(width: number, height: number, mines: number[]): Cell[] {
  const cells = createCells(width, height);
  for (const m of mines) placeMine(cells, m);
  return cells;
}

describe('isHiddenState', () => {
  it('classifies the hidden family', () => {
    expect(isHiddenState('hidden')).toBe(true);
    expect(isHiddenState('flagged')).toBe(true);
    expect(isHiddenState('questioned')).toBe(true);
    expect(isHiddenState('revealed')).toBe(false);
    expect(isHiddenState('exploded')).toBe(false);
    expect(isHiddenState('mine')).toBe(false);
    expect(isHiddenState('mismarked')).toBe(false);
  });
});

describe('placeMine', () => {
  it('increments neighbours but not the cell itself', () => {
    const cells = cellsWithMines(3, 3, [4]);
    expect(cells[4].hasMine).toBe(true);
    expect(cells[4].adjacentMines).toBe(0);
    for (const n of [0, 1, 2, 3, 5, 6, 7, 8]) {
      expect(cells[n].adjacentMines).toBe(1);
    }
  });

  it('accumulates counts from several mines', () => {
    const cells = cellsWithMines(3, 3, [0, 2]);
    expect(cells[1].adjacentMines).toBe(2);
    expect(cells[4].adjacentMines).toBe(2);
    expect(cells[3].adjacentMines).toBe(1);
    expect(cells[6].adjacentMines).toBe(0);
  });

  it('rejects a second mine on the same cell', () => {
    const cells = cellsWithMines(2, 2, [0]);
    expect(errorCode(() => placeMine(cells, 0))).toBe('MINE_ALREADY_PLACED');
    expect(cells[1].adjacentMines).toBe(1);
  });
});

describe('clickCell', () => {
  it('explodes a mined cell', () => {
    const cells = cellsWithMines(2, 2, [0]);
    expect(clickCell(cells, 0)).toEqual({ revealed: 1, state: 'exploded' });
  });

  it('reveals a numbered cell without spreading', () => {
    const cells = cellsWithMines(3, 3, [8]);
    expect(clickCell(cells, 4)).toEqual({ revealed: 1, state: 'revealed' });
    expect(cells.filter((c) => c.state === 'revealed')).toHaveLength(1);
  });

  it('opens the blank region and its numbered border', () => {
    const cells = cellsWithMines(3, 3, [8]);
    expect(clickCell(cells, 0)).toEqual({ revealed: 8, state: 'revealed' });
    expect(cells[8].state).toBe('hidden');
  });

  it('ignores flagged cells', () => {
    const cells = cellsWithMines(2, 2, [0]);
    cells[0].state = 'flagged';
    expect(clickCell(cells, 0)).toEqual({ revealed: 0, state: 'flagged' });
    expect(cells[0].state).toBe('flagged');
  });

  it('opens questioned cells', () => {
    const cells = cellsWithMines(2, 2, [0]);
    cells[3].state = 'questioned';
    expect(clickCell(cells, 3)).toEqual({ revealed: 1, state: 'revealed' });
  });

  it('is a no-op on revealed cells', () => {
    const cells = cellsWithMines(3, 3, [8]);
    clickCell(cells, 0);
    expect(clickCell(cells, 0)).toEqual({ revealed: 0, state: 'revealed' });
  });
});

describe('floodFillReveal', () => {
  it('stops at flags without revealing them', () => {
    const cells = createCells(4, 1);
    cells[1].state = 'flagged';
    expect(clickCell(cells, 0)).toEqual({ revealed: 1, state: 'revealed' });
    expect(cells.map((c) => c.state)).toEqual(['revealed', 'flagged', 'hidden', 'hidden']);
  });

  it('flows around a flag when the region connects', () => {
    const cells = createCells(3, 3);
    cells[4].state = 'flagged';
    expect(clickCell(cells, 0)).toEqual({ revealed: 8, state: 'revealed' });
    expect(cells[4].state).toBe('flagged');
  });

  it('does not count cells that were already revealed', () => {
    const cells = createCells(5, 1);
    cells[2].state = 'flagged';
    expect(clickCell(cells, 0).revealed).toBe(2);

    toggleCellMark(cells, 2); // flagged -> questioned
    expect(clickCell(cells, 4).revealed).toBe(3);
    expect(cells.every((c) => c.state === 'revealed')).toBe(true);
  });

  it('continues through blank cells that are already open', () => {
    const cells = createCells(6, 1);
    cells[0].state = 'flagged';
    cells[3].state = 'flagged';
    expect(clickCell(cells, 1).revealed).toBe(2);

    cells[0].state = 'hidden';
    cells[3].state = 'hidden';
    expect(clickCell(cells, 4).revealed).toBe(4);
    expect(cells[0].state).toBe('revealed');
  });

  it('never reveals mines', () => {
    const cells = cellsWithMines(3, 3, [8]);
    const visited = new Set([0]);
    cells[0].state = 'revealed';
    expect(floodFillReveal(cells, 0, visited)).toBe(7);
    expect(cells[8].state).toBe('hidden');
    expect(visited.has(8)).toBe(false);
  });
});

describe('toggleCellMark', () => {
  it('cycles hidden -> flagged -> questioned -> hidden', () => {
    const cells = createCells(1, 1);
    expect(toggleCellMark(cells, 0)).toBe('flagged');
    expect(toggleCellMark(cells, 0)).toBe('questioned');
    expect(toggleCellMark(cells, 0)).toBe('hidden');
  });

  it('leaves revealed cells alone', () => {
    const cells = createCells(2, 1);
    cells[0].state = 'revealed';
    expect(toggleCellMark(cells, 0)).toBe('revealed');
  });
});

describe('revealCell', () => {
  it('shows flagged mines as mismarked', () => {
    const cells = cellsWithMines(2, 1, [0]);
    cells[0].state = 'flagged';
    revealCell(cells, 0);
    expect(cells[0].state).toBe('mismarked');
  });

  it('shows unflagged mines, including questioned ones', () => {
    const cells = cellsWithMines(3, 1, [0, 2]);
    cells[2].state = 'questioned';
    revealCell(cells, 0);
    revealCell(cells, 2);
    expect(cells[0].state).toBe('mine');
    expect(cells[2].state).toBe('mine');
  });

  it('reveals safe cells, including flagged ones', () => {
    const cells = cellsWithMines(3, 1, [0]);
    cells[2].state = 'flagged';
    revealCell(cells, 1);
    revealCell(cells, 2);
    expect(cells[1].state).toBe('revealed');
    expect(cells[2].state).toBe('revealed');
  });

  it('leaves an exploded cell untouched', () => {
    const cells = cellsWithMines(2, 1, [0]);
    clickCell(cells, 0);
    revealCell(cells, 0);
    expect(cells[0].state).toBe('exploded');
  });
});

describe('cellAdjacentMines', () => {
  it('rejects reads on hidden-family cells', () => {
    const cells = cellsWithMines(2, 1, [0]);
    expect(errorCode(() => cellAdjacentMines(cells[1]))).toBe('CELL_NOT_REVEALED');
    cells[1].state = 'flagged';
    expect(errorCode(() => cellAdjacentMines(cells[1]))).toBe('CELL_NOT_REVEALED');
  });

  it('returns the count once revealed', () => {
    const cells = cellsWithMines(2, 1, [0]);
    clickCell(cells, 1);
    expect(cellAdjacentMines(cells[1])).toBe(1);
  });
});
