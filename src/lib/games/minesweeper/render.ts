import { BLANK_GLYPH, CELL_GLYPHS } from './constants';
import type { Cell, MinesweeperBoard } from './types';

export function cellGlyph(cell: Cell): string {
  if (cell.state === 'revealed') {
    return cell.adjacentMines === 0 ? BLANK_GLYPH : String(cell.adjacentMines);
  }
  return CELL_GLYPHS[cell.state];
}

/** One line per row, each terminated by a newline. */
export function renderBoard(board: MinesweeperBoard): string {
  let out = '';
  for (let y = 0; y < board.height; y++) {
    const row = board.cells.slice(y * board.width, (y + 1) * board.width);
    out += row.map(cellGlyph).join('') + '\n';
  }
  return out;
}
