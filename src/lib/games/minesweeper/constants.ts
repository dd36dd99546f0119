import type { CellState } from './types';

// Board defaults for the browser view
export const DEFAULT_WIDTH = 9;
export const DEFAULT_HEIGHT = 9;
export const DEFAULT_MINE_COUNT = 10;

export const HIDDEN_STATES: ReadonlySet<CellState> = new Set<CellState>([
  'hidden',
  'flagged',
  'questioned',
]);

// Text glyphs; 'revealed' is rendered from the adjacent count instead
export const CELL_GLYPHS: Record<Exclude<CellState, 'revealed'>, string> = {
  hidden: '~',
  flagged: 'P',
  questioned: '?',
  exploded: '#',
  mine: '*',
  mismarked: 'X',
};

export const BLANK_GLYPH = '_';

// Terminal messages
export const WIN_MESSAGE = 'You win!';
export const LOSE_MESSAGE = 'BOOM!';

// Browser cell sizing
export const CELL_SIZE = 32;

// Number colors (classic minesweeper palette adjusted for dark bg)
export const NUMBER_COLORS: Record<number, string> = {
  1: '#4A90D9',
  2: '#6BBF7A',
  3: '#E85B5B',
  4: '#7B68C4',
  5: '#C45B5B',
  6: '#5BB8B0',
  7: '#D4D4D4',
  8: '#8B8B8B',
};
