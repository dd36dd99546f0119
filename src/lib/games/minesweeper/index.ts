export {
  newRandomBoard,
  newFixedBoard,
  initializeMines,
  sweep,
  toggleMark,
  revealAllCells,
  cellState,
  adjacentMines,
  boardWidth,
  boardHeight,
  boardPhase,
  hiddenCount,
  flagCount,
  isGameOver,
} from './engine';
export type {
  MinesweeperBoard, Cell, CellState, Phase, ClickResult, BoardOptions, MinesweeperCommand,
} from './types';
export {
  isHiddenState, clickCell, floodFillReveal, toggleCellMark, revealCell, placeMine, cellAdjacentMines,
} from './cell';
export { toXY, toIndex, getNeighbours, createCells, isInBounds, cellAt } from './helpers';
export { renderBoard, cellGlyph } from './render';
export { parseCommand, COMMAND_HELP } from './commands';
export {
  DEFAULT_WIDTH, DEFAULT_HEIGHT, DEFAULT_MINE_COUNT,
  HIDDEN_STATES, CELL_GLYPHS, BLANK_GLYPH, WIN_MESSAGE, LOSE_MESSAGE,
  CELL_SIZE, NUMBER_COLORS,
} from './constants';
