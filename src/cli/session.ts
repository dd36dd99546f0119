import { isMinesweeperError } from '@/lib/errors';
import {
  COMMAND_HELP,
  LOSE_MESSAGE,
  WIN_MESSAGE,
  parseCommand,
  renderBoard,
  sweep,
  toggleMark,
} from '@/lib/games/minesweeper';
import type { MinesweeperBoard, MinesweeperCommand } from '@/lib/games/minesweeper';

export const PROMPT = 'Enter command:\n> ';

export interface LineResult {
  output: string;
  done: boolean;
}

function executeCommand(board: MinesweeperBoard, command: MinesweeperCommand): string {
  switch (command.type) {
    case 'mark':
      toggleMark(board, command.x, command.y);
      return renderBoard(board);
    case 'sweep':
      sweep(board, command.x, command.y);
      return renderBoard(board);
    case 'help':
      return COMMAND_HELP + '\n';
  }
}

/**
 * Executes one input line against the board and returns what to print.
 * `done` is set once the game is won or lost.
 */
export function runLine(board: MinesweeperBoard, line: string): LineResult {
  let output: string;
  try {
    output = executeCommand(board, parseCommand(line));
  } catch (err) {
    if (isMinesweeperError(err) && err.code === 'OUT_OF_BOUNDS') {
      return { output: err.message + '\n', done: false };
    }
    throw err;
  }

  if (board.phase === 'win') return { output: output + WIN_MESSAGE + '\n', done: true };
  if (board.phase === 'lose') return { output: output + LOSE_MESSAGE + '\n', done: true };
  return { output, done: false };
}
