import { createInterface } from 'node:readline';
import { isMinesweeperError } from '@/lib/errors';
import { newRandomBoard, renderBoard } from '@/lib/games/minesweeper';
import type { MinesweeperBoard } from '@/lib/games/minesweeper';
import { createRng } from '@/lib/utils';
import { USAGE, parseCliArgs, readSeed } from './config';
import { PROMPT, runLine } from './session';

function createGame(argv: string[]): MinesweeperBoard | null {
  const config = parseCliArgs(argv);
  if (!config) return null;

  const seed = readSeed(process.env);
  return newRandomBoard(config.width, config.height, config.mineCount, {
    random: seed === undefined ? undefined : createRng(seed),
  });
}

async function main(argv: string[]): Promise<number> {
  let board: MinesweeperBoard | null;
  try {
    board = createGame(argv);
  } catch (err) {
    if (isMinesweeperError(err)) {
      console.error(`Error: ${err.message}`);
      return 1;
    }
    throw err;
  }

  if (!board) {
    console.log(USAGE);
    return 0;
  }

  const rl = createInterface({ input: process.stdin, terminal: false });
  process.stdout.write(renderBoard(board));
  process.stdout.write(PROMPT);

  try {
    for await (const line of rl) {
      const { output, done } = runLine(board, line);
      process.stdout.write(output);
      if (done) break;
      process.stdout.write(PROMPT);
    }
  } finally {
    rl.close();
  }
  return 0;
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  });
