import { parseInteger } from '@/lib/utils';

export const USAGE = 'Usage: minesweeper [WIDTH] [HEIGHT] [NUM MINES]';

export interface CliConfig {
  width: number;
  height: number;
  mineCount: number;
}

/**
 * Expects exactly WIDTH HEIGHT NUM_MINES. Returns null when the usage line
 * should be shown instead. Range checks belong to board construction.
 */
export function parseCliArgs(argv: string[]): CliConfig | null {
  if (argv.length !== 3) return null;
  const [width, height, mineCount] = argv.map(parseInteger);
  if (width === null || height === null || mineCount === null) return null;
  return { width, height, mineCount };
}

// --- Env-var parsing ---

export function readSeed(env: Partial<NodeJS.ProcessEnv>): number | undefined {
  const value = env.MINESWEEPER_SEED;
  if (!value) return undefined;
  const seed = parseInteger(value.trim());
  if (seed === null) {
    throw new Error(`Invalid MINESWEEPER_SEED: ${value}`);
  }
  return seed;
}
