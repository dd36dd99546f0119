import { parseInteger } from '@/lib/utils';
import type { MinesweeperCommand } from './types';

export const COMMAND_HELP = [
  'Command Help',
  'Toggle marking:',
  'M [x-coordinate] [y-coordinate]',
  'Sweep square:',
  '[x-coordinate] [y-coordinate]',
].join('\n');

function parseCoordinates(tokens: string[]): [number, number] | null {
  if (tokens.length < 2) return null;
  const x = parseInteger(tokens[0]);
  const y = parseInteger(tokens[1]);
  if (x === null || y === null) return null;
  return [x, y];
}

/**
 * `M <x> <y>` toggles a mark, `<x> <y>` sweeps. Extra tokens are ignored;
 * anything else asks for help.
 */
export function parseCommand(line: string): MinesweeperCommand {
  const tokens = line.trim().split(/\s+/).filter(Boolean);

  if (tokens[0] === 'M') {
    const coords = parseCoordinates(tokens.slice(1));
    if (coords) return { type: 'mark', x: coords[0], y: coords[1] };
    return { type: 'help' };
  }

  const coords = parseCoordinates(tokens);
  if (coords) return { type: 'sweep', x: coords[0], y: coords[1] };
  return { type: 'help' };
}
