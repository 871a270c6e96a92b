// ═══════════════════════════════════════════════════════════════════════════════
// GRIDBOT - Maze Parser
// Symbolic layouts ('.' free, '#' wall, 'S' start) into walls and a start cell
// ═══════════════════════════════════════════════════════════════════════════════

import { MazeFormatError } from '../core/errors';
import { Cell } from '../core/types';
import { GridLayout } from './GridState';
import mazes from './mazes.json';

/** Rows top to bottom; a row is an array of one-character cells or a plain string */
export type MazeLayout = ReadonlyArray<ReadonlyArray<string> | string>;

export const MAZE_SYMBOLS = {
  empty: '.',
  wall: '#',
  start: 'S',
} as const;

export const SIMPLE_MAZE: MazeLayout = mazes.simple;
export const STUDENT_MAZE: MazeLayout = mazes.student;

/**
 * Parse a layout. Row 0 is the top of the grid, so cell (col, row) lands on
 * (col, height - 1 - row) and `up` moves toward the first row.
 *
 * Any symbol other than '#' and 'S' is free floor.
 */
export function parseMaze(layout: MazeLayout): GridLayout {
  if (layout.length === 0 || layout[0].length === 0) {
    throw new MazeFormatError('Maze layout is empty');
  }

  const rows: ReadonlyArray<ReadonlyArray<string>> = layout.map(row =>
    typeof row === 'string' ? Array.from(row) : row
  );
  const height = rows.length;
  const width = rows[0].length;
  const walls: Cell[] = [];
  let start: Cell | null = null;

  for (const [rowIndex, row] of rows.entries()) {
    if (row.length !== width) {
      throw new MazeFormatError(
        `Maze row ${rowIndex} has ${row.length} cells, expected ${width} like row 0`
      );
    }

    const y = height - 1 - rowIndex;

    for (const [x, symbol] of row.entries()) {
      if (Array.from(symbol).length !== 1) {
        throw new MazeFormatError(`Maze cell (${x}, ${rowIndex}) must be one character, got '${symbol}'`);
      }

      if (symbol === MAZE_SYMBOLS.wall) {
        walls.push({ x, y });
      } else if (symbol === MAZE_SYMBOLS.start) {
        if (start) {
          throw new MazeFormatError(
            `Maze has more than one start marker: (${start.x}, ${start.y}) and (${x}, ${y})`
          );
        }
        start = { x, y };
      }
    }
  }

  return { width, height, walls, start };
}
