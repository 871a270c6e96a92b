#!/usr/bin/env npx tsx
// ═══════════════════════════════════════════════════════════════════════════════
// GRIDBOT - Maze Playback
// Run a path through the bundled student maze, then replay the finished log
// ═══════════════════════════════════════════════════════════════════════════════

import { Cell, createProgram, STUDENT_MAZE } from '../src';

function render(width: number, height: number, walls: Cell[], robot: Cell): string {
  const wallSet = new Set(walls.map(w => `${w.x},${w.y}`));
  const lines: string[] = [];

  for (let y = height - 1; y >= 0; y--) {
    let line = '';
    for (let x = 0; x < width; x++) {
      if (x === robot.x && y === robot.y) line += '◉ ';
      else if (wallSet.has(`${x},${y}`)) line += '█ ';
      else line += '· ';
    }
    lines.push(line);
  }

  return lines.join('\n');
}

async function main(): Promise<void> {
  const program = await createProgram();
  program.loadMaze(STUDENT_MAZE);

  const path = ['right', 'right', 'down', 'down', 'down', 'down', 'right', 'right'] as const;
  for (const direction of path) {
    if (!(await program.robot.move(direction))) break;
  }

  const walls = program.getWalls();
  await program.replay({
    speed: 'fast',
    onFrame: ({ index, total, record }) => {
      console.log(`\nStep ${index + 1}/${total}: ${record.requestedDirection} ${record.success ? 'ok' : 'blocked'}`);
      console.log(render(program.width, program.height, walls, record.to));
    },
  });

  await program.close();
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
