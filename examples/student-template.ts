#!/usr/bin/env npx tsx
// ═══════════════════════════════════════════════════════════════════════════════
// GRIDBOT - Student Template
// The same code drives the simulator and the real robot: change `mode` only
// ═══════════════════════════════════════════════════════════════════════════════

import { createProgram } from '../src';

const c = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  cyan: '\x1b[36m',
};

async function main(): Promise<void> {
  const program = await createProgram({ mode: 'simulator', width: 6, height: 6, startX: 0, startY: 0 });
  program.addWall(3, 3);
  program.addWall(4, 3);

  console.log(`${c.cyan}${c.bold}Grid ${program.width}x${program.height}, backend: ${program.backend}${c.reset}`);

  const moves = ['right', 'right', 'right', 'up', 'up', 'up'] as const;

  for (const direction of moves) {
    const ok = await program.robot.move(direction);
    const { x, y } = program.robot.getPosition();
    const mark = ok ? `${c.green}✓${c.reset}` : `${c.red}✗${c.reset}`;
    console.log(`${mark} ${direction.padEnd(8)} → (${x}, ${y})`);

    if (!ok) {
      console.log(`${c.red}Blocked. Simulation stopped: ${program.robot.isSimulationStopped()}${c.reset}`);
      break;
    }
  }

  program.robot.resetSimulation();
  const start = program.robot.getPosition();
  console.log(`Reset to (${start.x}, ${start.y})`);

  await program.close();
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
