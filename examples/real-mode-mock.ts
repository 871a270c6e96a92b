#!/usr/bin/env npx tsx
// ═══════════════════════════════════════════════════════════════════════════════
// GRIDBOT - Real Mode Without a Robot
// With no robot on the network (or ROBOT_BEHAVIOR_HARDWARE_MOCK=1) the program
// falls back to the mock and every move is recorded instead of sent
// ═══════════════════════════════════════════════════════════════════════════════

import { createProgram, eventBus } from '../src';

interface SelectedPayload {
  backend: string;
  reason: string;
  error?: string;
}

async function main(): Promise<void> {
  eventBus.on<SelectedPayload>('program:backend:selected', (e) => {
    const detail = e.payload.error ? ` (${e.payload.error})` : '';
    console.log(`Backend: ${e.payload.backend} [${e.payload.reason}]${detail}`);
  });

  const program = await createProgram({
    mode: 'real',
    host: process.env.ROBOT_HOST ?? '192.168.12.1',
    robot: { probeTimeoutMs: 1500 },
  });

  console.log(`Using mock: ${program.usingMock}`);

  await program.robot.move('up');
  await program.robot.move('right', 0.5, 0.8);
  await program.robot.move('backward');

  for (const record of program.robot.getMoveLog()) {
    const commands = (record.commands ?? []).map(cmd => `${cmd.kind}@${cmd.speed}x${cmd.time}s`).join(', ');
    console.log(`#${record.sequenceNumber} ${record.requestedDirection} [${record.backend}] ${record.success} ${commands}`);
  }

  await program.close();
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
