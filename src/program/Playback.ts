// ═══════════════════════════════════════════════════════════════════════════════
// GRIDBOT - Playback
// Replays a finished move log at a visual cadence. Works on a frozen copy and
// never issues moves, so it cannot race the program that produced the log
// ═══════════════════════════════════════════════════════════════════════════════

import { MoveRecord, Sleep } from '../core/types';
import { sleep as realSleep } from '../core/timing';
import { copyMoveRecord, freezeMoveRecord } from '../grid/GridState';

export const PLAYBACK_DELAYS = {
  fast: 500,
  normal: 1000,
  slow: 2500,
} as const;

export type PlaybackSpeed = keyof typeof PLAYBACK_DELAYS;

export interface PlaybackFrame {
  index: number;
  total: number;
  record: MoveRecord;
}

export interface PlaybackOptions {
  onFrame: (frame: PlaybackFrame) => void | Promise<void>;
  delayMs?: number;
  speed?: PlaybackSpeed;
  sleep?: Sleep;
}

/** Resolves with the number of frames shown */
export async function replayMoveLog(log: readonly MoveRecord[], options: PlaybackOptions): Promise<number> {
  const frames = Object.freeze(log.map(record => freezeMoveRecord(copyMoveRecord(record))));
  const delayMs = options.delayMs ?? PLAYBACK_DELAYS[options.speed ?? 'normal'];
  const sleep = options.sleep ?? realSleep;

  for (const [index, record] of frames.entries()) {
    if (index > 0) {
      await sleep(delayMs);
    }
    await options.onFrame({ index, total: frames.length, record });
  }

  return frames.length;
}
