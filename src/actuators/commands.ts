// ═══════════════════════════════════════════════════════════════════════════════
// GRIDBOT - Command Planner
// Grid steps as timed velocity commands for a robot that can only walk along
// its body axis and turn in place
// ═══════════════════════════════════════════════════════════════════════════════

import { RobotSettings } from '../config/robot';
import { Direction, HardwareCommand, Heading, MotionParams } from '../core/types';
import { DIRECTION_HEADINGS, opposite, quarterTurns } from '../grid/MotionEngine';
import { StickAxes } from '../link/RobotLink';

export interface CommandPlan {
  commands: HardwareCommand[];
  /** Facing once the commands have run */
  facing: Heading;
}

type Timing = Pick<RobotSettings, 'moveSpeed' | 'moveTime' | 'turnSpeed' | 'turnTime'>;

/**
 * - `backward`: walk backward, facing unchanged
 * - toward the facing: walk forward
 * - away from the facing: walk backward, no about-turn
 * - sideways: quarter turn toward the target, then walk forward
 *
 * `params` override the walk; turns always use the configured turn timing.
 */
export function planCommands(
  direction: Direction,
  facing: Heading,
  timing: Timing,
  params: MotionParams = {}
): CommandPlan {
  const walk = (kind: 'forward' | 'backward'): HardwareCommand => ({
    kind,
    speed: params.speed ?? timing.moveSpeed,
    time: params.time ?? timing.moveTime,
  });

  if (direction === 'backward') {
    return { commands: [walk('backward')], facing };
  }

  const target = DIRECTION_HEADINGS[direction];

  if (target === facing) {
    return { commands: [walk('forward')], facing };
  }
  if (target === opposite(facing)) {
    return { commands: [walk('backward')], facing };
  }

  const turn: HardwareCommand = {
    kind: quarterTurns(facing, target) === 1 ? 'turn_right' : 'turn_left',
    speed: timing.turnSpeed,
    time: timing.turnTime,
  };

  return { commands: [turn, walk('forward')], facing: target };
}

export function stickFor(command: HardwareCommand): StickAxes {
  const s = command.speed;
  switch (command.kind) {
    case 'forward':
      return [0, 0, 0, s];
    case 'backward':
      return [0, 0, 0, -s];
    case 'turn_right':
      return [0, s, 0, 0];
    case 'turn_left':
      return [0, -s, 0, 0];
  }
}

export function describeCommand(command: HardwareCommand): string {
  return `${command.kind}(speed=${command.speed}, time=${command.time})`;
}
