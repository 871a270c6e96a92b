// ═══════════════════════════════════════════════════════════════════════════════
// GRIDBOT - Simulated Actuator
// Grid State is the whole world; the renderer follows along through events
// ═══════════════════════════════════════════════════════════════════════════════

import { Logger } from '../core/Logger';
import { Direction } from '../core/types';
import { GridState } from '../grid/GridState';
import { apply } from '../grid/MotionEngine';
import { Actuator } from './Actuator';

export interface RedrawPayload {
  direction: Direction;
  success: boolean;
  from: { x: number; y: number };
  to: { x: number; y: number };
  halted: boolean;
}

export class SimulatedActuator implements Actuator {
  readonly kind = 'simulated' as const;

  constructor(private readonly logger: Logger) {}

  // Speed and time have no meaning on the grid and are ignored.
  async step(state: GridState, direction: Direction): Promise<boolean> {
    const before = state.getPosition();
    const success = apply(state, direction);
    const after = state.getPosition();

    if (success) {
      this.logger.info(`Moved ${direction}: (${before.x}, ${before.y}) → (${after.x}, ${after.y})`);
    } else {
      this.logger.warn(`Move ${direction} blocked at (${before.x}, ${before.y})`);
    }

    const payload: RedrawPayload = {
      direction,
      success,
      from: { x: before.x, y: before.y },
      to: { x: after.x, y: after.y },
      halted: state.isHalted(),
    };
    this.logger.bus.emit('simulation:redraw', payload, this.logger.source);

    return success;
  }

  async dispose(): Promise<void> {
    // Nothing to release.
  }
}
