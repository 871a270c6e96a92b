// ═══════════════════════════════════════════════════════════════════════════════
// GRIDBOT - Actuator Capability
// One capability, `step`, with three closed variants: simulated, hardware, mock
// ═══════════════════════════════════════════════════════════════════════════════

import { RobotSettings } from '../config/robot';
import { Logger } from '../core/Logger';
import { BackendKind, Direction, HardwareCommand, MotionParams } from '../core/types';
import { GridState } from '../grid/GridState';
import { mirror } from '../grid/MotionEngine';
import { describeCommand, planCommands } from './commands';

export interface Actuator {
  readonly kind: BackendKind;

  /** Perform one step against `state`. Resolves false on rejection or dispatch failure, never rejects. */
  step(state: GridState, direction: Direction, params: MotionParams): Promise<boolean>;

  dispose(): Promise<void>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Command Actuator Base
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Shared path of the real-robot variants: plan velocity commands from the
 * mirrored facing, hand them to `dispatch`, then update the mirror.
 */
export abstract class CommandActuator implements Actuator {
  abstract readonly kind: Exclude<BackendKind, 'simulated'>;

  constructor(
    protected readonly settings: RobotSettings,
    protected readonly logger: Logger
  ) {}

  /** Send the commands in order; true when every one went out */
  protected abstract dispatch(commands: readonly HardwareCommand[], direction: Direction): Promise<boolean>;

  abstract dispose(): Promise<void>;

  async step(state: GridState, direction: Direction, params: MotionParams): Promise<boolean> {
    const plan = planCommands(direction, state.getPosition().facing, this.settings, params);

    for (const command of plan.commands) {
      this.logger.bus.emit('hardware:command', { backend: this.kind, direction, command }, this.logger.source);
      this.logger.debug(`${direction}: ${describeCommand(command)}`);
    }

    const dispatched = await this.dispatch(plan.commands, direction);

    return mirror(state, {
      direction,
      facing: plan.facing,
      dispatched,
      backend: this.kind,
      commands: plan.commands,
    });
  }
}
