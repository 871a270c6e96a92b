// ═══════════════════════════════════════════════════════════════════════════════
// GRIDBOT - Hardware Actuator
// Timed velocity commands over the robot link. Success means "dispatched";
// the robot has no position feedback, so the grid is only a mirror
// ═══════════════════════════════════════════════════════════════════════════════

import { RobotSettings } from '../config/robot';
import { errorMessage } from '../core/errors';
import { Logger } from '../core/Logger';
import { Direction, HardwareCommand, Sleep } from '../core/types';
import { sleep as realSleep } from '../core/timing';
import { RobotLink, STOP_AXES } from '../link/RobotLink';
import { CommandActuator } from './Actuator';
import { stickFor } from './commands';

/** Stick samples needed to hold a command for `time` seconds at `rateHz` */
export function tickCount(time: number, rateHz: number): number {
  return Math.max(1, Math.round(time * rateHz));
}

export class HardwareActuator extends CommandActuator {
  readonly kind = 'hardware' as const;

  constructor(
    private readonly link: RobotLink,
    settings: RobotSettings,
    logger: Logger,
    private readonly sleep: Sleep = realSleep
  ) {
    super(settings, logger);
  }

  // Each command: the stick held at the publish rate, then a zero stick. No retry.
  protected async dispatch(commands: readonly HardwareCommand[], direction: Direction): Promise<boolean> {
    const interval = 1000 / this.settings.commandRateHz;

    try {
      for (const command of commands) {
        const axes = stickFor(command);
        const ticks = tickCount(command.time, this.settings.commandRateHz);

        for (let i = 0; i < ticks; i++) {
          await this.link.sendStick(axes);
          await this.sleep(interval);
        }

        await this.link.sendStick(STOP_AXES);
      }
      return true;
    } catch (error) {
      this.logger.error(`Move ${direction} failed: ${errorMessage(error)}`);
      this.logger.bus.emit('link:error', { host: this.link.host, error: errorMessage(error) }, this.logger.source);
      await this.stopQuietly();
      return false;
    }
  }

  // One zero stick after a failed command; not a retry of the command.
  private async stopQuietly(): Promise<void> {
    try {
      await this.link.sendStick(STOP_AXES);
    } catch (error) {
      this.logger.debug(`Stop after failure not delivered: ${errorMessage(error)}`);
    }
  }

  async dispose(): Promise<void> {
    await this.link.close();
  }
}
