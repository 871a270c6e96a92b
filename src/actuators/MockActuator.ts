// ═══════════════════════════════════════════════════════════════════════════════
// GRIDBOT - Mock Actuator
// Stand-in for the real robot: records every command, touches nothing, always succeeds
// ═══════════════════════════════════════════════════════════════════════════════

import { Direction, HardwareCommand } from '../core/types';
import { CommandActuator } from './Actuator';
import { describeCommand } from './commands';

export interface MockCommandEntry {
  direction: Direction;
  command: HardwareCommand;
}

export class MockActuator extends CommandActuator {
  readonly kind = 'mock' as const;

  private entries: MockCommandEntry[] = [];

  protected async dispatch(commands: readonly HardwareCommand[], direction: Direction): Promise<boolean> {
    for (const command of commands) {
      this.entries.push({ direction, command: { ...command } });
      this.logger.info(`MOCK: ${describeCommand(command)}`);
    }
    return true;
  }

  getCommandLog(): MockCommandEntry[] {
    return this.entries.map(entry => ({ direction: entry.direction, command: { ...entry.command } }));
  }

  async dispose(): Promise<void> {
    this.logger.debug(`Mock robot released after ${this.entries.length} commands`);
  }
}
