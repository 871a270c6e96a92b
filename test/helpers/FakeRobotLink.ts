/**
 * In-process stand-in for the quadruped's broker. Records every stick sample
 * and mode switch; can be told to fail after a number of stick samples.
 */

import { GaitMode } from '../../src/config/robot';
import { LinkError } from '../../src/core/errors';
import { RobotLink, StickAxes } from '../../src/link/RobotLink';
import { Sleep } from '../../src/core/types';

export class FakeRobotLink implements RobotLink {
  readonly host = 'test-robot';

  sticks: StickAxes[] = [];
  modes: GaitMode[] = [];
  closeCount = 0;

  /** Stick samples accepted before sendStick starts throwing */
  failAfter: number | null = null;
  /** Throw once when this many samples have been accepted, then recover */
  failOnceAt: number | null = null;
  rejectModes = false;

  async sendStick(axes: StickAxes): Promise<void> {
    if (this.failAfter !== null && this.sticks.length >= this.failAfter) {
      throw new LinkError('Robot link to test-robot is not connected');
    }
    if (this.failOnceAt !== null && this.sticks.length === this.failOnceAt) {
      this.failOnceAt = null;
      throw new LinkError('Publish to controller/stick failed: timeout');
    }
    this.sticks.push(axes);
  }

  async changeMode(mode: GaitMode): Promise<void> {
    if (this.rejectModes) {
      throw new LinkError(`Mode ${mode} refused`);
    }
    this.modes.push(mode);
  }

  async close(): Promise<void> {
    this.closeCount++;
  }

  get closed(): boolean {
    return this.closeCount > 0;
  }
}

export const noSleep: Sleep = async () => undefined;

export const realDelay = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));
