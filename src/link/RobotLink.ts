// ═══════════════════════════════════════════════════════════════════════════════
// GRIDBOT - Robot Link
// The hardware actuator's view of the quadruped: stick vectors and gait modes
// ═══════════════════════════════════════════════════════════════════════════════

import { GaitMode, RobotSettings } from '../config/robot';
import { Logger } from '../core/Logger';

/** Controller stick [strafe, turn, pitch, forward], each clipped to [-1, 1] */
export type StickAxes = readonly [number, number, number, number];

export const STOP_AXES: StickAxes = [0, 0, 0, 0];

export interface RobotLink {
  readonly host: string;

  /** Publish one stick sample. The robot keeps moving until a zero stick arrives. */
  sendStick(axes: StickAxes): Promise<void>;

  changeMode(mode: GaitMode): Promise<void>;

  close(): Promise<void>;
}

export type RobotLinkFactory = (settings: RobotSettings, logger: Logger) => Promise<RobotLink>;
