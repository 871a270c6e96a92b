// ═══════════════════════════════════════════════════════════════════════════════
// GRIDBOT - Robot & Simulator Configuration
// Defaults are merged per program; nothing here is mutated at runtime
// ═══════════════════════════════════════════════════════════════════════════════

import { ConfigurationError, InvalidMotionParameterError, errorMessage } from '../core/errors';
import { MotionParams } from '../core/types';

/** Locomotion modes understood by the quadruped's controller */
export type GaitMode =
  | 'damping'
  | 'standUp'
  | 'standDown'
  | 'recoverStand'
  | 'stand'
  | 'walk'
  | 'run'
  | 'climb';

export interface RobotSettings {
  host: string;
  port: number;
  initialMode: GaitMode;

  // Walk commands (up/down/backward and the step after a turn)
  moveSpeed: number;            // 0-1
  moveTime: number;             // seconds

  // Turn commands
  turnSpeed: number;            // 0-1
  turnTime: number;             // seconds

  // Link
  probeTimeoutMs: number;
  standSettleMs: number;        // pause between stand and the initial gait
  commandRateHz: number;        // stick publish rate while a command runs
  keepaliveSeconds: number;
}

export interface SimulatorSettings {
  gridWidth: number;
  gridHeight: number;
  startX: number;
  startY: number;
  visualizationDelayMs: number;
}

export const defaultRobotSettings: RobotSettings = {
  host: '192.168.12.1',
  port: 1883,
  initialMode: 'walk',
  moveSpeed: 0.3,
  moveTime: 1.0,
  turnSpeed: 0.3,
  turnTime: 1.0,
  probeTimeoutMs: 3000,
  standSettleMs: 2000,
  commandRateHz: 10,
  keepaliveSeconds: 5,
};

export const defaultSimulatorSettings: SimulatorSettings = {
  gridWidth: 8,
  gridHeight: 8,
  startX: 0,
  startY: 0,
  visualizationDelayMs: 500,
};

// ─────────────────────────────────────────────────────────────────────────────
// Environment
// ─────────────────────────────────────────────────────────────────────────────

export const HARDWARE_MOCK_ENV = 'ROBOT_BEHAVIOR_HARDWARE_MOCK';

const TRUTHY = new Set(['1', 'true', 'yes', 'on']);

export function readHardwareMockOverride(env: NodeJS.ProcessEnv = process.env): boolean {
  const raw = env[HARDWARE_MOCK_ENV];
  return raw !== undefined && TRUTHY.has(raw.trim().toLowerCase());
}

// ─────────────────────────────────────────────────────────────────────────────
// Validation
// ─────────────────────────────────────────────────────────────────────────────

/** Throws on a speed outside (0, 1] or a non-positive time; undefined means "use the default" */
export function validateMotionParams(params: MotionParams): MotionParams {
  const { speed, time } = params;

  if (speed !== undefined && !(Number.isFinite(speed) && speed > 0 && speed <= 1)) {
    throw new InvalidMotionParameterError('speed', speed);
  }
  if (time !== undefined && !(Number.isFinite(time) && time > 0)) {
    throw new InvalidMotionParameterError('time', time);
  }

  return { speed, time };
}

export function resolveRobotSettings(overrides: Partial<RobotSettings> = {}): RobotSettings {
  const settings: RobotSettings = { ...defaultRobotSettings, ...overrides };

  try {
    validateMotionParams({ speed: settings.moveSpeed, time: settings.moveTime });
    validateMotionParams({ speed: settings.turnSpeed, time: settings.turnTime });
  } catch (error) {
    throw new ConfigurationError('INVALID_ROBOT_SETTINGS', `Invalid robot settings: ${errorMessage(error)}`);
  }

  if (!(settings.commandRateHz > 0) || !(settings.probeTimeoutMs > 0)) {
    throw new ConfigurationError(
      'INVALID_ROBOT_SETTINGS',
      'Invalid robot settings: commandRateHz and probeTimeoutMs must be positive'
    );
  }

  return settings;
}
