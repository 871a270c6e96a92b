// ═══════════════════════════════════════════════════════════════════════════════
// GRIDBOT - Core Types
// Shared vocabulary for the grid model, the actuators and the program facade
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────
// Directions & Headings
// ─────────────────────────────────────────────────────────────────────────────

/** Caller-facing move symbols. Only `backward` depends on the robot's facing. */
export type Direction = 'up' | 'down' | 'left' | 'right' | 'backward';

export const DIRECTIONS: readonly Direction[] = ['up', 'down', 'left', 'right', 'backward'];

export type AbsoluteDirection = Exclude<Direction, 'backward'>;

/** Facing, clockwise from north */
export type Heading = 'north' | 'east' | 'south' | 'west';

export const HEADINGS: readonly Heading[] = ['north', 'east', 'south', 'west'];

export function isDirection(value: unknown): value is Direction {
  return DIRECTIONS.some(direction => direction === value);
}

// ─────────────────────────────────────────────────────────────────────────────
// Geometry
// ─────────────────────────────────────────────────────────────────────────────

export interface Cell {
  x: number;
  y: number;
}

export interface Delta {
  dx: number;
  dy: number;
}

export interface Pose extends Cell {
  facing: Heading;
}

// ─────────────────────────────────────────────────────────────────────────────
// Backends & Commands
// ─────────────────────────────────────────────────────────────────────────────

export type ProgramMode = 'simulator' | 'real';

export type BackendKind = 'simulated' | 'hardware' | 'mock';

export type HardwareCommandKind = 'forward' | 'backward' | 'turn_left' | 'turn_right';

/** One timed velocity command: hold `speed` (0-1] for `time` seconds */
export interface HardwareCommand {
  kind: HardwareCommandKind;
  speed: number;
  time: number;
}

export interface MotionParams {
  speed?: number;
  time?: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Move Log
// ─────────────────────────────────────────────────────────────────────────────

export type MoveReason = 'moved' | 'boundary' | 'wall' | 'link_error';

export interface MoveRecord {
  sequenceNumber: number;
  requestedDirection: Direction;
  resolvedDelta: Delta;
  success: boolean;
  reason: MoveReason;
  backend: BackendKind;
  from: Cell;
  to: Cell;
  commands?: readonly HardwareCommand[];
}

export type Sleep = (ms: number) => Promise<void>;
