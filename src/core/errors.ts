// ═══════════════════════════════════════════════════════════════════════════════
// GRIDBOT - Errors
// Configuration problems fail fast; movement rejection is never an error
// ═══════════════════════════════════════════════════════════════════════════════

export type GridbotErrorCode =
  | 'INVALID_MODE'
  | 'INVALID_GRID_DIMENSIONS'
  | 'INVALID_START_POSITION'
  | 'INVALID_WALL_POSITION'
  | 'MAZE_FORMAT'
  | 'INVALID_MOTION_PARAMETER'
  | 'INVALID_ROBOT_SETTINGS'
  | 'LINK';

export class GridbotError extends Error {
  readonly code: GridbotErrorCode;

  constructor(code: GridbotErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Malformed setup or call arguments. A blocked move is never one of these. */
export class ConfigurationError extends GridbotError {}

export class InvalidGridDimensionsError extends ConfigurationError {
  constructor(width: number, height: number) {
    super('INVALID_GRID_DIMENSIONS', `Grid dimensions must be positive integers (got ${width}x${height})`);
  }
}

export class InvalidStartPositionError extends ConfigurationError {
  constructor(x: number, y: number, width: number, height: number) {
    super(
      'INVALID_START_POSITION',
      `Start position (${x}, ${y}) is outside the ${width}x${height} grid`
    );
  }
}

export class InvalidWallPositionError extends ConfigurationError {
  constructor(x: number, y: number, width: number, height: number) {
    super('INVALID_WALL_POSITION', `Wall (${x}, ${y}) is outside the ${width}x${height} grid`);
  }
}

export class MazeFormatError extends ConfigurationError {
  constructor(message: string) {
    super('MAZE_FORMAT', message);
  }
}

export class InvalidMotionParameterError extends ConfigurationError {
  constructor(name: 'speed' | 'time', value: number) {
    const rule = name === 'speed' ? 'in (0, 1]' : 'greater than 0';
    super('INVALID_MOTION_PARAMETER', `${name} must be ${rule} (got ${value})`);
  }
}

/** Hardware link failure. Stays inside the hardware path: moves report false, selection falls back to mock. */
export class LinkError extends GridbotError {
  constructor(message: string, cause?: unknown) {
    super('LINK', message, cause === undefined ? undefined : { cause });
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
