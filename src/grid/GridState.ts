// ═══════════════════════════════════════════════════════════════════════════════
// GRIDBOT - Grid State
// Dimensions, walls, pose, trail, move log and the halt flag of one program
// Only the Motion Engine moves the robot; everything handed out is a copy
// ═══════════════════════════════════════════════════════════════════════════════

import {
  InvalidGridDimensionsError,
  InvalidStartPositionError,
  InvalidWallPositionError,
  MazeFormatError,
} from '../core/errors';
import { Cell, Heading, MoveRecord, Pose } from '../core/types';

export interface GridStateConfig {
  width: number;
  height: number;
  start: Cell;
  facing?: Heading;
}

export interface GridLayout {
  width: number;
  height: number;
  walls: readonly Cell[];
  start: Cell | null;
}

export const DEFAULT_FACING: Heading = 'east';

const cellKey = (x: number, y: number): string => `${x},${y}`;

export class GridState {
  private _width: number;
  private _height: number;
  private walls: Map<string, Cell> = new Map();
  private startPose: Pose;
  private pose: Pose;
  private trail: Cell[];
  private log: MoveRecord[] = [];
  private halted = false;

  constructor(config: GridStateConfig) {
    const { width, height, start } = config;
    assertDimensions(width, height);

    this._width = width;
    this._height = height;

    if (!this.isInside(start)) {
      throw new InvalidStartPositionError(start.x, start.y, width, height);
    }

    this.startPose = { x: start.x, y: start.y, facing: config.facing ?? DEFAULT_FACING };
    this.pose = { ...this.startPose };
    this.trail = [{ x: start.x, y: start.y }];
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Geometry
  // ─────────────────────────────────────────────────────────────────────────────

  get width(): number {
    return this._width;
  }

  get height(): number {
    return this._height;
  }

  isInside(cell: Cell): boolean {
    return Number.isInteger(cell.x) && Number.isInteger(cell.y) &&
      cell.x >= 0 && cell.x < this._width &&
      cell.y >= 0 && cell.y < this._height;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Walls
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Idempotent. A wall dropped on the robot's own cell does not move or halt it;
   * it only blocks moves back into that cell.
   */
  addWall(x: number, y: number): void {
    if (!this.isInside({ x, y })) {
      throw new InvalidWallPositionError(x, y, this._width, this._height);
    }
    this.walls.set(cellKey(x, y), { x, y });
  }

  hasWall(cell: Cell): boolean {
    return this.walls.has(cellKey(cell.x, cell.y));
  }

  getWalls(): Cell[] {
    return Array.from(this.walls.values(), wall => ({ ...wall }));
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Read access
  // ─────────────────────────────────────────────────────────────────────────────

  getPosition(): Pose {
    return { ...this.pose };
  }

  getStartPose(): Pose {
    return { ...this.startPose };
  }

  getTrail(): Cell[] {
    return this.trail.map(cell => ({ ...cell }));
  }

  getLog(): MoveRecord[] {
    return this.log.map(copyMoveRecord);
  }

  isHalted(): boolean {
    return this.halted;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Mutation (Motion Engine)
  // ─────────────────────────────────────────────────────────────────────────────

  /** Caller has already checked the target against bounds and walls */
  moveTo(pose: Pose): void {
    this.pose = { ...pose };
    this.trail.push({ x: pose.x, y: pose.y });
  }

  setFacing(facing: Heading): void {
    this.pose = { ...this.pose, facing };
  }

  halt(): void {
    this.halted = true;
  }

  appendRecord(record: Omit<MoveRecord, 'sequenceNumber'>): MoveRecord {
    const entry = freezeMoveRecord(copyMoveRecord({ sequenceNumber: this.log.length + 1, ...record }));
    this.log.push(entry);
    return entry;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ─────────────────────────────────────────────────────────────────────────────

  /** Back to the start pose with an empty log; the wall set is kept */
  reset(): void {
    this.halted = false;
    this.pose = { ...this.startPose };
    this.trail = [{ x: this.startPose.x, y: this.startPose.y }];
    this.log = [];
  }

  /**
   * Swap in a parsed maze: new dimensions and walls, the maze's start marker if it
   * has one, then a full reset. Without a marker the current start must still be
   * a free cell of the new grid.
   */
  replaceLayout(layout: GridLayout): void {
    assertDimensions(layout.width, layout.height);

    const start = layout.start ?? this.startPose;
    const walls = new Map(layout.walls.map(wall => [cellKey(wall.x, wall.y), { x: wall.x, y: wall.y }]));
    const inside = start.x >= 0 && start.x < layout.width && start.y >= 0 && start.y < layout.height;

    if (!inside) {
      throw new MazeFormatError(
        `Start (${start.x}, ${start.y}) lies outside the ${layout.width}x${layout.height} maze`
      );
    }
    if (walls.has(cellKey(start.x, start.y))) {
      throw new MazeFormatError(`Start (${start.x}, ${start.y}) lies inside a wall`);
    }

    this._width = layout.width;
    this._height = layout.height;
    this.walls = walls;
    this.startPose = { x: start.x, y: start.y, facing: this.startPose.facing };
    this.reset();
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Record helpers
// ─────────────────────────────────────────────────────────────────────────────

export function copyMoveRecord(record: MoveRecord): MoveRecord {
  const copy: MoveRecord = {
    ...record,
    resolvedDelta: { ...record.resolvedDelta },
    from: { ...record.from },
    to: { ...record.to },
  };
  if (record.commands) {
    copy.commands = record.commands.map(command => ({ ...command }));
  }
  return copy;
}

/** Freezes the record and everything it holds, in place */
export function freezeMoveRecord(record: MoveRecord): MoveRecord {
  Object.freeze(record.resolvedDelta);
  Object.freeze(record.from);
  Object.freeze(record.to);
  if (record.commands) {
    record.commands.forEach(command => Object.freeze(command));
    Object.freeze(record.commands);
  }
  return Object.freeze(record);
}

function assertDimensions(width: number, height: number): void {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new InvalidGridDimensionsError(width, height);
  }
}
