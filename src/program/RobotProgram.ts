// ═══════════════════════════════════════════════════════════════════════════════
// GRIDBOT - Robot Program
// The student-facing facade: `program.robot.move(...)` behaves the same on the
// grid, on the quadruped and on the mock
// ═══════════════════════════════════════════════════════════════════════════════

import { Actuator } from '../actuators/Actuator';
import {
  defaultSimulatorSettings,
  readHardwareMockOverride,
  resolveRobotSettings,
  RobotSettings,
  validateMotionParams,
} from '../config/robot';
import { EventBus } from '../core/event-bus/EventBus';
import { ConfigurationError, errorMessage } from '../core/errors';
import { createLogger, Logger } from '../core/Logger';
import {
  BackendKind,
  Cell,
  Direction,
  isDirection,
  MotionParams,
  MoveRecord,
  Pose,
  ProgramMode,
  Sleep,
} from '../core/types';
import { GridState } from '../grid/GridState';
import { MazeLayout, parseMaze } from '../grid/MazeParser';
import { RobotLinkFactory } from '../link/RobotLink';
import { BackendSelection, selectBackend, SelectionReason } from './BackendSelector';
import { PlaybackOptions, replayMoveLog } from './Playback';

export interface CreateProgramOptions {
  mode?: ProgramMode;
  width?: number;
  height?: number;
  startX?: number;
  startY?: number;

  // Real robot
  host?: string;
  hardwareMock?: boolean;
  robot?: Partial<RobotSettings>;
  linkFactory?: RobotLinkFactory;

  /** Source of the hardware mock override; read once */
  env?: NodeJS.ProcessEnv;
  sleep?: Sleep;
  debug?: boolean;
  /** Where the program's events and log entries go; the shared `eventBus` when omitted */
  bus?: EventBus;
}

let programCounter = 0;

// ─────────────────────────────────────────────────────────────────────────────
// Robot handle
// ─────────────────────────────────────────────────────────────────────────────

/** What student code holds: movement plus read-only views of the grid */
export class Robot {
  private pending: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly programId: string,
    private readonly state: GridState,
    private readonly actuator: Actuator,
    private readonly logger: Logger
  ) {}

  /**
   * Move one cell. Calls are serialized: a move issued before the previous one
   * settled waits for it, so the grid only ever has one writer.
   *
   * `speed` (0-1] and `time` (seconds) shape the real robot's walk and are
   * ignored by the simulator, but are checked in every mode.
   */
  async move(direction: Direction, speed?: number, time?: number): Promise<boolean> {
    const params = validateMotionParams({ speed, time });

    const run = this.pending.then(() => this.step(direction, params));
    this.pending = run.catch((error: unknown) => {
      this.logger.error(`Move ${String(direction)} failed unexpectedly: ${errorMessage(error)}`);
    });

    return run;
  }

  private async step(direction: Direction, params: MotionParams): Promise<boolean> {
    if (this.state.isHalted()) {
      this.logger.warn(`Move ${direction} ignored: simulation stopped, call resetSimulation() first`);
      return false;
    }

    // Untyped callers can pass anything; an unknown symbol counts as an illegal move.
    const normalized: unknown = typeof direction === 'string' ? direction.trim().toLowerCase() : direction;
    if (!isDirection(normalized)) {
      this.logger.warn(`Invalid direction '${String(direction)}'; simulation stopped`);
      this.state.halt();
      this.emit('robot:halted', { direction: String(direction), reason: 'invalid_direction' });
      return false;
    }

    const success = await this.actuator.step(this.state, normalized, params);
    const position = this.state.getPosition();

    if (success) {
      this.emit('robot:moved', { direction: normalized, position, backend: this.actuator.kind });
    } else {
      this.emit('robot:blocked', { direction: normalized, position, backend: this.actuator.kind });
      if (this.state.isHalted()) {
        this.emit('robot:halted', { direction: normalized, reason: 'collision' });
      }
    }

    return success;
  }

  getPosition(): Pose {
    return this.state.getPosition();
  }

  getTrail(): Cell[] {
    return this.state.getTrail();
  }

  getMoveLog(): MoveRecord[] {
    return this.state.getLog();
  }

  isSimulationStopped(): boolean {
    return this.state.isHalted();
  }

  resetSimulation(): void {
    this.state.reset();
    const position = this.state.getPosition();
    this.logger.info(`Robot reset to starting position (${position.x}, ${position.y})`);
    this.emit('robot:reset', { position });
  }

  private emit(type: string, payload: object): void {
    this.logger.bus.emit(type, { programId: this.programId, ...payload }, this.logger.source);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Program facade
// ─────────────────────────────────────────────────────────────────────────────

export class RobotProgram {
  readonly id: string;
  readonly mode: ProgramMode;
  readonly backend: BackendKind;
  readonly selectionReason: SelectionReason;
  readonly robot: Robot;

  private readonly state: GridState;
  private readonly actuator: Actuator;
  private readonly logger: Logger;
  private closed = false;

  constructor(id: string, mode: ProgramMode, state: GridState, selection: BackendSelection, logger: Logger) {
    this.id = id;
    this.mode = mode;
    this.state = state;
    this.actuator = selection.actuator;
    this.backend = selection.kind;
    this.selectionReason = selection.reason;
    this.logger = logger;
    this.robot = new Robot(id, state, selection.actuator, logger);
  }

  /** True when the real-robot path ended on the mock, forced or by fallback */
  get usingMock(): boolean {
    return this.backend === 'mock';
  }

  /** The bus this program emits on */
  get events(): EventBus {
    return this.logger.bus;
  }

  get width(): number {
    return this.state.width;
  }

  get height(): number {
    return this.state.height;
  }

  getWalls(): Cell[] {
    return this.state.getWalls();
  }

  addWall(x: number, y: number): void {
    this.state.addWall(x, y);
    this.logger.debug(`Wall added at (${x}, ${y})`);
  }

  /**
   * Replace the grid with a parsed maze and restart the run: walls, size and
   * (if the maze has an 'S') start pose change, then pose, trail, log and the
   * halt flag reset. The same happens whether or not moves were made before.
   */
  loadMaze(layout: MazeLayout): void {
    this.state.replaceLayout(parseMaze(layout));
    const start = this.state.getPosition();
    this.logger.info(`Maze loaded: ${this.state.width}x${this.state.height}, start (${start.x}, ${start.y})`);
    this.logger.bus.emit('program:maze:loaded', {
      programId: this.id,
      width: this.state.width,
      height: this.state.height,
      walls: this.state.getWalls().length,
      start,
    }, this.logger.source);
  }

  /** Replay this program's move log as it stands now, at the visualization delay unless told otherwise */
  replay(options: PlaybackOptions): Promise<number> {
    const delayMs = options.delayMs ??
      (options.speed === undefined ? defaultSimulatorSettings.visualizationDelayMs : undefined);
    return replayMoveLog(this.state.getLog(), { ...options, delayMs });
  }

  /** Release the robot link. On a hardware backend every later move reports false. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.actuator.dispose();
    this.logger.bus.emit('program:closed', { programId: this.id }, this.logger.source);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Factory
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Build a program and pick its backend. Bad grid settings throw; an absent
 * robot never does, it only turns `mode: 'real'` into the mock.
 */
export async function createProgram(options: CreateProgramOptions = {}): Promise<RobotProgram> {
  const mode = options.mode ?? 'simulator';
  if (mode !== 'simulator' && mode !== 'real') {
    throw new ConfigurationError('INVALID_MODE', `Unknown mode '${String(mode)}'. Use 'simulator' or 'real'`);
  }

  const state = new GridState({
    width: options.width ?? defaultSimulatorSettings.gridWidth,
    height: options.height ?? defaultSimulatorSettings.gridHeight,
    start: {
      x: options.startX ?? defaultSimulatorSettings.startX,
      y: options.startY ?? defaultSimulatorSettings.startY,
    },
  });

  const settings = resolveRobotSettings({
    ...options.robot,
    ...(options.host !== undefined ? { host: options.host } : {}),
  });

  programCounter++;
  const id = `program_${programCounter}`;
  const logger = createLogger(id, { debug: options.debug, bus: options.bus });
  const hardwareMock = (options.hardwareMock ?? false) || readHardwareMockOverride(options.env ?? process.env);

  const selection = await selectBackend({
    mode,
    hardwareMock,
    settings,
    logger,
    linkFactory: options.linkFactory,
    sleep: options.sleep,
  });

  logger.bus.emit('program:backend:selected', {
    programId: id,
    mode,
    backend: selection.kind,
    reason: selection.reason,
    error: selection.error,
  }, id);

  return new RobotProgram(id, mode, state, selection, logger);
}
