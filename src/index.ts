// ═══════════════════════════════════════════════════════════════════════════════
//
//   GRIDBOT
//   One movement API for a grid simulator and a real quadruped
//
//   const program = await createProgram({ width: 6, height: 6 });
//   await program.robot.move('right');
//
// ═══════════════════════════════════════════════════════════════════════════════

// Program facade
export { createProgram, RobotProgram, Robot } from './program/RobotProgram';
export type { CreateProgramOptions } from './program/RobotProgram';
export { selectBackend, probeLink } from './program/BackendSelector';
export type { BackendSelection, SelectionReason } from './program/BackendSelector';
export { replayMoveLog, PLAYBACK_DELAYS } from './program/Playback';
export type { PlaybackFrame, PlaybackOptions, PlaybackSpeed } from './program/Playback';

// Grid model
export { GridState, DEFAULT_FACING } from './grid/GridState';
export type { GridLayout } from './grid/GridState';
export {
  MotionEngine,
  apply,
  mirror,
  resolveDelta,
  resolveStep,
  opposite,
  HEADING_DELTAS,
  DIRECTION_HEADINGS,
} from './grid/MotionEngine';
export type { StepResolution } from './grid/MotionEngine';
export { parseMaze, MAZE_SYMBOLS, SIMPLE_MAZE, STUDENT_MAZE } from './grid/MazeParser';
export type { MazeLayout } from './grid/MazeParser';

// Actuators
export { CommandActuator } from './actuators/Actuator';
export type { Actuator } from './actuators/Actuator';
export { SimulatedActuator } from './actuators/SimulatedActuator';
export type { RedrawPayload } from './actuators/SimulatedActuator';
export { HardwareActuator } from './actuators/HardwareActuator';
export { MockActuator } from './actuators/MockActuator';
export type { MockCommandEntry } from './actuators/MockActuator';
export { planCommands, stickFor } from './actuators/commands';
export type { CommandPlan } from './actuators/commands';

// Robot link
export { STOP_AXES } from './link/RobotLink';
export type { RobotLink, RobotLinkFactory, StickAxes } from './link/RobotLink';
export { MqttRobotLink, connectMqttLink, encodeStick, ROBOT_TOPICS } from './link/MqttRobotLink';

// Config
export {
  defaultRobotSettings,
  defaultSimulatorSettings,
  readHardwareMockOverride,
  resolveRobotSettings,
  HARDWARE_MOCK_ENV,
} from './config/robot';
export type { GaitMode, RobotSettings, SimulatorSettings } from './config/robot';

// Core
export { eventBus, EventBus } from './core/event-bus/EventBus';
export type { Event, EventHandler } from './core/event-bus/EventBus';
export { createLogger } from './core/Logger';
export type { Logger, LogEntry, LogLevel } from './core/Logger';
export * from './core/errors';
export * from './core/types';
