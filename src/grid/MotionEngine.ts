// ═══════════════════════════════════════════════════════════════════════════════
// GRIDBOT - Motion Engine
// The one place boundary and wall checks live
// ═══════════════════════════════════════════════════════════════════════════════

import {
  AbsoluteDirection,
  BackendKind,
  Cell,
  Delta,
  Direction,
  HardwareCommand,
  Heading,
  HEADINGS,
} from '../core/types';
import { GridState } from './GridState';

// ─────────────────────────────────────────────────────────────────────────────
// Direction algebra
// ─────────────────────────────────────────────────────────────────────────────

export const HEADING_DELTAS: Record<Heading, Delta> = {
  north: { dx: 0, dy: 1 },
  east: { dx: 1, dy: 0 },
  south: { dx: 0, dy: -1 },
  west: { dx: -1, dy: 0 },
};

export const DIRECTION_HEADINGS: Record<AbsoluteDirection, Heading> = {
  up: 'north',
  right: 'east',
  down: 'south',
  left: 'west',
};

export function opposite(heading: Heading): Heading {
  return HEADINGS[(HEADINGS.indexOf(heading) + 2) % 4];
}

/** Quarter turns clockwise from `from` to `to` (0-3) */
export function quarterTurns(from: Heading, to: Heading): number {
  return (HEADINGS.indexOf(to) - HEADINGS.indexOf(from) + 4) % 4;
}

/** Grid-absolute delta; `backward` is the one move that reads the facing */
export function resolveDelta(direction: Direction, facing: Heading): Delta {
  const heading = direction === 'backward' ? opposite(facing) : DIRECTION_HEADINGS[direction];
  return { ...HEADING_DELTAS[heading] };
}

// ─────────────────────────────────────────────────────────────────────────────
// Step resolution
// ─────────────────────────────────────────────────────────────────────────────

export type BlockReason = 'boundary' | 'wall';

export interface StepResolution {
  delta: Delta;
  from: Cell;
  target: Cell;
  blockedBy: BlockReason | null;
}

export function resolveStep(state: GridState, direction: Direction): StepResolution {
  const pose = state.getPosition();
  const delta = resolveDelta(direction, pose.facing);
  const from = { x: pose.x, y: pose.y };
  const target = { x: pose.x + delta.dx, y: pose.y + delta.dy };

  let blockedBy: BlockReason | null = null;
  if (!state.isInside(target)) {
    blockedBy = 'boundary';
  } else if (state.hasWall(target)) {
    blockedBy = 'wall';
  }

  return { delta, from, target, blockedBy };
}

// ─────────────────────────────────────────────────────────────────────────────
// Authoritative step (simulator)
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Validate and apply one move. A halted state rejects without touching
 * anything; a blocked move halts the state and logs a failing record.
 */
export function apply(state: GridState, direction: Direction): boolean {
  if (state.isHalted()) return false;

  const step = resolveStep(state, direction);

  if (step.blockedBy) {
    state.halt();
    state.appendRecord({
      requestedDirection: direction,
      resolvedDelta: step.delta,
      success: false,
      reason: step.blockedBy,
      backend: 'simulated',
      from: step.from,
      to: step.from,
    });
    return false;
  }

  state.moveTo({ ...step.target, facing: state.getPosition().facing });
  state.appendRecord({
    requestedDirection: direction,
    resolvedDelta: step.delta,
    success: true,
    reason: 'moved',
    backend: 'simulated',
    from: step.from,
    to: step.target,
  });
  return true;
}

// ─────────────────────────────────────────────────────────────────────────────
// Best-effort mirror (hardware & mock)
// ─────────────────────────────────────────────────────────────────────────────

export interface MirrorUpdate {
  direction: Direction;
  facing: Heading;
  dispatched: boolean;
  backend: Exclude<BackendKind, 'simulated'>;
  commands: readonly HardwareCommand[];
}

/**
 * Track a real robot that has no position feedback. The mirror follows a
 * dispatched step only onto a free cell and is never halted; the robot itself
 * is the authority.
 */
export function mirror(state: GridState, update: MirrorUpdate): boolean {
  const step = resolveStep(state, update.direction);
  let to = step.from;

  if (update.dispatched) {
    if (step.blockedBy) {
      state.setFacing(update.facing);
    } else {
      state.moveTo({ ...step.target, facing: update.facing });
      to = step.target;
    }
  }

  state.appendRecord({
    requestedDirection: update.direction,
    resolvedDelta: step.delta,
    success: update.dispatched,
    reason: update.dispatched ? 'moved' : 'link_error',
    backend: update.backend,
    from: step.from,
    to,
    commands: update.commands,
  });

  return update.dispatched;
}

export const MotionEngine = {
  apply,
  mirror,
  resolveStep,
  resolveDelta,
};
