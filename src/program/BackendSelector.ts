// ═══════════════════════════════════════════════════════════════════════════════
// GRIDBOT - Backend Selection
// Runs once per program. The real-robot path never throws: anything that stops
// the link from coming up selects the mock instead
// ═══════════════════════════════════════════════════════════════════════════════

import { Actuator } from '../actuators/Actuator';
import { HardwareActuator } from '../actuators/HardwareActuator';
import { MockActuator } from '../actuators/MockActuator';
import { SimulatedActuator } from '../actuators/SimulatedActuator';
import { RobotSettings } from '../config/robot';
import { errorMessage } from '../core/errors';
import { Logger } from '../core/Logger';
import { BackendKind, ProgramMode, Sleep } from '../core/types';
import { sleep as realSleep, withTimeout } from '../core/timing';
import { connectMqttLink } from '../link/MqttRobotLink';
import { RobotLink, RobotLinkFactory } from '../link/RobotLink';

export type SelectionReason =
  | 'simulator'          // simulator mode, no probing
  | 'mock_forced'        // hardwareMock option or environment override
  | 'link_unavailable'   // probe failed, fell back
  | 'link_ready';

export interface BackendSelection {
  actuator: Actuator;
  kind: BackendKind;
  reason: SelectionReason;
  error?: string;
}

export interface SelectBackendOptions {
  mode: ProgramMode;
  hardwareMock: boolean;
  settings: RobotSettings;
  logger: Logger;
  linkFactory?: RobotLinkFactory;
  sleep?: Sleep;
}

export async function selectBackend(options: SelectBackendOptions): Promise<BackendSelection> {
  const { mode, settings, logger } = options;

  if (mode === 'simulator') {
    return { actuator: new SimulatedActuator(logger.child('sim')), kind: 'simulated', reason: 'simulator' };
  }

  const mock = (): MockActuator => new MockActuator(settings, logger.child('mock'));

  if (options.hardwareMock) {
    logger.info('Hardware mock forced; no connection attempted');
    return { actuator: mock(), kind: 'mock', reason: 'mock_forced' };
  }

  const sleep = options.sleep ?? realSleep;

  try {
    const link = await probeLink(settings, logger, options.linkFactory ?? connectMqttLink, sleep);
    logger.info(`Real robot ready at ${settings.host} (gait: ${settings.initialMode})`);
    return {
      actuator: new HardwareActuator(link, settings, logger.child('hardware'), sleep),
      kind: 'hardware',
      reason: 'link_ready',
    };
  } catch (error) {
    logger.warn(`Real robot not available (${errorMessage(error)}); using mock robot`);
    return { actuator: mock(), kind: 'mock', reason: 'link_unavailable', error: errorMessage(error) };
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Probe
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Connect, stand, let the robot settle, switch to the initial gait. Connect
 * and each mode switch are bounded by `probeTimeoutMs`; a link that only comes
 * up after its timeout is closed as soon as it arrives.
 */
export async function probeLink(
  settings: RobotSettings,
  logger: Logger,
  factory: RobotLinkFactory,
  sleep: Sleep
): Promise<RobotLink> {
  const timeoutMs = settings.probeTimeoutMs;
  const pending = factory(settings, logger.child('link'));

  let link: RobotLink;
  try {
    link = await withTimeout(pending, timeoutMs, `No answer from ${settings.host} within ${timeoutMs}ms`);
  } catch (error) {
    void pending.then(
      late => closeQuietly(late, logger),
      (lateError: unknown) => logger.debug(`Probe connection ended: ${errorMessage(lateError)}`)
    );
    throw error;
  }

  try {
    await withTimeout(link.changeMode('stand'), timeoutMs, 'Robot did not accept stand mode');
    await sleep(settings.standSettleMs);
    await withTimeout(
      link.changeMode(settings.initialMode),
      timeoutMs,
      `Robot did not accept ${settings.initialMode} mode`
    );
  } catch (error) {
    await closeQuietly(link, logger);
    throw error;
  }

  return link;
}

async function closeQuietly(link: RobotLink, logger: Logger): Promise<void> {
  try {
    await link.close();
  } catch (error) {
    logger.debug(`Closing abandoned link failed: ${errorMessage(error)}`);
  }
}
