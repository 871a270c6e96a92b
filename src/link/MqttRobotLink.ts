// ═══════════════════════════════════════════════════════════════════════════════
// GRIDBOT - MQTT Robot Link
// The quadruped's onboard broker takes stick samples and mode switches as MQTT
// publishes; the `mqtt` package is loaded on first use
// ═══════════════════════════════════════════════════════════════════════════════

import type { IClientOptions, MqttClient } from 'mqtt';
import { GaitMode, RobotSettings } from '../config/robot';
import { LinkError, errorMessage } from '../core/errors';
import { Logger } from '../core/Logger';
import { RobotLink, StickAxes, STOP_AXES } from './RobotLink';

export const ROBOT_TOPICS = {
  stick: 'controller/stick',
  action: 'controller/action',
} as const;

type QoS = 0 | 1 | 2;

/** Four little-endian float32 values, clipped to [-1, 1] */
export function encodeStick(axes: StickAxes): Buffer {
  const buffer = Buffer.alloc(16);
  axes.forEach((value, index) => {
    buffer.writeFloatLE(Math.max(-1, Math.min(1, value)), index * 4);
  });
  return buffer;
}

export function brokerUrl(settings: Pick<RobotSettings, 'host' | 'port'>): string {
  return `mqtt://${settings.host}:${settings.port}`;
}

export class MqttRobotLink implements RobotLink {
  readonly host: string;

  private constructor(
    private readonly client: MqttClient,
    settings: RobotSettings,
    private readonly logger: Logger
  ) {
    this.host = settings.host;

    this.client.on('error', (error) => {
      this.logger.error(`MQTT error: ${error.message}`);
      this.logger.bus.emit('link:error', { host: this.host, error: error.message }, this.logger.source);
    });

    this.client.on('close', () => {
      this.logger.debug('MQTT connection closed');
    });
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Connection
  // ─────────────────────────────────────────────────────────────────────────

  /** Connect once, without retries: a robot that does not answer is reported, not waited for. */
  static async connect(settings: RobotSettings, logger: Logger): Promise<MqttRobotLink> {
    const url = brokerUrl(settings);
    logger.info(`Connecting to robot broker ${url}`);

    let mqtt: typeof import('mqtt');
    try {
      mqtt = await import('mqtt');
    } catch (error) {
      throw new LinkError('The mqtt package is not installed', error);
    }

    const options: IClientOptions = {
      clientId: `gridbot-${Math.random().toString(36).slice(2, 10)}`,
      keepalive: settings.keepaliveSeconds,
      connectTimeout: settings.probeTimeoutMs,
      reconnectPeriod: 0,
    };

    try {
      const client = await mqtt.connectAsync(url, options, false);
      logger.bus.emit('link:connected', { host: settings.host, url }, logger.source);
      return new MqttRobotLink(client, settings, logger);
    } catch (error) {
      throw new LinkError(`Cannot reach robot at ${url}: ${errorMessage(error)}`, error);
    }
  }

  async close(): Promise<void> {
    await this.client.endAsync();
    this.logger.info('Disconnected from robot broker');
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Commands
  // ─────────────────────────────────────────────────────────────────────────

  async sendStick(axes: StickAxes): Promise<void> {
    await this.publish(ROBOT_TOPICS.stick, encodeStick(axes), 0);
  }

  /** The controller ignores mode switches while moving, so the stick is zeroed first */
  async changeMode(mode: GaitMode): Promise<void> {
    await this.sendStick(STOP_AXES);
    await this.publish(ROBOT_TOPICS.action, mode, 1);
    this.logger.info(`Gait mode set to ${mode}`);
  }

  private async publish(topic: string, payload: Buffer | string, qos: QoS): Promise<void> {
    if (!this.client.connected) {
      throw new LinkError(`Robot link to ${this.host} is not connected`);
    }

    try {
      await this.client.publishAsync(topic, payload, { qos });
    } catch (error) {
      throw new LinkError(`Publish to ${topic} failed: ${errorMessage(error)}`, error);
    }

    this.logger.debug(`Published to ${topic}: ${payload.length} bytes`);
  }
}

export const connectMqttLink = (settings: RobotSettings, logger: Logger): Promise<RobotLink> =>
  MqttRobotLink.connect(settings, logger);
