/**
 * Notification-variant (Halo) chlorinator device.
 */

import { consoleLogger, type Logger } from './logger';
import type { HaloAction, HeaterAction, LightAction, SolarAction } from './models/enums';
import { validateAccessCode, validatePositive, type HaloDeviceOptions } from './options';
import {
  buildHaloAction,
  buildHeaterAction,
  buildLightAction,
  buildSolarAction,
} from './protocol/commands';
import { DEFAULT_REQUEST_TAGS, HaloCharacteristic, type CommandTag } from './protocol/constants';
import { NotificationDemultiplexer } from './session/demultiplexer';
import { authenticate, HALO_AUTH, performNotificationHandshake } from './session/handshake';
import { SessionLock } from './session/session-lock';
import type { HaloSnapshot } from './session/snapshot';
import { openConnection, type CharacteristicClient } from './transport/connection';
import type { GattTransport, Subscription } from './transport/types';

/**
 * Notification-variant BLE chlorinator.
 *
 * Data arrives as tagged notifications in answer to read requests. Calls on
 * the same instance never overlap on the air: each waits for the previous
 * session to disconnect.
 *
 * @example
 * ```typescript
 * const device = new HaloChlorinatorDevice(transport, 'AA:BB:CC:DD:EE:FF', { accessCode: '1234' });
 * const snapshot = await device.gatherData();
 * console.log(snapshot.get('waterTemperature'), snapshot.gpoSetups);
 * ```
 */
export class HaloChlorinatorDevice {
  static readonly DEFAULT_SESSION_TIMEOUT_MS = 15000;

  private readonly lock = new SessionLock();
  private readonly accessCode: string;
  private readonly logger: Logger;
  private readonly requestTags: readonly CommandTag[];
  private readonly sessionTimeoutMs: number;
  private readonly lockTimeoutMs: number | undefined;
  private readonly highWaterMark: number | undefined;

  /**
   * @throws {ConfigurationError} If the options are invalid
   */
  constructor(
    private readonly transport: GattTransport,
    readonly deviceId: string,
    options: HaloDeviceOptions
  ) {
    validateAccessCode(options.accessCode);
    validatePositive('sessionTimeoutMs', options.sessionTimeoutMs);
    validatePositive('lockTimeoutMs', options.lockTimeoutMs);
    validatePositive('highWaterMark', options.highWaterMark);

    this.accessCode = options.accessCode;
    this.logger = options.logger ?? consoleLogger;
    this.requestTags = options.requestTags ?? DEFAULT_REQUEST_TAGS;
    this.sessionTimeoutMs = options.sessionTimeoutMs ?? HaloChlorinatorDevice.DEFAULT_SESSION_TIMEOUT_MS;
    this.lockTimeoutMs = options.lockTimeoutMs;
    this.highWaterMark = options.highWaterMark;
  }

  /**
   * True while a session holds the device.
   */
  get isBusy(): boolean {
    return this.lock.isLocked;
  }

  /**
   * Request the configured tags and merge every notification until the
   * device disconnects or the session timeout passes.
   *
   * A session cut short still returns the fields merged so far.
   *
   * @throws {SessionBusyError} If the lock timeout expires first
   * @throws {ConnectionError} If the connection cannot be opened
   * @throws {HandshakeFailedError} If authentication or subscription fails
   * @throws {CharacteristicIOError} If a request write fails
   */
  async gatherData(): Promise<HaloSnapshot> {
    return this.withSession(async (client) => {
      const { session, handler: demux } = await performNotificationHandshake(
        client,
        this.accessCode,
        (sessionKey) =>
          new NotificationDemultiplexer(sessionKey, {
            idleTimeoutMs: this.sessionTimeoutMs,
            highWaterMark: this.highWaterMark,
            logger: this.logger,
          }),
        this.logger
      );

      const removeListener = client.onDisconnect(() => demux.stop('disconnected'));
      const deadline = setTimeout(() => demux.stop('timeout'), this.sessionTimeoutMs);

      try {
        const merged = demux.run();
        try {
          if (!client.isConnected) {
            demux.stop('disconnected');
          }
          for (const tag of this.requestTags) {
            if (demux.isStopped) {
              break;
            }
            await session.requestTag(tag);
          }
        } catch (error) {
          demux.stop('request failed');
          await merged;
          throw error;
        }

        const snapshot = await merged;
        this.logger.debug(`Session with ${this.deviceId} merged ${demux.recordCount} records`);
        return snapshot;
      } finally {
        clearTimeout(deadline);
        removeListener();
        await this.release(client, session.subscription);
      }
    });
  }

  private async release(client: CharacteristicClient, subscription: Subscription): Promise<void> {
    if (!client.isConnected) {
      return;
    }
    try {
      await client.unsubscribe(subscription);
    } catch (error) {
      this.logger.warn(`Failed to unsubscribe from ${subscription.uuid}:`, error);
    }
  }

  /**
   * Send a chlorinator action.
   *
   * @param parameter - Minutes, for the period actions
   */
  async writeAction(action: HaloAction, parameter: number = 0): Promise<void> {
    await this.writePacket(`chlorinator action ${action}`, buildHaloAction(action, parameter));
  }

  async writeHeaterAction(action: HeaterAction): Promise<void> {
    await this.writePacket(`heater action ${action}`, buildHeaterAction(action));
  }

  async writeSolarAction(action: SolarAction): Promise<void> {
    await this.writePacket(`solar action ${action}`, buildSolarAction(action));
  }

  async writeLightAction(action: LightAction): Promise<void> {
    await this.writePacket(`light action ${action}`, buildLightAction(action));
  }

  private async writePacket(description: string, packet: Uint8Array): Promise<void> {
    await this.withSession(async (client) => {
      const session = await authenticate(client, HALO_AUTH, this.accessCode, this.logger);
      this.logger.info(`Writing ${description} to ${this.deviceId}`);
      await session.writeEncrypted(HaloCharacteristic.RX, packet);
    });
  }

  private async withSession<T>(work: (client: CharacteristicClient) => Promise<T>): Promise<T> {
    if (this.lock.isLocked) {
      this.logger.debug(`${this.deviceId} busy, waiting`);
    }
    return this.lock.runExclusive(async () => {
      const client = await openConnection(this.transport, this.deviceId, this.logger);
      try {
        return await work(client);
      } finally {
        await client.disconnect();
      }
    }, this.lockTimeoutMs);
  }
}
