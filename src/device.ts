/**
 * Poll-variant chlorinator device.
 */

import { ProtocolError } from './exceptions';
import { consoleLogger, type Logger } from './logger';
import type { PollAction } from './models/enums';
import { validateAccessCode, type DeviceOptions } from './options';
import { buildPollAction } from './protocol/commands';
import { PollCharacteristic } from './protocol/constants';
import { POLL_CODECS } from './protocol/registry';
import { performPollHandshake } from './session/handshake';
import { PollSnapshot } from './session/snapshot';
import { openConnection, type CharacteristicClient } from './transport/connection';
import type { GattTransport } from './transport/types';

/**
 * Poll-variant BLE chlorinator.
 *
 * Every call opens its own connection, authenticates, does its work and
 * disconnects. Records are read one characteristic at a time.
 *
 * @example
 * ```typescript
 * const device = new ChlorinatorDevice(transport, 'AA:BB:CC:DD:EE:FF', { accessCode: '1234' });
 * const snapshot = await device.gatherData();
 * console.log(snapshot.get('phMeasurement'));
 * await device.writeAction(PollAction.AUTO);
 * ```
 */
export class ChlorinatorDevice {
  private readonly accessCode: string;
  private readonly logger: Logger;

  /**
   * @throws {ConfigurationError} If the options are invalid
   */
  constructor(
    private readonly transport: GattTransport,
    readonly deviceId: string,
    options: DeviceOptions
  ) {
    validateAccessCode(options.accessCode);
    this.accessCode = options.accessCode;
    this.logger = options.logger ?? consoleLogger;
  }

  /**
   * Read and decode every chlorinator record.
   *
   * Records of the wrong length or that fail to decode are logged and left
   * out of the snapshot.
   *
   * @throws {ConnectionError} If the connection cannot be opened
   * @throws {HandshakeFailedError} If authentication fails
   * @throws {CharacteristicIOError} If a record read fails
   */
  async gatherData(): Promise<PollSnapshot> {
    return this.withSession(async (client) => {
      const session = await performPollHandshake(client, this.accessCode, this.logger);
      const snapshot = new PollSnapshot();

      for (const [uuid, codec] of POLL_CODECS) {
        try {
          codec.apply(snapshot, await session.readDecrypted(uuid));
        } catch (error) {
          if (!(error instanceof ProtocolError)) {
            throw error;
          }
          this.logger.warn(`Skipping ${codec.name}: ${error.message}`);
        }
      }

      this.logger.debug(`Gathered ${Object.keys(snapshot.fields).length} fields from ${this.deviceId}`);
      return snapshot;
    });
  }

  /**
   * Send an action to the chlorinator.
   *
   * @param parameter - Minutes, for DISABLE_ACID_DOSING_FOR_PERIOD
   * @throws {ConfigurationError} If the parameter is not a 32-bit integer
   */
  async writeAction(action: PollAction, parameter: number = 0): Promise<void> {
    const packet = buildPollAction(action, parameter);
    await this.withSession(async (client) => {
      const session = await performPollHandshake(client, this.accessCode, this.logger);
      this.logger.info(`Writing action ${action} (parameter ${parameter}) to ${this.deviceId}`);
      await session.writeEncrypted(PollCharacteristic.CHLORINATOR_APP_ACTION, packet);
    });
  }

  private async withSession<T>(work: (client: CharacteristicClient) => Promise<T>): Promise<T> {
    const client = await openConnection(this.transport, this.deviceId, this.logger);
    try {
      return await work(client);
    } finally {
      await client.disconnect();
    }
  }
}
