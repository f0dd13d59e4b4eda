/**
 * Characteristic I/O wrapper for chlorinator connections.
 *
 * Provides the operations the session layer needs on top of a
 * GattConnection:
 * - Characteristic reads and writes
 * - Notification subscriptions
 * - Disconnect tracking
 *
 * Transport errors are wrapped in CharacteristicIOError; errors raised by this
 * library pass through unchanged.
 */

import { hexPreview } from '../encoding/bytes';
import { CharacteristicIOError, ChlorinatorError, ConnectionError } from '../exceptions';
import { consoleLogger, type Logger } from '../logger';
import type { GattConnection, GattTransport, NotificationListener, Subscription } from './types';

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Open a connection through the transport.
 *
 * @throws {ConnectionError} If the transport fails to connect
 */
export async function openConnection(
  transport: GattTransport,
  deviceId: string,
  logger: Logger = consoleLogger
): Promise<CharacteristicClient> {
  let connection: GattConnection;
  try {
    connection = await transport.connect(deviceId);
  } catch (error) {
    if (error instanceof ChlorinatorError) {
      throw error;
    }
    throw new ConnectionError(`Failed to connect to ${deviceId}: ${describe(error)}`, { cause: error });
  }
  logger.info(`Connected to ${deviceId}`);
  return new CharacteristicClient(connection, logger);
}

export class CharacteristicClient {
  constructor(
    private readonly connection: GattConnection,
    private readonly logger: Logger = consoleLogger
  ) {}

  get isConnected(): boolean {
    return this.connection.isConnected;
  }

  /**
   * Read a characteristic value.
   *
   * @throws {CharacteristicIOError} If the read fails
   */
  async read(uuid: string): Promise<Uint8Array> {
    const data = await this.wrap('read', uuid, () => this.connection.read(uuid));
    this.logger.debug(`Read ${uuid}: ${hexPreview(data)}`);
    return data;
  }

  /**
   * Write a characteristic value (with response).
   *
   * @throws {CharacteristicIOError} If the write fails
   */
  async write(uuid: string, data: Uint8Array): Promise<void> {
    this.logger.debug(`Write ${uuid}: ${hexPreview(data)}`);
    await this.wrap('write', uuid, () => this.connection.write(uuid, data));
  }

  /**
   * Start notifications on a characteristic.
   *
   * @throws {CharacteristicIOError} If the subscription fails
   */
  async subscribe(uuid: string, listener: NotificationListener): Promise<Subscription> {
    const subscription = await this.wrap('subscribe to', uuid, () => this.connection.subscribe(uuid, listener));
    this.logger.debug(`Subscribed to ${uuid}`);
    return subscription;
  }

  async unsubscribe(subscription: Subscription): Promise<void> {
    await this.wrap('unsubscribe from', subscription.uuid, () => this.connection.unsubscribe(subscription));
  }

  onDisconnect(listener: () => void): () => void {
    return this.connection.onDisconnect(listener);
  }

  /**
   * Close the connection. Errors during teardown are logged, not thrown.
   */
  async disconnect(): Promise<void> {
    try {
      await this.connection.disconnect();
      this.logger.info('Disconnected');
    } catch (error) {
      this.logger.warn(`Disconnect failed: ${describe(error)}`);
    }
  }

  private async wrap<T>(verb: string, uuid: string, operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      if (error instanceof ChlorinatorError) {
        throw error;
      }
      throw new CharacteristicIOError(`Failed to ${verb} ${uuid}: ${describe(error)}`, uuid, { cause: error });
    }
  }
}
