/**
 * Session handshake for both device families.
 *
 * Read the per-connection session key, answer with the derived token, then
 * do whatever the family needs before the session carries data: keep-alive
 * reads for the poll variant, a TX subscription for the notification variant.
 */

import { hexPreview } from '../encoding/bytes';
import { decryptPayload, deriveAuthToken, encryptPayload } from '../encoding/cipher';
import { HandshakeFailedError } from '../exceptions';
import { consoleLogger, type Logger } from '../logger';
import { buildReadRequest } from '../protocol/commands';
import {
  HaloCharacteristic,
  PollCharacteristic,
  POLL_KEEPALIVE_READS,
  type AuthCharacteristics,
  type CommandTag,
} from '../protocol/constants';
import type { CharacteristicClient } from '../transport/connection';
import type { NotificationListener, Subscription } from '../transport/types';

export const POLL_AUTH: AuthCharacteristics = {
  sessionKey: PollCharacteristic.SESSION_KEY,
  authentication: PollCharacteristic.AUTHENTICATION,
};

export const HALO_AUTH: AuthCharacteristics = {
  sessionKey: HaloCharacteristic.SESSION_KEY,
  authentication: HaloCharacteristic.AUTHENTICATION,
};

/**
 * An authenticated connection and the session key that encrypts its traffic.
 */
export class AuthenticatedSession {
  constructor(
    readonly client: CharacteristicClient,
    readonly sessionKey: Uint8Array
  ) {}

  /**
   * Read a characteristic and decrypt it.
   */
  async readDecrypted(uuid: string): Promise<Uint8Array> {
    return decryptPayload(await this.client.read(uuid), this.sessionKey);
  }

  /**
   * Encrypt a plaintext packet and write it.
   */
  async writeEncrypted(uuid: string, plaintext: Uint8Array): Promise<void> {
    await this.client.write(uuid, encryptPayload(plaintext, this.sessionKey));
  }

  decrypt(ciphertext: Uint8Array): Uint8Array {
    return decryptPayload(ciphertext, this.sessionKey);
  }
}

/**
 * Notification-variant session with an active TX subscription.
 */
export class NotificationSession extends AuthenticatedSession {
  constructor(
    client: CharacteristicClient,
    sessionKey: Uint8Array,
    readonly subscription: Subscription
  ) {
    super(client, sessionKey);
  }

  /**
   * Ask the device to notify the record behind `tag`.
   */
  async requestTag(tag: CommandTag): Promise<void> {
    await this.writeEncrypted(HaloCharacteristic.RX, buildReadRequest(tag));
  }
}

async function guarded<T>(step: string, operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new HandshakeFailedError(`Handshake failed during ${step}: ${detail}`, { cause: error });
  }
}

/**
 * Read the session key and write back the access token.
 *
 * @throws {HandshakeFailedError} If any step fails; `cause` holds the original error
 */
export async function authenticate(
  client: CharacteristicClient,
  characteristics: AuthCharacteristics,
  accessCode: string,
  logger: Logger = consoleLogger
): Promise<AuthenticatedSession> {
  const sessionKey = await guarded('session key read', () => client.read(characteristics.sessionKey));
  const token = await guarded('token derivation', async () => deriveAuthToken(sessionKey, accessCode));
  logger.debug(`Session key ${hexPreview(sessionKey)}, token ${hexPreview(token)}`);
  await guarded('authentication write', () => client.write(characteristics.authentication, token));
  return new AuthenticatedSession(client, sessionKey);
}

/**
 * Authenticate a poll-variant session.
 *
 * The device drops the link unless a fixed set of characteristics is read
 * right after authenticating; those values are discarded.
 *
 * @throws {HandshakeFailedError} If any step fails
 */
export async function performPollHandshake(
  client: CharacteristicClient,
  accessCode: string,
  logger: Logger = consoleLogger
): Promise<AuthenticatedSession> {
  const session = await authenticate(client, POLL_AUTH, accessCode, logger);
  for (const uuid of POLL_KEEPALIVE_READS) {
    await guarded(`keep-alive read of ${uuid}`, () => client.read(uuid));
  }
  return session;
}

/**
 * Anything that consumes raw TX notifications.
 */
export interface NotificationHandler {
  onNotification: NotificationListener;
}

/**
 * Authenticate a notification-variant session and subscribe to TX.
 *
 * `createHandler` receives the session key and returns the consumer for TX
 * notifications. The subscription is in place before this resolves, so no
 * notification answering a later request can be missed.
 *
 * @throws {HandshakeFailedError} If any step fails
 */
export async function performNotificationHandshake<H extends NotificationHandler>(
  client: CharacteristicClient,
  accessCode: string,
  createHandler: (sessionKey: Uint8Array) => H,
  logger: Logger = consoleLogger
): Promise<{ session: NotificationSession; handler: H }> {
  const auth = await authenticate(client, HALO_AUTH, accessCode, logger);
  const handler = createHandler(auth.sessionKey);
  const subscription = await guarded('TX subscription', () =>
    client.subscribe(HaloCharacteristic.TX, handler.onNotification)
  );
  return { session: new NotificationSession(client, auth.sessionKey, subscription), handler };
}
