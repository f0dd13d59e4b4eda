/**
 * Notification demultiplexer: routes decrypted notification packets to their
 * codecs and folds the records into one snapshot.
 *
 * The producer side (`onNotification`) runs in the transport's callback and
 * only decrypts and enqueues. The consumer side (`run`) decodes and merges,
 * one packet at a time, in arrival order.
 */

import { decryptPayload } from '../encoding/cipher';
import { DecodeError } from '../exceptions';
import { consoleLogger, type Logger } from '../logger';
import { NOTIFICATION_CODECS, type Codec } from '../protocol/registry';
import { parseNotification, type NotificationPacket } from '../protocol/responses';
import { PacketChannel } from '../transport/packet-channel';
import { HaloSnapshot } from './snapshot';

export interface DemultiplexerOptions {
  /** Give up waiting for the next packet after this long */
  idleTimeoutMs?: number;
  highWaterMark?: number;
  codecs?: ReadonlyMap<number, Codec<HaloSnapshot>>;
  logger?: Logger;
}

export class NotificationDemultiplexer {
  static readonly DEFAULT_IDLE_TIMEOUT_MS = 15000;

  readonly snapshot = new HaloSnapshot();
  private readonly channel: PacketChannel<NotificationPacket>;
  private readonly codecs: ReadonlyMap<number, Codec<HaloSnapshot>>;
  private readonly idleTimeoutMs: number;
  private readonly logger: Logger;
  private decoded = 0;

  constructor(
    private readonly sessionKey: Uint8Array,
    options: DemultiplexerOptions = {}
  ) {
    this.logger = options.logger ?? consoleLogger;
    this.codecs = options.codecs ?? NOTIFICATION_CODECS;
    this.idleTimeoutMs = options.idleTimeoutMs ?? NotificationDemultiplexer.DEFAULT_IDLE_TIMEOUT_MS;
    this.channel = new PacketChannel({ highWaterMark: options.highWaterMark, logger: this.logger });
  }

  /**
   * Producer: decrypt one raw notification and enqueue it. Packets that fail
   * to decrypt are logged and dropped.
   */
  onNotification = (raw: Uint8Array): void => {
    let packet: NotificationPacket;
    try {
      packet = parseNotification(decryptPayload(raw, this.sessionKey));
    } catch (error) {
      this.logger.warn(`Dropping undecryptable notification (${raw.length} bytes):`, error);
      return;
    }
    this.channel.push(packet);
  };

  /**
   * Close the channel. `run` finishes once the packets already queued are merged.
   */
  stop(reason: string): void {
    this.channel.close(reason);
  }

  get isStopped(): boolean {
    return this.channel.isClosed;
  }

  /** Number of packets decoded and merged so far */
  get recordCount(): number {
    return this.decoded;
  }

  /**
   * Consumer: merge packets until the channel ends or goes idle.
   *
   * @returns The snapshot, which is partial if the session ended early
   */
  async run(): Promise<HaloSnapshot> {
    for (;;) {
      const message = await this.channel.receive(this.idleTimeoutMs);
      if (message.type === 'end') {
        this.logger.debug(`Notification stream ended (${message.reason}) after ${this.decoded} records`);
        return this.snapshot;
      }
      this.dispatch(message.value);
    }
  }

  private dispatch(packet: NotificationPacket): void {
    const codec = this.codecs.get(packet.tag);
    if (!codec) {
      this.logger.debug(`No codec for tag ${packet.tag}; dropped`);
      return;
    }
    try {
      codec.apply(this.snapshot, packet.data);
      this.decoded++;
    } catch (error) {
      if (error instanceof DecodeError) {
        this.logger.warn(`Skipping ${codec.name} (tag ${packet.tag}): ${error.message}`);
        return;
      }
      throw error;
    }
  }
}
