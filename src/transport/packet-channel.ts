/**
 * FIFO channel between a notification callback and an async consumer.
 *
 * Notifications arrive via callbacks on the transport's schedule. This channel
 * buffers them in arrival order and gives the consumer a Promise-based
 * interface with timeout support. Closing the channel queues an explicit end
 * message behind any buffered packets.
 */

import { consoleLogger, type Logger } from '../logger';

export type ChannelMessage<T> =
  | { type: 'packet'; value: T }
  | { type: 'end'; reason: string };

interface PendingReceiver<T> {
  resolve: (message: ChannelMessage<T>) => void;
  timeoutId: ReturnType<typeof setTimeout>;
}

export interface PacketChannelOptions {
  /** Warn once the backlog reaches this many packets */
  highWaterMark?: number;
  logger?: Logger;
}

export class PacketChannel<T> {
  static readonly DEFAULT_HIGH_WATER_MARK = 256;

  private queue: ChannelMessage<T>[] = [];
  private pendingReceivers: PendingReceiver<T>[] = [];
  private closed = false;
  private warned = false;
  private readonly highWaterMark: number;
  private readonly logger: Logger;

  constructor(options: PacketChannelOptions = {}) {
    this.highWaterMark = options.highWaterMark ?? PacketChannel.DEFAULT_HIGH_WATER_MARK;
    this.logger = options.logger ?? consoleLogger;
  }

  /**
   * Add a packet. Ignored once the channel is closed.
   */
  push(value: T): void {
    if (this.closed) {
      return;
    }
    this.deliver({ type: 'packet', value });

    if (!this.warned && this.queue.length >= this.highWaterMark) {
      this.warned = true;
      this.logger.warn(`Packet backlog reached ${this.queue.length}; consumer is falling behind`);
    }
  }

  /**
   * Queue the end message. Packets pushed afterwards are dropped.
   */
  close(reason: string): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.deliver({ type: 'end', reason });
  }

  /**
   * Take the next message.
   *
   * Resolves with `{ type: 'end', reason: 'timeout' }` if nothing arrives in
   * time. Once the end message has been taken, every later call returns it
   * again.
   */
  async receive(timeoutMs: number): Promise<ChannelMessage<T>> {
    const next = this.queue.shift();
    if (next) {
      if (next.type === 'end') {
        this.queue.unshift(next);
      }
      return next;
    }

    return new Promise<ChannelMessage<T>>((resolve) => {
      const pending: PendingReceiver<T> = {
        resolve,
        timeoutId: setTimeout(() => {
          const index = this.pendingReceivers.indexOf(pending);
          if (index !== -1) {
            this.pendingReceivers.splice(index, 1);
            resolve({ type: 'end', reason: 'timeout' });
          }
        }, timeoutMs),
      };
      this.pendingReceivers.push(pending);
    });
  }

  get size(): number {
    return this.queue.filter((m) => m.type === 'packet').length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  private deliver(message: ChannelMessage<T>): void {
    if (message.type === 'end') {
      // Every waiting receiver sees the end; it also stays queued for later calls.
      for (const pending of this.pendingReceivers.splice(0)) {
        clearTimeout(pending.timeoutId);
        pending.resolve(message);
      }
      this.queue.push(message);
      return;
    }

    const pending = this.pendingReceivers.shift();
    if (pending) {
      clearTimeout(pending.timeoutId);
      pending.resolve(message);
    } else {
      this.queue.push(message);
    }
  }
}
