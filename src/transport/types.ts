/**
 * Transport interface the library drives. A BLE stack (noble, a native
 * bridge, or the in-process fake used by the tests) implements it.
 */

/** Handle for an active notification subscription. */
export interface Subscription {
  readonly uuid: string;
}

export type NotificationListener = (data: Uint8Array) => void;

export interface GattConnection {
  readonly isConnected: boolean;

  read(uuid: string): Promise<Uint8Array>;

  /** Write with response. */
  write(uuid: string, data: Uint8Array): Promise<void>;

  subscribe(uuid: string, listener: NotificationListener): Promise<Subscription>;

  unsubscribe(subscription: Subscription): Promise<void>;

  /**
   * Register a listener for link loss or remote disconnect.
   *
   * @returns Function that removes the listener
   */
  onDisconnect(listener: () => void): () => void;

  disconnect(): Promise<void>;
}

export interface GattTransport {
  /**
   * Open a connection to the device with the given address.
   */
  connect(deviceId: string): Promise<GattConnection>;
}
