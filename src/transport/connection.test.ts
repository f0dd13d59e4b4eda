import { describe, expect, it, vi } from 'vitest';
import { CharacteristicIOError, ConnectionError, HandshakeFailedError } from '../exceptions';
import { createTestLogger } from '../testing/logger';
import { CharacteristicClient, openConnection } from './connection';
import type { GattConnection } from './types';

function stubConnection(overrides: Partial<GattConnection> = {}): GattConnection {
  return {
    isConnected: true,
    read: vi.fn(async () => Uint8Array.of(0xaa, 0xbb, 0xcc, 0xdd, 0xee)),
    write: vi.fn(async () => undefined),
    subscribe: vi.fn(async (uuid: string) => ({ uuid })),
    unsubscribe: vi.fn(async () => undefined),
    onDisconnect: vi.fn(() => () => undefined),
    disconnect: vi.fn(async () => undefined),
    ...overrides,
  };
}

describe('openConnection', () => {
  it('should wrap transport errors in ConnectionError', async () => {
    const transport = { connect: vi.fn(async () => Promise.reject(new Error('out of range'))) };
    const attempt = openConnection(transport, 'dev-1', createTestLogger());
    await expect(attempt).rejects.toThrow(ConnectionError);
    await expect(attempt).rejects.toThrow('Failed to connect to dev-1: out of range');
  });

  it('should pass library errors through', async () => {
    const error = new HandshakeFailedError('already wrapped');
    const transport = { connect: vi.fn(async () => Promise.reject(error)) };
    await expect(openConnection(transport, 'dev-1', createTestLogger())).rejects.toBe(error);
  });
});

describe('CharacteristicClient', () => {
  it('should log reads with a hex preview', async () => {
    const logger = createTestLogger();
    const client = new CharacteristicClient(stubConnection(), logger);
    await client.read('char-1');
    expect(logger.debug).toHaveBeenCalledWith('Read char-1: aabbccdd…(5 bytes)');
  });

  it('should wrap a failed write with the characteristic', async () => {
    const client = new CharacteristicClient(
      stubConnection({ write: vi.fn(async () => Promise.reject(new Error('GATT 0x0e'))) }),
      createTestLogger()
    );
    const attempt = client.write('char-2', new Uint8Array(20));
    await expect(attempt).rejects.toThrow(CharacteristicIOError);
    await expect(attempt).rejects.toMatchObject({
      message: 'Failed to write char-2: GATT 0x0e',
      characteristic: 'char-2',
    });
  });

  it('should log rather than throw when disconnect fails', async () => {
    const logger = createTestLogger();
    const client = new CharacteristicClient(
      stubConnection({ disconnect: vi.fn(async () => Promise.reject(new Error('already gone'))) }),
      logger
    );
    await expect(client.disconnect()).resolves.toBeUndefined();
    expect(logger.warn).toHaveBeenCalledWith('Disconnect failed: already gone');
  });

  it('should forward disconnect listeners to the connection', () => {
    const connection = stubConnection();
    const listener = () => undefined;
    new CharacteristicClient(connection, createTestLogger()).onDisconnect(listener);
    expect(connection.onDisconnect).toHaveBeenCalledWith(listener);
  });
});
