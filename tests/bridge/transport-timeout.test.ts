/**
 * Transport Connect Timeout Tests
 * connect() hands back a socket that never connects, so only the timer can settle it
 */

import { describe, it, expect, vi } from 'vitest';
import { connect } from 'net';
import { openTransport } from '../../src/bridge/transport.js';
import { TransportError } from '../../src/utils/errors.js';

vi.mock('net', async importOriginal => {
  const actual = await importOriginal<typeof import('net')>();
  return { ...actual, connect: vi.fn(() => new actual.Socket()) };
});

describe('openTransport timeout', () => {
  it('should reject with ETIMEDOUT when the connection never completes', async () => {
    const started = Date.now();
    const attempt = openTransport({ kind: 'tcp', host: '192.0.2.1', port: 9 }, 50);

    await expect(attempt).rejects.toBeInstanceOf(TransportError);
    await expect(attempt).rejects.toMatchObject({
      code: 'ETIMEDOUT',
      message: 'Timed out connecting to tcp:192.0.2.1:9'
    });
    expect(Date.now() - started).toBeLessThan(5000);
    expect(connect).toHaveBeenCalledWith({ host: '192.0.2.1', port: 9 });
  });
});
