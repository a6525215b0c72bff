/**
 * Loopback listener tests
 */

import { createServer, type Server } from 'http';
import axios from 'axios';
import { LocalhostListener } from '../../../src/lib/auth/local-listener';
import { BindError } from '../../../src/lib/auth/errors';

describe('LocalhostListener', () => {
  const listeners: LocalhostListener[] = [];

  afterEach(async () => {
    await Promise.all(listeners.map(listener => listener.close({ graceMs: 0 })));
    listeners.length = 0;
  });

  async function open(port = 0): Promise<LocalhostListener> {
    const listener = await LocalhostListener.open(port);
    listeners.push(listener);
    return listener;
  }

  it('should pick a free port when asked for port 0', async () => {
    const listener = await open();

    expect(listener.port).toBeGreaterThan(0);
    expect(listener.url).toBe(`http://localhost:${listener.port}`);
    expect(listener.listening).toBe(true);
  });

  it('should fail with BindError when the port is taken', async () => {
    const first = await open();

    const error = await LocalhostListener.open(first.port).then(() => null, (err: unknown) => err);

    expect(error).toBeInstanceOf(BindError);
    expect(error).toMatchObject({ stage: 'listen', port: first.port });
  });

  it('should fail with BindError when the port is taken on the IPv6 loopback', async () => {
    const holder = await listenOnIpv6Loopback();
    if (!holder) {
      // No IPv6 loopback on this host
      return;
    }

    try {
      const address = holder.address();
      if (address === null || typeof address === 'string') throw new Error('holder has no port');

      const error = await LocalhostListener.open(address.port).then(() => null, (err: unknown) => err);

      expect(error).toBeInstanceOf(BindError);
      expect(error).toMatchObject({ stage: 'listen', port: address.port });
    } finally {
      await new Promise(resolve => holder.close(resolve));
    }
  });

  it('should answer on both loopback addresses when IPv6 is available', async () => {
    const listener = await open();
    listener.onRequest((_req, res) => res.end('hello'));

    expect((await axios.get(`http://127.0.0.1:${listener.port}`)).data).toBe('hello');
    if (listener.servers.length === 2) {
      expect((await axios.get(`http://[::1]:${listener.port}`)).data).toBe('hello');
    }
  });

  it('should reject ports outside the valid range', async () => {
    await expect(LocalhostListener.open(70000)).rejects.toThrow(
      'Could not listen on port 70000: port must be an integer between 0 and 65535'
    );
    await expect(LocalhostListener.open(-1)).rejects.toBeInstanceOf(BindError);
  });

  it('should stop accepting connections once closed', async () => {
    const listener = await open();
    listener.onRequest((_req, res) => res.end('hello'));

    const response = await axios.get(listener.url);
    expect(response.data).toBe('hello');

    await listener.close();

    expect(listener.closed).toBe(true);
    expect(listener.listening).toBe(false);
    await expect(axios.get(listener.url)).rejects.toThrow();
  });

  it('should return the same promise when closed twice', async () => {
    const listener = await open();

    const first = listener.close();
    const second = listener.close();

    expect(second).toBe(first);
    await first;
  });

  it('should drop a stalled connection once the signal aborts', async () => {
    const listener = await open();
    // Never answers
    const received = new Promise<void>(resolve => listener.onRequest(() => resolve()));

    const stalled = axios.get(listener.url).then(() => null, (err: unknown) => err);
    await received;

    const controller = new AbortController();
    const closing = listener.close({ signal: controller.signal, graceMs: 60000 });
    controller.abort();

    await closing;
    expect(await stalled).toBeInstanceOf(Error);
  });
});

function listenOnIpv6Loopback(): Promise<Server | null> {
  const server = createServer();
  return new Promise(resolve => {
    server.once('error', () => resolve(null));
    server.listen(0, '::1', () => resolve(server));
  });
}
