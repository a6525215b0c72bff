/**
 * Loopback Listener
 *
 * Binds a temporary HTTP server on localhost to act as the OAuth redirect
 * target. A random free port is allocated when the port is 0.
 *
 * `localhost` may resolve to either loopback family, so the port is bound on
 * 127.0.0.1 and on ::1. Hosts without IPv6 only get the first.
 *
 * Usage:
 *   const listener = await LocalhostListener.open(0);
 *   listener.onRequest(handler);
 *   console.log(listener.url);  // http://localhost:53682
 *   await listener.close();
 */

import { createServer, type RequestListener, type Server } from 'http';
import { BindError } from './errors';

export const LOOPBACK_HOST = 'localhost';

/** Bound in order; the first one picks the port when it is 0 */
export const LOOPBACK_ADDRESSES = ['127.0.0.1', '::1'] as const;

/** Grace period for in-flight connections before they are destroyed */
export const DEFAULT_SHUTDOWN_GRACE_MS = 5000;

/** Bind errors meaning the host has no IPv6 loopback */
const NO_IPV6_CODES: ReadonlySet<string> = new Set(['EADDRNOTAVAIL', 'EAFNOSUPPORT']);

/** Random ports tried before giving up when ::1 already holds the picked one */
const RANDOM_PORT_ATTEMPTS = 5;

export interface CloseOptions {
  /** Destroys open connections immediately once aborted */
  signal?: AbortSignal;
  graceMs?: number;
}

function errorCode(err: unknown): string | undefined {
  return err instanceof Error && 'code' in err && typeof err.code === 'string' ? err.code : undefined;
}

function listenOn(port: number, host: string): Promise<Server> {
  const server = createServer();

  return new Promise<Server>((resolve, reject) => {
    const onError = (err: Error) => {
      server.removeListener('listening', onListening);
      reject(err);
    };
    const onListening = () => {
      server.removeListener('error', onError);
      resolve(server);
    };

    server.once('error', onError);
    server.once('listening', onListening);
    server.listen(port, host);
  });
}

function boundPort(server: Server): number {
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error(`unexpected server address ${String(address)}`);
  }
  return address.port;
}

export class LocalhostListener {
  private closing: Promise<void> | null = null;

  private constructor(
    readonly servers: readonly Server[],
    readonly port: number,
    readonly url: string,
  ) {}

  /**
   * Bind the listener on the loopback addresses
   *
   * @param port - Port to bind, or 0 for any free port
   * @throws {BindError} when the port is invalid, in use or otherwise unavailable
   */
  static async open(port: number = 0): Promise<LocalhostListener> {
    if (!Number.isInteger(port) || port < 0 || port > 65535) {
      throw new BindError(port, new RangeError(`port must be an integer between 0 and 65535`));
    }

    for (let attempt = 1; ; attempt++) {
      try {
        const servers = await bindAll(port);
        const bound = boundPort(servers[0]);
        return new LocalhostListener(servers, bound, `http://${LOOPBACK_HOST}:${bound}`);
      } catch (err) {
        if (port === 0 && errorCode(err) === 'EADDRINUSE' && attempt < RANDOM_PORT_ATTEMPTS) {
          continue;
        }
        throw new BindError(port, err);
      }
    }
  }

  get closed(): boolean {
    return this.closing !== null;
  }

  get listening(): boolean {
    return this.servers.every(server => server.listening);
  }

  onRequest(handler: RequestListener): void {
    for (const server of this.servers) {
      server.on('request', handler);
    }
  }

  onError(handler: (err: Error) => void): void {
    for (const server of this.servers) {
      server.on('error', handler);
    }
  }

  /**
   * Stop accepting connections and wait for open ones to finish
   *
   * Idle keep-alive connections are dropped right away; busy ones get
   * `graceMs` to complete, or none at all once `signal` is aborted.
   * Calling close() again returns the same promise.
   */
  close(options: CloseOptions = {}): Promise<void> {
    if (this.closing) {
      return this.closing;
    }

    const { signal, graceMs = DEFAULT_SHUTDOWN_GRACE_MS } = options;
    const servers = this.servers;

    const forceClose = () => servers.forEach(server => server.closeAllConnections());
    const timer = setTimeout(forceClose, graceMs);
    timer.unref();
    signal?.addEventListener('abort', forceClose, { once: true });

    const closed = servers.map(server => new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
      server.closeIdleConnections();
    }));

    if (signal?.aborted) {
      forceClose();
    }

    this.closing = Promise.all(closed)
      .then(() => undefined)
      .finally(() => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', forceClose);
      });

    return this.closing;
  }
}

/**
 * Bind every loopback address on one port
 *
 * A failure other than a missing IPv6 loopback closes what was already bound.
 */
async function bindAll(port: number): Promise<Server[]> {
  const [first, ...rest] = LOOPBACK_ADDRESSES;
  const primary = await listenOn(port, first);
  const servers = [primary];

  try {
    const bound = boundPort(primary);
    for (const host of rest) {
      try {
        servers.push(await listenOn(bound, host));
      } catch (err) {
        const code = errorCode(err);
        if (code === undefined || !NO_IPV6_CODES.has(code)) {
          throw err;
        }
      }
    }
  } catch (err) {
    servers.forEach(server => server.close());
    throw err;
  }

  return servers;
}
