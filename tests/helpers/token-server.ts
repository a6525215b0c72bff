/**
 * Token Endpoint Test Helper
 *
 * Runs a stand-in OAuth token endpoint on localhost inside the test process
 * and records every request it receives.
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'http';

export interface RecordedTokenRequest {
  method: string;
  path: string;
  headers: IncomingMessage['headers'];
  body: string;
  form: URLSearchParams;
}

export interface TokenServerReply {
  status: number;
  body: string;
  headers?: Record<string, string>;
}

export type TokenServerHandler = (request: RecordedTokenRequest) => TokenServerReply;

export class TokenServerHelper {
  readonly requests: RecordedTokenRequest[] = [];
  private server: Server | null = null;
  private port = 0;

  constructor(private handler: TokenServerHandler = () => TokenServerHelper.json(200, {})) {}

  static json(status: number, payload: unknown): TokenServerReply {
    return {
      status,
      body: JSON.stringify(payload),
      headers: { 'Content-Type': 'application/json' },
    };
  }

  get url(): string {
    return `http://localhost:${this.port}/token`;
  }

  respondWith(handler: TokenServerHandler): void {
    this.handler = handler;
  }

  /**
   * Start listening on a random free port
   */
  async start(): Promise<void> {
    if (this.server) {
      throw new Error('Token server already running');
    }

    const server = createServer((req, res) => this.handle(req, res));
    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(0, 'localhost', () => resolve());
    });

    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Token server has no port');
    }
    this.port = address.port;
    this.server = server;
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = null;
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  }

  private handle(req: IncomingMessage, res: ServerResponse): void {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => {
      const body = Buffer.concat(chunks).toString('utf-8');
      const request: RecordedTokenRequest = {
        method: req.method ?? '',
        path: req.url ?? '',
        headers: req.headers,
        body,
        form: new URLSearchParams(body),
      };
      this.requests.push(request);

      const reply = this.handler(request);
      res.writeHead(reply.status, reply.headers ?? {});
      res.end(reply.body);
    });
  }
}
