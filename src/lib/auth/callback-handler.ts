/**
 * Redirect callback handling for the loopback listener
 *
 * The same local URL is both the browser's first navigation target (which
 * bounces to the provider) and the provider's redirect target (which carries
 * the code or error back).
 */

import type { IncomingMessage, RequestListener, ServerResponse } from 'http';

export type CallbackRequest =
  | { kind: 'not_found' }
  | { kind: 'error'; error: string; errorDescription: string }
  | { kind: 'code'; code: string; state: string }
  | { kind: 'redirect' };

/**
 * Classify an inbound request
 *
 * Checked in this order, first match wins:
 *   1. anything but GET / → not_found
 *   2. non-empty `error` → error (wins over `code` if a provider sends both)
 *   3. non-empty `code` → code
 *   4. otherwise → redirect to the provider
 */
export function classifyCallbackRequest(method: string | undefined, rawUrl: string | undefined): CallbackRequest {
  const target = rawUrl ?? '/';
  const queryStart = target.indexOf('?');
  const path = queryStart === -1 ? target : target.slice(0, queryStart);
  const query = new URLSearchParams(queryStart === -1 ? '' : target.slice(queryStart + 1));

  if (method !== 'GET' || path !== '/') {
    return { kind: 'not_found' };
  }

  const error = query.get('error');
  if (error) {
    return { kind: 'error', error, errorDescription: query.get('error_description') ?? '' };
  }

  const code = query.get('code');
  if (code) {
    return { kind: 'code', code, state: query.get('state') ?? '' };
  }

  return { kind: 'redirect' };
}

export interface CallbackHandlerOptions {
  /** Provider authorization URL the bare local URL redirects to */
  authCodeUrl: string;
  /** Called for every inbound request, before it is answered */
  onRequest?: (request: CallbackRequest) => void;
  /** Called once the browser has been answered */
  onCode: (code: string, state: string) => void;
  /** Called once the browser has been answered */
  onError: (error: string, errorDescription: string) => void;
  /** Called when a request could not be answered */
  onFailure: (err: unknown) => void;
}

const CLOSE_WINDOW_HTML = '<html><body>OK<script>window.close()</script></body></html>';

export function createCallbackHandler(options: CallbackHandlerOptions): RequestListener {
  return (req: IncomingMessage, res: ServerResponse) => {
    try {
      respond(options, classifyCallbackRequest(req.method, req.url), res);
    } catch (err) {
      if (res.headersSent) {
        res.destroy();
      } else {
        sendText(res, 500, 'Internal Server Error');
      }
      options.onFailure(err);
    }
  };
}

function respond(options: CallbackHandlerOptions, request: CallbackRequest, res: ServerResponse): void {
  options.onRequest?.(request);

  switch (request.kind) {
    case 'error':
      res.once('close', () => options.onError(request.error, request.errorDescription));
      sendText(res, 500, 'OAuth Error');
      return;

    case 'code':
      res.once('close', () => options.onCode(request.code, request.state));
      res.writeHead(200, { 'Content-Type': 'text/html; charset=utf-8' });
      res.end(CLOSE_WINDOW_HTML);
      return;

    case 'redirect':
      res.writeHead(302, { Location: options.authCodeUrl });
      res.end();
      return;

    case 'not_found':
      sendText(res, 404, 'Not Found');
      return;
  }
}

function sendText(res: ServerResponse, status: number, text: string): void {
  res.writeHead(status, {
    'Content-Type': 'text/plain; charset=utf-8',
    'X-Content-Type-Options': 'nosniff',
  });
  res.end(`${text}\n`);
}
