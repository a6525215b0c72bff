/**
 * Authorization Code Flow Errors
 *
 * Every failure of the flow is an OAuthFlowError tagged with the stage that
 * failed, so callers can tell a port conflict from a provider denial from a
 * token endpoint outage without parsing messages.
 */

export type FlowStage = 'configure' | 'listen' | 'authorize' | 'exchange';

const STAGE_LABELS: Record<FlowStage, string> = {
  configure: 'Invalid OAuth configuration',
  listen: 'Could not start the local server',
  authorize: 'Could not get an authorization code',
  exchange: 'Could not exchange the code for a token',
};

/**
 * Human-readable label for a flow stage
 */
export function describeStage(stage: FlowStage): string {
  return STAGE_LABELS[stage];
}

/**
 * Base class for all flow errors
 */
export class OAuthFlowError extends Error {
  constructor(
    public readonly stage: FlowStage,
    message: string,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = 'OAuthFlowError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Client configuration is incomplete or malformed
 */
export class ConfigurationError extends OAuthFlowError {
  constructor(message: string) {
    super('configure', message);
    this.name = 'ConfigurationError';
  }
}

/**
 * The loopback listener could not bind its port
 */
export class BindError extends OAuthFlowError {
  constructor(
    public readonly port: number,
    cause?: unknown,
  ) {
    super('listen', `Could not listen on port ${port}: ${errorMessage(cause)}`, cause);
    this.name = 'BindError';
  }
}

/**
 * The provider redirected back with an `error` parameter
 */
export class AuthorizationError extends OAuthFlowError {
  constructor(
    public readonly error: string,
    public readonly errorDescription: string,
  ) {
    super('authorize', `OAuth error: ${error}${errorDescription ? ` ${errorDescription}` : ''}`);
    this.name = 'AuthorizationError';
  }
}

/**
 * The callback's state does not match the state this flow generated
 */
export class StateMismatchError extends OAuthFlowError {
  constructor(
    public readonly expected: string,
    public readonly received: string,
  ) {
    super('authorize', `State does not match, wants ${expected} but got ${received || '(none)'}`);
    this.name = 'StateMismatchError';
  }
}

/**
 * The caller's signal fired before the flow finished
 */
export class CancellationError extends OAuthFlowError {
  constructor(
    public readonly reason: unknown,
    stage: FlowStage = 'authorize',
  ) {
    super(
      stage,
      stage === 'exchange'
        ? `Cancelled while exchanging the code for a token: ${errorMessage(reason)}`
        : `Cancelled while waiting for authorization response: ${errorMessage(reason)}`,
      reason,
    );
    this.name = 'CancellationError';
  }
}

/**
 * The local server failed after it started listening
 */
export class CallbackServerError extends OAuthFlowError {
  constructor(cause: unknown) {
    super('authorize', `Local server failed: ${errorMessage(cause)}`, cause);
    this.name = 'CallbackServerError';
  }
}

/**
 * The token endpoint could not be reached or the response could not be read
 */
export class TokenRequestError extends OAuthFlowError {
  constructor(
    public readonly tokenUrl: string,
    cause: unknown,
  ) {
    super('exchange', `Token request to ${tokenUrl} failed: ${errorMessage(cause)}`, cause);
    this.name = 'TokenRequestError';
  }
}

/**
 * The token endpoint answered with a non-2xx status
 *
 * The response is kept as received for diagnostics.
 */
export class RetrieveError extends OAuthFlowError {
  constructor(
    public readonly status: number,
    public readonly statusText: string,
    public readonly headers: Readonly<Record<string, string>>,
    public readonly body: Buffer,
  ) {
    super('exchange', `Cannot fetch token: ${status} ${statusText}\nResponse: ${body.toString('utf-8')}`);
    this.name = 'RetrieveError';
  }
}

/**
 * The token endpoint answered 2xx with a body that is not a token response
 */
export class DecodeError extends OAuthFlowError {
  constructor(
    public readonly body: Buffer,
    reason: string,
    cause?: unknown,
  ) {
    super('exchange', `Cannot decode token response: ${reason}`, cause);
    this.name = 'DecodeError';
  }
}

export function errorMessage(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (value === undefined) return 'unknown reason';
  return String(value);
}
