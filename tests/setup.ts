/**
 * Global test setup for Jest
 *
 * Tests start real HTTP servers on localhost (the flow's local server and an
 * in-process token endpoint); nothing leaves the machine.
 */

// Extend Jest timeout for tests that wait on real sockets
jest.setTimeout(15000);

// Suppress console output during tests (unless TEST_VERBOSE=true)
if (!process.env.TEST_VERBOSE) {
  global.console = {
    ...console,
    log: jest.fn(),
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    // Keep error for debugging test failures
    error: console.error,
  };
}

process.env.NODE_ENV = 'test';

// Keep the developer's own settings out of the tests
for (const name of [
  'AUTHCODE_CLIENT_ID',
  'AUTHCODE_CLIENT_SECRET',
  'AUTHCODE_AUTH_URL',
  'AUTHCODE_TOKEN_URL',
  'AUTHCODE_REDIRECT_URL',
]) {
  delete process.env[name];
}
