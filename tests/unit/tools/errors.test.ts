import { BrokenCircuitError, TaskCancelledError } from 'cockatiel';
import { toStdError } from '../../../src/tools/errors.js';
import { ExternalFetchError } from '../../../src/util/fetch.js';

describe('toStdError', () => {
  test.each([
    [new ExternalFetchError('timeout', 'timeout'), 'timeout'],
    [new ExternalFetchError('cancelled', 'cancelled'), 'cancelled'],
    [new ExternalFetchError('http', 'HTTP_401', 401), 'auth_error'],
    [new ExternalFetchError('http', 'HTTP_429', 429), 'rate_limit'],
    [new ExternalFetchError('http', 'HTTP_502', 502), 'http_error'],
    [new ExternalFetchError('network', 'circuit_open'), 'circuit_open'],
    [new ExternalFetchError('network', 'ECONNRESET'), 'network_error'],
    [new TaskCancelledError(), 'timeout'],
    [new BrokenCircuitError(), 'circuit_open'],
    [new DOMException('Aborted', 'AbortError'), 'cancelled'],
    [new Error('boom'), 'unknown_error'],
    ['weird', 'unknown_error'],
  ])('maps %p to %s', (error, code) => {
    expect(toStdError(error).code).toBe(code);
  });

  test('keeps the HTTP status and context', () => {
    expect(toStdError(new ExternalFetchError('http', 'HTTP_503', 503), 'web')).toEqual({
      code: 'http_error',
      message: 'HTTP_503',
      details: { status: 503 },
      causeId: 'web',
    });
  });
});
