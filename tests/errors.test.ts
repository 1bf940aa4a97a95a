import { FetchError } from 'node-fetch';
import { ConfigError, describeError, WattBoxHttpError } from '../wattbox/errors';

const quiet = { baseUrl: 'http://10.0.0.5', verbose: false };
const loud = { baseUrl: 'http://10.0.0.5', verbose: true };

describe('describeError', () => {
  test('HTTP errors show status and, when verbose, the start of the body', () => {
    const error = new WattBoxHttpError(500, 'Internal Server Error', 'http://10.0.0.5/outlet/on?o=1', 'x'.repeat(600));

    expect(describeError(error, quiet)).toEqual(['✗ HTTP Error: 500 Internal Server Error for url: http://10.0.0.5/outlet/on?o=1']);
    expect(describeError(error, loud)[1]).toBe(`Response: ${'x'.repeat(500)}`);
  });

  test('omits an empty status text', () => {
    expect(new WattBoxHttpError(401, '', 'http://10.0.0.5/main', '').message).toBe('401 for url: http://10.0.0.5/main');
  });

  test('timeouts', () => {
    const error = new FetchError('network timeout at: http://10.0.0.5/main', 'request-timeout');

    expect(describeError(error, loud)).toEqual(['✗ Timeout Error: Request timed out']);
  });

  test('connection failures name the device', () => {
    const error = new FetchError('request to http://10.0.0.5/main failed, reason: connect ECONNREFUSED', 'system');

    expect(describeError(error, quiet)).toEqual(['✗ Connection Error: Could not connect to http://10.0.0.5']);
    expect(describeError(error, loud)).toEqual([
      '✗ Connection Error: Could not connect to http://10.0.0.5',
      'Details: request to http://10.0.0.5/main failed, reason: connect ECONNREFUSED',
    ]);
  });

  test('other request failures', () => {
    expect(describeError(new FetchError('max redirect reached', 'max-redirect'), quiet)).toEqual(['✗ Request Error: max redirect reached']);
  });

  test('configuration errors', () => {
    expect(describeError(new ConfigError('Invalid action "x"'), quiet)).toEqual(['✗ Configuration Error: Invalid action "x"']);
  });

  test('anything else, with the stack when verbose', () => {
    const error = new Error('boom');

    expect(describeError(error, quiet)).toEqual(['✗ Unexpected Error: boom']);
    expect(describeError(error, loud)).toEqual(['✗ Unexpected Error: boom', error.stack]);
    expect(describeError('plain', quiet)).toEqual(['✗ Unexpected Error: plain']);
  });
});
