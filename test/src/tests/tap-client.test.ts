/**
 * Unit tests for the TAP client
 *
 * Requests are answered in-process by a custom axios adapter.
 */

import { AxiosError, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';
import { TapClient, extractServiceMessage } from '../../../src/tap/tap-client.js';
import { TapTraceLogger } from '../../../src/tap/trace-logger.js';
import { ServiceError } from '../../../src/errors.js';

type Handler = (config: InternalAxiosRequestConfig) => Promise<AxiosResponse>;

const noTrace = new TapTraceLogger('test', { enabled: false });

function respondWith(data: unknown, status = 200): Handler {
  return async (config) => {
    const response: AxiosResponse = { data, status, statusText: String(status), headers: {}, config };
    if (status >= 400) {
      throw new AxiosError(`Request failed with status code ${status}`, AxiosError.ERR_BAD_REQUEST, config, null, response);
    }
    return response;
  };
}

function clientFor(handler: Handler): TapClient {
  return new TapClient({ baseUrl: 'http://tap.test/TAP', timeoutMs: 1000, adapter: handler, trace: noTrace });
}

async function captureError(promise: Promise<unknown>): Promise<ServiceError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof ServiceError) return error;
    throw error;
  }
  throw new Error('expected the query to fail');
}

describe('TAP CLIENT', () => {
  it('sends the ADQL to the sync endpoint and asks for JSON', async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    const client = clientFor(async (config) => {
      seen.push(config);
      return respondWith([{ pl_name: 'Kepler-442 b' }])(config);
    });

    const rows = await client.query('SELECT pl_name FROM pscomppars');

    expect(rows).toEqual([{ pl_name: 'Kepler-442 b' }]);
    expect(seen).toHaveLength(1);
    expect(seen[0].baseURL).toBe('http://tap.test/TAP');
    expect(seen[0].url).toBe('/sync');
    expect(seen[0].params).toEqual({
      REQUEST: 'doQuery',
      LANG: 'ADQL',
      FORMAT: 'json',
      QUERY: 'SELECT pl_name FROM pscomppars',
    });
  });

  it('returns an empty list for a query with no matches', async () => {
    const rows = await clientFor(respondWith([])).query('SELECT pl_name FROM pscomppars');
    expect(rows).toEqual([]);
  });

  it('reports rejected queries with the service message', async () => {
    const votable = '<VOTABLE><RESOURCE type="results"><INFO name="QUERY_STATUS" value="ERROR">Unknown column "pl_mass"</INFO></RESOURCE></VOTABLE>';
    const error = await captureError(clientFor(respondWith(votable, 400)).query('SELECT pl_mass FROM pscomppars'));

    expect(error.kind).toBe('rejected');
    expect(error.code).toBe('service_rejected');
    expect(error.status).toBe(400);
    expect(error.message).toBe('TAP service rejected the query (HTTP 400): Unknown column "pl_mass"');
  });

  it('treats an error VOTable returned with HTTP 200 as rejected', async () => {
    const votable = '<VOTABLE><INFO name="QUERY_STATUS" value="ERROR">syntax error near ORDER</INFO></VOTABLE>';
    const error = await captureError(clientFor(respondWith(votable)).query('SELECT'));

    expect(error.kind).toBe('rejected');
    expect(error.message).toBe('TAP service rejected the query: syntax error near ORDER');
  });

  it('distinguishes timeouts', async () => {
    const error = await captureError(clientFor(async (config) => {
      throw new AxiosError('timeout of 1000ms exceeded', AxiosError.ECONNABORTED, config);
    }).query('SELECT pl_name FROM pscomppars'));

    expect(error.kind).toBe('timeout');
    expect(error.message).toBe('TAP query timed out after 1000ms');
  });

  it('distinguishes an unreachable service', async () => {
    const error = await captureError(clientFor(async (config) => {
      throw new AxiosError('connect ECONNREFUSED 127.0.0.1:80', 'ECONNREFUSED', config);
    }).query('SELECT pl_name FROM pscomppars'));

    expect(error.kind).toBe('unreachable');
    expect(error.message).toBe('TAP service unreachable: connect ECONNREFUSED 127.0.0.1:80');
  });

  it('rejects bodies that are not a list of rows', async () => {
    for (const body of [{ rows: [] }, [1, 2], 'plain text']) {
      const error = await captureError(clientFor(respondWith(body)).query('SELECT pl_name FROM pscomppars'));
      expect(error.kind).toBe('malformed_response');
    }
  });

  describe('extractServiceMessage', () => {
    it('falls back to the trimmed body text', () => {
      expect(extractServiceMessage('  Service unavailable \n')).toBe('Service unavailable');
    });

    it('reads a message property from JSON bodies', () => {
      expect(extractServiceMessage({ message: 'bad query' })).toBe('bad query');
    });

    it('returns null when there is nothing to read', () => {
      expect(extractServiceMessage('')).toBeNull();
      expect(extractServiceMessage(undefined)).toBeNull();
    });
  });
});
