/**
 * TAP Client Adapter
 *
 * Submits ADQL to the synchronous endpoint of a TAP service and returns the
 * result rows. One attempt per query: no retries, no caching, so every call
 * reflects the archive as it is right now.
 */

import axios, { AxiosError, type AxiosInstance, type AxiosRequestConfig } from 'axios';
import { config } from '../config.js';
import { ServiceError } from '../errors.js';
import { TapTraceLogger } from './trace-logger.js';

/** One result row, keyed by column name */
export type TapRow = Record<string, unknown>;

/**
 * Anything that can run an ADQL query. Tool handlers depend on this, not on
 * the HTTP client, so tests can stand in for the archive.
 */
export interface TapQueryExecutor {
  query(adql: string): Promise<TapRow[]>;
}

export interface TapClientOptions {
  /** Service base URL (default: config.tap.url) */
  baseUrl?: string;
  /** Request timeout in ms (default: config.tap.timeoutMs) */
  timeoutMs?: number;
  /** Custom axios adapter, used to answer requests in-process */
  adapter?: AxiosRequestConfig['adapter'];
  trace?: TapTraceLogger;
}

const ERROR_INFO_PATTERN = /<INFO[^>]*value="ERROR"[^>]*>([\s\S]*?)<\/INFO>/i;
const MAX_ERROR_TEXT = 300;

function isRow(value: unknown): value is TapRow {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Pull the service's own error text out of a response body (VOTable or plain text).
 */
export function extractServiceMessage(body: unknown): string | null {
  if (typeof body === 'string') {
    const info = body.match(ERROR_INFO_PATTERN);
    if (info) return info[1].trim();
    const text = body.trim();
    return text ? text.slice(0, MAX_ERROR_TEXT) : null;
  }
  if (isRow(body) && typeof body.message === 'string') {
    return body.message;
  }
  return null;
}

export class TapClient implements TapQueryExecutor {
  private readonly http: AxiosInstance;
  private readonly trace: TapTraceLogger;

  constructor(options: TapClientOptions = {}) {
    this.http = axios.create({
      baseURL: options.baseUrl ?? config.tap.url,
      timeout: options.timeoutMs ?? config.tap.timeoutMs,
      adapter: options.adapter,
    });
    this.trace = options.trace ?? new TapTraceLogger('tap');
  }

  /**
   * Run a query and return its rows. An empty array is a successful query
   * with no matches, not a failure.
   */
  async query(adql: string): Promise<TapRow[]> {
    this.trace.logQuery(adql);
    const started = Date.now();

    let body: unknown;
    try {
      const response = await this.http.get<unknown>('/sync', {
        params: {
          REQUEST: 'doQuery',
          LANG: 'ADQL',
          FORMAT: 'json',
          QUERY: adql,
        },
      });
      body = response.data;
    } catch (error) {
      const serviceError = this.toServiceError(error);
      this.trace.logError(serviceError);
      throw serviceError;
    }

    const rows = this.parseRows(body);
    this.trace.logRows(rows.length, Date.now() - started);
    return rows;
  }

  close(): void {
    this.trace.close();
  }

  private parseRows(body: unknown): TapRow[] {
    if (Array.isArray(body)) {
      const rows = body.filter(isRow);
      if (rows.length === body.length) return rows;
    } else if (typeof body === 'string' && ERROR_INFO_PATTERN.test(body)) {
      // Some query errors come back as a VOTable with HTTP 200
      const error = new ServiceError('rejected', `TAP service rejected the query: ${extractServiceMessage(body)}`);
      this.trace.logError(error);
      throw error;
    }

    const error = new ServiceError('malformed_response', 'TAP service returned a body that is not a list of rows');
    this.trace.logError(error);
    throw error;
  }

  private toServiceError(error: unknown): ServiceError {
    if (!axios.isAxiosError(error)) {
      return new ServiceError('unreachable', error instanceof Error ? error.message : String(error));
    }

    if (error.code === AxiosError.ECONNABORTED || error.code === AxiosError.ETIMEDOUT) {
      return new ServiceError('timeout', `TAP query timed out after ${this.http.defaults.timeout}ms`);
    }

    if (error.response) {
      const status = error.response.status;
      const detail = extractServiceMessage(error.response.data) ?? error.message;
      return new ServiceError('rejected', `TAP service rejected the query (HTTP ${status}): ${detail}`, status);
    }

    return new ServiceError('unreachable', `TAP service unreachable: ${error.message}`);
  }
}
