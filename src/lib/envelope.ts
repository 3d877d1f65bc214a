/**
 * Response Formatter
 *
 * Every tool answers with one JSON envelope:
 * - success: `{ status, count, data, failures? }`
 * - empty:   the query ran and matched nothing
 * - error:   `{ status, errorType, message }`
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { ValidationError, errorCodeOf, errorMessageOf, type ErrorCode } from '../errors.js';
import type { BatchResult, RecordFailure } from '../metrics/batch.js';

export interface SuccessEnvelope<T> {
  status: 'success';
  count: number;
  data: T[];
  /** Records of a batch that could not be computed */
  failures?: RecordFailure[];
}

export interface EmptyEnvelope {
  status: 'empty';
  count: 0;
  data: [];
  message: string;
}

export interface ErrorEnvelope {
  status: 'error';
  errorType: ErrorCode;
  message: string;
  /** Offending parameter, for validation errors */
  field?: string;
  failures?: RecordFailure[];
}

export type ResponseEnvelope<T> = SuccessEnvelope<T> | EmptyEnvelope | ErrorEnvelope;

export function successEnvelope<T>(data: T[], failures: RecordFailure[] = []): SuccessEnvelope<T> {
  return failures.length > 0
    ? { status: 'success', count: data.length, data, failures }
    : { status: 'success', count: data.length, data };
}

export function emptyEnvelope(message: string): EmptyEnvelope {
  return { status: 'empty', count: 0, data: [], message };
}

/**
 * Success when there is at least one row, empty otherwise.
 */
export function rowsEnvelope<T>(data: T[], emptyMessage: string): SuccessEnvelope<T> | EmptyEnvelope {
  return data.length > 0 ? successEnvelope(data) : emptyEnvelope(emptyMessage);
}

/**
 * Wrap a failure. Only the message is carried over.
 *
 * @param prefix Prepended to the message (tool name in debug mode)
 */
export function errorEnvelope(error: unknown, prefix?: string): ErrorEnvelope {
  const message = errorMessageOf(error);
  const envelope: ErrorEnvelope = {
    status: 'error',
    errorType: errorCodeOf(error),
    message: prefix ? `${prefix}: ${message}` : message,
  };
  if (error instanceof ValidationError) envelope.field = error.field;
  return envelope;
}

/**
 * Batch outcome: partial failures ride along with the successes. When nothing
 * could be computed the whole call is an error listing every failure.
 */
export function batchEnvelope<T>(result: BatchResult<T>): SuccessEnvelope<T> | ErrorEnvelope {
  if (result.data.length === 0 && result.failures.length > 0) {
    return {
      status: 'error',
      errorType: result.failures[0].errorType,
      message: result.failures.map(failure => failure.message).join('; '),
      failures: result.failures,
    };
  }
  return successEnvelope(result.data, result.failures);
}

/**
 * MCP form of an envelope: pretty JSON as text content.
 */
export function toToolResult<T>(envelope: ResponseEnvelope<T>): CallToolResult {
  const content = [{ type: 'text' as const, text: JSON.stringify(envelope, null, 2) }];
  return envelope.status === 'error' ? { content, isError: true } : { content };
}
