/**
 * Filing import errors.
 */

import type { InfraError } from '@/common/types/errors.js';
import type { DocumentParseError } from '@/modules/document/index.js';

export interface NetworkError extends InfraError {
  readonly type: 'NetworkError';
  readonly url: string;
}

export interface TimeoutError extends InfraError {
  readonly type: 'TimeoutError';
  readonly url: string;
  readonly timeoutMs: number;
}

export interface HttpError extends InfraError {
  readonly type: 'HttpError';
  readonly url: string;
  readonly status: number;
}

export interface FileReadError extends InfraError {
  readonly type: 'FileReadError';
  readonly path: string;
}

export interface StorageError extends InfraError {
  readonly type: 'StorageError';
}

export type FilingSourceError = NetworkError | TimeoutError | HttpError | FileReadError;
export type FilingSinkError = StorageError;
export type ImportFilingError = FilingSourceError | FilingSinkError | DocumentParseError;

export const createNetworkError = (url: string, cause?: unknown): NetworkError => ({
  type: 'NetworkError',
  message: `Request to ${url} failed`,
  url,
  retryable: true,
  ...(cause !== undefined && { cause }),
});

export const createTimeoutError = (url: string, timeoutMs: number): TimeoutError => ({
  type: 'TimeoutError',
  message: `Request to ${url} timed out after ${String(timeoutMs)}ms`,
  url,
  timeoutMs,
  retryable: true,
});

export const createHttpError = (url: string, status: number): HttpError => ({
  type: 'HttpError',
  message: `Request to ${url} returned HTTP ${String(status)}`,
  url,
  status,
  retryable: status >= 500 || status === 429,
});

export const createFileReadError = (path: string, cause?: unknown): FileReadError => ({
  type: 'FileReadError',
  message: `Could not read ${path}`,
  path,
  retryable: false,
  ...(cause !== undefined && { cause }),
});

export const createStorageError = (message: string, cause?: unknown): StorageError => ({
  type: 'StorageError',
  message,
  retryable: false,
  ...(cause !== undefined && { cause }),
});
