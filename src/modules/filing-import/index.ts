// Use case
export {
  importFiling,
  type ImportFilingDeps,
  type ImportFilingInput,
  type ImportFilingOutcome,
} from './core/usecases/import-filing.js';

// Ports
export type { FilingSource, FilingSink } from './core/ports.js';

// Errors
export type {
  FilingSourceError,
  FilingSinkError,
  ImportFilingError,
  NetworkError,
  TimeoutError,
  HttpError,
  FileReadError,
  StorageError,
} from './core/errors.js';
export {
  createNetworkError,
  createTimeoutError,
  createHttpError,
  createFileReadError,
  createStorageError,
} from './core/errors.js';

// Shell
export { makeHttpFilingSource, type HttpFilingSourceConfig } from './shell/http/http-filing-source.js';
export { makeFileFilingSource } from './shell/fs/file-filing-source.js';
