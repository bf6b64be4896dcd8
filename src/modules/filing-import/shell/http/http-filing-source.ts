/**
 * HTTP filing source.
 *
 * Fetches filing pages with the global `fetch`, identifying itself with the
 * configured User-Agent. A 404 means the filing does not exist.
 */

import { err, ok } from 'neverthrow';

import { createChildLogger, type Logger } from '@/infra/logger/index.js';

import {
  createHttpError,
  createNetworkError,
  createTimeoutError,
} from '../../core/errors.js';

import type { FilingSource } from '../../core/ports.js';

export interface HttpFilingSourceConfig {
  /** Client identifier sent as the User-Agent header */
  userAgent: string;
  timeoutMs: number;
  logger: Logger;
  /** Replaces the global fetch, mainly for tests */
  fetchFn?: typeof fetch;
}

const isTimeout = (error: unknown): boolean =>
  typeof error === 'object' &&
  error !== null &&
  'name' in error &&
  (error.name === 'TimeoutError' || error.name === 'AbortError');

// An unread body holds its connection open
const discardBody = async (response: Response, log: Logger): Promise<void> => {
  try {
    await response.body?.cancel();
  } catch (error) {
    log.debug({ err: error }, 'Could not discard response body');
  }
};

export const makeHttpFilingSource = (config: HttpFilingSourceConfig): FilingSource => {
  const { userAgent, timeoutMs } = config;
  const fetchFn = config.fetchFn ?? fetch;
  const log = createChildLogger(config.logger, { component: 'HttpFilingSource' });

  return {
    async fetch(url) {
      log.debug({ url }, 'Fetching filing page');

      let response: Response;
      try {
        response = await fetchFn(url, {
          headers: { 'User-Agent': userAgent, Accept: 'text/html' },
          signal: AbortSignal.timeout(timeoutMs),
        });
      } catch (error) {
        if (isTimeout(error)) {
          log.warn({ url, timeoutMs }, 'Filing request timed out');
          return err(createTimeoutError(url, timeoutMs));
        }
        log.warn({ url, err: error }, 'Filing request failed');
        return err(createNetworkError(url, error));
      }

      if (response.status === 404) {
        await discardBody(response, log);
        log.debug({ url }, 'Filing not found');
        return ok(null);
      }

      if (!response.ok) {
        await discardBody(response, log);
        log.warn({ url, status: response.status }, 'Unexpected HTTP status');
        return err(createHttpError(url, response.status));
      }

      try {
        return ok(await response.text());
      } catch (error) {
        return err(createNetworkError(url, error));
      }
    },
  };
};
