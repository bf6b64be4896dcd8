/**
 * Import Filing Use Case
 *
 * Fetches one filing page, extracts it and hands the record to the sink.
 * No retries and no crawling; the caller decides what to import and when.
 */

import { err, ok, type Result } from 'neverthrow';

import {
  countRecords,
  extractFiling,
  unparsedDates,
  type Filing,
  type FilingKind,
} from '@/modules/extraction/index.js';

import type { ImportFilingError } from '../errors.js';
import type { FilingSink, FilingSource } from '../ports.js';
import type { Logger } from 'pino';

export interface ImportFilingDeps {
  source: FilingSource;
  sink: FilingSink;
  logger: Logger;
}

export interface ImportFilingInput {
  kind: FilingKind;
  url: string;
  /** Report or entity id, when the URL does not end with it */
  id?: string;
}

export type ImportFilingOutcome =
  | { status: 'imported'; filing: Filing }
  | { status: 'not_found'; url: string };

export const importFiling = async (
  deps: ImportFilingDeps,
  input: ImportFilingInput
): Promise<Result<ImportFilingOutcome, ImportFilingError>> => {
  const { source, sink, logger } = deps;
  const log = logger.child({ usecase: 'importFiling', kind: input.kind, url: input.url });

  const fetched = await source.fetch(input.url);
  if (fetched.isErr()) {
    log.warn({ error: fetched.error }, 'Failed to fetch filing');
    return err(fetched.error);
  }

  const html = fetched.value;
  if (html === null) {
    log.info('Filing does not exist');
    return ok({ status: 'not_found', url: input.url });
  }

  const extracted = extractFiling({
    kind: input.kind,
    html,
    sourceUrl: input.url,
    ...(input.id !== undefined && { id: input.id }),
  });
  if (extracted.isErr()) {
    log.error({ error: extracted.error }, 'Failed to parse filing page');
    return err(extracted.error);
  }

  const filing = extracted.value;
  const unparsed = unparsedDates(filing);
  if (unparsed.length > 0) {
    log.warn({ dates: unparsed }, 'Some dates could not be parsed');
  }

  const saved = await sink.save(filing);
  if (saved.isErr()) {
    log.error({ error: saved.error }, 'Failed to save filing');
    return err(saved.error);
  }

  log.info({ records: countRecords(filing) }, 'Filing imported');
  return ok({ status: 'imported', filing });
};
