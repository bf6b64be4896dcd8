/**
 * Collaborators of the import use case. The extraction core never performs
 * I/O; fetching and storage happen behind these ports.
 */

import type { FilingSinkError, FilingSourceError } from './errors.js';
import type { Filing } from '@/modules/extraction/index.js';
import type { Result } from 'neverthrow';

export interface FilingSource {
  /**
   * Raw HTML of the filing page.
   * Resolves to ok(null) when the filing does not exist.
   */
  fetch(url: string): Promise<Result<string | null, FilingSourceError>>;
}

export interface FilingSink {
  save(filing: Filing): Promise<Result<void, FilingSinkError>>;
}
