/**
 * Filing source over saved pages on disk. The "URL" is a file path; a
 * missing file means the filing does not exist.
 */

import { readFile } from 'node:fs/promises';

import { err, ok } from 'neverthrow';

import { createFileReadError } from '../../core/errors.js';

import type { FilingSource } from '../../core/ports.js';

const isMissingFile = (error: unknown): boolean =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';

export const makeFileFilingSource = (): FilingSource => ({
  async fetch(path) {
    try {
      return ok(await readFile(path, 'utf8'));
    } catch (error) {
      if (isMissingFile(error)) {
        return ok(null);
      }
      return err(createFileReadError(path, error));
    }
  },
});
