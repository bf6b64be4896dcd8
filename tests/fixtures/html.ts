/**
 * Saved filing pages used by the extraction tests.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

export type HtmlFixture =
  | 'disclosure-report'
  | 'lobbyist-report'
  | 'entity-registration'
  | 'lobbyist-registration';

export const loadHtmlFixture = (name: HtmlFixture): string =>
  readFileSync(new URL(`./html/${name}.html`, import.meta.url), 'utf8');

/** Directory holding the saved pages */
export const HTML_FIXTURE_DIR = fileURLToPath(new URL('./html/', import.meta.url));

export const htmlFixturePath = (name: HtmlFixture): string =>
  fileURLToPath(new URL(`./html/${name}.html`, import.meta.url));
