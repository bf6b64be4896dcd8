/**
 * Text normalization shared by every query on a filing document.
 */

const WHITESPACE_RE = /\s+/g;
const TRAILING_COLON_RE = /\s*:+\s*$/;
const LEADING_COLON_RE = /^:+\s*/;

/**
 * Collapses runs of whitespace (including non-breaking spaces) and trims.
 */
export const cleanText = (text: string | null | undefined): string => {
  if (text == null) return '';
  return text.replace(WHITESPACE_RE, ' ').trim();
};

/**
 * Canonical key for a label: its cleaned text without a trailing colon.
 *
 * @example labelKey('Begin Date:') // 'Begin Date'
 */
export const labelKey = (labelText: string): string =>
  cleanText(labelText).replace(TRAILING_COLON_RE, '');

/**
 * Resolves the value of a label from the text of its container.
 *
 * The label text is removed from the front of the container text when it is
 * there; otherwise the whole container text is the value.
 */
export const valueAfterLabel = (containerText: string, labelText: string): string => {
  const full = cleanText(containerText);
  const label = cleanText(labelText);

  if (label === '' || !full.startsWith(label)) {
    return full;
  }

  return full.slice(label.length).trim().replace(LEADING_COLON_RE, '');
};
