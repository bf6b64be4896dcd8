/**
 * Domain errors for the Document module.
 *
 * Parsing is the only step of extraction that can fail; everything after it
 * degrades to empty values.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Domain Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * The raw input was empty or whitespace only.
 */
export interface EmptyDocumentError {
  readonly type: 'EmptyDocument';
  readonly message: string;
}

/**
 * The raw input could not be turned into a markup tree.
 */
export interface UnparseableDocumentError {
  readonly type: 'UnparseableDocument';
  readonly message: string;
  readonly cause?: unknown;
}

/**
 * All possible document parsing errors.
 */
export type DocumentParseError = EmptyDocumentError | UnparseableDocumentError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createEmptyDocumentError = (): EmptyDocumentError => ({
  type: 'EmptyDocument',
  message: 'Document is empty',
});

export const createUnparseableDocumentError = (
  message: string,
  cause?: unknown
): UnparseableDocumentError => ({
  type: 'UnparseableDocument',
  message,
  ...(cause !== undefined && { cause }),
});
