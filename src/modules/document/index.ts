// Document accessor
export { FilingDocument } from './core/filing-document.js';

// Text helpers
export { cleanText, labelKey, valueAfterLabel } from './core/text.js';

// Types
export type {
  LabelEntry,
  FieldsetCell,
  ColumnPair,
  TableCell,
  TableRow,
  TableView,
  TableQuery,
  SegmentSpec,
  MarkerSegment,
} from './core/types.js';

// Errors
export type {
  DocumentParseError,
  EmptyDocumentError,
  UnparseableDocumentError,
} from './core/errors.js';
export { createEmptyDocumentError, createUnparseableDocumentError } from './core/errors.js';
