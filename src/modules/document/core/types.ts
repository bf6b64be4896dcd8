/**
 * Document module types.
 *
 * Read-only views over a parsed filing page. None of them expose the
 * underlying markup nodes.
 */

/**
 * A `<label>` element and the value resolved from its enclosing container.
 */
export interface LabelEntry {
  /** Cleaned label text, as displayed */
  readonly text: string;
  /** Label text without a trailing colon; the key used by field maps */
  readonly key: string;
  /** Value of the `for` attribute, '' when absent */
  readonly htmlFor: string;
  /**
   * Container text minus the label text.
   * null when the label has no enclosing container.
   */
  readonly value: string | null;
}

/**
 * A labeled cell inside a `<fieldset>`.
 */
export interface FieldsetCell {
  /** Cleaned text of the fieldset's legend, '' when it has none */
  readonly legend: string;
  readonly label: string;
  readonly value: string;
}

/**
 * Two adjacent grid columns read as a label/value pair.
 */
export interface ColumnPair {
  readonly label: string;
  readonly value: string;
}

/**
 * One table cell.
 */
export interface TableCell {
  readonly text: string;
  /** Whether the cell contains an element matching the selector. */
  contains(selector: string): boolean;
}

export type TableRow = readonly TableCell[];

/**
 * A table located by a query.
 */
export interface TableView {
  /** Cleaned text of the table header */
  readonly headerText: string;
  /** Body rows, each as its list of data cells */
  readonly rows: readonly TableRow[];
}

/**
 * Options for locating a table by header keyword.
 */
export interface TableQuery {
  /** CSS selector the table must match. Defaults to `table.dis-table`. */
  selector?: string;
  /** Header text that disqualifies a table. */
  exclude?: string;
}

/**
 * Marker patterns for splitting a page into repeating blocks.
 */
export interface SegmentSpec {
  /** Bold marker texts that open a new block */
  readonly start: readonly RegExp[];
  /** Bold marker texts that close the current block without opening one */
  readonly boundary?: readonly RegExp[];
}

/**
 * A bold section marker and the labels that follow it up to the next
 * marker (or the end of the document).
 */
export interface MarkerSegment {
  readonly marker: string;
  /** 0-based position of the marker among all opening markers */
  readonly index: number;
  readonly labels: readonly LabelEntry[];
}
