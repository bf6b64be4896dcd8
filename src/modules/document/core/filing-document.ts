/**
 * Filing Document
 *
 * Typed query interface over one parsed filing page. Extraction code asks
 * for labels, tables and marker-delimited blocks instead of walking the
 * markup tree itself.
 *
 * A FilingDocument is immutable once parsed. Its caches belong to the
 * instance, so concurrent extractions over different documents share nothing.
 */

import * as cheerio from 'cheerio';
import { err, ok, type Result } from 'neverthrow';

import { errorMessage } from '@/common/types/errors.js';

import {
  createEmptyDocumentError,
  createUnparseableDocumentError,
  type DocumentParseError,
} from './errors.js';
import { cleanText, labelKey, valueAfterLabel } from './text.js';

import type {
  ColumnPair,
  FieldsetCell,
  LabelEntry,
  MarkerSegment,
  SegmentSpec,
  TableCell,
  TableQuery,
  TableRow,
  TableView,
} from './types.js';
import type { CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';

const DEFAULT_TABLE_SELECTOR = 'table.dis-table';
const HEADING_TAGS = new Set(['h1', 'h2', 'h3', 'h4', 'h5', 'h6']);
const BOLD_TAGS = new Set(['b', 'strong']);
const BOLD_STYLE_RE = /font-weight\s*:\s*(bold|bolder|[6-9]00)/i;
const GRID_COLUMN_RE = /\bcol-md-\d/;

export class FilingDocument {
  private readonly labelEntries = new Map<Element, LabelEntry>();

  private constructor(private readonly $: CheerioAPI) {}

  /**
   * Parses raw HTML into a document.
   *
   * Fails only when there is nothing to parse; malformed markup is repaired
   * by the parser the way a browser would.
   */
  static parse(html: string): Result<FilingDocument, DocumentParseError> {
    if (html.trim() === '') {
      return err(createEmptyDocumentError());
    }

    let $: CheerioAPI;
    try {
      $ = cheerio.load(html);
    } catch (error) {
      return err(createUnparseableDocumentError(errorMessage(error), error));
    }

    if ($('body *').length === 0 && $('title').length === 0) {
      return err(createUnparseableDocumentError('Document contains no markup elements'));
    }

    // Line breaks separate words in rendered text
    $('br').replaceWith(' ');

    return ok(new FilingDocument($));
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Labels
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Cleaned text of the `<title>` element, '' when absent.
   */
  title(): string {
    return cleanText(this.$('title').first().text());
  }

  /**
   * Every `<label>` in document order with its resolved value.
   */
  labels(): LabelEntry[] {
    return this.$('label')
      .toArray()
      .map((el) => this.labelEntry(el));
  }

  /**
   * First non-empty value of the label with the given text.
   */
  valueFor(label: string): string | null {
    const key = labelKey(label);
    for (const entry of this.labels()) {
      if (entry.key === key && entry.value !== null && entry.value !== '') {
        return entry.value;
      }
    }
    return null;
  }

  /**
   * Cleaned text of every `<legend>`, in document order.
   */
  legends(): string[] {
    return this.$('legend')
      .toArray()
      .map((el) => cleanText(this.$(el).text()))
      .filter((text) => text !== '');
  }

  /**
   * Labeled `div.dis-cell` cells of every fieldset, tagged with the
   * fieldset legend.
   */
  fieldsetCells(): FieldsetCell[] {
    const cells: FieldsetCell[] = [];

    for (const fieldset of this.$('fieldset').toArray()) {
      const $fieldset = this.$(fieldset);
      const legend = cleanText($fieldset.find('legend').first().text());

      for (const cell of $fieldset.find('div.dis-cell').toArray()) {
        const $label = this.$(cell).find('label').first();
        if ($label.length === 0) continue;

        const labelText = cleanText($label.text());
        cells.push({
          legend,
          label: labelKey(labelText),
          value: valueAfterLabel(this.$(cell).text(), labelText),
        });
      }
    }

    return cells;
  }

  /**
   * Grid rows (`div.row`) read as consecutive label/value column pairs.
   */
  columnPairs(): ColumnPair[] {
    const pairs: ColumnPair[] = [];

    for (const row of this.$('div.row').toArray()) {
      const columns = this.$(row)
        .find('div')
        .toArray()
        .filter((el) => GRID_COLUMN_RE.test(this.$(el).attr('class') ?? ''))
        .map((el) => cleanText(this.$(el).text()));

      for (let i = 0; i + 1 < columns.length; i += 2) {
        const label = columns[i];
        const value = columns[i + 1];
        if (label === undefined || value === undefined) continue;
        pairs.push({ label: labelKey(label), value });
      }
    }

    return pairs;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Tables
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * First table whose header mentions the keyword.
   */
  tableByHeaderKeyword(keyword: string, query: TableQuery = {}): TableView | null {
    return this.tablesByHeaderKeyword(keyword, query)[0] ?? null;
  }

  /**
   * Every table whose header mentions the keyword (and not the excluded
   * text), in document order. Tables without a `<thead>` never match.
   */
  tablesByHeaderKeyword(keyword: string, query: TableQuery = {}): TableView[] {
    const selector = query.selector ?? DEFAULT_TABLE_SELECTOR;
    const views: TableView[] = [];

    for (const table of this.$(selector).toArray()) {
      const $thead = this.$(table).children('thead').first();
      if ($thead.length === 0) continue;

      const headerText = cleanText($thead.text());
      if (!headerText.includes(keyword)) continue;
      if (query.exclude !== undefined && headerText.includes(query.exclude)) continue;

      const rows = this.$(table)
        .children('tbody')
        .children('tr')
        .toArray()
        .map((tr) => this.rowCells(tr));

      views.push({ headerText, rows });
    }

    return views;
  }

  /**
   * Rows of the first table that follows the first heading matching the
   * pattern. null when either is missing.
   */
  tableAfterHeading(pattern: RegExp): TableRow[] | null {
    let headingSeen = false;

    for (const el of this.$('body *').toArray()) {
      if (!headingSeen) {
        headingSeen = HEADING_TAGS.has(el.name) && pattern.test(cleanText(this.$(el).text()));
        continue;
      }

      if (el.name === 'table') {
        return this.$(el)
          .find('tr')
          .toArray()
          .map((tr) => this.rowCells(tr))
          .filter((row) => row.length > 0);
      }
    }

    return null;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Repeating blocks
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Splits the document into blocks opened by bold markers.
   *
   * Single forward pass: each opening marker collects the labels that follow
   * it until the next opening or boundary marker. The returned iterable is
   * lazy and can be iterated again from the start.
   */
  segments(markers: SegmentSpec): Iterable<MarkerSegment> {
    return {
      [Symbol.iterator]: () => this.scanSegments(markers),
    };
  }

  private *scanSegments(markers: SegmentSpec): Generator<MarkerSegment, void, undefined> {
    const boundary = markers.boundary ?? [];
    let current: { marker: string; index: number; labels: LabelEntry[] } | null = null;
    let lastMarker: Element | null = null;
    let opened = 0;

    for (const el of this.$('body *').toArray()) {
      const insideMarker = lastMarker !== null && this.$.contains(lastMarker, el);

      if (!insideMarker && this.isBold(el)) {
        const text = cleanText(this.$(el).text());

        if (markers.start.some((pattern) => pattern.test(text))) {
          if (current !== null) yield current;
          current = { marker: text, index: opened, labels: [] };
          opened += 1;
          lastMarker = el;
          continue;
        }

        if (boundary.some((pattern) => pattern.test(text))) {
          if (current !== null) yield current;
          current = null;
          lastMarker = el;
          continue;
        }
      }

      if (current !== null && el.name === 'label') {
        current.labels.push(this.labelEntry(el));
      }
    }

    if (current !== null) yield current;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Helpers
  // ───────────────────────────────────────────────────────────────────────────

  private labelEntry(el: Element): LabelEntry {
    const cached = this.labelEntries.get(el);
    if (cached !== undefined) return cached;

    const $label = this.$(el);
    const text = cleanText($label.text());
    const $container = $label.closest('div');

    const entry: LabelEntry = {
      text,
      key: labelKey(text),
      htmlFor: $label.attr('for') ?? '',
      value: $container.length > 0 ? valueAfterLabel($container.text(), text) : null,
    };

    this.labelEntries.set(el, entry);
    return entry;
  }

  private rowCells(tr: Element): TableCell[] {
    return this.$(tr)
      .children('td')
      .toArray()
      .map((td) => {
        const $td = this.$(td);
        return {
          text: cleanText($td.text()),
          contains: (selector: string) => $td.find(selector).length > 0,
        };
      });
  }

  private isBold(el: Element): boolean {
    if (BOLD_TAGS.has(el.name)) return true;
    return BOLD_STYLE_RE.test(this.$(el).attr('style') ?? '');
  }
}
