/**
 * Label/Value Extractor
 *
 * Walks every label of a document and records its resolved value first-wins.
 * A label without an enclosing container contributes nothing. Named fields
 * are promoted separately with `promoteFields` and a rule table.
 */

import { FieldMap } from './field-map.js';

import type { FilingDocument, LabelEntry } from '@/modules/document/index.js';

export interface LabelValues {
  /** Every label value keyed by label text, first occurrence kept */
  fields: FieldMap;
  /** The labels the map was built from, in document order */
  labels: readonly LabelEntry[];
}

export const collectLabelFields = (labels: Iterable<LabelEntry>): FieldMap => {
  const fields = new FieldMap();
  for (const label of labels) {
    if (label.value !== null) {
      fields.setIfAbsent(label.key, label.value);
    }
  }
  return fields;
};

export const extractLabelValues = (doc: FilingDocument): LabelValues => {
  const labels = doc.labels();
  return { fields: collectLabelFields(labels), labels };
};
