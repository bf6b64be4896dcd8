/**
 * Data-driven field mapping.
 *
 * A rule table maps label patterns to named fields. Every filing type uses
 * the same engine with its own table, in place of per-parser if/else chains.
 */

import { FieldMap } from './field-map.js';

/**
 * How a label is recognised.
 * - 'exact': the label key equals the text
 * - 'contains': the label key contains the text
 * - 'for': the label's `for` attribute equals the id
 */
export type LabelMatcher =
  | { readonly kind: 'exact'; readonly text: string }
  | { readonly kind: 'contains'; readonly text: string }
  | { readonly kind: 'for'; readonly id: string };

export const exact = (text: string): LabelMatcher => ({ kind: 'exact', text });
export const contains = (text: string): LabelMatcher => ({ kind: 'contains', text });
export const forAttr = (id: string): LabelMatcher => ({ kind: 'for', id });

/**
 * Maps any of the matchers to the target field.
 */
export interface FieldRule<F extends string> {
  readonly field: F;
  readonly match: readonly LabelMatcher[];
}

/**
 * The parts of a label a rule can look at.
 */
export interface LabeledValue {
  readonly key: string;
  readonly htmlFor: string;
  readonly value: string | null;
}

export type PromotedFields<F extends string> = Partial<Record<F, string>>;

export const matchesLabel = (matcher: LabelMatcher, label: LabeledValue): boolean => {
  switch (matcher.kind) {
    case 'exact':
      return label.key === matcher.text;
    case 'contains':
      return label.key.includes(matcher.text);
    case 'for':
      return label.htmlFor === matcher.id;
  }
};

/**
 * Promotes label values into named fields.
 *
 * Labels are visited in document order. Each label goes to the first rule,
 * in table order, that matches it and whose field is still unclaimed; a
 * claimed field keeps its first value.
 */
export const promoteFields = <F extends string>(
  labels: Iterable<LabeledValue>,
  rules: readonly FieldRule<F>[]
): PromotedFields<F> => {
  const claimed = new FieldMap();

  for (const label of labels) {
    if (label.value === null || label.value === '') continue;

    const rule = rules.find(
      (candidate) =>
        !claimed.has(candidate.field) &&
        candidate.match.some((matcher) => matchesLabel(matcher, label))
    );

    if (rule !== undefined) {
      claimed.setIfAbsent(rule.field, label.value);
    }
  }

  const promoted: PromotedFields<F> = {};
  for (const rule of rules) {
    const value = claimed.get(rule.field);
    if (value !== undefined) {
      promoted[rule.field] = value;
    }
  }
  return promoted;
};
