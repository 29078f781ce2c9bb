/**
 * Description-based classification of ledger lines.
 *
 * Brokerage exports carry no machine-readable transaction type; the kind of
 * each line is recovered from its free-text description with ordered regex
 * lists. Patterns are case-insensitive unless they carry inline flags.
 */

import type { CashEventKind } from './models.js';

export type ClassifiedKind = Exclude<CashEventKind, 'other'>;

/** Regex sources per kind, as written in configuration. */
export type ClassificationPatterns = Record<ClassifiedKind, string[]>;

/** Evaluation order: the first kind whose patterns match wins. */
export const CLASSIFICATION_ORDER: readonly ClassifiedKind[] = [
  'deposit',
  'dividend',
  'tax',
  'fee',
  'interest',
  'fx',
  'transfer',
  'trade',
];

export const DEFAULT_CLASSIFICATION: ClassificationPatterns = {
  deposit: ['deposit', 'storting', 'withdrawal', 'terugstorting'],
  dividend: ['dividend'],
  tax: ['belasting', '\\btax\\b'],
  fee: ['kosten', 'costs', '\\bfee'],
  interest: ['interest', '\\brente\\b'],
  fx: ['valuta', 'currency'],
  transfer: ['overboeking', 'cash sweep', 'transfer'],
  trade: ['^(koop|verkoop|buy|sell)\\b'],
};

/** Verbs that mark a trade line as a sale. */
export const DEFAULT_SELL_PATTERN = '^(verkoop|sell)\\b';

export type Classifier = (description: string) => CashEventKind;

/**
 * Compile one configured pattern.
 *
 * Leading inline flags such as `(?s)` are accepted; `i` is always applied.
 *
 * @throws {Error} naming `label` when the pattern is not a valid regex.
 */
export function compilePattern(label: string, pattern: string): RegExp {
  const trimmed = pattern.trim();
  let source = trimmed;
  const flags = new Set<string>(['i']);
  while (true) {
    const match = source.match(/^\(\?([a-z]+)\)/);
    if (match === null) break;

    for (const flag of match[1]) {
      if (flag !== 'i' && flag !== 'm' && flag !== 's') {
        throw new Error(`Invalid ${label} regex: ${trimmed} (unsupported inline flag '${flag}')`);
      }
      flags.add(flag);
    }
    source = source.slice(match[0].length);
  }

  try {
    return new RegExp(source, [...flags].sort().join(''));
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid ${label} regex: ${trimmed} (${msg})`);
  }
}

/** Compile a list of patterns into a single matcher; an empty list never matches. */
export function compilePatternList(label: string, patterns: readonly string[]): (text: string) => boolean {
  const compiled = patterns
    .filter((p) => p.trim() !== '')
    .map((p, i) => compilePattern(`${label}[${String(i)}]`, p));
  return (text) => compiled.some((re) => re.test(text));
}

export function compileClassifier(patterns: ClassificationPatterns = DEFAULT_CLASSIFICATION): Classifier {
  const matchers = CLASSIFICATION_ORDER.map(
    (kind) => [kind, compilePatternList(`classification.${kind}`, patterns[kind])] as const,
  );
  return (description) => {
    const text = description.trim();
    for (const [kind, matches] of matchers) {
      if (matches(text)) {
        return kind;
      }
    }
    return 'other';
  };
}

const defaultClassifier = compileClassifier();

/** Classify with the default patterns. */
export function classifyDescription(description: string): CashEventKind {
  return defaultClassifier(description);
}
