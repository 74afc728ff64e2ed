import type { DonorRecord, DonorValue } from '../types/receipt.js';

export interface SubstitutionOptions {
  now?: Date;
  locale?: string;
  /** Fields whose numeric values are printed with two decimals */
  amountFields?: readonly string[];
}

export interface SubstitutionResult {
  text: string;
  /** Placeholder names still present after substitution, in order of first appearance */
  unresolved: string[];
}

export const DEFAULT_AMOUNT_FIELDS = ['Donation Amount', 'Amount', 'Value of Item'];

const PLACEHOLDER_PATTERN = /\{([^{}\n]+)\}/g;

const NUMERIC_PATTERN = /^-?\d+(?:\.\d+)?$/;

export function buildSystemValues(now: Date, locale = 'en-US'): Record<string, string> {
  const date = now.toLocaleDateString(locale, { year: 'numeric', month: 'long', day: 'numeric' });
  const year = String(now.getFullYear());
  return {
    Date: date,
    'Current Year': year,
    Year: year
  };
}

export function stringifyDonorValue(value: DonorValue): string {
  if (value === null || value === undefined) return '';
  return String(value);
}

function formatValue(key: string, value: DonorValue, amountFields: readonly string[]): string {
  const text = stringifyDonorValue(value).trim();
  if (amountFields.includes(key) && NUMERIC_PATTERN.test(text)) {
    return Number(text).toFixed(2);
  }
  return stringifyDonorValue(value);
}

/**
 * Replaces `{Field}` (and the older `{{Field}}` spelling) with donor and system
 * values. Donor columns override system values of the same name. Values are
 * inserted verbatim and not scanned again, so a value that itself looks like
 * a placeholder stays literal. Unknown names are left in place.
 */
export function substituteVariables(
  template: string,
  record: DonorRecord,
  options: SubstitutionOptions = {}
): SubstitutionResult {
  const amountFields = options.amountFields ?? DEFAULT_AMOUNT_FIELDS;
  const values = new Map<string, string>();

  for (const [key, value] of Object.entries(buildSystemValues(options.now ?? new Date(), options.locale))) {
    values.set(key, value);
  }
  for (const [key, value] of Object.entries(record)) {
    values.set(key, formatValue(key, value, amountFields));
  }

  // Tokenize once so replacement text is never re-matched
  const text = template.replace(/\{\{([^{}\n]+)\}\}|\{([^{}\n]+)\}/g, (match, doubled?: string, single?: string) => {
    const name = doubled ?? single ?? '';
    const value = values.get(name);
    return value === undefined ? match : value;
  });

  return { text, unresolved: findUnresolvedPlaceholders(text) };
}

export function findUnresolvedPlaceholders(text: string): string[] {
  const seen = new Set<string>();
  for (const match of text.matchAll(PLACEHOLDER_PATTERN)) {
    const name = match[1];
    if (name !== undefined && name.trim().length > 0) seen.add(name);
  }
  return [...seen];
}
