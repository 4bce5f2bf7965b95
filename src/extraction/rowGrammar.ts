/**
 * Detail Row Grammar
 *
 * A table line is a detail row only when the whole normalized line reads:
 *
 *   EVENT_CODE  description…  SVC  U  qty  rate  charge  tax  total
 *
 * The line is split into space-separated tokens. The event code is the first
 * token and the seven trailing fields are the last seven tokens; whatever
 * sits in between is the description. Fields are consumed in order so a
 * rejected line reports the first field that broke the grammar.
 */

import { normalizeText } from './normalizeText';
import { DEFAULT_PATTERNS, type PatternLibrary } from './patterns';
import type { LineClass, RowField, RowFields, RowMatch, RowMatchFailure } from './types';

/** Fields that follow the description, in line order */
const TAIL_FIELDS = [
  'serviceCode',
  'uom',
  'quantityAmount',
  'rate',
  'charge',
  'taxAmount',
  'totalCharge',
] as const satisfies readonly RowField[];

type TailField = (typeof TAIL_FIELDS)[number];

/** Event code + at least one description token + the tail */
const MIN_TOKENS = 2 + TAIL_FIELDS.length;

function fail(reason: string, field?: RowField): RowMatch {
  const failure: RowMatchFailure = field ? { field, reason } : { reason };
  return { matched: false, failure };
}

function ruleFor(field: TailField, patterns: PatternLibrary): RegExp {
  switch (field) {
    case 'serviceCode':
      return patterns.row.serviceCode;
    case 'uom':
      return patterns.row.uom;
    default:
      return patterns.row.amount;
  }
}

/**
 * Splits a line into tokens after normalization. An empty line has no tokens.
 */
export function tokenizeLine(line: string): string[] {
  const normalized = normalizeText(line);
  return normalized === '' ? [] : normalized.split(' ');
}

/**
 * Applies the detail row grammar to a whole line.
 *
 * @example
 * matchDetailRow('EVT1 Network Access Fee SVC A 10 2.50 25.00 1.25 26.25')
 * // Returns: { matched: true, fields: { eventCode: 'EVT1', description: 'Network Access Fee', ... } }
 */
export function matchDetailRow(line: string, patterns: PatternLibrary = DEFAULT_PATTERNS): RowMatch {
  const tokens = tokenizeLine(line);

  if (tokens.length < MIN_TOKENS) {
    return fail(`expected at least ${MIN_TOKENS} tokens, found ${tokens.length}`);
  }

  const [eventCode] = tokens;
  if (!patterns.row.eventCode.test(eventCode)) {
    return fail(`"${eventCode}" is not an upper-case alphanumeric code`, 'eventCode');
  }

  const tailStart = tokens.length - TAIL_FIELDS.length;
  const tail = tokens.slice(tailStart);

  for (const [offset, field] of TAIL_FIELDS.entries()) {
    if (!ruleFor(field, patterns).test(tail[offset])) {
      return fail(`"${tail[offset]}" does not match ${field}`, field);
    }
  }

  const [serviceCode, uom, quantityAmount, rate, charge, taxAmount, totalCharge] = tail;

  const fields: RowFields = {
    eventCode,
    description: tokens.slice(1, tailStart).join(' '),
    serviceCode,
    uom,
    quantityAmount,
    rate,
    charge,
    taxAmount,
    totalCharge,
  };

  return { matched: true, fields };
}

/**
 * A subtotal line holds a single amount and nothing else.
 */
export function isSubtotalLine(line: string, patterns: PatternLibrary = DEFAULT_PATTERNS): boolean {
  return patterns.subtotalLine.test(normalizeText(line));
}

/**
 * A header banner contains every signature phrase of the table header.
 */
export function isHeaderBanner(line: string, patterns: PatternLibrary = DEFAULT_PATTERNS): boolean {
  const normalized = normalizeText(line);
  return patterns.headerSignature.every((phrase) => normalized.includes(phrase));
}

/**
 * Classifies a line. Header and subtotal checks run before the row grammar,
 * so neither can ever surface as a detail row.
 */
export function classifyLine(
  line: string,
  patterns: PatternLibrary = DEFAULT_PATTERNS
): { lineClass: LineClass; match: RowMatch } {
  if (isHeaderBanner(line, patterns)) {
    return { lineClass: 'header', match: fail('header banner') };
  }

  if (isSubtotalLine(line, patterns)) {
    return { lineClass: 'subtotal', match: fail('subtotal line') };
  }

  const match = matchDetailRow(line, patterns);
  return { lineClass: match.matched ? 'detail' : 'noise', match };
}

/**
 * Parses a locale-formatted amount ("1,234.56"). Text that still fails to
 * parse after dropping commas yields 0 and `degraded: true`.
 *
 * @example
 * parseAmount('1,234.50') // Returns: { value: 1234.5, degraded: false }
 * parseAmount(',')        // Returns: { value: 0, degraded: true }
 */
export function parseAmount(text: string): { value: number; degraded: boolean } {
  const cleaned = text.replace(/,/g, '').trim();
  const value = cleaned === '' ? Number.NaN : Number(cleaned);

  if (!Number.isFinite(value)) {
    return { value: 0, degraded: true };
  }

  return { value, degraded: false };
}
