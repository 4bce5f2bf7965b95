/**
 * Pattern Library for the Invoice Extraction Engine
 *
 * Every rule the extractors apply, compiled once and frozen. Components take
 * a `PatternLibrary` argument that defaults to `DEFAULT_PATTERNS`, so tests
 * and callers can supply their own without touching module state.
 *
 * None of the expressions carry the `g` or `y` flag: they hold no
 * `lastIndex` state and are safe to share.
 */

// ============================================
// Raw building blocks
// ============================================

/** Amount token: optional minus, digit groups with commas, optional fraction */
const AMOUNT_SOURCE = String.raw`-?[\d,]+(?:\.\d+)?`;

export const MONTH_ABBREVIATIONS = [
  'JAN',
  'FEB',
  'MAR',
  'APR',
  'MAY',
  'JUN',
  'JUL',
  'AUG',
  'SEP',
  'OCT',
  'NOV',
  'DEC',
] as const;

export const HEADER_SIGNATURE_PARTS = [
  'Event Service Quantity/ Tax Total',
  'Code Description Code UOM Amount Rate Charge Amount Charge',
] as const;

// ============================================
// Library shape
// ============================================

/**
 * Whole-token rules for the detail row grammar:
 *
 *   eventCode description… serviceCode uom qty rate charge tax total
 */
export interface RowTokenRules {
  readonly eventCode: RegExp;
  readonly serviceCode: RegExp;
  readonly uom: RegExp;
  readonly amount: RegExp;
}

export interface PatternLibrary {
  readonly row: RowTokenRules;
  /** Line made of a single amount token */
  readonly subtotalLine: RegExp;
  /** Both phrases must appear for a line to be a header banner */
  readonly headerSignature: readonly string[];
  /** Labeled invoice number; group 1 holds digits and hyphens */
  readonly invoiceNumberLabeled: RegExp;
  /** Any run of nine or more digits, spaces or hyphens */
  readonly invoiceNumberLoose: RegExp;
  /** Groups: month abbreviation, day, year */
  readonly billingDate: RegExp;
  /** Group 1: currency code */
  readonly currency: RegExp;
  /** Month abbreviation (upper case) → month number 1-12 */
  readonly months: ReadonlyMap<string, number>;
  /** Lower-cased text of the paragraph that anchors metadata search */
  readonly invoiceAnchor: string;
}

/**
 * Builds a fresh, frozen pattern library.
 */
export function createPatternLibrary(): PatternLibrary {
  const row: RowTokenRules = Object.freeze({
    eventCode: /^[A-Z0-9]+$/,
    serviceCode: /^[A-Z0-9]{1,4}$/,
    uom: /^[A-Z]$/,
    amount: new RegExp(`^${AMOUNT_SOURCE}$`),
  });

  const months = new Map<string, number>(
    MONTH_ABBREVIATIONS.map((abbreviation, index) => [abbreviation, index + 1])
  );

  return Object.freeze({
    row,
    subtotalLine: new RegExp(`^${AMOUNT_SOURCE}$`),
    headerSignature: Object.freeze([...HEADER_SIGNATURE_PARTS]),
    invoiceNumberLabeled: /(?:Invoice\s*(?:#|No\.?|Number)?\s*:?\s*)(\d[\d-]{9,})/i,
    invoiceNumberLoose: /(\d[\d\s-]{8,})/,
    billingDate: /Billing\s*Cycle\s*Date\s*:\s*([A-Z]{3})\s+(\d{1,2})\s+(\d{4})/i,
    currency: /Currency\s*:\s*([A-Z]{3})/i,
    months,
    invoiceAnchor: 'invoice',
  });
}

/** Process-wide library, built once at module load */
export const DEFAULT_PATTERNS: PatternLibrary = createPatternLibrary();
