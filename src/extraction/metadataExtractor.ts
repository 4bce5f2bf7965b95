/**
 * Invoice Metadata Extraction
 *
 * Recovers the invoice number, billing cycle date and currency with an
 * ordered list of strategies, evaluated first-match-wins for each field on
 * its own:
 *
 * 1. anchored - the paragraph whose text, line breaks removed, is exactly
 *    "invoice", then the paragraph right after it
 * 2. document - every paragraph joined in document order
 *
 * A field nobody resolves stays `null` and is logged; it is never an error.
 */

import { logger } from '../utils';
import { normalizeText } from './normalizeText';
import { paragraphText, toParagraphs } from './paragraphs';
import { DEFAULT_PATTERNS, type PatternLibrary } from './patterns';
import type {
  DocumentParagraph,
  ExtractionInput,
  ExtractionOptions,
  InvoiceMetadata,
  MetadataField,
  MetadataResolution,
  MetadataStrategyName,
} from './types';

// ============================================
// Strategies
// ============================================

export interface MetadataStrategy {
  name: MetadataStrategyName;
  /** Texts to search, highest priority first */
  candidateTexts(paragraphs: readonly DocumentParagraph[], patterns: PatternLibrary): string[];
}

const anchoredStrategy: MetadataStrategy = {
  name: 'anchored',
  candidateTexts(paragraphs, patterns) {
    const anchorIndex = paragraphs.findIndex(
      (paragraph) => normalizeText(paragraphText(paragraph)).toLowerCase() === patterns.invoiceAnchor
    );
    if (anchorIndex === -1) {
      return [];
    }
    return paragraphs.slice(anchorIndex, anchorIndex + 2);
  },
};

const documentStrategy: MetadataStrategy = {
  name: 'document',
  candidateTexts(paragraphs) {
    return [paragraphs.join('\n')];
  },
};

export const METADATA_STRATEGIES: readonly MetadataStrategy[] = [anchoredStrategy, documentStrategy];

// ============================================
// Field grabbers
// ============================================

/**
 * Finds an invoice number: a labeled number first ("Invoice # 12345-67890"),
 * otherwise any run of nine or more digits. Non-digits are dropped and the
 * digits read as an integer of any length.
 */
export function grabInvoiceNumber(text: string, patterns: PatternLibrary = DEFAULT_PATTERNS): bigint | null {
  const normalized = normalizeText(text);
  const match =
    patterns.invoiceNumberLabeled.exec(normalized) ?? patterns.invoiceNumberLoose.exec(normalized);

  if (!match) {
    return null;
  }

  const digits = match[1].replace(/\D/g, '');
  return digits === '' ? null : BigInt(digits);
}

/**
 * Finds "Billing Cycle Date: MON DD YYYY". A recognized label with an
 * unknown month or an impossible calendar date resolves to null.
 */
export function grabBillingDate(text: string, patterns: PatternLibrary = DEFAULT_PATTERNS): Date | null {
  const match = patterns.billingDate.exec(normalizeText(text));
  if (!match) {
    return null;
  }

  const [, monthText, dayText, yearText] = match;
  const month = patterns.months.get(monthText.toUpperCase());
  if (month === undefined) {
    return null;
  }

  return toCalendarDate(Number(yearText), month, Number(dayText));
}

/**
 * Finds "Currency: CCC", upper-cased.
 */
export function grabCurrency(text: string, patterns: PatternLibrary = DEFAULT_PATTERNS): string | null {
  const match = patterns.currency.exec(normalizeText(text));
  return match ? match[1].toUpperCase() : null;
}

/**
 * Builds a UTC midnight date, or null when the parts do not form a real day.
 */
export function toCalendarDate(year: number, month: number, day: number): Date | null {
  if (year < 1 || month < 1 || month > 12 || day < 1) {
    return null;
  }

  const date = new Date(0);
  // setUTCFullYear keeps two-digit years literal, unlike Date.UTC
  date.setUTCFullYear(year, month - 1, day);

  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }

  return date;
}

/**
 * ISO-8601 calendar date (YYYY-MM-DD) of a UTC midnight date.
 */
export function toIsoDate(date: Date | null): string | null {
  return date ? date.toISOString().slice(0, 10) : null;
}

// ============================================
// Resolution
// ============================================

type Grabber<T> = (text: string, patterns: PatternLibrary) => T | null;

interface Resolved<T> {
  value: T | null;
  strategy: MetadataStrategyName | null;
}

function resolveField<T>(
  grab: Grabber<T>,
  textsByStrategy: ReadonlyArray<{ name: MetadataStrategyName; texts: string[] }>,
  patterns: PatternLibrary
): Resolved<T> {
  for (const { name, texts } of textsByStrategy) {
    for (const text of texts) {
      const value = grab(text, patterns);
      if (value !== null) {
        return { value, strategy: name };
      }
    }
  }
  return { value: null, strategy: null };
}

const METADATA_FIELDS: readonly MetadataField[] = ['invoiceNumber', 'billingCycleDate', 'currency'];

const MISSING_FIELD_MESSAGES: Record<MetadataField, string> = {
  invoiceNumber: "No 'Invoice # <number>' found",
  billingCycleDate: "No 'Billing Cycle Date: <MON DD YYYY>' found",
  currency: "No 'Currency: <CCC>' found",
};

/**
 * Resolves every metadata field and reports which strategy produced it.
 */
export function resolveMetadata(input: ExtractionInput, options: ExtractionOptions = {}): MetadataResolution {
  const patterns = options.patterns ?? DEFAULT_PATTERNS;
  const paragraphs = toParagraphs(input);

  const textsByStrategy = METADATA_STRATEGIES.map((strategy) => ({
    name: strategy.name,
    texts: strategy.candidateTexts(paragraphs, patterns),
  }));

  const invoiceNumber = resolveField(grabInvoiceNumber, textsByStrategy, patterns);
  const billingCycleDate = resolveField(grabBillingDate, textsByStrategy, patterns);
  const currency = resolveField(grabCurrency, textsByStrategy, patterns);

  const metadata: InvoiceMetadata = {
    invoiceNumber: invoiceNumber.value,
    billingCycleDate: billingCycleDate.value,
    currency: currency.value,
  };

  const missingFields = METADATA_FIELDS.filter((field) => metadata[field] === null);

  for (const field of missingFields) {
    logger.warn(MISSING_FIELD_MESSAGES[field], { document: options.documentName });
  }

  return {
    metadata,
    resolvedBy: {
      invoiceNumber: invoiceNumber.strategy,
      billingCycleDate: billingCycleDate.strategy,
      currency: currency.strategy,
    },
    missingFields,
  };
}

/**
 * Extracts invoice metadata from a document.
 *
 * @example
 * extractMetadata(['Invoice', 'Invoice # 1234567890 Billing Cycle Date: JAN 15 2024 Currency: USD'])
 * // Returns: { invoiceNumber: 1234567890n, billingCycleDate: 2024-01-15T00:00:00.000Z, currency: 'USD' }
 */
export function extractMetadata(input: ExtractionInput, options: ExtractionOptions = {}): InvoiceMetadata {
  return resolveMetadata(input, options).metadata;
}
