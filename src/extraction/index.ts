/**
 * Invoice Extraction Engine
 *
 * Turns the text of a converted invoice into invoice metadata and an ordered
 * list of line-item detail rows.
 *
 * Usage:
 * ```typescript
 * import { extractInvoice, htmlToParagraphs, toLineItemRecord } from './extraction';
 *
 * const { metadata, rows } = extractInvoice(htmlToParagraphs(html));
 * const records = rows.map(toLineItemRecord);
 * ```
 */

// Main entry point
export { extractInvoice } from './extractInvoice';

// Components
export { normalizeText } from './normalizeText';
export { createPatternLibrary, DEFAULT_PATTERNS, MONTH_ABBREVIATIONS, HEADER_SIGNATURE_PARTS } from './patterns';
export {
  extractMetadata,
  resolveMetadata,
  grabInvoiceNumber,
  grabBillingDate,
  grabCurrency,
  toCalendarDate,
  toIsoDate,
  METADATA_STRATEGIES,
} from './metadataExtractor';
export { parseLineItems, scanLineItems, buildLineItemRow } from './lineItemParser';
export {
  matchDetailRow,
  classifyLine,
  isSubtotalLine,
  isHeaderBanner,
  parseAmount,
  tokenizeLine,
} from './rowGrammar';
export {
  htmlToParagraphs,
  textToParagraphs,
  toParagraphs,
  isEmptyDocument,
  hasVisibleText,
  paragraphText,
} from './paragraphs';
export { bestMatch, similarityRatio } from './fuzzyMatch';
export { ExtractionError, isExtractionError } from './errors';
export { toLineItemRecord, toMetadataRecord, enrichRecords } from './records';

// Types
export type { PatternLibrary, RowTokenRules } from './patterns';
export type { MetadataStrategy } from './metadataExtractor';
export type { ExtractionErrorCode } from './errors';
export type {
  LineItemRecord,
  EnrichedLineItemRecord,
  InvoiceMetadataRecord,
  RecordProvenance,
} from './records';
export type {
  DocumentParagraph,
  ExtractionInput,
  ExtractionOptions,
  InvoiceMetadata,
  MetadataField,
  MetadataResolution,
  MetadataStrategyName,
  LineItemRow,
  NumericRowField,
  RowField,
  RowFields,
  RowMatch,
  RowMatchFailure,
  LineClass,
  ScannedLine,
  LineScanStats,
  LineItemScan,
  InvoiceExtraction,
  BestMatch,
} from './types';
