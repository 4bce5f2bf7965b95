/**
 * Type Definitions for the Invoice Extraction Engine
 *
 * The engine reads already-materialized document text and
 * returns structured values. File, network and queue concerns live in the
 * services and workers that call it.
 */

import type { PatternLibrary } from './patterns';

// ============================================
// INPUT TYPES
// ============================================

/**
 * One paragraph-like block of a converted document. Lines inside a block are
 * separated by `\n`; each table row is expected on a line of its own.
 */
export type DocumentParagraph = string;

/**
 * Anything the engine accepts as a document: raw text (paragraphs separated
 * by blank lines) or paragraphs already split by the converter.
 */
export type ExtractionInput = string | readonly DocumentParagraph[];

// ============================================
// METADATA
// ============================================

/**
 * Invoice-level fields. Each one is independently `null` when it could not be
 * resolved; none has a default.
 */
export interface InvoiceMetadata {
  /** Invoice identifier with its separators dropped; may exceed the safe integer range */
  invoiceNumber: bigint | null;
  /** Billing cycle date as a UTC midnight Date */
  billingCycleDate: Date | null;
  /** Three-letter upper-case currency code */
  currency: string | null;
}

export type MetadataField = keyof InvoiceMetadata;

/** Name of the strategy that resolved a metadata field */
export type MetadataStrategyName = 'anchored' | 'document';

export interface MetadataResolution {
  metadata: InvoiceMetadata;
  resolvedBy: Record<MetadataField, MetadataStrategyName | null>;
  missingFields: MetadataField[];
}

// ============================================
// LINE ITEMS
// ============================================

export type NumericRowField = 'quantityAmount' | 'rate' | 'charge' | 'taxAmount' | 'totalCharge';

export type RowField = 'eventCode' | 'description' | 'serviceCode' | 'uom' | NumericRowField;

/**
 * A detail row of the itemized table, stamped with the enclosing document's
 * metadata.
 */
export interface LineItemRow {
  invoiceNumber: bigint | null;
  /** ISO-8601 date (YYYY-MM-DD) */
  billingCycleDate: string | null;
  currency: string | null;
  eventCode: string;
  description: string;
  serviceCode: string;
  uom: string;
  quantityAmount: number;
  rate: number;
  charge: number;
  taxAmount: number;
  totalCharge: number;
  /**
   * Numeric fields whose text could not be parsed and were set to 0.
   * Never serialized into the output record.
   */
  degradedFields: readonly NumericRowField[];
}

export type LineClass = 'detail' | 'subtotal' | 'header' | 'noise';

export interface RowFields {
  eventCode: string;
  description: string;
  serviceCode: string;
  uom: string;
  quantityAmount: string;
  rate: string;
  charge: string;
  taxAmount: string;
  totalCharge: string;
}

export type RowMatch =
  | { matched: true; fields: RowFields }
  | { matched: false; failure: RowMatchFailure };

export interface RowMatchFailure {
  /** Field that did not satisfy the grammar, when a single one can be blamed */
  field?: RowField;
  reason: string;
}

/**
 * Per-line outcome of a table scan.
 */
export interface ScannedLine {
  paragraphIndex: number;
  lineIndex: number;
  text: string;
  lineClass: LineClass;
  failure?: RowMatchFailure;
}

export interface LineScanStats {
  lines: number;
  detail: number;
  subtotal: number;
  header: number;
  noise: number;
  degradedRows: number;
}

export interface LineItemScan {
  rows: LineItemRow[];
  lines: ScannedLine[];
  stats: LineScanStats;
}

// ============================================
// DOCUMENT RESULT
// ============================================

export interface InvoiceExtraction {
  metadata: InvoiceMetadata;
  missingFields: MetadataField[];
  rows: LineItemRow[];
  stats: LineScanStats;
}

// ============================================
// FUZZY MATCHING
// ============================================

export interface BestMatch {
  best: string | null;
  score: number;
}

// ============================================
// OPTIONS
// ============================================

export interface ExtractionOptions {
  /** Rules to apply; defaults to the process-wide library */
  patterns?: PatternLibrary;
  /** Label used in log lines (file name, upload id) */
  documentName?: string;
}
