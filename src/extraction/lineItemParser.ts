/**
 * Line-Item Table Parser
 *
 * Walks every line of every paragraph in document order and keeps the lines
 * that satisfy the detail row grammar. This is a line classifier, not a
 * layout parser: it relies on the converter keeping each logical table row
 * on one line.
 *
 * Output order is document order; consumers treat it as presentation order.
 */

import { logger } from '../utils';
import { resolveMetadata, toIsoDate } from './metadataExtractor';
import { toParagraphs } from './paragraphs';
import { DEFAULT_PATTERNS } from './patterns';
import { classifyLine, parseAmount } from './rowGrammar';
import type {
  ExtractionInput,
  ExtractionOptions,
  InvoiceMetadata,
  LineItemRow,
  LineItemScan,
  LineScanStats,
  NumericRowField,
  RowFields,
  ScannedLine,
} from './types';

/**
 * Builds a row from grammar captures and the document's metadata.
 * Unparsable amounts become 0 and are listed in `degradedFields`.
 */
export function buildLineItemRow(fields: RowFields, metadata: InvoiceMetadata): LineItemRow {
  const degradedFields: NumericRowField[] = [];

  const amount = (field: NumericRowField): number => {
    const { value, degraded } = parseAmount(fields[field]);
    if (degraded) {
      degradedFields.push(field);
    }
    return value;
  };

  return {
    invoiceNumber: metadata.invoiceNumber,
    billingCycleDate: toIsoDate(metadata.billingCycleDate),
    currency: metadata.currency,
    eventCode: fields.eventCode,
    description: fields.description,
    serviceCode: fields.serviceCode,
    uom: fields.uom,
    quantityAmount: amount('quantityAmount'),
    rate: amount('rate'),
    charge: amount('charge'),
    taxAmount: amount('taxAmount'),
    totalCharge: amount('totalCharge'),
    degradedFields,
  };
}

function emptyStats(): LineScanStats {
  return { lines: 0, detail: 0, subtotal: 0, header: 0, noise: 0, degradedRows: 0 };
}

/**
 * Classifies every line of the document and collects detail rows, keeping a
 * per-line record so rejected lines can be traced to the failing field.
 *
 * @param metadata - Metadata to stamp on rows; resolved from the document when omitted
 */
export function scanLineItems(
  input: ExtractionInput,
  metadata?: InvoiceMetadata,
  options: ExtractionOptions = {}
): LineItemScan {
  const patterns = options.patterns ?? DEFAULT_PATTERNS;
  const paragraphs = toParagraphs(input);
  const documentMetadata = metadata ?? resolveMetadata(paragraphs, options).metadata;

  const rows: LineItemRow[] = [];
  const lines: ScannedLine[] = [];
  const stats = emptyStats();

  paragraphs.forEach((paragraph, paragraphIndex) => {
    paragraph.split('\n').forEach((line, lineIndex) => {
      const { lineClass, match } = classifyLine(line, patterns);

      stats.lines++;
      stats[lineClass]++;

      if (match.matched) {
        const row = buildLineItemRow(match.fields, documentMetadata);
        if (row.degradedFields.length > 0) {
          stats.degradedRows++;
          logger.warn(
            `Row ${row.eventCode} kept with unparsable amounts set to 0: ${row.degradedFields.join(', ')}`,
            { document: options.documentName }
          );
        }
        rows.push(row);
        lines.push({ paragraphIndex, lineIndex, text: line, lineClass });
      } else {
        lines.push({ paragraphIndex, lineIndex, text: line, lineClass, failure: match.failure });
      }
    });
  });

  logger.debug(
    `Scanned ${stats.lines} lines: ${stats.detail} detail, ${stats.subtotal} subtotal, ` +
      `${stats.header} header, ${stats.noise} noise`,
    { document: options.documentName }
  );

  return { rows, lines, stats };
}

/**
 * Parses the detail rows of a document.
 *
 * @example
 * parseLineItems('EVT1 Network Access Fee SVC A 10 2.50 25.00 1.25 26.25')
 * // Returns: [{ eventCode: 'EVT1', description: 'Network Access Fee', serviceCode: 'SVC', ... }]
 */
export function parseLineItems(
  input: ExtractionInput,
  metadata?: InvoiceMetadata,
  options: ExtractionOptions = {}
): LineItemRow[] {
  return scanLineItems(input, metadata, options).rows;
}
