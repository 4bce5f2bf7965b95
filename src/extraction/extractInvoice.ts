/**
 * Whole-document extraction: metadata once, then the detail table.
 */

import { ExtractionError } from './errors';
import { scanLineItems } from './lineItemParser';
import { resolveMetadata } from './metadataExtractor';
import { isEmptyDocument, toParagraphs } from './paragraphs';
import type { ExtractionInput, ExtractionOptions, InvoiceExtraction } from './types';

/**
 * Extracts metadata and detail rows from one document.
 *
 * @throws ExtractionError CONVERSION_EMPTY_CONTENT when the document has no paragraphs
 * @throws ExtractionError PARSER_EMPTY_RESULT when no line matches the row grammar
 */
export function extractInvoice(input: ExtractionInput, options: ExtractionOptions = {}): InvoiceExtraction {
  const reference = options.documentName ?? 'document';
  const paragraphs = toParagraphs(input);

  if (isEmptyDocument(paragraphs)) {
    throw ExtractionError.emptyContent(reference);
  }

  const { metadata, missingFields } = resolveMetadata(paragraphs, options);
  const { rows, stats } = scanLineItems(paragraphs, metadata, options);

  if (rows.length === 0) {
    throw ExtractionError.emptyResult(reference);
  }

  return { metadata, missingFields, rows, stats };
}

export default extractInvoice;
