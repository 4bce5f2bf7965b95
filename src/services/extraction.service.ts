/**
 * Extraction Service
 *
 * Runs one document through the whole pipeline:
 *
 *   readable? → convert → extract → enrich with provenance → store → register
 *
 * Every failure surfaces as an ExtractionError with its own code so callers
 * can bucket documents without aborting a batch. Missing metadata fields are
 * reported in the result, never thrown.
 */

import { createHash } from 'crypto';
import { constants } from 'fs';
import { access, readFile } from 'fs/promises';
import {
  createConverterSet,
  selectConverter,
  type ConverterSet,
  type DocumentSource,
} from '../conversion';
import {
  enrichRecords,
  extractInvoice,
  ExtractionError,
  isEmptyDocument,
  toMetadataRecord,
  type DocumentParagraph,
  type EnrichedLineItemRecord,
  type InvoiceMetadataRecord,
  type LineScanStats,
  type MetadataField,
} from '../extraction';
import { markFileProcessed } from '../redis';
import { buildResultKey, resultWriter, type ResultWriter } from '../storage/resultWriter';
import { logger } from '../utils';

// ============================================
// Types
// ============================================

export interface ProcessDocumentParams {
  filePath: string;
  fileName: string;
  /** Stable identifier of the source document; content hash when omitted */
  fileId?: string;
}

export interface ProcessedDocument {
  fileId: string;
  fileName: string;
  metadata: InvoiceMetadataRecord;
  missingFields: MetadataField[];
  records: EnrichedLineItemRecord[];
  stats: LineScanStats;
  outputKey: string;
  outputPath: string;
}

export interface ExtractionServiceDeps {
  converters?: ConverterSet;
  writer?: ResultWriter;
  clock?: () => Date;
}

// ============================================
// Helpers
// ============================================

/**
 * SHA-256 of the file contents, used as the file id for uploads.
 */
export async function computeFileId(filePath: string): Promise<string> {
  const content = await readFile(filePath);
  return createHash('sha256').update(content).digest('hex');
}

async function assertReadable(source: DocumentSource): Promise<void> {
  if (!source.filePath) {
    throw ExtractionError.inputMissing(source.fileName);
  }

  try {
    await access(source.filePath, constants.R_OK);
  } catch {
    throw ExtractionError.inputMissing(source.fileName);
  }
}

// ============================================
// Service
// ============================================

export class ExtractionService {
  private readonly converters: ConverterSet;
  private readonly writer: ResultWriter;
  private readonly clock: () => Date;

  constructor(deps: ExtractionServiceDeps = {}) {
    this.converters = deps.converters ?? createConverterSet();
    this.writer = deps.writer ?? resultWriter;
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Converts a document into paragraphs. Only a conversion with no paragraphs
   * at all counts as empty; blank pages are left to the row parser.
   *
   * @throws ExtractionError INPUT_MISSING, CONVERSION_FAILURE or CONVERSION_EMPTY_CONTENT
   */
  async convertDocument(source: DocumentSource): Promise<DocumentParagraph[]> {
    await assertReadable(source);

    const converter = selectConverter(source.fileName, this.converters);
    if (!converter) {
      throw ExtractionError.unsupportedType(source.fileName);
    }

    let paragraphs: DocumentParagraph[];
    try {
      paragraphs = await converter.convert(source);
    } catch (error) {
      throw ExtractionError.conversionFailure(source.fileName, error);
    }

    if (isEmptyDocument(paragraphs)) {
      throw ExtractionError.emptyContent(source.fileName);
    }

    logger.debug(`${source.fileName}: ${paragraphs.length} paragraphs via ${converter.name}`);
    return paragraphs;
  }

  /**
   * Processes one document end to end and stores its rows.
   */
  async processDocument(params: ProcessDocumentParams): Promise<ProcessedDocument> {
    const source: DocumentSource = { filePath: params.filePath, fileName: params.fileName };

    logger.info(`Processing document: ${params.fileName}`);

    const paragraphs = await this.convertDocument(source);
    const fileId = params.fileId ?? (await computeFileId(params.filePath));

    const extraction = extractInvoice(paragraphs, { documentName: params.fileName });

    const records = enrichRecords(extraction.rows, {
      file_id: fileId,
      file_name: params.fileName,
      processing_timestamp: this.clock().toISOString(),
    });

    const outputKey = buildResultKey(params.fileName, extraction.metadata.billingCycleDate);
    const outputPath = await this.writer.write(outputKey, records);

    await markFileProcessed(fileId);

    logger.info(`${params.fileName}: extracted ${records.length} rows`);

    return {
      fileId,
      fileName: params.fileName,
      metadata: toMetadataRecord(extraction.metadata),
      missingFields: extraction.missingFields,
      records,
      stats: extraction.stats,
      outputKey,
      outputPath,
    };
  }
}

export const extractionService = new ExtractionService();

export default extractionService;
