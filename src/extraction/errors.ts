import { AppError } from '../utils/AppError';

/**
 * Failure codes raised for a single document. Anything else (such as a
 * missing metadata field) is a partial result, not an error.
 */
export type ExtractionErrorCode =
  | 'INPUT_MISSING'
  | 'CONVERSION_FAILURE'
  | 'CONVERSION_EMPTY_CONTENT'
  | 'PARSER_EMPTY_RESULT';

const STATUS_BY_CODE: Record<ExtractionErrorCode, number> = {
  INPUT_MISSING: 400,
  CONVERSION_FAILURE: 502,
  CONVERSION_EMPTY_CONTENT: 502,
  PARSER_EMPTY_RESULT: 422,
};

export class ExtractionError extends AppError {
  public readonly code: ExtractionErrorCode;

  constructor(code: ExtractionErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, STATUS_BY_CODE[code]);
    this.code = code;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }

  static inputMissing(reference: string): ExtractionError {
    return new ExtractionError('INPUT_MISSING', `Document not found or unreadable: ${reference}`);
  }

  static unsupportedType(fileName: string): ExtractionError {
    return new ExtractionError('INPUT_MISSING', `Unsupported document type: ${fileName}`);
  }

  static conversionFailure(reference: string, cause: unknown): ExtractionError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new ExtractionError('CONVERSION_FAILURE', `Conversion failed for ${reference}: ${reason}`, {
      cause,
    });
  }

  static emptyContent(reference: string): ExtractionError {
    return new ExtractionError('CONVERSION_EMPTY_CONTENT', `Conversion produced no text for ${reference}`);
  }

  static emptyResult(reference: string): ExtractionError {
    return new ExtractionError('PARSER_EMPTY_RESULT', `No detail rows found in ${reference}`);
  }
}

export function isExtractionError(error: unknown): error is ExtractionError {
  return error instanceof ExtractionError;
}

export default ExtractionError;
