import type { DocumentParagraph } from '../extraction';

/**
 * A document waiting to be converted: where it lives and what it was called
 * when it was received.
 */
export interface DocumentSource {
  filePath: string;
  fileName: string;
}

/**
 * Boundary to whatever turns a binary or markup document into paragraph
 * text. Implementations throw on failure and may return no paragraphs; the
 * pipeline maps both cases to extraction error codes.
 */
export interface DocumentConverter {
  readonly name: string;
  convert(source: DocumentSource): Promise<DocumentParagraph[]>;
}
