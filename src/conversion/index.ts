import { extname } from 'path';
import { LocalFileConverter, HTML_EXTENSIONS, TEXT_EXTENSIONS } from './localFileConverter';
import { TikaDocumentConverter } from './tikaConverter';
import type { DocumentConverter } from './types';

export { LocalFileConverter, HTML_EXTENSIONS, TEXT_EXTENSIONS } from './localFileConverter';
export { TikaDocumentConverter, type TikaConverterOptions } from './tikaConverter';
export type { DocumentConverter, DocumentSource } from './types';

/** Extensions handed to the remote conversion service */
export const BINARY_EXTENSIONS = ['.pdf'] as const;

export const SUPPORTED_EXTENSIONS: readonly string[] = [
  ...BINARY_EXTENSIONS,
  ...HTML_EXTENSIONS,
  ...TEXT_EXTENSIONS,
];

export interface ConverterSet {
  binary: DocumentConverter;
  local: DocumentConverter;
}

export const createConverterSet = (): ConverterSet => ({
  binary: new TikaDocumentConverter(),
  local: new LocalFileConverter(),
});

/**
 * Picks the converter for a file by extension, or null when the type is not
 * supported.
 */
export function selectConverter(fileName: string, converters: ConverterSet): DocumentConverter | null {
  const extension = extname(fileName).toLowerCase();

  if (BINARY_EXTENSIONS.some((ext) => ext === extension)) {
    return converters.binary;
  }
  if (SUPPORTED_EXTENSIONS.includes(extension)) {
    return converters.local;
  }
  return null;
}
