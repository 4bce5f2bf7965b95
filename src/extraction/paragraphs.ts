/**
 * Paragraph segmentation for converted documents.
 *
 * The conversion service renders each text block of the source document as
 * an HTML `<p>`. Lines inside a paragraph are its text nodes, in document
 * order, joined with a newline.
 */

import { JSDOM } from 'jsdom';
import { normalizeText } from './normalizeText';
import type { DocumentParagraph, ExtractionInput } from './types';

const BLANK_LINE = /\r?\n[ \t\u00a0]*\r?\n/;

function collectTextNodes(node: Node, pieces: string[]): void {
  for (const child of Array.from(node.childNodes)) {
    if (child.nodeType === child.TEXT_NODE) {
      pieces.push(child.textContent ?? '');
    } else {
      collectTextNodes(child, pieces);
    }
  }
}

/**
 * Splits converted (X)HTML into paragraphs, one per `<p>` element.
 *
 * @example
 * htmlToParagraphs('<p>Invoice</p><p>Invoice # 1234567890<br/>Currency: USD</p>')
 * // Returns: ['Invoice', 'Invoice # 1234567890\nCurrency: USD']
 */
export function htmlToParagraphs(html: string): DocumentParagraph[] {
  const { document } = new JSDOM(html).window;

  return Array.from(document.querySelectorAll('p')).map((paragraph) => {
    const pieces: string[] = [];
    collectTextNodes(paragraph, pieces);
    return pieces.join('\n');
  });
}

/**
 * Splits plain text into paragraphs on blank lines.
 */
export function textToParagraphs(text: string): DocumentParagraph[] {
  return text.split(BLANK_LINE).filter((block) => normalizeText(block) !== '');
}

/**
 * Accepts either raw text or pre-split paragraphs.
 */
export function toParagraphs(input: ExtractionInput): DocumentParagraph[] {
  return typeof input === 'string' ? textToParagraphs(input) : [...input];
}

/**
 * True when a document yielded no paragraphs at all. Paragraphs without
 * visible text still count: an image-only scan converts to empty pages.
 */
export function isEmptyDocument(paragraphs: readonly DocumentParagraph[]): boolean {
  return paragraphs.length === 0;
}

/**
 * True when some paragraph holds visible text.
 */
export function hasVisibleText(paragraphs: readonly DocumentParagraph[]): boolean {
  return paragraphs.some((paragraph) => normalizeText(paragraph) !== '');
}

/**
 * Paragraph text with its line breaks removed, the way a `<p>` reads when its
 * text nodes are concatenated.
 */
export function paragraphText(paragraph: DocumentParagraph): string {
  return paragraph.replace(/\r?\n/g, '');
}
