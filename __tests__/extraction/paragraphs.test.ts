/**
 * Tests for paragraph segmentation
 */

import {
  hasVisibleText,
  htmlToParagraphs,
  isEmptyDocument,
  paragraphText,
  textToParagraphs,
  toParagraphs,
} from '../../src/extraction/paragraphs';

describe('Paragraphs', () => {
  describe('htmlToParagraphs', () => {
    it('should return one entry per <p> with line breaks as newlines', () => {
      const html =
        '<html><body><p>Invoice</p><p>Invoice # 1234567890<br/>Currency: USD</p><div>sidebar</div></body></html>';

      expect(htmlToParagraphs(html)).toEqual(['Invoice', 'Invoice # 1234567890\nCurrency: USD']);
    });

    it('should keep empty paragraphs', () => {
      expect(htmlToParagraphs('<p></p><p>Total</p>')).toEqual(['', 'Total']);
    });

    it('should return nothing for markup without paragraphs', () => {
      expect(htmlToParagraphs('<div>Invoice</div>')).toEqual([]);
    });
  });

  describe('textToParagraphs', () => {
    it('should split on blank lines', () => {
      expect(textToParagraphs('Invoice\n\nA\nB\r\n\r\nC')).toEqual(['Invoice', 'A\nB', 'C']);
    });

    it('should drop blank blocks', () => {
      expect(textToParagraphs('A\n\n\n\nB')).toEqual(['A', 'B']);
      expect(textToParagraphs('')).toEqual([]);
    });
  });

  describe('toParagraphs', () => {
    it('should copy paragraph arrays', () => {
      const input = ['Invoice'];
      const result = toParagraphs(input);

      expect(result).toEqual(['Invoice']);
      expect(result).not.toBe(input);
    });
  });

  describe('isEmptyDocument', () => {
    it('should be true only without paragraphs', () => {
      expect(isEmptyDocument([])).toBe(true);
    });

    it('should be false for blank pages', () => {
      expect(isEmptyDocument(['  ', '\n'])).toBe(false);
      expect(isEmptyDocument(['', 'x'])).toBe(false);
    });
  });

  describe('hasVisibleText', () => {
    it('should look for any non-blank paragraph', () => {
      expect(hasVisibleText(['  ', '\u00a0', '\n'])).toBe(false);
      expect(hasVisibleText(['', 'x'])).toBe(true);
      expect(hasVisibleText([])).toBe(false);
    });
  });

  describe('paragraphText', () => {
    it('should join the lines of a paragraph without a separator', () => {
      expect(paragraphText('In\nvoice')).toBe('Invoice');
      expect(paragraphText('Invoice\r\n')).toBe('Invoice');
    });
  });
});
