/**
 * Tests for the Detail Row Grammar
 */

import {
  classifyLine,
  isHeaderBanner,
  isSubtotalLine,
  matchDetailRow,
  parseAmount,
  tokenizeLine,
} from '../../src/extraction/rowGrammar';

const DETAIL_LINE = 'EVT1 Network Access Fee SVC A 10 2.50 25.00 1.25 26.25';
const HEADER_LINE =
  'Event Service Quantity/ Tax Total Code Description Code UOM Amount Rate Charge Amount Charge';

describe('Row Grammar', () => {
  // ============================================
  // Tokenizing
  // ============================================
  describe('tokenizeLine', () => {
    it('should split normalized text on single spaces', () => {
      expect(tokenizeLine('  EVT1   Fee\tSVC ')).toEqual(['EVT1', 'Fee', 'SVC']);
    });

    it('should return no tokens for a blank line', () => {
      expect(tokenizeLine('   ')).toEqual([]);
    });
  });

  // ============================================
  // Detail rows
  // ============================================
  describe('matchDetailRow', () => {
    it('should capture every field of a detail row', () => {
      expect(matchDetailRow(DETAIL_LINE)).toEqual({
        matched: true,
        fields: {
          eventCode: 'EVT1',
          description: 'Network Access Fee',
          serviceCode: 'SVC',
          uom: 'A',
          quantityAmount: '10',
          rate: '2.50',
          charge: '25.00',
          taxAmount: '1.25',
          totalCharge: '26.25',
        },
      });
    });

    it('should match after whitespace normalization', () => {
      const result = matchDetailRow('  EVT1  Network Access Fee  SVC A 10 2.50 25.00 1.25 26.25 ');
      expect(result.matched).toBe(true);
    });

    it('should keep digits and punctuation inside the description', () => {
      const result = matchDetailRow('X9 Port 443 (TLS) - monthly P1 M 1 5.00 5.00 0.00 5.00');

      expect(result).toMatchObject({
        matched: true,
        fields: { eventCode: 'X9', description: 'Port 443 (TLS) - monthly', serviceCode: 'P1' },
      });
    });

    it('should accept thousands separators and negative amounts', () => {
      const result = matchDetailRow('CR7 Credit adjustment ADJ U 1 -1,200.00 -1,200.00 0.00 -1,200.00');

      expect(result).toMatchObject({
        matched: true,
        fields: { rate: '-1,200.00', charge: '-1,200.00', totalCharge: '-1,200.00' },
      });
    });

    it('should reject lines with too few tokens', () => {
      expect(matchDetailRow('EVT1 SVC A 10 2.50 25.00 1.25 26.25')).toEqual({
        matched: false,
        failure: { reason: 'expected at least 9 tokens, found 8' },
      });
    });

    it('should reject a lower-case event code', () => {
      expect(matchDetailRow('evt1 Network Fee SVC A 10 2.50 25.00 1.25 26.25')).toEqual({
        matched: false,
        failure: { field: 'eventCode', reason: '"evt1" is not an upper-case alphanumeric code' },
      });
    });

    it('should reject a service code longer than four characters', () => {
      expect(matchDetailRow('EVT1 Network Fee SERVICE A 10 2.50 25.00 1.25 26.25')).toEqual({
        matched: false,
        failure: { field: 'serviceCode', reason: '"SERVICE" does not match serviceCode' },
      });
    });

    it('should reject a multi-letter unit of measure', () => {
      expect(matchDetailRow('EVT1 Network Fee SVC EA 10 2.50 25.00 1.25 26.25')).toEqual({
        matched: false,
        failure: { field: 'uom', reason: '"EA" does not match uom' },
      });
    });

    it('should report the first non-numeric amount', () => {
      expect(matchDetailRow('EVT1 Network Fee SVC A 10 n/a 25.00 TBD 26.25')).toEqual({
        matched: false,
        failure: { field: 'rate', reason: '"n/a" does not match rate' },
      });
    });
  });

  // ============================================
  // Subtotals and headers
  // ============================================
  describe('isSubtotalLine', () => {
    it('should accept a line holding a single amount', () => {
      expect(isSubtotalLine('1234.56')).toBe(true);
      expect(isSubtotalLine('  1,234.56 ')).toBe(true);
    });

    it('should reject anything else on the line', () => {
      expect(isSubtotalLine('Total 1234.56')).toBe(false);
      expect(isSubtotalLine('')).toBe(false);
    });
  });

  describe('isHeaderBanner', () => {
    it('should detect the table header when both phrases are present', () => {
      expect(isHeaderBanner(HEADER_LINE)).toBe(true);
    });

    it('should detect the header across irregular whitespace', () => {
      expect(isHeaderBanner(HEADER_LINE.replace(/ /g, '  '))).toBe(true);
    });

    it('should require both phrases', () => {
      expect(isHeaderBanner('Event Service Quantity/ Tax Total')).toBe(false);
    });
  });

  describe('classifyLine', () => {
    it('should classify a detail row', () => {
      expect(classifyLine(DETAIL_LINE).lineClass).toBe('detail');
    });

    it('should classify a subtotal before trying the row grammar', () => {
      expect(classifyLine('1234.56')).toEqual({
        lineClass: 'subtotal',
        match: { matched: false, failure: { reason: 'subtotal line' } },
      });
    });

    it('should classify the header banner', () => {
      expect(classifyLine(HEADER_LINE)).toEqual({
        lineClass: 'header',
        match: { matched: false, failure: { reason: 'header banner' } },
      });
    });

    it('should classify a header with a row-shaped tail as a header', () => {
      expect(classifyLine(`EVT9 ${HEADER_LINE} SVC A 1 2 3 4 5`).lineClass).toBe('header');
    });

    it('should classify everything else as noise', () => {
      expect(classifyLine('Page 2 of 3').lineClass).toBe('noise');
    });
  });

  // ============================================
  // Amounts
  // ============================================
  describe('parseAmount', () => {
    it('should drop thousands separators', () => {
      expect(parseAmount('1,234.50')).toEqual({ value: 1234.5, degraded: false });
    });

    it('should parse negative amounts', () => {
      expect(parseAmount('-25.00')).toEqual({ value: -25, degraded: false });
    });

    it('should degrade text that is only separators to 0', () => {
      expect(parseAmount(',')).toEqual({ value: 0, degraded: true });
      expect(parseAmount(',,,')).toEqual({ value: 0, degraded: true });
    });

    it('should degrade a lone minus sign to 0', () => {
      expect(parseAmount('-,')).toEqual({ value: 0, degraded: true });
    });
  });
});
