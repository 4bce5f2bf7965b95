/**
 * Tests for Text Normalization
 */

import { normalizeText } from '../../src/extraction/normalizeText';

describe('normalizeText', () => {
  it('should collapse whitespace runs to a single space', () => {
    expect(normalizeText('Billing   Cycle\t\tDate')).toBe('Billing Cycle Date');
  });

  it('should turn newlines into spaces', () => {
    expect(normalizeText('Invoice #\n1234567890')).toBe('Invoice # 1234567890');
  });

  it('should replace non-breaking spaces', () => {
    expect(normalizeText('Currency:\u00a0USD')).toBe('Currency: USD');
  });

  it('should trim leading and trailing whitespace', () => {
    expect(normalizeText('  \u00a0 Invoice \n ')).toBe('Invoice');
  });

  it('should return an empty string for empty or absent input', () => {
    expect(normalizeText('')).toBe('');
    expect(normalizeText('   \n\t ')).toBe('');
    expect(normalizeText(null)).toBe('');
    expect(normalizeText(undefined)).toBe('');
  });

  it('should be idempotent', () => {
    const once = normalizeText(' EVT1 \u00a0 Network  Access\nFee ');
    expect(normalizeText(once)).toBe(once);
  });
});
