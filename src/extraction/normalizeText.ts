/**
 * Text normalization shared by every matcher.
 *
 * Layout-derived text carries non-breaking spaces and irregular runs of
 * whitespace from table cells. Patterns are only ever applied to normalized
 * text.
 */

const NBSP = /\u00a0/g;
const WHITESPACE_RUN = /\s+/g;

/**
 * Replaces non-breaking spaces with spaces, collapses whitespace runs to a
 * single space and trims. Total and idempotent.
 *
 * @example
 * normalizeText('  Billing Cycle \n Date ') // Returns: "Billing Cycle Date"
 */
export function normalizeText(raw: string | null | undefined): string {
  if (!raw) {
    return '';
  }

  return raw.replace(NBSP, ' ').replace(WHITESPACE_RUN, ' ').trim();
}

export default normalizeText;
