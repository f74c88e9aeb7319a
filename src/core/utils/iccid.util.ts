const SEPARATORS = /[\s-]+/g;
const ICCID_PATTERN = /^[A-Za-z0-9]{10,50}$/;

/**
 * Canonical form used to compare ICCIDs across providers
 */
export function normalizeIccid(iccid: string): string {
  return iccid.replace(SEPARATORS, '').toLowerCase();
}

export function iccidsMatch(left: string | null | undefined, right: string | null | undefined): boolean {
  if (!left || !right) return false;
  return normalizeIccid(left) === normalizeIccid(right);
}

/**
 * Strips separators and checks the result is 10-50 alphanumerics.
 * Returns the cleaned ICCID (case preserved) or null.
 */
export function sanitizeIccid(input: string): string | null {
  const cleaned = input.trim().replace(SEPARATORS, '');
  return ICCID_PATTERN.test(cleaned) ? cleaned : null;
}
