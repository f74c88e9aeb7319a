import { iccidsMatch, normalizeIccid, sanitizeIccid } from './iccid.util';

describe('iccid.util', () => {
  it('normalizes separators and case', () => {
    expect(normalizeIccid('8944-5000 0000 1234 56AB')).toBe('894450000000123456ab');
  });

  it('matches ICCIDs by exact normalized equality', () => {
    expect(iccidsMatch('8944 5000 0000 1234 567', '8944500000001234567')).toBe(true);
    expect(iccidsMatch('89445000000012345AB', '89445000000012345ab')).toBe(true);
    expect(iccidsMatch('894450000000123456', '8944500000001234567')).toBe(false);
    expect(iccidsMatch(null, '8944500000001234567')).toBe(false);
  });

  it('sanitizes user input', () => {
    expect(sanitizeIccid(' 8944-5000-0000-1234-567 ')).toBe('8944500000001234567');
    expect(sanitizeIccid('12345')).toBeNull();
    expect(sanitizeIccid('8944500000001234567;drop')).toBeNull();
  });
});
