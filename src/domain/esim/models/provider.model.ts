/**
 * eSIM provider identity
 *
 * The provider set is closed. Enumeration order is significant: it is the
 * tie-break order for primary selection and the processing order for merges.
 */

export enum ProviderId {
  AIRHUB = 'AIRHUB',
  ESIMCARD = 'ESIMCARD',
  TRAVELROAM = 'TRAVELROAM',
}

export const PROVIDER_ORDER: readonly ProviderId[] = [
  ProviderId.AIRHUB,
  ProviderId.ESIMCARD,
  ProviderId.TRAVELROAM,
];

export const PROVIDER_DISPLAY_NAMES: Record<ProviderId, string> = {
  [ProviderId.AIRHUB]: 'AirHub',
  [ProviderId.ESIMCARD]: 'eSIMCard',
  [ProviderId.TRAVELROAM]: 'TravelRoam',
};

export function isProviderId(value: string): value is ProviderId {
  return PROVIDER_ORDER.some((provider) => provider === value);
}
