import { MissingProviderContextError } from '../../../core/errors/esim.errors';
import { ProviderContext, ProviderId } from '../../../domain/esim';

export const DEFAULT_AIRHUB_RENEWAL_DAYS = '7';

/**
 * Context keys written by a failed fulfillment, cleared once it succeeds
 */
export const FAILURE_CONTEXT_KEYS = [
  'failureReason',
  'failureStep',
  'paymentCaptured',
] as const;

export interface RenewalContextInput {
  iccid: string;
  provider: ProviderId;
  amount: number;
  context: Record<string, string | undefined>;
}

export interface PreparedRenewalContext {
  providerContext: ProviderContext;
  providerOrderReference: string | null;
}

/**
 * Fills provider defaults into a renewal context and checks what order
 * creation needs. TravelRoam may carry a plan label instead of a bundle id;
 * the bundle is then resolved at fulfillment.
 */
export function prepareRenewalContext(
  input: RenewalContextInput,
): PreparedRenewalContext {
  const given = compact(input.context);

  switch (input.provider) {
    case ProviderId.AIRHUB: {
      const orderReference =
        given.orderReference ?? given.providerOrderReference;
      if (!orderReference) {
        throw new MissingProviderContextError(input.provider, ['orderReference']);
      }
      return {
        providerContext: {
          ...given,
          orderReference,
          renewalDays: given.renewalDays ?? DEFAULT_AIRHUB_RENEWAL_DAYS,
          chargedAmount: input.amount.toFixed(2),
        },
        providerOrderReference: orderReference,
      };
    }

    case ProviderId.ESIMCARD: {
      if (!given.packageId) {
        throw new MissingProviderContextError(input.provider, ['packageId']);
      }
      return {
        providerContext: {
          ...given,
          deviceIdentifier: given.deviceIdentifier ?? input.iccid,
        },
        providerOrderReference: given.simId ?? null,
      };
    }

    case ProviderId.TRAVELROAM: {
      if (!given.bundleId && !given.planLabel) {
        throw new MissingProviderContextError(input.provider, ['bundleId']);
      }
      return {
        providerContext: { ...given, iccid: given.iccid ?? input.iccid },
        providerOrderReference: null,
      };
    }
  }
}

export function withoutFailureDetails(context: ProviderContext): ProviderContext {
  const failureKeys: readonly string[] = FAILURE_CONTEXT_KEYS;
  return Object.fromEntries(
    Object.entries(context).filter(([key]) => !failureKeys.includes(key)),
  );
}

/**
 * Drops blank values so defaults apply
 */
function compact(context: Record<string, string | undefined>): ProviderContext {
  const result: ProviderContext = {};
  for (const [key, value] of Object.entries(context)) {
    const trimmed = value?.trim();
    if (trimmed) {
      result[key] = trimmed;
    }
  }
  return result;
}
