import {
  EsimProviderClient,
  ProviderContext,
  ProviderFulfillmentResult,
  ProviderId,
  ProviderRecord,
} from '../../src/domain/esim';

/**
 * In-process stand-in for a provider API client
 */
export class FakeProviderClient implements EsimProviderClient {
  readonly lookupByICCID = jest.fn<Promise<ProviderRecord | null>, [string]>();
  readonly fulfillRenewal = jest.fn<
    Promise<ProviderFulfillmentResult>,
    [ProviderContext]
  >();
  readonly isHealthy = jest.fn<Promise<boolean>, []>(async () => true);

  constructor(
    readonly providerId: ProviderId,
    readonly requiredContextKeys: readonly string[] = [],
  ) {
    this.lookupByICCID.mockResolvedValue(null);
  }
}

export function never<T>(): Promise<T> {
  return new Promise<T>(() => undefined);
}
