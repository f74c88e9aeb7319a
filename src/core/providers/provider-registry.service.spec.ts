import { ConfigService } from '@nestjs/config';
import { FakeProviderClient } from '../../../test/fixtures/fake-provider-client';
import { ProviderId } from '../../domain/esim';
import { ProviderRegistry } from './provider-registry.service';

function createRegistry(enabledProviders?: string) {
  return new ProviderRegistry(
    new ConfigService(
      enabledProviders === undefined ? {} : { ENABLED_PROVIDERS: enabledProviders },
    ),
  );
}

describe('ProviderRegistry', () => {
  it('enables every provider by default', () => {
    const registry = createRegistry();
    registry.registerProvider(new FakeProviderClient(ProviderId.TRAVELROAM));
    registry.registerProvider(new FakeProviderClient(ProviderId.AIRHUB));

    expect(registry.getActiveProviders().map((p) => p.id)).toEqual([
      ProviderId.AIRHUB,
      ProviderId.TRAVELROAM,
    ]);
    expect(registry.getActiveProviders()[0]?.metadata.displayName).toBe('AirHub');
  });

  it('reads the enabled set from configuration', () => {
    const registry = createRegistry(' esimcard , bogus');
    const airhub = new FakeProviderClient(ProviderId.AIRHUB);
    const esimcard = new FakeProviderClient(ProviderId.ESIMCARD);
    registry.registerProvider(airhub);
    registry.registerProvider(esimcard);

    expect(registry.getProviderClient(ProviderId.AIRHUB)).toBeUndefined();
    expect(registry.getProviderClient(ProviderId.ESIMCARD)).toBe(esimcard);
    expect(registry.getActiveProviderClients()).toEqual([esimcard]);
  });

  it('keeps the first registration of a provider', () => {
    const registry = createRegistry();
    const first = new FakeProviderClient(ProviderId.AIRHUB);
    registry.registerProvider(first);
    registry.registerProvider(new FakeProviderClient(ProviderId.AIRHUB), false);

    expect(registry.getProviderClient(ProviderId.AIRHUB)).toBe(first);
  });

  it('reports a throwing health check as unhealthy', async () => {
    const registry = createRegistry();
    const airhub = new FakeProviderClient(ProviderId.AIRHUB);
    const esimcard = new FakeProviderClient(ProviderId.ESIMCARD);
    esimcard.isHealthy.mockRejectedValue(new Error('socket hang up'));
    registry.registerProvider(airhub);
    registry.registerProvider(esimcard);

    const health = await registry.checkProvidersHealth();

    expect([...health.entries()].sort()).toEqual([
      [ProviderId.AIRHUB, true],
      [ProviderId.ESIMCARD, false],
    ]);
  });
});
