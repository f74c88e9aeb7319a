import { ConfigService } from '@nestjs/config';
import CircuitBreaker from 'opossum';
import { CircuitBreakerService } from './circuit-breaker.service';

class ClientError extends Error {}

describe('CircuitBreakerService', () => {
  const shutdowns: Array<() => void> = [];
  let service: CircuitBreakerService;

  beforeEach(() => {
    service = new CircuitBreakerService(new ConfigService({}));
  });

  afterEach(() => {
    shutdowns.splice(0).forEach((shutdown) => shutdown());
  });

  function track<TArgs extends unknown[], TResult>(
    breaker: CircuitBreaker<TArgs, TResult>,
  ): CircuitBreaker<TArgs, TResult> {
    shutdowns.push(() => breaker.shutdown());
    return breaker;
  }

  it('names provider breakers after the provider', async () => {
    const breaker = track(
      service.createProviderCircuitBreaker('AIRHUB', async (iccid: string) => iccid),
    );

    await expect(breaker.fire('8944500000001234567')).resolves.toBe(
      '8944500000001234567',
    );

    const state = service.getProviderCircuitBreakerState('AIRHUB');
    expect(state?.state).toBe('closed');
    expect(state?.stats.successes).toBe(1);
    expect(Object.keys(service.getProviderCircuitBreakerStates())).toEqual([
      'airhub',
    ]);
    expect(service.getCircuitBreakerState('airhub-api')).toEqual(state);
  });

  it('opens once failures cross the threshold', async () => {
    const breaker = track(
      service.createProviderCircuitBreaker(
        'ESIMCARD',
        async () => {
          throw new Error('connect ECONNREFUSED');
        },
        { errorThresholdPercentage: 1 },
      ),
    );

    await expect(breaker.fire()).rejects.toThrow('connect ECONNREFUSED');

    expect(service.isProviderCircuitBreakerOpen('ESIMCARD')).toBe(true);
    expect(service.getProviderCircuitBreakerState('ESIMCARD')?.stats.failures).toBe(1);
  });

  it('does not count filtered errors as failures', async () => {
    const breaker = track(
      service.createProviderCircuitBreaker(
        'TRAVELROAM',
        async () => {
          throw new ClientError('404 Not Found');
        },
        {
          errorThresholdPercentage: 1,
          errorFilter: (error) => error instanceof ClientError,
        },
      ),
    );

    await expect(breaker.fire()).rejects.toThrow('404 Not Found');

    expect(service.isProviderCircuitBreakerOpen('TRAVELROAM')).toBe(false);
    expect(service.getProviderCircuitBreakerState('TRAVELROAM')?.stats.failures).toBe(0);
  });

  it('returns null for unknown breakers', () => {
    expect(service.getProviderCircuitBreakerState('AIRHUB')).toBeNull();
    expect(service.isProviderCircuitBreakerOpen('AIRHUB')).toBe(false);
  });
});
