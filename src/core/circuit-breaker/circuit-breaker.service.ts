import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import CircuitBreaker from 'opossum';
import { errorMessage } from '../errors/esim.errors';
import { logger } from '../logger/logger.config';

export interface CircuitBreakerOptions {
  timeout?: number;
  errorThresholdPercentage?: number;
  resetTimeout?: number;
  name?: string;

  /**
   * Return true for errors that must not count as breaker failures
   */
  errorFilter?: (error: unknown) => boolean;
}

export type CircuitBreakerStateName = 'open' | 'halfOpen' | 'closed';

export interface CircuitBreakerState {
  state: CircuitBreakerStateName;
  enabled: boolean;
  stats: {
    fires: number;
    failures: number;
    successes: number;
    timeouts: number;
    rejects: number;
  };
}

type BreakerView = Pick<
  CircuitBreaker,
  'opened' | 'halfOpen' | 'enabled' | 'stats'
>;

@Injectable()
export class CircuitBreakerService {
  private readonly logger = logger();
  private readonly breakers = new Map<string, BreakerView>();

  constructor(private readonly configService: ConfigService) {}

  createCircuitBreaker<TArgs extends unknown[], TResult>(
    fn: (...args: TArgs) => Promise<TResult>,
    options?: CircuitBreakerOptions,
  ): CircuitBreaker<TArgs, TResult> {
    const name = options?.name || 'default';
    const timeout =
      options?.timeout ||
      this.configService.get<number>('CIRCUIT_BREAKER_TIMEOUT', 30000);
    const errorThresholdPercentage =
      options?.errorThresholdPercentage ||
      Number(
        this.configService.get<number>('CIRCUIT_BREAKER_ERROR_THRESHOLD', 50),
      );
    const resetTimeout =
      options?.resetTimeout ||
      Number(
        this.configService.get<number>('CIRCUIT_BREAKER_RESET_TIMEOUT', 30000),
      );

    const breaker = new CircuitBreaker<TArgs, TResult>(fn, {
      timeout: Number(timeout),
      errorThresholdPercentage,
      resetTimeout,
      name,
      errorFilter: options?.errorFilter,
    });

    breaker.on('open', () => {
      this.logger.warn(
        { circuitBreaker: name, state: 'open' },
        'Circuit breaker opened',
      );
    });

    breaker.on('halfOpen', () => {
      this.logger.info(
        { circuitBreaker: name, state: 'halfOpen' },
        'Circuit breaker half-open',
      );
    });

    breaker.on('close', () => {
      this.logger.info(
        { circuitBreaker: name, state: 'close' },
        'Circuit breaker closed',
      );
    });

    breaker.on('failure', (error: unknown) => {
      this.logger.debug(
        { circuitBreaker: name, error: errorMessage(error) },
        'Circuit breaker failure',
      );
    });

    this.breakers.set(name, breaker);
    return breaker;
  }

  createProviderCircuitBreaker<TArgs extends unknown[], TResult>(
    provider: string,
    fn: (...args: TArgs) => Promise<TResult>,
    options?: Omit<CircuitBreakerOptions, 'name'>,
  ): CircuitBreaker<TArgs, TResult> {
    return this.createCircuitBreaker(fn, {
      ...options,
      name: this.providerBreakerName(provider),
    });
  }

  getCircuitBreakerState(name: string): CircuitBreakerState | null {
    const breaker = this.breakers.get(name);
    if (!breaker) return null;
    return this.describe(breaker);
  }

  getAllCircuitBreakersState(): Record<string, CircuitBreakerState> {
    const states: Record<string, CircuitBreakerState> = {};
    this.breakers.forEach((breaker, name) => {
      states[name] = this.describe(breaker);
    });
    return states;
  }

  getProviderCircuitBreakerState(provider: string): CircuitBreakerState | null {
    return this.getCircuitBreakerState(this.providerBreakerName(provider));
  }

  isProviderCircuitBreakerOpen(provider: string): boolean {
    return this.getProviderCircuitBreakerState(provider)?.state === 'open';
  }

  getProviderCircuitBreakerStates(): Record<string, CircuitBreakerState> {
    const providerStates: Record<string, CircuitBreakerState> = {};

    this.breakers.forEach((breaker, name) => {
      if (name.endsWith('-api')) {
        providerStates[name.slice(0, -'-api'.length)] = this.describe(breaker);
      }
    });

    return providerStates;
  }

  private providerBreakerName(provider: string): string {
    return `${provider.toLowerCase()}-api`;
  }

  private describe(breaker: BreakerView): CircuitBreakerState {
    let state: CircuitBreakerStateName = 'closed';
    if (breaker.opened) {
      state = 'open';
    } else if (breaker.halfOpen) {
      state = 'halfOpen';
    }

    return {
      state,
      enabled: breaker.enabled,
      stats: {
        fires: breaker.stats.fires,
        failures: breaker.stats.failures,
        successes: breaker.stats.successes,
        timeouts: breaker.stats.timeouts,
        rejects: breaker.stats.rejects,
      },
    };
  }
}
