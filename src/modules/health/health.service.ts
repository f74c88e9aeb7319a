import { Injectable } from '@nestjs/common';
import { HealthIndicator, HealthIndicatorResult } from '@nestjs/terminus';
import { CircuitBreakerService } from '../../core/circuit-breaker/circuit-breaker.service';
import { ProcessingLimitsService } from '../../core/limits/processing-limits.service';
import { ProviderRegistry } from '../../core/providers';
import { RenewalOrderStatus } from '../../domain/esim';
import { RenewalOrderRepository } from '../renewals/repositories/renewal-order.repository';

interface ProviderHealthStatus {
  displayName: string;
  enabled: boolean;
  healthy: boolean;
  apiHealthy: boolean;
  circuitBreaker: string;
}

@Injectable()
export class HealthService extends HealthIndicator {
  constructor(
    private readonly circuitBreakerService: CircuitBreakerService,
    private readonly providerRegistry: ProviderRegistry,
    private readonly renewalRepository: RenewalOrderRepository,
    private readonly limitsService: ProcessingLimitsService,
  ) {
    super();
  }

  async checkCircuitBreakers(): Promise<HealthIndicatorResult> {
    const allBreakers = this.circuitBreakerService.getAllCircuitBreakersState();
    const openBreakers = Object.entries(allBreakers).filter(
      ([, state]) => state.state === 'open',
    );

    const isHealthy = openBreakers.length === 0;

    return this.getStatus('circuit-breakers', isHealthy, {
      total: Object.keys(allBreakers).length,
      open: openBreakers.length,
      breakers: allBreakers,
      message: isHealthy
        ? 'All circuit breakers closed'
        : `${openBreakers.length} circuit breaker(s) open`,
    });
  }

  /**
   * Credentials present and circuit not open, per enabled provider
   */
  async checkProviders(): Promise<HealthIndicatorResult> {
    const activeProviders = this.providerRegistry.getActiveProviders();
    const providerHealthMap = await this.providerRegistry.checkProvidersHealth();
    const circuitBreakerStates =
      this.circuitBreakerService.getProviderCircuitBreakerStates();

    const providersStatus: Record<string, ProviderHealthStatus> = {};
    let unhealthyCount = 0;

    for (const provider of activeProviders) {
      const isApiHealthy = providerHealthMap.get(provider.id) ?? false;
      const breakerState =
        circuitBreakerStates[provider.id.toLowerCase()]?.state ?? 'idle';
      const isHealthy = isApiHealthy && breakerState !== 'open';

      if (!isHealthy) unhealthyCount++;

      providersStatus[provider.id] = {
        displayName: provider.metadata.displayName,
        enabled: provider.enabled,
        healthy: isHealthy,
        apiHealthy: isApiHealthy,
        circuitBreaker: breakerState,
      };
    }

    // one reachable provider is enough to answer lookups
    const isOverallHealthy =
      activeProviders.length > 0 && unhealthyCount < activeProviders.length;

    return this.getStatus('providers', isOverallHealthy, {
      total: activeProviders.length,
      healthy: activeProviders.length - unhealthyCount,
      unhealthy: unhealthyCount,
      providers: providersStatus,
      message: isOverallHealthy
        ? unhealthyCount === 0
          ? 'All providers healthy'
          : `${unhealthyCount} provider(s) unhealthy`
        : 'No provider available',
    });
  }

  /**
   * Paid orders waiting for manual reconciliation. Reported, never fails the check.
   */
  async checkRenewalBacklog(): Promise<HealthIndicatorResult> {
    const orders = await this.renewalRepository.findOrdersByStatus([
      RenewalOrderStatus.PAID,
      RenewalOrderStatus.PROVIDER_FAILED,
    ]);
    const staleAfterMs = this.limitsService.getStalePaidOrderMinutes() * 60_000;
    const now = Date.now();

    const providerFailed = orders.filter(
      (order) => order.status === RenewalOrderStatus.PROVIDER_FAILED,
    ).length;
    const stalePaid = orders.filter(
      (order) =>
        order.status === RenewalOrderStatus.PAID &&
        now - order.updatedAt.getTime() > staleAfterMs,
    ).length;

    return this.getStatus('renewals', true, {
      providerFailed,
      stalePaid,
    });
  }
}
