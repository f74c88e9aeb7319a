import { Controller, Get } from '@nestjs/common';
import {
  HealthCheck,
  HealthCheckService,
  MemoryHealthIndicator,
} from '@nestjs/terminus';
import { HealthService } from './health.service';

const HEAP_LIMIT_BYTES = 150 * 1024 * 1024;
const RSS_LIMIT_BYTES = 300 * 1024 * 1024;

/**
 * GET /api/health
 *
 * Fails when memory limits are exceeded, when a provider breaker is open or
 * when no enabled provider is healthy. The renewal backlog is informational.
 */
@Controller('health')
export class HealthController {
  constructor(
    private readonly health: HealthCheckService,
    private readonly memory: MemoryHealthIndicator,
    private readonly healthService: HealthService,
  ) {}

  @Get()
  @HealthCheck()
  check() {
    return this.health.check([
      () => this.memory.checkHeap('memory_heap', HEAP_LIMIT_BYTES),
      () => this.memory.checkRSS('memory_rss', RSS_LIMIT_BYTES),
      () => this.healthService.checkCircuitBreakers(),
      () => this.healthService.checkProviders(),
      () => this.healthService.checkRenewalBacklog(),
    ]);
  }
}
