import { HttpModule } from '@nestjs/axios';
import { Global, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { CircuitBreakerService } from './circuit-breaker/circuit-breaker.service';
import { ProcessingLimitsService } from './limits/processing-limits.service';
import { ProvidersModule } from './providers/providers.module';
import { PayloadValidatorService } from './validation/payload-validator.service';

/**
 * Shared plumbing for provider clients: HTTP, breakers, limits, validation
 * and the provider registry
 */
@Global()
@Module({
  imports: [
    ConfigModule,
    HttpModule.registerAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        timeout: Number(configService.get<number | string>('API_CALL_TIMEOUT', 30000)),
        maxRedirects: 5,
      }),
    }),
    ProvidersModule,
  ],
  providers: [
    CircuitBreakerService,
    ProcessingLimitsService,
    PayloadValidatorService,
  ],
  exports: [
    HttpModule,
    CircuitBreakerService,
    ProcessingLimitsService,
    PayloadValidatorService,
    ProvidersModule,
  ],
})
export class CoreModule {}
