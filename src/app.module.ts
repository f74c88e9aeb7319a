import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { TerminusModule } from '@nestjs/terminus';
import { AppController } from './app.controller';
import { paymentsConfig } from './config/payments.config';
import { providersConfig } from './config/providers.config';
import { CoreModule } from './core/core.module';
import { HealthModule } from './modules/health/health.module';
import { AirhubModule } from './modules/providers/airhub/airhub.module';
import { EsimcardModule } from './modules/providers/esimcard/esimcard.module';
import { TravelroamModule } from './modules/providers/travelroam/travelroam.module';
import { ReconciliationModule } from './modules/reconciliation/reconciliation.module';
import { RenewalsModule } from './modules/renewals/renewals.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env.local', '.env'],
      load: [providersConfig, paymentsConfig],
    }),
    CoreModule,
    ScheduleModule.forRoot(),
    TerminusModule,
    AirhubModule,
    EsimcardModule,
    TravelroamModule,
    ReconciliationModule,
    RenewalsModule,
    HealthModule,
  ],
  controllers: [AppController],
  providers: [],
})
export class AppModule {}
