import { Module } from '@nestjs/common';
import { CoreModule } from '../../core/core.module';
import { PAYMENT_GATEWAY } from '../../domain/esim';
import { AirhubModule } from '../providers/airhub/airhub.module';
import { EsimcardModule } from '../providers/esimcard/esimcard.module';
import { TravelroamModule } from '../providers/travelroam/travelroam.module';
import { StripePaymentGateway } from './adapters/stripe-payment-gateway.service';
import { RenewalController } from './controllers/renewal.controller';
import { InMemoryRenewalOrderRepository } from './repositories/in-memory-renewal-order.repository';
import { RenewalOrderRepository } from './repositories/renewal-order.repository';
import { RenewalAuditService } from './services/renewal-audit.service';
import { RenewalOrderStateMachineService } from './services/renewal-order-state-machine.service';

/**
 * Renewals Module - paid plan renewals
 *
 * Order lifecycle: create -> checkout -> confirm payment -> provider renewal.
 *
 * Endpoints:
 * - GET /api/esim/renewal/packages
 * - POST /api/esim/renewal/create
 * - POST /api/esim/renewal/confirm-payment
 * - GET /api/esim/renewal/order/:orderId
 * - POST /api/esim/renewal/order/:orderId/retry-fulfillment
 */
@Module({
  imports: [CoreModule, AirhubModule, EsimcardModule, TravelroamModule],
  providers: [
    { provide: RenewalOrderRepository, useClass: InMemoryRenewalOrderRepository },
    { provide: PAYMENT_GATEWAY, useClass: StripePaymentGateway },
    RenewalOrderStateMachineService,
    RenewalAuditService,
  ],
  controllers: [RenewalController],
  exports: [RenewalOrderRepository, RenewalOrderStateMachineService],
})
export class RenewalsModule {}
