import {
  BadRequestException,
  Body,
  Controller,
  Get,
  Headers,
  HttpCode,
  HttpStatus,
  Inject,
  Param,
  Post,
  Query,
  UnauthorizedException,
  UseInterceptors,
} from '@nestjs/common';
import { Timeout } from '../../../core/timeout/timeout.decorator';
import { TimeoutInterceptor } from '../../../core/timeout/timeout.interceptor';
import { sanitizeIccid } from '../../../core/utils/iccid.util';
import {
  BUNDLE_CATALOG,
  BundleCatalog,
  CatalogBundle,
  ProviderId,
} from '../../../domain/esim';
import { ConfirmPaymentDto } from '../dto/confirm-payment.dto';
import {
  CreateRenewalOrderDto,
  CreateRenewalOrderResponseDto,
} from '../dto/create-renewal-order.dto';
import {
  ConfirmPaymentResponseDto,
  RenewalOrderResponseDto,
  toConfirmPaymentResponse,
  toRenewalOrderResponse,
} from '../dto/renewal-order-response.dto';
import { RenewalPackagesQueryDto } from '../dto/renewal-packages-query.dto';
import { RenewalOrderRepository } from '../repositories/renewal-order.repository';
import { RenewalOrderStateMachineService } from '../services/renewal-order-state-machine.service';

@Controller('esim/renewal')
@UseInterceptors(TimeoutInterceptor)
export class RenewalController {
  constructor(
    private readonly stateMachine: RenewalOrderStateMachineService,
    private readonly repository: RenewalOrderRepository,
    @Inject(BUNDLE_CATALOG) private readonly catalog: BundleCatalog,
  ) {}

  /**
   * GET /api/esim/renewal/packages
   *
   * TravelRoam bundles, optionally filtered by country or description
   */
  @Get('packages')
  @Timeout(60000)
  async getPackages(
    @Query() query: RenewalPackagesQueryDto,
  ): Promise<CatalogBundle[]> {
    return this.catalog.listBundles({
      countries: query.countries,
      description: query.description,
    });
  }

  /**
   * POST /api/esim/renewal/create
   *
   * Creates a PENDING order and its checkout session. The customer pays on
   * `checkoutUrl` and comes back with the session id for /confirm-payment.
   */
  @Post('create')
  @Timeout(60000)
  async create(
    @Body() body: CreateRenewalOrderDto,
  ): Promise<CreateRenewalOrderResponseDto> {
    const iccid = sanitizeIccid(body.iccid);
    if (!iccid) {
      throw new BadRequestException('Invalid ICCID format');
    }

    const order = await this.stateMachine.create({
      iccid,
      provider: body.provider,
      amount: body.amount,
      currency: body.currency ?? 'USD',
      context: toRenewalContext(body),
      customerEmail: body.customerEmail,
    });

    const payment = await this.stateMachine.initiatePayment(
      order.orderId,
      body.packageName,
    );

    return {
      orderId: order.orderId,
      sessionId: payment.checkoutHandle,
      checkoutUrl: payment.redirectUrl,
      amount: order.amount,
      currency: order.currency,
    };
  }

  /**
   * POST /api/esim/renewal/confirm-payment
   *
   * Confirms the checkout and runs the provider renewal. A provider failure
   * after payment is reported in the body with the order in PROVIDER_FAILED.
   */
  @Post('confirm-payment')
  @HttpCode(HttpStatus.OK)
  @Timeout(120000)
  async confirmPayment(
    @Body() body: ConfirmPaymentDto,
  ): Promise<ConfirmPaymentResponseDto> {
    const outcome = await this.stateMachine.confirmAndFulfill(body.sessionId);
    const payment = await this.repository.findPayment(outcome.order.orderId);
    return toConfirmPaymentResponse(outcome, payment);
  }

  /**
   * GET /api/esim/renewal/order/:orderId
   */
  @Get('order/:orderId')
  async getOrder(
    @Param('orderId') orderId: string,
  ): Promise<RenewalOrderResponseDto> {
    const { order, payment } = await this.stateMachine.getOrder(orderId);
    return toRenewalOrderResponse(order, payment);
  }

  /**
   * POST /api/esim/renewal/order/:orderId/retry-fulfillment
   *
   * Operator action for PAID or PROVIDER_FAILED orders
   */
  @Post('order/:orderId/retry-fulfillment')
  @HttpCode(HttpStatus.OK)
  @Timeout(120000)
  async retryFulfillment(
    @Headers('authorization') auth: string | undefined,
    @Param('orderId') orderId: string,
  ): Promise<ConfirmPaymentResponseDto> {
    if (!auth) {
      throw new UnauthorizedException('Authorization header required');
    }

    const outcome = await this.stateMachine.retryFulfillment(orderId);
    const payment = await this.repository.findPayment(orderId);
    return toConfirmPaymentResponse(outcome, payment);
  }
}

export function toRenewalContext(
  body: CreateRenewalOrderDto,
): Record<string, string | undefined> {
  return {
    orderReference: body.orderSimId,
    renewalDays: body.renewalDays?.toString(),
    packageId: body.packageId,
    bundleId: body.provider === ProviderId.TRAVELROAM ? body.packageId : undefined,
    planLabel: body.planName,
    countryCode: body.countryCode?.toUpperCase(),
    deviceIdentifier: body.deviceIdentifier,
  };
}
