/**
 * AirHub Mapper
 *
 * Converts AirHub order and activation payloads into provider records.
 */

import {
  parseDataQuantity,
  parseDataUnit,
  quantity,
} from '../../../../core/utils/data-quantity.util';
import {
  parseTimestamp,
  presentText,
} from '../../../../core/utils/field-normalization.util';
import {
  ActivationStatus,
  ProviderId,
  ProviderRecord,
} from '../../../../domain/esim';
import {
  AirhubActivationDto,
  AirhubOrderDto,
} from '../dto/airhub-responses.dto';

export class AirhubMapper {
  static orderIccid(order: AirhubOrderDto): string | null {
    return (
      presentText(order.simID) ||
      presentText(order.iccid) ||
      presentText(order.ICCID)
    );
  }

  /**
   * @param queriedIccid - used when the order carries no ICCID of its own
   */
  static toProviderRecord(
    order: AirhubOrderDto,
    activation: AirhubActivationDto | null,
    queriedIccid: string,
  ): ProviderRecord {
    const capacityUnit = parseDataUnit(order.capacityUnit) ?? 'GB';

    return {
      providerId: ProviderId.AIRHUB,
      externalId: presentText(order.orderId),
      iccid: this.orderIccid(order) ?? queriedIccid,
      planLabel: presentText(order.planName),
      activationStatus: order.isActive
        ? ActivationStatus.ACTIVE
        : ActivationStatus.INACTIVE,
      purchasedAt: parseTimestamp(order.purchaseDate),
      validityDays:
        order.vaildity !== undefined && order.vaildity > 0
          ? Math.trunc(order.vaildity)
          : null,
      dataCapacity:
        order.capacity !== undefined ? quantity(order.capacity, capacityUnit) : null,
      dataConsumed: parseDataQuantity(presentText(order.dataConsumed), capacityUnit),
      dataRemaining: parseDataQuantity(presentText(order.dataRemaining), capacityUnit),
      activationCode: presentText(activation?.activationCode),
      accessPointName: presentText(activation?.apn),
      bundleStartTime: null,
      bundleEndTime: null,
    };
  }
}
