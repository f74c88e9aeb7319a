/**
 * eSIMCard Mapper
 *
 * Converts eSIMCard SIM details and package usage into provider records.
 * Consumed data is derived: initial quantity (converted to the remaining
 * quantity's unit) minus remaining, rounded to 2 decimals and floored at 0.
 */

import { logger } from '../../../../core/logger/logger.config';
import {
  convertDataQuantity,
  parseDataUnit,
  quantity,
  roundQuantity,
} from '../../../../core/utils/data-quantity.util';
import {
  parseActivationStatus,
  parseTimestamp,
  parseValidityDays,
  presentText,
} from '../../../../core/utils/field-normalization.util';
import {
  DataQuantity,
  ProviderId,
  ProviderRecord,
} from '../../../../domain/esim';
import {
  EsimcardPackageUsageDto,
  EsimcardSimDetailsDto,
  EsimcardSimSummaryDto,
} from '../dto/esimcard-responses.dto';

const mapperLogger = logger();

interface PackageFigures {
  capacity: DataQuantity | null;
  consumed: DataQuantity | null;
  remaining: DataQuantity | null;
}

export class EsimcardMapper {
  static simIccid(sim: EsimcardSimSummaryDto): string | null {
    return presentText(sim.iccid) || presentText(sim.ICCID);
  }

  static toProviderRecord(
    summary: EsimcardSimSummaryDto,
    details: EsimcardSimDetailsDto | null,
    usage: EsimcardPackageUsageDto | null,
    queriedIccid: string,
  ): ProviderRecord {
    const sim = details?.sim;
    const usagePackage =
      details?.in_use_packages?.[0] ?? details?.assigned_packages?.[0] ?? usage;
    const figures = usagePackage
      ? this.packageFigures(usagePackage, queriedIccid)
      : { capacity: null, consumed: null, remaining: null };
    const planLabel = presentText(sim?.last_bundle);

    return {
      providerId: ProviderId.ESIMCARD,
      externalId: presentText(sim?.id) || presentText(summary.id),
      iccid:
        (sim && this.simIccid(sim)) || this.simIccid(summary) || queriedIccid,
      planLabel,
      activationStatus: parseActivationStatus(sim?.status ?? summary.status),
      purchasedAt: parseTimestamp(sim?.created_at),
      validityDays: usagePackage ? parseValidityDays(planLabel) : null,
      dataCapacity: figures.capacity,
      dataConsumed: figures.consumed,
      dataRemaining: figures.remaining,
      activationCode:
        presentText(sim?.qr_code_text) ||
        presentText(sim?.qr_code) ||
        presentText(sim?.activation_code) ||
        presentText(sim?.lpa),
      accessPointName: presentText(sim?.apn),
      bundleStartTime: null,
      bundleEndTime: null,
    };
  }

  static packageFigures(
    usagePackage: EsimcardPackageUsageDto,
    iccid: string,
  ): PackageFigures {
    const initialUnit = parseDataUnit(usagePackage.initial_data_unit) ?? 'GB';
    const remainingUnit = parseDataUnit(usagePackage.rem_data_unit) ?? 'GB';

    const capacity =
      usagePackage.initial_data_quantity !== undefined
        ? quantity(usagePackage.initial_data_quantity, initialUnit)
        : null;

    if (!capacity || capacity.value === 0 || usagePackage.rem_data_quantity === undefined) {
      return { capacity, consumed: null, remaining: null };
    }

    const remaining = quantity(usagePackage.rem_data_quantity, remainingUnit);
    const consumed = roundQuantity(
      quantity(
        convertDataQuantity(capacity, remainingUnit).value - remaining.value,
        remainingUnit,
      ),
    );

    if (consumed.value < 0) {
      mapperLogger.warn(
        {
          provider: ProviderId.ESIMCARD,
          iccid,
          initial: capacity,
          remaining,
        },
        'Remaining data exceeds initial quantity, consumed clamped to 0',
      );
      return { capacity, consumed: quantity(0, remainingUnit), remaining };
    }

    return { capacity, consumed, remaining };
  }
}
