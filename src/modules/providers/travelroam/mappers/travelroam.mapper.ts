/**
 * TravelRoam Mapper
 *
 * Combines eSIM details, the first applied bundle and the current network
 * location into a provider record. Bundle quantities arrive in bytes and are
 * reported in GB.
 */

import { logger } from '../../../../core/logger/logger.config';
import {
  bytesToGigabytes,
  quantity,
} from '../../../../core/utils/data-quantity.util';
import {
  parseActivationStatus,
  parseTimestamp,
  presentText,
  wholeDaysBetween,
} from '../../../../core/utils/field-normalization.util';
import { ProviderId, ProviderRecord } from '../../../../domain/esim';
import {
  TravelroamAppliedBundleDto,
  TravelroamAssignmentDto,
  TravelroamEsimDetailsDto,
  TravelroamLocationDto,
} from '../dto/travelroam-responses.dto';

const mapperLogger = logger();

export class TravelroamMapper {
  static toProviderRecord(
    details: TravelroamEsimDetailsDto,
    bundles: TravelroamAppliedBundleDto[],
    location: TravelroamLocationDto | null,
    queriedIccid: string,
  ): ProviderRecord {
    const bundle = bundles[0];
    const assignment = bundle ? this.dataAssignment(bundle) : undefined;
    const usage = assignment ? this.usage(assignment, queriedIccid) : null;
    const bundleStartTime = parseTimestamp(assignment?.startTime);
    const bundleEndTime = parseTimestamp(assignment?.endTime);

    return {
      providerId: ProviderId.TRAVELROAM,
      externalId: presentText(details.matchingId),
      iccid: presentText(details.iccid) ?? queriedIccid,
      planLabel:
        presentText(bundle?.description) || presentText(bundle?.name),
      activationStatus: parseActivationStatus(details.profileStatus),
      purchasedAt: parseTimestamp(details.firstInstalledDateTime),
      validityDays:
        bundleStartTime && bundleEndTime
          ? wholeDaysBetween(bundleStartTime, bundleEndTime)
          : null,
      dataCapacity: usage?.capacity ?? null,
      dataConsumed: usage?.consumed ?? null,
      dataRemaining: usage?.remaining ?? null,
      activationCode: presentText(details.smdpAddress),
      accessPointName: location ? this.accessPointName(location) : null,
      bundleStartTime,
      bundleEndTime,
    };
  }

  /**
   * "<network> (<country>)", or just the network when no country is known
   */
  static accessPointName(location: TravelroamLocationDto): string | null {
    const network =
      presentText(location.networkName) || presentText(location.networkBrandName);
    if (!network) return null;

    const country = presentText(location.country);
    return country ? `${network} (${country})` : network;
  }

  private static dataAssignment(
    bundle: TravelroamAppliedBundleDto,
  ): TravelroamAssignmentDto | undefined {
    return bundle.assignments?.find(
      (assignment) => assignment.callTypeGroup?.toLowerCase() === 'data',
    );
  }

  private static usage(assignment: TravelroamAssignmentDto, iccid: string) {
    const initialBytes = assignment.initialQuantity ?? 0;
    if (initialBytes <= 0) return null;

    const capacity = bytesToGigabytes(initialBytes);
    const remainingBytes = assignment.remainingQuantity;
    if (remainingBytes === undefined) {
      return { capacity, consumed: null, remaining: null };
    }

    const remaining = bytesToGigabytes(remainingBytes);
    let consumed = quantity(capacity.value - remaining.value, 'GB');

    if (consumed.value < 0) {
      mapperLogger.warn(
        { provider: ProviderId.TRAVELROAM, iccid, initialBytes, remainingBytes },
        'Remaining data exceeds initial quantity, consumed clamped to 0',
      );
      consumed = quantity(0, 'GB');
    }

    return { capacity, consumed, remaining };
  }
}
