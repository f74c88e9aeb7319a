import { isZeroLike } from '../../../core/utils/data-quantity.util';
import { ACTIVE_LIKE_STATUSES, ProviderRecord } from '../../../domain/esim';

export const SCORE_WEIGHTS = {
  consumed: 50,
  remaining: 50,
  found: 30,
  activeStatus: 20,
} as const;

export const MAX_COMPLETENESS_SCORE =
  SCORE_WEIGHTS.consumed +
  SCORE_WEIGHTS.remaining +
  SCORE_WEIGHTS.found +
  SCORE_WEIGHTS.activeStatus;

/**
 * Ranks how useful a provider's record is, usage figures first.
 * A missing record scores 0.
 */
export function scoreRecord(record: ProviderRecord | null): number {
  if (!record) return 0;

  let score = SCORE_WEIGHTS.found;

  if (!isZeroLike(record.dataConsumed)) score += SCORE_WEIGHTS.consumed;
  if (!isZeroLike(record.dataRemaining)) score += SCORE_WEIGHTS.remaining;
  if (ACTIVE_LIKE_STATUSES.includes(record.activationStatus)) {
    score += SCORE_WEIGHTS.activeStatus;
  }

  return score;
}
