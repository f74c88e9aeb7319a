import { makeProviderRecord } from '../../../../test/fixtures/provider-record.factory';
import { ActivationStatus, ProviderId } from '../../../domain/esim';
import { MAX_COMPLETENESS_SCORE, scoreRecord } from './completeness-scorer';

describe('scoreRecord', () => {
  it('scores a missing record as 0', () => {
    expect(scoreRecord(null)).toBe(0);
  });

  it('gives 30 for a bare record', () => {
    expect(scoreRecord(makeProviderRecord(ProviderId.AIRHUB))).toBe(30);
  });

  it('adds 50 per non-zero usage figure and 20 for an active status', () => {
    const record = makeProviderRecord(ProviderId.ESIMCARD, {
      dataConsumed: { value: 0.5, unit: 'GB' },
      dataRemaining: { value: 1.5, unit: 'GB' },
      activationStatus: ActivationStatus.ENABLED,
    });

    expect(scoreRecord(record)).toBe(150);
    expect(MAX_COMPLETENESS_SCORE).toBe(150);
  });

  it('ignores zero usage', () => {
    const record = makeProviderRecord(ProviderId.TRAVELROAM, {
      dataConsumed: { value: 0, unit: 'GB' },
      dataRemaining: { value: 0, unit: 'MB' },
      activationStatus: ActivationStatus.INSTALLED,
    });

    expect(scoreRecord(record)).toBe(50);
  });

  it('does not reward inactive statuses', () => {
    const record = makeProviderRecord(ProviderId.AIRHUB, {
      activationStatus: ActivationStatus.EXPIRED,
    });

    expect(scoreRecord(record)).toBe(30);
  });

  it('increases strictly with each usage figure', () => {
    const base = makeProviderRecord(ProviderId.AIRHUB);
    const withConsumed = { ...base, dataConsumed: { value: 1, unit: 'GB' as const } };
    const withBoth = {
      ...withConsumed,
      dataRemaining: { value: 2, unit: 'GB' as const },
    };

    expect(scoreRecord(withConsumed)).toBeGreaterThan(scoreRecord(base));
    expect(scoreRecord(withBoth)).toBeGreaterThan(scoreRecord(withConsumed));
  });
});
