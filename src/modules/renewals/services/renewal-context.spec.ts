import { TEST_ICCID } from '../../../../test/fixtures/provider-record.factory';
import { MissingProviderContextError } from '../../../core/errors/esim.errors';
import { ProviderId } from '../../../domain/esim';
import { prepareRenewalContext, withoutFailureDetails } from './renewal-context';

describe('prepareRenewalContext', () => {
  it('defaults the AirHub renewal period and records the charged amount', () => {
    expect(
      prepareRenewalContext({
        iccid: TEST_ICCID,
        provider: ProviderId.AIRHUB,
        amount: 4.5,
        context: { providerOrderReference: 'ORD-7', renewalDays: '' },
      }),
    ).toEqual({
      providerContext: {
        providerOrderReference: 'ORD-7',
        orderReference: 'ORD-7',
        renewalDays: '7',
        chargedAmount: '4.50',
      },
      providerOrderReference: 'ORD-7',
    });
  });

  it('uses the ICCID as the eSIMCard device identifier', () => {
    expect(
      prepareRenewalContext({
        iccid: TEST_ICCID,
        provider: ProviderId.ESIMCARD,
        amount: 8,
        context: { packageId: 'PKG-5GB', simId: 'sim-1' },
      }),
    ).toEqual({
      providerContext: {
        packageId: 'PKG-5GB',
        simId: 'sim-1',
        deviceIdentifier: TEST_ICCID,
      },
      providerOrderReference: 'sim-1',
    });
  });

  it('accepts a TravelRoam plan label in place of a bundle id', () => {
    const prepared = prepareRenewalContext({
      iccid: TEST_ICCID,
      provider: ProviderId.TRAVELROAM,
      amount: 3,
      context: { planLabel: 'eSIM, 1GB, 7 Days, Turkey, V2', countryCode: 'TR' },
    });

    expect(prepared.providerContext).toEqual({
      planLabel: 'eSIM, 1GB, 7 Days, Turkey, V2',
      countryCode: 'TR',
      iccid: TEST_ICCID,
    });
  });

  it.each([
    [ProviderId.AIRHUB, ['orderReference']],
    [ProviderId.ESIMCARD, ['packageId']],
    [ProviderId.TRAVELROAM, ['bundleId']],
  ])('names the missing %s keys', (provider, missingKeys) => {
    let caught: unknown;
    try {
      prepareRenewalContext({ iccid: TEST_ICCID, provider, amount: 1, context: {} });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(MissingProviderContextError);
    expect(caught).toMatchObject({ missingKeys });
  });
});

describe('withoutFailureDetails', () => {
  it('drops the keys a failed fulfillment wrote', () => {
    expect(
      withoutFailureDetails({
        bundleId: 'esim_1gb_7d_tr_u',
        failureReason: 'boom',
        failureStep: 'fulfill',
        paymentCaptured: 'true',
      }),
    ).toEqual({ bundleId: 'esim_1gb_7d_tr_u' });
  });
});
