import { ProviderId } from '../../../domain/esim';
import { CreateRenewalOrderDto } from '../dto/create-renewal-order.dto';
import { toRenewalContext } from './renewal.controller';

function body(overrides: Partial<CreateRenewalOrderDto>): CreateRenewalOrderDto {
  return Object.assign(new CreateRenewalOrderDto(), {
    iccid: '8944500000001234567',
    provider: ProviderId.AIRHUB,
    amount: 9.99,
    ...overrides,
  });
}

describe('toRenewalContext', () => {
  it('maps the AirHub order reference and renewal period', () => {
    expect(
      toRenewalContext(body({ orderSimId: 'ORD-1', renewalDays: 14 })),
    ).toEqual({
      orderReference: 'ORD-1',
      renewalDays: '14',
      packageId: undefined,
      bundleId: undefined,
      planLabel: undefined,
      countryCode: undefined,
      deviceIdentifier: undefined,
    });
  });

  it('uses the package id as the TravelRoam bundle', () => {
    const context = toRenewalContext(
      body({
        provider: ProviderId.TRAVELROAM,
        packageId: 'esim_1gb_7d_tr_u',
        planName: 'eSIM, 1GB, 7 Days, Turkey, V2',
        countryCode: 'tr',
      }),
    );

    expect(context).toMatchObject({
      packageId: 'esim_1gb_7d_tr_u',
      bundleId: 'esim_1gb_7d_tr_u',
      planLabel: 'eSIM, 1GB, 7 Days, Turkey, V2',
      countryCode: 'TR',
    });
  });

  it('leaves the bundle unset for other providers', () => {
    expect(
      toRenewalContext(body({ provider: ProviderId.ESIMCARD, packageId: 'PKG-5GB' }))
        .bundleId,
    ).toBeUndefined();
  });
});
