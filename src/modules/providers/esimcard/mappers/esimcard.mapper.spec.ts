import { PayloadValidatorService } from '../../../../core/validation/payload-validator.service';
import { ActivationStatus, ProviderId } from '../../../../domain/esim';
import {
  EsimcardSimDetailsResponseDto,
  EsimcardUsageResponseDto,
} from '../dto/esimcard-responses.dto';
import { EsimcardMapper } from './esimcard.mapper';

const ICCID = '8944500000001234567';

describe('EsimcardMapper', () => {
  it('derives consumed data in the remaining unit', () => {
    const record = EsimcardMapper.toProviderRecord(
      { id: 'sim-1', iccid: ICCID, status: 'Active' },
      {
        sim: {
          id: 'sim-1',
          iccid: ICCID,
          status: 'enabled',
          last_bundle: 'Turkey 2GB 7 Days',
          created_at: '2024-03-01 10:00:00',
          qr_code_text: 'N/A',
          lpa: 'LPA:1$smdp.example.test$ABC',
          apn: 'internet',
        },
        in_use_packages: [
          {
            initial_data_quantity: 2,
            initial_data_unit: 'GB',
            rem_data_quantity: 500,
            rem_data_unit: 'MB',
          },
        ],
      },
      null,
      ICCID,
    );

    expect(record).toEqual({
      providerId: ProviderId.ESIMCARD,
      externalId: 'sim-1',
      iccid: ICCID,
      planLabel: 'Turkey 2GB 7 Days',
      activationStatus: ActivationStatus.ENABLED,
      purchasedAt: new Date('2024-03-01T10:00:00.000Z'),
      validityDays: 7,
      dataCapacity: { value: 2, unit: 'GB' },
      dataConsumed: { value: 1548, unit: 'MB' },
      dataRemaining: { value: 500, unit: 'MB' },
      activationCode: 'LPA:1$smdp.example.test$ABC',
      accessPointName: 'internet',
      bundleStartTime: null,
      bundleEndTime: null,
    });
  });

  it('rounds consumed to two decimals', () => {
    const figures = EsimcardMapper.packageFigures(
      {
        initial_data_quantity: 1,
        initial_data_unit: 'GB',
        rem_data_quantity: 0.333333,
        rem_data_unit: 'GB',
      },
      ICCID,
    );

    expect(figures.consumed).toEqual({ value: 0.67, unit: 'GB' });
  });

  it('clamps negative consumption to zero', () => {
    const figures = EsimcardMapper.packageFigures(
      {
        initial_data_quantity: 1,
        initial_data_unit: 'GB',
        rem_data_quantity: 2048,
        rem_data_unit: 'MB',
      },
      ICCID,
    );

    expect(figures.consumed).toEqual({ value: 0, unit: 'MB' });
  });

  it('falls back to the usage endpoint and skips validity without a package', () => {
    const withUsage = EsimcardMapper.toProviderRecord(
      { id: 'sim-2', ICCID: ICCID, status: 'Installed' },
      null,
      {
        initial_data_quantity: 3,
        initial_data_unit: 'GB',
        rem_data_quantity: 1,
        rem_data_unit: 'GB',
      },
      ICCID,
    );
    expect(withUsage.activationStatus).toBe(ActivationStatus.INSTALLED);
    expect(withUsage.dataConsumed).toEqual({ value: 2, unit: 'GB' });

    const bare = EsimcardMapper.toProviderRecord(
      { id: 'sim-3' },
      { sim: { last_bundle: 'Plan 7 Days' } },
      null,
      ICCID,
    );
    expect(bare.validityDays).toBeNull();
    expect(bare.iccid).toBe(ICCID);
    expect(bare.activationStatus).toBe(ActivationStatus.UNKNOWN);
  });

  describe('placeholder figures from the API', () => {
    const validator = new PayloadValidatorService();

    it('accepts a package list with placeholder quantities', async () => {
      const response = await validator.validateWithDto(
        {
          status: true,
          data: {
            sim: { id: 'sim-1', iccid: ICCID, status: 'Active' },
            in_use_packages: [
              {
                initial_data_quantity: 'N/A',
                initial_data_unit: 'GB',
                rem_data_quantity: '-',
                rem_data_unit: 'GB',
              },
            ],
            assigned_packages: [{ initial_data_quantity: '', rem_data_quantity: '1' }],
          },
        },
        EsimcardSimDetailsResponseDto,
      );

      const usagePackage = response.data?.in_use_packages?.[0];
      expect(usagePackage?.initial_data_quantity).toBeUndefined();
      expect(usagePackage?.rem_data_quantity).toBeUndefined();
      expect(response.data?.assigned_packages?.[0]?.rem_data_quantity).toBe(1);

      const record = EsimcardMapper.toProviderRecord(
        { id: 'sim-1' },
        response.data ?? null,
        null,
        ICCID,
      );
      expect(record.externalId).toBe('sim-1');
      expect(record.dataCapacity).toBeNull();
      expect(record.dataConsumed).toBeNull();
      expect(record.dataRemaining).toBeNull();
    });

    it('keeps the capacity when only the remaining figure is a placeholder', async () => {
      const response = await validator.validateWithDto(
        {
          status: 'true',
          data: {
            initial_data_quantity: '3',
            initial_data_unit: 'GB',
            rem_data_quantity: 'N/A',
            rem_data_unit: 'GB',
          },
        },
        EsimcardUsageResponseDto,
      );

      const record = EsimcardMapper.toProviderRecord(
        { id: 'sim-2' },
        null,
        response.data ?? null,
        ICCID,
      );
      expect(record.dataCapacity).toEqual({ value: 3, unit: 'GB' });
      expect(record.dataConsumed).toBeNull();
      expect(record.dataRemaining).toBeNull();
    });
  });
});
