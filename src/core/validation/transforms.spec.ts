import { plainToInstance } from 'class-transformer';
import { ToOptionalBoolean, ToOptionalNumber, ToOptionalString } from './transforms';

class Sample {
  @ToOptionalNumber()
  amount?: unknown;

  @ToOptionalString()
  id?: unknown;

  @ToOptionalBoolean()
  active?: unknown;
}

function amountOf(amount: unknown): unknown {
  return plainToInstance(Sample, { amount }).amount;
}

describe('validation transforms', () => {
  describe('ToOptionalNumber', () => {
    it.each([
      ['1.5', 1.5],
      [' 2 ', 2],
      [7, 7],
      ['0', 0],
    ])('reads %p as %p', (raw, expected) => {
      expect(amountOf(raw)).toBe(expected);
    });

    it.each(['N/A', 'n/a', '', '  ', '-', 'null', 'unlimited', null, Number.NaN])(
      'drops %p',
      (raw) => {
        expect(amountOf(raw)).toBeUndefined();
      },
    );

    it('leaves non-scalar values for validation to report', () => {
      expect(amountOf({ value: 1 })).toEqual({ value: 1 });
    });
  });

  it('normalizes numeric ids to strings', () => {
    expect(plainToInstance(Sample, { id: 1001 }).id).toBe('1001');
    expect(plainToInstance(Sample, { id: '' }).id).toBeUndefined();
  });

  it('reads provider flags and drops placeholder flags', () => {
    expect(plainToInstance(Sample, { active: 'Active' }).active).toBe(true);
    expect(plainToInstance(Sample, { active: 0 }).active).toBe(false);
    expect(plainToInstance(Sample, { active: 'N/A' }).active).toBeUndefined();
  });
});
