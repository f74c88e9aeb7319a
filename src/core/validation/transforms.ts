import { Transform } from 'class-transformer';
import { isPlaceholder } from '../utils/field-normalization.util';

function isBlank(value: unknown): boolean {
  return (
    value === null ||
    value === undefined ||
    (typeof value === 'string' && isPlaceholder(value))
  );
}

/**
 * Upstream APIs mix numeric and string ids; normalize to string
 */
export const ToOptionalString = () =>
  Transform(({ value }: { value: unknown }) =>
    value === null || value === undefined || value === '' ? undefined : String(value),
  );

/**
 * "1.5", 1.5 and " 1.5 " become 1.5. Placeholders ("N/A", "-", "") and any
 * other text that is not a number become undefined, so one unusable figure
 * never rejects the whole response. Non-scalar values are left for
 * validation to report.
 */
export const ToOptionalNumber = () =>
  Transform(({ value }: { value: unknown }) => {
    if (isBlank(value)) return undefined;
    if (typeof value === 'number') {
      return Number.isFinite(value) ? value : undefined;
    }
    if (typeof value === 'string') {
      const parsed = Number(value.trim());
      return Number.isFinite(parsed) ? parsed : undefined;
    }
    return value;
  });

export const ToOptionalBoolean = () =>
  Transform(({ value }: { value: unknown }) => {
    if (isBlank(value)) return undefined;
    if (typeof value === 'string') {
      return ['true', '1', 'yes', 'active'].includes(value.trim().toLowerCase());
    }
    if (typeof value === 'number') return value !== 0;
    return value;
  });
