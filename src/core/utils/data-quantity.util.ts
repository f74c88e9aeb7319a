import { DataQuantity, DataUnit } from '../../domain/esim';

const UNIT_FACTORS: Record<DataUnit, number> = {
  B: 1,
  KB: 1024,
  MB: 1024 ** 2,
  GB: 1024 ** 3,
  TB: 1024 ** 4,
};

const UNIT_ALIASES: Record<string, DataUnit> = {
  B: 'B',
  BYTE: 'B',
  BYTES: 'B',
  K: 'KB',
  KB: 'KB',
  KIB: 'KB',
  M: 'MB',
  MB: 'MB',
  MIB: 'MB',
  G: 'GB',
  GB: 'GB',
  GIB: 'GB',
  T: 'TB',
  TB: 'TB',
  TIB: 'TB',
};

const QUANTITY_PATTERN = /^(-?\d+(?:\.\d+)?)\s*([A-Za-z]*)$/;

export function parseDataUnit(raw: string | null | undefined): DataUnit | null {
  if (!raw) return null;
  return UNIT_ALIASES[raw.trim().toUpperCase()] ?? null;
}

export function quantity(value: number, unit: DataUnit): DataQuantity {
  return { value, unit };
}

/**
 * Parses "1.5 GB", "500MB", "0" or a bare number. A value without a unit
 * takes `defaultUnit`. Unparseable input yields null.
 */
export function parseDataQuantity(
  raw: string | number | null | undefined,
  defaultUnit: DataUnit = 'GB',
): DataQuantity | null {
  if (raw === null || raw === undefined) return null;

  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? quantity(raw, defaultUnit) : null;
  }

  const match = QUANTITY_PATTERN.exec(raw.trim());
  if (!match) return null;

  const unit = match[2] ? parseDataUnit(match[2]) : defaultUnit;
  if (!unit) return null;

  return quantity(Number(match[1]), unit);
}

export function convertDataQuantity(
  source: DataQuantity,
  unit: DataUnit,
): DataQuantity {
  if (source.unit === unit) return source;
  return quantity((source.value * UNIT_FACTORS[source.unit]) / UNIT_FACTORS[unit], unit);
}

export function bytesToGigabytes(bytes: number): DataQuantity {
  return convertDataQuantity(quantity(bytes, 'B'), 'GB');
}

export function roundQuantity(source: DataQuantity, decimals = 2): DataQuantity {
  const factor = 10 ** decimals;
  return quantity(Math.round(source.value * factor) / factor, source.unit);
}

/**
 * Null and zero values count as "no usage data"
 */
export function isZeroLike(value: DataQuantity | null): boolean {
  return value === null || value.value === 0;
}

/**
 * @example formatDataQuantity({ value: 1, unit: 'GB' }) // "1.00 GB"
 */
export function formatDataQuantity(value: DataQuantity | null): string | null {
  if (!value) return null;
  return `${value.value.toFixed(2)} ${value.unit}`;
}
