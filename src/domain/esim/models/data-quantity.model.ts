/**
 * Data quantity value object
 *
 * Units are binary multiples (1 GB = 1024 MB = 1024^3 B).
 */

export const DATA_UNITS = ['B', 'KB', 'MB', 'GB', 'TB'] as const;

export type DataUnit = (typeof DATA_UNITS)[number];

export interface DataQuantity {
  value: number;
  unit: DataUnit;
}
