/**
 * Bundle catalog of the roaming provider
 */

export const BUNDLE_CATALOG = Symbol('BUNDLE_CATALOG');

export interface CatalogBundle {
  /**
   * Bundle identifier used when ordering
   *
   * @example "esim_1GB_7D_TR_U"
   */
  id: string;

  /**
   * Display name
   *
   * @example "eSIM, 1GB, 7 Days, Turkey, V2"
   */
  description: string | null;

  dataAmount: number | null;
  validityDays: number | null;
  price: number | null;
}

export interface CatalogQuery {
  /**
   * Comma-separated ISO country codes
   */
  countries?: string;
  description?: string;
}

export interface BundleCatalog {
  listBundles(query: CatalogQuery): Promise<CatalogBundle[]>;
}
