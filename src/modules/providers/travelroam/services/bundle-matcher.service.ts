import { Inject, Injectable } from '@nestjs/common';
import { logger } from '../../../../core/logger/logger.config';
import {
  BUNDLE_CATALOG,
  BundleCatalog,
  CatalogBundle,
  CatalogQuery,
} from '../../../../domain/esim';
import countryCodes from '../data/country-codes.json';

const DATA_TOKEN = /(\d+)\s*GB/i;
const DURATION_TOKEN = /(\d+)\s*Day/i;
const COUNTRY_NAME = /,\s*([A-Za-z\s]+),/;

const COUNTRY_CODES: Record<string, string> = countryCodes;

export interface PlanTokens {
  /**
   * Data amount in GB, e.g. "1" for "1GB"
   */
  dataAmount: string | null;
  durationDays: string | null;
  countryName: string | null;

  /**
   * Upper-case ISO code, given or resolved from `countryName`
   */
  countryCode: string | null;
}

/**
 * Finds the catalog bundle to order when renewing a plan that only has a label.
 *
 * First pass: a bundle whose description equals, contains or is contained in
 * the label (case-insensitive). Second pass: a bundle whose identifier contains
 * "<N>gb", "<D>d" and, when a country code is known, the lower-cased code.
 * The first qualifying bundle wins.
 */
@Injectable()
export class BundleMatcherService {
  private readonly logger = logger();

  constructor(@Inject(BUNDLE_CATALOG) private readonly catalog: BundleCatalog) {}

  extractTokens(planLabel: string, countryCode?: string | null): PlanTokens {
    const dataAmount = DATA_TOKEN.exec(planLabel)?.[1] ?? null;
    const durationDays = DURATION_TOKEN.exec(planLabel)?.[1] ?? null;

    const explicitCode = countryCode?.trim().toUpperCase() || null;
    if (explicitCode) {
      return { dataAmount, durationDays, countryName: null, countryCode: explicitCode };
    }

    const countryName = COUNTRY_NAME.exec(planLabel)?.[1]?.trim() || null;
    const resolvedCode = countryName
      ? COUNTRY_CODES[countryName.toLowerCase()] ?? null
      : null;

    return { dataAmount, durationDays, countryName, countryCode: resolvedCode };
  }

  async findBundle(
    planLabel: string,
    countryCode?: string | null,
  ): Promise<string | null> {
    const tokens = this.extractTokens(planLabel, countryCode);

    const query: CatalogQuery = tokens.countryCode
      ? { countries: tokens.countryCode }
      : { description: tokens.dataAmount ? `${tokens.dataAmount}GB` : undefined };

    this.logger.info({ planLabel, ...tokens, query }, 'Searching bundle catalog');

    const bundles = await this.catalog.listBundles(query);
    const match = this.selectBundle(planLabel, tokens, bundles);

    if (!match) {
      this.logger.warn(
        { planLabel, candidates: bundles.length },
        'No matching bundle found',
      );
      return null;
    }

    this.logger.info({ planLabel, bundleId: match.id }, 'Matched bundle');
    return match.id;
  }

  selectBundle(
    planLabel: string,
    tokens: PlanTokens,
    bundles: CatalogBundle[],
  ): CatalogBundle | null {
    const label = planLabel.trim().toLowerCase();

    const byDescription = bundles.find((bundle) => {
      const description = bundle.description?.trim().toLowerCase();
      if (!description || !label) return false;
      return description.includes(label) || label.includes(description);
    });
    if (byDescription) return byDescription;

    const { dataAmount, durationDays, countryCode } = tokens;
    if (!dataAmount || !durationDays) return null;

    return (
      bundles.find((bundle) => {
        const id = bundle.id.toLowerCase();
        return (
          id.includes(`${dataAmount}gb`) &&
          id.includes(`${durationDays}d`) &&
          (!countryCode || id.includes(countryCode.toLowerCase()))
        );
      }) ?? null
    );
  }
}
