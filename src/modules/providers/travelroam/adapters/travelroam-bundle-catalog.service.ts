import { Injectable } from '@nestjs/common';
import { presentText } from '../../../../core/utils/field-normalization.util';
import {
  BundleCatalog,
  CatalogBundle,
  CatalogQuery,
} from '../../../../domain/esim';
import { TravelroamApiClientService } from './travelroam-api-client.service';

@Injectable()
export class TravelroamBundleCatalog implements BundleCatalog {
  constructor(private readonly travelroamApiClient: TravelroamApiClientService) {}

  async listBundles(query: CatalogQuery): Promise<CatalogBundle[]> {
    const bundles = await this.travelroamApiClient.getCatalog(query);

    return bundles.map((bundle) => ({
      id: bundle.name,
      description: presentText(bundle.description),
      dataAmount: bundle.data ?? null,
      validityDays: bundle.validity ?? null,
      price: bundle.price ?? null,
    }));
  }
}
