import { asc } from 'drizzle-orm';
import type { Database } from '../db/client.js';
import { applianceCatalog } from '../db/schema.js';
import type { ApplianceCatalog, ApplianceCatalogEntry } from '../types/index.js';

export interface ApplianceRepository {
  listCatalog(): Promise<ApplianceCatalogEntry[]>;
}

export class DrizzleApplianceRepository implements ApplianceRepository {
  constructor(private readonly db: Database) {}

  async listCatalog(): Promise<ApplianceCatalogEntry[]> {
    return this.db
      .selectDistinct({
        category: applianceCatalog.category,
        subCategory: applianceCatalog.subCategory,
        brand: applianceCatalog.brand,
        modelNumber: applianceCatalog.modelNumber,
      })
      .from(applianceCatalog)
      .orderBy(asc(applianceCatalog.subCategory), asc(applianceCatalog.brand), asc(applianceCatalog.modelNumber));
  }
}

/**
 * Group catalog rows as `subCategory → brand → modelNumber[]`. The keys are the
 * specializations an engineer may claim.
 */
export function groupCatalog(entries: ApplianceCatalogEntry[]): ApplianceCatalog {
  const catalog: ApplianceCatalog = {};

  for (const { subCategory, brand, modelNumber } of entries) {
    const brands = (catalog[subCategory] ??= {});
    const models = (brands[brand] ??= []);
    if (!models.includes(modelNumber)) {
      models.push(modelNumber);
    }
  }

  return catalog;
}
