import type { HousingFilters, HousingRecord, HousingRow } from "../core/housing/housing.types";
import type { IndexPoint } from "../core/housing/housingStats";

export interface HousingRepository {
  ensureSchema(): Promise<void>;
  // One transaction per call: either every row is written or none is.
  upsertMany(rows: HousingRow[]): Promise<{ rowsAffected: number }>;
  query(filters: HousingFilters): Promise<HousingRecord[]>;
  series(location: string, type: string): Promise<IndexPoint[]>;
}
