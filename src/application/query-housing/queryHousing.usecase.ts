import { isIsoDate, type HousingFilters, type HousingRecord, type HousingStats } from "../../core/housing/housing.types";
import { computeHousingStats } from "../../core/housing/housingStats";
import type { HousingRepository } from "../../ports/HousingRepository";

export class InvalidQueryError extends Error {
  readonly code = "invalid_query";

  constructor(message: string) {
    super(message);
    this.name = "InvalidQueryError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

const normalizeOptionalString = (value: string | null | undefined): string | undefined => {
  if (typeof value !== "string") return undefined;
  const normalized = value.trim();
  return normalized === "" ? undefined : normalized;
};

export type RawHousingQuery = {
  location?: string | null;
  type?: string | null;
  start_date?: string | null;
  end_date?: string | null;
};

/**
 * Blank parameters count as absent; dates must be YYYY-MM-DD.
 */
export const resolveHousingFilters = (raw: RawHousingQuery): HousingFilters => {
  const filters: HousingFilters = {};
  const location = normalizeOptionalString(raw.location);
  const type = normalizeOptionalString(raw.type);
  const startDate = normalizeOptionalString(raw.start_date);
  const endDate = normalizeOptionalString(raw.end_date);

  if (startDate != null && !isIsoDate(startDate)) {
    throw new InvalidQueryError("start_date must be a YYYY-MM-DD date");
  }
  if (endDate != null && !isIsoDate(endDate)) {
    throw new InvalidQueryError("end_date must be a YYYY-MM-DD date");
  }

  if (location != null) filters.location = location;
  if (type != null) filters.type = type;
  if (startDate != null) filters.startDate = startDate;
  if (endDate != null) filters.endDate = endDate;
  return filters;
};

export type RawChartQuery = RawHousingQuery & { chart_type?: string | null };

/**
 * Comparison charts pin one dimension and let the other vary: region
 * comparisons need a category, category comparisons need a region.
 * Any other chart_type reads like the plain data query.
 */
export const resolveChartFilters = (raw: RawChartQuery): HousingFilters => {
  const filters = resolveHousingFilters(raw);
  const chartType = normalizeOptionalString(raw.chart_type);
  if (chartType === "comparison_location" && filters.type == null) {
    throw new InvalidQueryError("type parameter is required for comparison_location");
  }
  if (chartType === "comparison_type" && filters.location == null) {
    throw new InvalidQueryError("location parameter is required for comparison_type");
  }
  return filters;
};

export const queryHousing = async (
  deps: { repo: HousingRepository },
  filters: HousingFilters
): Promise<HousingRecord[]> => deps.repo.query(filters);

export const housingStats = async (
  deps: { repo: HousingRepository },
  raw: Pick<RawHousingQuery, "location" | "type">
): Promise<HousingStats | undefined> => {
  const location = normalizeOptionalString(raw.location);
  const type = normalizeOptionalString(raw.type);
  if (location == null || type == null) {
    throw new InvalidQueryError("location and type parameters are required for stats");
  }

  const points = await deps.repo.series(location, type);
  return computeHousingStats(points);
};
