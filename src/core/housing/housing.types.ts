/**
 * Column names of the housing price index dataset. They double as the
 * table's column names and the JSON field names of the read API.
 */
export const housingCsvColumns = ["tarih", "istanbul_turkiye", "yeni_yeni_olmayan_konut", "fiyat_endeksi"] as const;

export type HousingRow = {
  date: string; // YYYY-MM-DD
  region: string;
  category: string;
  indexValue: number;
};

export type HousingRecord = {
  id: number;
  tarih: string;
  istanbul_turkiye: string;
  yeni_yeni_olmayan_konut: string;
  fiyat_endeksi: number;
  created_at: string;
  updated_at: string;
};

export type HousingFilters = {
  location?: string;
  type?: string;
  startDate?: string;
  endDate?: string;
};

export type HousingStats = {
  last_month_index: number;
  last_month_date: string;
  change_from_start_percentage: number;
  last_year_increase_percentage: number;
  max_value: number;
  min_value: number;
};

export const naturalKeyOf = (row: Pick<HousingRow, "date" | "region" | "category">): string =>
  JSON.stringify([row.date, row.region, row.category]);

const isoDatePattern = /^\d{4}-\d{2}-\d{2}$/;

export const isIsoDate = (value: string): boolean => {
  if (!isoDatePattern.test(value)) return false;
  const parsed = new Date(`${value}T00:00:00.000Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
};
