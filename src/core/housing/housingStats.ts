import type { HousingStats } from "./housing.types";

export type IndexPoint = {
  date: string; // YYYY-MM-DD
  value: number;
};

const shiftOneYearBack = (date: string): string => {
  const parsed = new Date(`${date}T00:00:00.000Z`);
  parsed.setUTCFullYear(parsed.getUTCFullYear() - 1);
  return parsed.toISOString().slice(0, 10);
};

const percentChange = (from: number, to: number): number => (from > 0 ? ((to - from) / from) * 100 : 0);

/**
 * KPIs for one (region, category) series.
 * The year-ago reference is the latest point at or before one year before the
 * latest point, falling back to the earliest point when the series is shorter.
 */
export const computeHousingStats = (points: IndexPoint[]): HousingStats | undefined => {
  if (points.length === 0) return undefined;

  const sorted = [...points].sort((a, b) => a.date.localeCompare(b.date));
  const first = sorted[0];
  const last = sorted[sorted.length - 1];

  const yearAgoCutoff = shiftOneYearBack(last.date);
  const yearAgo = sorted.filter((point) => point.date <= yearAgoCutoff).pop() ?? first;

  const values = sorted.map((point) => point.value);

  return {
    last_month_index: last.value,
    last_month_date: last.date,
    change_from_start_percentage: percentChange(first.value, last.value),
    last_year_increase_percentage: percentChange(yearAgo.value, last.value),
    max_value: Math.max(...values),
    min_value: Math.min(...values)
  };
};
