import type { Pool, PoolClient } from "pg";
import {
  naturalKeyOf,
  type HousingFilters,
  type HousingRecord,
  type HousingRow
} from "../../core/housing/housing.types";
import type { IndexPoint } from "../../core/housing/housingStats";
import type { HousingRepository } from "../../ports/HousingRepository";
import { postgresSchema, schemaLockKeys } from "./postgres.schema";
import { withTransaction } from "./PgPoolFactory";

type HousingDbRow = {
  id: number;
  tarih: string;
  istanbul_turkiye: string;
  yeni_yeni_olmayan_konut: string;
  fiyat_endeksi: string | number;
  created_at: string;
  updated_at: string;
};

// TIMESTAMP columns carry no zone; formatting them in SQL keeps node-pg from reading them as local time.
const timestampText = (column: string) => `to_char(${column}, 'YYYY-MM-DD"T"HH24:MI:SS.MS') AS ${column}`;

// 4 bind parameters per row keeps a batch well under the 65535 parameter limit.
export const upsertBatchSize = 1000;

export const dedupeHousingRowsByNaturalKey = (rows: HousingRow[]): HousingRow[] => {
  const byKey = new Map<string, HousingRow>();
  for (const row of rows) {
    // Keep the latest value seen for each natural key inside the same import.
    byKey.set(naturalKeyOf(row), row);
  }
  return Array.from(byKey.values());
};

export const buildUpsertStatement = (rows: HousingRow[]): { text: string; values: Array<string | number> } => {
  const values: Array<string | number> = [];
  const tuples = rows.map((row, index) => {
    const base = index * 4;
    values.push(row.date, row.region, row.category, row.indexValue);
    return `($${base + 1}, $${base + 2}, $${base + 3}, $${base + 4})`;
  });

  const text =
    "INSERT INTO housing_price_index (tarih, istanbul_turkiye, yeni_yeni_olmayan_konut, fiyat_endeksi) " +
    `VALUES ${tuples.join(", ")} ` +
    "ON CONFLICT (tarih, istanbul_turkiye, yeni_yeni_olmayan_konut) " +
    "DO UPDATE SET fiyat_endeksi = EXCLUDED.fiyat_endeksi, updated_at = CURRENT_TIMESTAMP";

  return { text, values };
};

export const buildHousingQuery = (filters: HousingFilters): { text: string; values: string[] } => {
  const clauses: string[] = [];
  const values: string[] = [];
  const bind = (clause: string, value: string) => {
    values.push(value);
    clauses.push(`${clause} $${values.length}`);
  };

  if (filters.location) bind("istanbul_turkiye =", filters.location);
  if (filters.type) bind("yeni_yeni_olmayan_konut =", filters.type);
  if (filters.startDate) bind("housing_price_index.tarih >=", filters.startDate);
  if (filters.endDate) bind("housing_price_index.tarih <=", filters.endDate);

  const where = clauses.length > 0 ? ` WHERE ${clauses.join(" AND ")}` : "";
  const text =
    "SELECT id, to_char(tarih, 'YYYY-MM-DD') AS tarih, istanbul_turkiye, yeni_yeni_olmayan_konut, " +
    `fiyat_endeksi, ${timestampText("created_at")}, ${timestampText("updated_at")} FROM housing_price_index` +
    where +
    " ORDER BY housing_price_index.tarih DESC, istanbul_turkiye ASC, yeni_yeni_olmayan_konut ASC";

  return { text, values };
};

export const toHousingRecord = (row: HousingDbRow): HousingRecord => ({
  id: row.id,
  tarih: row.tarih,
  istanbul_turkiye: row.istanbul_turkiye,
  yeni_yeni_olmayan_konut: row.yeni_yeni_olmayan_konut,
  fiyat_endeksi: Number(row.fiyat_endeksi),
  created_at: row.created_at,
  updated_at: row.updated_at
});

/**
 * Postgres repository using batched INSERT ... ON CONFLICT upserts keyed on the
 * (tarih, istanbul_turkiye, yeni_yeni_olmayan_konut) natural key.
 */
export class PgHousingRepository implements HousingRepository {
  constructor(private readonly pool: Pool) {}

  async ensureSchema(): Promise<void> {
    await withTransaction(this.pool, async (client) => {
      await client.query("SELECT pg_advisory_xact_lock($1)", [schemaLockKeys.housing]);
      for (const statement of postgresSchema.housing) {
        await client.query(statement);
      }
    });
  }

  async upsertMany(rows: HousingRow[]): Promise<{ rowsAffected: number }> {
    if (rows.length === 0) {
      return { rowsAffected: 0 };
    }

    const deduped = dedupeHousingRowsByNaturalKey(rows);
    return withTransaction(this.pool, async (client: PoolClient) => {
      let rowsAffected = 0;
      for (let start = 0; start < deduped.length; start += upsertBatchSize) {
        const statement = buildUpsertStatement(deduped.slice(start, start + upsertBatchSize));
        const res = await client.query(statement.text, statement.values);
        rowsAffected += res.rowCount ?? 0;
      }
      return { rowsAffected };
    });
  }

  async query(filters: HousingFilters): Promise<HousingRecord[]> {
    const { text, values } = buildHousingQuery(filters);
    const res = await this.pool.query<HousingDbRow>(text, values);
    return res.rows.map(toHousingRecord);
  }

  async series(location: string, type: string): Promise<IndexPoint[]> {
    const res = await this.pool.query<{ tarih: string; fiyat_endeksi: string | number }>(
      "SELECT to_char(tarih, 'YYYY-MM-DD') AS tarih, fiyat_endeksi FROM housing_price_index " +
        "WHERE istanbul_turkiye = $1 AND yeni_yeni_olmayan_konut = $2 ORDER BY housing_price_index.tarih ASC",
      [location, type]
    );
    return res.rows.map((row) => ({ date: row.tarih, value: Number(row.fiyat_endeksi) }));
  }
}
