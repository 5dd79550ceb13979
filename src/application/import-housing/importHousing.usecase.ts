import { readFile } from "fs/promises";
import type { HousingRow } from "../../core/housing/housing.types";
import { parseHousingCsv } from "../../core/housing/parseHousingCsv";
import type { HousingRepository } from "../../ports/HousingRepository";
import { wrapParseFailure, wrapRepositoryFailure, wrapSchemaFailure, wrapSourceFailure } from "./import.error-handler";

export type HousingCsvSource = { kind: "file"; path: string } | { kind: "text"; text: string };

export type ImportResult = {
  rowsRead: number;
  rowsAffected: number;
};

const readSource = async (source: HousingCsvSource): Promise<string> => {
  if (source.kind === "text") return source.text;
  try {
    return await readFile(source.path, "utf8");
  } catch (err) {
    throw wrapSourceFailure(err, source.path);
  }
};

/**
 * Parses a housing price index CSV and upserts every row in one transaction.
 * A parse error means nothing is written.
 */
export const importHousing = async (
  deps: { repo: HousingRepository },
  source: HousingCsvSource
): Promise<ImportResult> => {
  const { repo } = deps;
  const text = await readSource(source);

  let rows: HousingRow[];
  try {
    rows = parseHousingCsv(text);
  } catch (err) {
    throw wrapParseFailure(err);
  }

  try {
    await repo.ensureSchema();
  } catch (err) {
    throw wrapSchemaFailure(err);
  }

  let rowsAffected = 0;
  if (rows.length > 0) {
    try {
      ({ rowsAffected } = await repo.upsertMany(rows));
    } catch (err) {
      throw wrapRepositoryFailure(err, { rowsRead: rows.length });
    }
  }

  const result = { rowsRead: rows.length, rowsAffected };
  console.log(JSON.stringify({ event: "housing.import_completed", source: source.kind, ...result }));
  return result;
};
