import * as Papa from "papaparse";
import { housingCsvColumns, isIsoDate, type HousingRow } from "./housing.types";

export class HousingCsvError extends Error {
  readonly code = "invalid_csv";
  readonly row?: number;

  constructor(message: string, row?: number) {
    super(message);
    this.name = "HousingCsvError";
    this.row = row;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

const maxLabelLength = 50;
const numericPattern = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

type CsvRecord = Record<string, string | undefined>;

const requireLabel = (record: CsvRecord, column: string, row: number): string => {
  const value = record[column]?.trim() ?? "";
  if (value === "") {
    throw new HousingCsvError(`Invalid CSV row ${row}: ${column} is empty`, row);
  }
  // Counted in code points, so characters outside the BMP count once.
  if (Array.from(value).length > maxLabelLength) {
    throw new HousingCsvError(`Invalid CSV row ${row}: ${column} is longer than ${maxLabelLength} characters`, row);
  }
  return value;
};

const parseDate = (record: CsvRecord, row: number): string => {
  const value = record.tarih?.trim() ?? "";
  if (!isIsoDate(value)) {
    throw new HousingCsvError(`Invalid CSV row ${row}: tarih "${value}" is not a YYYY-MM-DD date`, row);
  }
  return value;
};

const parseIndexValue = (record: CsvRecord, row: number): number => {
  const value = record.fiyat_endeksi?.trim() ?? "";
  const parsed = Number(value);
  if (!numericPattern.test(value) || !Number.isFinite(parsed)) {
    throw new HousingCsvError(`Invalid CSV row ${row}: fiyat_endeksi "${value}" is not a number`, row);
  }
  return parsed;
};

/**
 * Parses the housing price index CSV. Any malformed row aborts the whole parse;
 * there is no skip-and-continue.
 */
export const parseHousingCsv = (text: string): HousingRow[] => {
  const normalized = text.replace(/^\uFEFF/, "").trim();
  if (normalized === "") return [];

  const parsed = Papa.parse<CsvRecord>(normalized, {
    header: true,
    delimiter: ",",
    skipEmptyLines: "greedy",
    transformHeader: (header) => header.trim()
  });

  const fields = parsed.meta.fields ?? [];
  const missing = housingCsvColumns.filter((column) => !fields.includes(column));
  if (missing.length > 0) {
    throw new HousingCsvError(`Invalid CSV header: missing column(s) ${missing.join(", ")}`);
  }

  const [firstError] = parsed.errors;
  if (firstError) {
    const row = typeof firstError.row === "number" ? firstError.row + 1 : undefined;
    const where = row != null ? ` row ${row}` : "";
    throw new HousingCsvError(`Invalid CSV${where}: ${firstError.message}`, row);
  }

  return parsed.data.map((record, index) => {
    const row = index + 1;
    return {
      date: parseDate(record, row),
      region: requireLabel(record, "istanbul_turkiye", row),
      category: requireLabel(record, "yeni_yeni_olmayan_konut", row),
      indexValue: parseIndexValue(record, row)
    };
  });
};
