import { HousingCsvError } from "../../core/housing/parseHousingCsv";

export type ImportFailureCode = "csv_invalid" | "source_unreadable" | "schema_failed" | "repository_write_failed";

export type ImportErrorContext = {
  rowsRead?: number;
  row?: number;
};

const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};

const causeOf = (reason: unknown): unknown =>
  reason instanceof Error ? reason.cause ?? reason : reason;

export class HousingImportError extends Error {
  readonly code: ImportFailureCode;
  readonly context: ImportErrorContext;

  constructor(args: { code: ImportFailureCode; message: string; context: ImportErrorContext; cause?: unknown }) {
    super(args.message, { cause: args.cause });
    this.name = "HousingImportError";
    this.code = args.code;
    this.context = args.context;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export const wrapParseFailure = (reason: unknown): HousingImportError => {
  if (reason instanceof HousingCsvError) {
    const context: ImportErrorContext = {};
    if (reason.row != null) context.row = reason.row;
    return new HousingImportError({ code: "csv_invalid", message: reason.message, context, cause: reason });
  }

  return new HousingImportError({
    code: "csv_invalid",
    message: `Unexpected CSV parse failure: ${toErrorMessage(reason)}`,
    context: {},
    cause: causeOf(reason)
  });
};

export const wrapSourceFailure = (reason: unknown, path: string): HousingImportError =>
  new HousingImportError({
    code: "source_unreadable",
    message: `Cannot read CSV file ${path}: ${toErrorMessage(reason)}`,
    context: {},
    cause: causeOf(reason)
  });

export const wrapSchemaFailure = (reason: unknown): HousingImportError =>
  new HousingImportError({
    code: "schema_failed",
    message: `Schema setup failed: ${toErrorMessage(reason)}`,
    context: {},
    cause: causeOf(reason)
  });

export const wrapRepositoryFailure = (reason: unknown, context: Pick<ImportErrorContext, "rowsRead">) =>
  new HousingImportError({
    code: "repository_write_failed",
    message: `Repository write failed after reading ${context.rowsRead ?? 0} rows: ${toErrorMessage(reason)}`,
    context,
    cause: causeOf(reason)
  });
