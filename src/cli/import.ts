#!/usr/bin/env node
import { HousingImportError } from "../application/import-housing/import.error-handler";
import { runImport } from "../composition/root";

/**
 * Usage: housing-import <file.csv>   (falls back to HOUSING_SEED_FILE)
 */
export const resolveCsvPath = (argv: string[], env: NodeJS.ProcessEnv = process.env): string | undefined => {
  const fromArgs = argv[2]?.trim();
  if (fromArgs) return fromArgs;
  const fromEnv = env.HOUSING_SEED_FILE?.trim();
  return fromEnv ? fromEnv : undefined;
};

export const executeImportCli = async (argv: string[] = process.argv): Promise<void> => {
  try {
    const path = resolveCsvPath(argv);
    if (!path) {
      throw new Error("Usage: housing-import <file.csv> (or set HOUSING_SEED_FILE)");
    }
    await runImport(path);
  } catch (err) {
    const debug = ["1", "true"].includes(process.env.DEBUG?.toLowerCase() ?? "");
    const error = err instanceof Error ? err : new Error(String(err));
    // Causes can hold driver payloads; only the import's own code and context are printed.
    console.error(
      JSON.stringify({
        event: "housing.import_failed",
        message: error.message,
        ...(error instanceof HousingImportError ? { code: error.code, context: error.context } : {}),
        ...(debug ? { stack: error.stack } : {})
      })
    );
    process.exit(1);
  }
};

if (require.main === module) {
  void executeImportCli();
}
