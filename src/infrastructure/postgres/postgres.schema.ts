/**
 * Schema plan, applied by ensureSchema() on startup and before each import:
 * - housing_price_index: unique natural key (tarih, istanbul_turkiye, yeni_yeni_olmayan_konut)
 *   plus lookup indexes by date and by region
 * - processing_jobs: append-only audit log, unique job_id
 *
 * Statements run under a transaction-scoped advisory lock so concurrent
 * callers do not race on CREATE ... IF NOT EXISTS.
 */
export const schemaLockKeys = {
  housing: 724_101,
  jobAudit: 724_102
} as const;

export const postgresSchema = {
  housing: [
    `CREATE TABLE IF NOT EXISTS housing_price_index (
      id SERIAL PRIMARY KEY,
      tarih DATE NOT NULL,
      istanbul_turkiye VARCHAR(50) NOT NULL,
      yeni_yeni_olmayan_konut VARCHAR(50) NOT NULL,
      fiyat_endeksi DECIMAL(10, 2) NOT NULL,
      created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
      updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
      UNIQUE (tarih, istanbul_turkiye, yeni_yeni_olmayan_konut)
    )`,
    "CREATE INDEX IF NOT EXISTS idx_housing_tarih ON housing_price_index (tarih)",
    "CREATE INDEX IF NOT EXISTS idx_housing_location ON housing_price_index (istanbul_turkiye)"
  ],
  jobAudit: [
    `CREATE TABLE IF NOT EXISTS processing_jobs (
      id SERIAL PRIMARY KEY,
      job_id VARCHAR(255) UNIQUE NOT NULL,
      input_data JSONB NOT NULL,
      output_data JSONB,
      status VARCHAR(50) NOT NULL,
      created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
      completed_at TIMESTAMP,
      error_message TEXT
    )`,
    "CREATE INDEX IF NOT EXISTS idx_jobs_job_id ON processing_jobs (job_id)",
    "CREATE INDEX IF NOT EXISTS idx_jobs_status ON processing_jobs (status)",
    "CREATE INDEX IF NOT EXISTS idx_jobs_created_at ON processing_jobs (created_at DESC)"
  ]
} as const;
