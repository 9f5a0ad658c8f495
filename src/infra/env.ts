import { z, ZodError } from 'zod';

/**
 * Environment variable schema with strict validation
 */
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().default(3000),

  // Data storage
  SQLITE_DB_PATH: z.string().default('./data/ledger.db'),

  // Statement files
  INBOX_DIR: z.string().default('./data/inbox'),
  ARCHIVE_DIR: z.string().default('./data/archive'),
  BANK_PROFILES_PATH: z.preprocess(
    (value) => (value === '' ? undefined : value),
    z.string().optional()
  ),

  // Import pipeline
  ACCOUNT_POLICY: z.enum(['auto_create', 'reject']).default('auto_create'),
  MAX_PARALLEL_FILES: z.coerce
    .number()
    .int()
    .min(1, { message: 'MAX_PARALLEL_FILES must be at least 1' })
    .default(4),
  FILE_READ_TIMEOUT_MS: z.coerce.number().int().min(1).default(10_000),
  STORAGE_TIMEOUT_MS: z.coerce.number().int().min(1).default(5_000),
  ARCHIVE_RETRIES: z.coerce.number().int().min(0).default(2),
  FUTURE_DATE_TOLERANCE_DAYS: z.coerce.number().int().min(0).default(3),
  MAX_AMOUNT: z.coerce.number().positive().default(1_000_000),

  // Inbox scanning (0 disables the scheduler)
  INBOX_SCAN_INTERVAL_MINUTES: z.coerce.number().int().min(0).default(0),

  // Logging
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  LOG_FILE: z.string().optional(),

  // Rate limiting (API)
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().default(60000),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().default(120),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Parses an environment-like record; throws ZodError on invalid input
 */
export function parseEnv(source: Record<string, string | undefined>): Env {
  return envSchema.parse(source);
}

/**
 * Validates and parses environment variables
 * Exits process with code 1 if validation fails (fail-fast principle)
 */
export function validateEnv(): Env {
  try {
    return parseEnv(process.env);
  } catch (error) {
    if (error instanceof ZodError) {
      console.error('❌ Environment validation failed:');
      error.issues.forEach((err) => {
        console.error(`  - ${err.path.join('.')}: ${err.message}`);
      });
      console.error('\nCheck .env.example for required variables');
      process.exit(1);
    }
    throw error;
  }
}
