import { z } from 'zod';

/**
 * Environment variable validation schema
 * Validates all required and optional environment variables at startup
 */
export const envSchema = z.object({
  // Application
  APP_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.string().regex(/^\d+$/, 'PORT must be a number').optional(),
  APP_PORT: z.string().regex(/^\d+$/, 'APP_PORT must be a number').optional(),

  // Artifact store
  OTA_FILES_DIR: z.string().min(1, 'OTA_FILES_DIR must not be empty').default('./ota_files'),
  OTA_FAMILIES_FILE: z.string().min(1, 'OTA_FAMILIES_FILE must not be empty').default('./ota-families.json'),
  PUBLIC_BASE_URL: z.string().url('PUBLIC_BASE_URL must be an absolute URL').optional(),
  CATALOG_CACHE_TTL_MS: z.string().regex(/^\d+$/, 'CATALOG_CACHE_TTL_MS must be a non-negative integer').default('0'),

  // Logging
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  LOG_PRETTY: z.string().optional(),
  REQUEST_ID_HEADER: z.string().default('X-Request-ID'),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Validate environment variables
 * Called at application startup - fails fast if validation fails
 */
export function validateEnv(): Env {
  const result = envSchema.safeParse(process.env);
  if (result.success) {
    return result.data;
  }

  // Logger is not available yet (it reads the validated level), so report on stderr
  console.error('\n❌ Environment variable validation failed:\n');
  result.error.errors.forEach((err) => {
    console.error(`  ${err.path.join('.')}: ${err.message}`);
  });
  console.error('\nPlease check your .env file and ensure all variables are valid.\n');
  process.exit(1);
}
