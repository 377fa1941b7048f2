import { z } from 'zod';

const secondsList = z
  .string()
  .regex(/^\s*\d+(\.\d+)?(\s*,\s*\d+(\.\d+)?)*\s*$/, 'Expected a comma separated list of seconds')
  .transform((value) => value.split(',').map((entry) => Number(entry.trim())));

export const envSchema = z.object({
  // Core
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'silent']).default('info'),

  // Discovery (HTTP)
  WGS_DISCOVERY_URL: z.string().url().default('https://www.ncbi.nlm.nih.gov/blast/BDB2EZ/taxid2wgs.cgi'),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),

  // Archive (FTP)
  FTP_HOST: z.string().min(1).default('ftp.ncbi.nlm.nih.gov'),
  FTP_PORT: z.coerce.number().int().min(1).max(65535).default(21),
  FTP_BASE_DIR: z.string().startsWith('/').default('/sra/wgs_aux'),
  FTP_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  FTP_KEEPALIVE_INTERVAL_MS: z.coerce.number().int().positive().default(30000),
  ARCHIVE_SUFFIX: z.string().min(1).default('.fsa_nt.gz'),

  // Retry
  RETRY_SCHEDULE_SECONDS: secondsList.default('0,5,15,30,60,120'),
});

export type EnvConfig = z.infer<typeof envSchema>;

export function validateEnv(config: Record<string, unknown>): EnvConfig {
  const result = envSchema.safeParse(config);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new Error(`Environment validation failed:\n${errors}`);
  }

  return result.data;
}
