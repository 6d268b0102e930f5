import { z } from 'zod';

const flag = z
  .enum(['true', 'false'])
  .default('false')
  .transform((value) => value === 'true');

export const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  SWAGGER_PATH: z.string().min(1).default('docs'),
  DATABASE_URL: z.string().url().optional(),
  SYNC_DATABASE: flag,
  /** Checkout the pipeline runs in. Defaults to the process working directory. */
  WORKSPACE_DIR: z.string().min(1).optional(),
  /** When set, webhooks for any other repository are ignored. */
  WEBHOOK_REPOSITORY: z.string().min(1).optional(),
  STAGE_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(0),
  CODECOV_URL: z.string().url().default('https://codecov.io'),
  CODECOV_TOKEN: z.string().optional(),
});

export type Env = z.infer<typeof envSchema>;

/** ConfigModule `validate` hook: fails startup with every invalid variable listed. */
export function validateEnv(config: Record<string, unknown>): Env {
  // unset and empty are the same thing in a .env file
  const present = Object.fromEntries(Object.entries(config).filter(([, value]) => value !== ''));
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid environment: ${issues.join('; ')}`);
  }
  return parsed.data;
}
