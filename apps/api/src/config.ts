import { z } from 'zod';

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  LOAN_AMORT_DB_PATH: z.string().min(1).default('./data/loan-amort.db'),
  LOAN_AMORT_API_KEY: z.string().optional(),
  LOAN_AMORT_CURRENCY: z.string().regex(/^[A-Z]{3}$/, 'LOAN_AMORT_CURRENCY must be an ISO 4217 code').default('USD'),
});

export interface Config {
  port: number;
  dbPath: string;
  /** Unset or empty disables API key auth. */
  apiKey?: string;
  currency: string;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join(', ');
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const data = parsed.data;
  return {
    port: data.PORT,
    dbPath: data.LOAN_AMORT_DB_PATH,
    apiKey: data.LOAN_AMORT_API_KEY || undefined,
    currency: data.LOAN_AMORT_CURRENCY,
  };
}
