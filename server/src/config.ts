import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8787),
  LEDGER_DB_PATH: z.string().min(1).default(path.join(__dirname, '../data/ledger.db')),
  CORS_ORIGIN: z.string().min(1).optional(),
});

export interface ServerConfig {
  port: number;
  dbPath: string;
  /** Unset means any origin */
  corsOrigin: string | undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid environment: ${problems.join('; ')}`);
  }
  return {
    port: parsed.data.PORT,
    dbPath: parsed.data.LEDGER_DB_PATH,
    corsOrigin: parsed.data.CORS_ORIGIN,
  };
}
