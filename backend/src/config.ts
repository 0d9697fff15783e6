import 'dotenv/config';
import { z } from 'zod';

export type DbConfig =
  | {
      host: string;
      port: number;
      user: string;
      password: string;
      database: string;
    }
  | { connectionString: string };

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const portSchema = z.coerce.number().int().min(1).max(65535);

const envSchema = z.object({
  POSTGRES_USER: z.string().default('user'),
  POSTGRES_PASSWORD: z.string().default('password'),
  POSTGRES_HOST: z.string().default('localhost'),
  POSTGRES_PORT: portSchema.default(5432),
  POSTGRES_DB: z.string().default('portfolio'),
  DATABASE_URL: z.string().trim().min(1).optional(),
  API_PORT: portSchema.default(8080),
  IMPORT_MAX_FILE_SIZE: z.coerce.number().int().positive().default(10 * 1024 * 1024),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export type AppConfig = z.infer<typeof envSchema>;

// Empty strings count as unset.
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') {
      result[key] = value;
    }
  }
  return result;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`invalid configuration (${problems.join('; ')})`);
  }
  return parsed.data;
}

export function getDatabaseConfig(config: AppConfig = loadConfig()): DbConfig {
  if (config.DATABASE_URL) {
    return { connectionString: config.DATABASE_URL };
  }
  return {
    host: config.POSTGRES_HOST,
    port: config.POSTGRES_PORT,
    user: config.POSTGRES_USER,
    password: config.POSTGRES_PASSWORD,
    database: config.POSTGRES_DB,
  };
}

/** Connection target without credentials, for log lines. */
export function describeDatabase(db: DbConfig): string {
  if ('connectionString' in db) {
    try {
      const url = new URL(db.connectionString);
      return `${url.hostname}:${url.port || '5432'}${url.pathname}`;
    } catch {
      return 'unknown';
    }
  }
  return `${db.host}:${db.port}/${db.database}`;
}
