import { z } from 'zod';
import { ConfigurationError } from './errors';

export type DatabaseConfig = {
  user: string;
  password: string;
  host: string;
  port: number;
  database: string;
  connectTimeoutMs: number;
};

export type ApiConfig = {
  baseUrl: string;
  apiKey?: string;
  timeoutMs: number;
};

export type PipelineConfig = {
  database: DatabaseConfig;
  api: ApiConfig;
  limit: number;
};

export const DEFAULT_LIMIT = 5;
export const DEFAULT_API_URL = 'https://api.coingecko.com/api/v3';

const REQUIRED_KEYS = ['DB_USER', 'DB_PASSWORD', 'DB_HOST', 'DB_PORT', 'DB_NAME'] as const;
const OPTIONAL_KEYS = [
  'PIPELINE_LIMIT',
  'COINGECKO_API_URL',
  'COINGECKO_API_KEY',
  'HTTP_TIMEOUT_MS',
  'DB_CONNECT_TIMEOUT_MS',
] as const;

const wholeNumber = (min: number, max: number) =>
  z
    .string()
    .regex(/^\d+$/, 'must be a whole number')
    .transform((value) => Number(value))
    .pipe(z.number().int().min(min).max(max));

const envSchema = z.object({
  DB_USER: z.string(),
  DB_PASSWORD: z.string(),
  DB_HOST: z.string(),
  DB_PORT: wholeNumber(1, 65535),
  DB_NAME: z.string(),
  PIPELINE_LIMIT: wholeNumber(1, 250).default(String(DEFAULT_LIMIT)),
  COINGECKO_API_URL: z
    .string()
    .url()
    .transform((value) => value.replace(/\/+$/, ''))
    .default(DEFAULT_API_URL),
  COINGECKO_API_KEY: z.string().optional(),
  HTTP_TIMEOUT_MS: wholeNumber(1, 300_000).default('15000'),
  DB_CONNECT_TIMEOUT_MS: wholeNumber(1, 300_000).default('10000'),
});

type EnvInput = Partial<Record<(typeof REQUIRED_KEYS)[number] | (typeof OPTIONAL_KEYS)[number], string>>;

// Blank values count as unset. Passwords are kept verbatim.
function pickEnv(env: NodeJS.ProcessEnv): EnvInput {
  const picked: EnvInput = {};
  for (const key of [...REQUIRED_KEYS, ...OPTIONAL_KEYS]) {
    const raw = env[key];
    const trimmed = raw?.trim();
    if (!raw || !trimmed) continue;
    picked[key] = key === 'DB_PASSWORD' ? raw : trimmed;
  }
  return picked;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  const parsed = envSchema.safeParse(pickEnv(env));
  if (!parsed.success) {
    const missing = parsed.error.issues
      .filter((issue) => issue.code === 'invalid_type' && issue.received === 'undefined')
      .map((issue) => issue.path.join('.'));
    const problems = parsed.error.issues
      .filter((issue) => !missing.includes(issue.path.join('.')))
      .map((issue) => `${issue.path.join('.')} ${issue.message}`);

    const parts: string[] = [];
    if (missing.length) parts.push(`missing ${missing.join(', ')}`);
    if (problems.length) parts.push(problems.join('; '));
    throw new ConfigurationError(`Invalid configuration: ${parts.join('; ')}`, missing);
  }

  const e = parsed.data;
  return {
    database: {
      user: e.DB_USER,
      password: e.DB_PASSWORD,
      host: e.DB_HOST,
      port: e.DB_PORT,
      database: e.DB_NAME,
      connectTimeoutMs: e.DB_CONNECT_TIMEOUT_MS,
    },
    api: {
      baseUrl: e.COINGECKO_API_URL,
      apiKey: e.COINGECKO_API_KEY,
      timeoutMs: e.HTTP_TIMEOUT_MS,
    },
    limit: e.PIPELINE_LIMIT,
  };
}

export function connectionString(db: Pick<DatabaseConfig, 'user' | 'password' | 'host' | 'port' | 'database'>): string {
  const user = encodeURIComponent(db.user);
  const password = encodeURIComponent(db.password);
  return `postgresql://${user}:${password}@${db.host}:${db.port}/${encodeURIComponent(db.database)}`;
}
