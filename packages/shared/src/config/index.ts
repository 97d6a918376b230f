import path from 'node:path';
import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';

const DEFAULT_MIGRATIONS_DIR = path.resolve(process.cwd(), 'migrations');

loadDotenv();

const booleanFlag = z
  .string()
  .optional()
  .transform((value) => {
    if (value === undefined) return undefined;
    return value !== 'false';
  });

const configSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    PORT: z.coerce.number().int().positive().default(3000),
    LOG_LEVEL: z.string().default('info'),
    SERVICE_NAME: z.string().default('makerspace-reservations'),
    STORAGE_DRIVER: z.enum(['memory', 'postgres']).default('memory'),
    DATABASE_URL: z.string().optional(),
    DATABASE_MAX_POOL: z.coerce.number().int().positive().optional(),
    MIGRATIONS_DIR: z.string().optional(),
    LOCK_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
    EVENT_BUS_URL: z.string().optional(),
    EVENT_BUS_DRIVER: z.enum(['in-memory', 'rabbitmq']).optional(),
    EVENT_BUS_EXCHANGE: z.string().optional(),
    TRACING_EXPORT_JSON: booleanFlag,
    METRICS_ENABLED: booleanFlag
  })
  .superRefine((values, ctx) => {
    if (values.STORAGE_DRIVER === 'postgres' && !values.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'DATABASE_URL is required when STORAGE_DRIVER is postgres'
      });
    }
  })
  .transform((values) => ({
    ...values,
    MIGRATIONS_DIR: values.MIGRATIONS_DIR ?? DEFAULT_MIGRATIONS_DIR,
    METRICS_ENABLED: values.METRICS_ENABLED ?? true,
    DATABASE_MAX_POOL: values.DATABASE_MAX_POOL ?? 10,
    EVENT_BUS_DRIVER:
      values.EVENT_BUS_DRIVER ??
      (values.EVENT_BUS_URL && values.EVENT_BUS_URL.startsWith('amqp')
        ? 'rabbitmq'
        : 'in-memory'),
    EVENT_BUS_EXCHANGE: values.EVENT_BUS_EXCHANGE ?? 'makerspace.events',
    TRACING_EXPORT_JSON: values.TRACING_EXPORT_JSON ?? false
  }));

export type AppConfig = z.infer<typeof configSchema>;

export class ConfigError extends Error {
  constructor(public readonly issues: z.ZodIssue[]) {
    super('Invalid configuration');
    this.name = 'ConfigError';
  }
}

let cachedConfig: AppConfig | null = null;

function parseEnvironment(
  source: NodeJS.ProcessEnv,
  { exitOnError }: { exitOnError: boolean }
): AppConfig {
  const result = configSchema.safeParse(source);

  if (!result.success) {
    if (exitOnError) {
      // eslint-disable-next-line no-console
      console.error('Invalid configuration', result.error.flatten().fieldErrors);
      process.exit(1);
    }

    throw new ConfigError(result.error.issues);
  }

  return Object.freeze(result.data);
}

export function loadConfig(overrides?: Partial<NodeJS.ProcessEnv>): AppConfig {
  if (overrides) {
    return parseEnvironment(
      {
        ...process.env,
        ...overrides
      },
      { exitOnError: false }
    );
  }

  if (!cachedConfig) {
    cachedConfig = parseEnvironment(process.env, { exitOnError: true });
  }

  return cachedConfig;
}

export const config = loadConfig();
