import { z } from 'zod';

import { BUCKETS, DEFAULT_TIME_ZONE, isValidTimeZone, parseBucket } from '@gridcarbon/emissions';

export const INLINE_ACCOUNT = 'inline';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export class ServiceConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid emissions service configuration: ${issues.join('; ')}`);
    this.name = 'ServiceConfigError';
    this.issues = issues;
  }
}

const required = (name: string) =>
  z.string({ required_error: `${name} is required` }).min(1, `${name} is required`);

const warehouseSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('inline'),
    database: required('SNOWFLAKE_DATABASE'),
    seedFile: z.string().min(1).nullable()
  }),
  z.object({
    kind: z.literal('snowflake'),
    account: required('SNOWFLAKE_ACCOUNT'),
    username: required('SNOWFLAKE_USER'),
    password: required('SNOWFLAKE_PASSWORD'),
    database: required('SNOWFLAKE_DATABASE'),
    warehouse: required('SNOWFLAKE_WAREHOUSE'),
    role: z.string().min(1).nullable()
  })
]);

const configSchema = z.object({
  host: z.string().min(1),
  port: z
    .number({ invalid_type_error: 'EMISSIONS_PORT must be an integer' })
    .int('EMISSIONS_PORT must be an integer')
    .min(0)
    .max(65535),
  logLevel: z.enum(LOG_LEVELS, {
    errorMap: () => ({ message: `EMISSIONS_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}` })
  }),
  timeZone: z.string().refine(isValidTimeZone, (value) => ({
    message: `EMISSIONS_TIME_ZONE '${value}' is not a known time zone`
  })),
  cacheTtlSeconds: z
    .number({ invalid_type_error: 'EMISSIONS_CACHE_TTL_SECONDS must be a positive integer' })
    .int('EMISSIONS_CACHE_TTL_SECONDS must be a positive integer')
    .positive('EMISSIONS_CACHE_TTL_SECONDS must be a positive integer'),
  sourceSchema: required('EMISSIONS_SOURCE_SCHEMA'),
  warehouse: warehouseSchema,
  publish: z.object({
    schema: z.string().min(1).nullable(),
    table: z.string().min(1).nullable(),
    bucket: z.enum(BUCKETS, {
      errorMap: () => ({ message: `EMISSIONS_PUBLISH_BUCKET must be one of ${BUCKETS.join(', ')}` })
    }),
    incremental: z.boolean()
  })
});

export type ServiceConfig = z.infer<typeof configSchema>;

export type WarehouseSettings = ServiceConfig['warehouse'];

type Env = Record<string, string | undefined>;

const trimmed = (value: string | undefined): string | undefined => {
  const result = value?.trim();
  return result ? result : undefined;
};

const toBool = (value: string | undefined, fallback: boolean) => {
  if (value === undefined) {
    return fallback;
  }

  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }
  return fallback;
};

const toInteger = (value: string | undefined, fallback: number): number => {
  const raw = trimmed(value);
  if (raw === undefined) {
    return fallback;
  }
  return /^-?\d+$/.test(raw) ? Number.parseInt(raw, 10) : Number.NaN;
};

const readWarehouse = (env: Env) => {
  const account = trimmed(env.SNOWFLAKE_ACCOUNT);
  if (account?.toLowerCase() === INLINE_ACCOUNT) {
    return {
      kind: 'inline',
      database: trimmed(env.SNOWFLAKE_DATABASE),
      seedFile: trimmed(env.EMISSIONS_INLINE_SEED_FILE) ?? null
    };
  }
  return {
    kind: 'snowflake',
    account,
    username: trimmed(env.SNOWFLAKE_USER),
    password: env.SNOWFLAKE_PASSWORD ? env.SNOWFLAKE_PASSWORD : undefined,
    database: trimmed(env.SNOWFLAKE_DATABASE),
    warehouse: trimmed(env.SNOWFLAKE_WAREHOUSE),
    role: trimmed(env.SNOWFLAKE_ROLE) ?? null
  };
};

export const formatConfigError = (error: ServiceConfigError): string =>
  ['Invalid emissions service configuration:', ...error.issues.map((issue) => `  - ${issue}`)].join('\n');

export const loadServiceConfig = (env: Env = process.env): ServiceConfig => {
  const publishBucket = trimmed(env.EMISSIONS_PUBLISH_BUCKET);

  const candidate = {
    host: trimmed(env.EMISSIONS_HOST) ?? '0.0.0.0',
    port: toInteger(env.EMISSIONS_PORT, 4300),
    logLevel: trimmed(env.EMISSIONS_LOG_LEVEL)?.toLowerCase() ?? 'info',
    timeZone: trimmed(env.EMISSIONS_TIME_ZONE) ?? DEFAULT_TIME_ZONE,
    cacheTtlSeconds: toInteger(env.EMISSIONS_CACHE_TTL_SECONDS, 86_400),
    sourceSchema: trimmed(env.EMISSIONS_SOURCE_SCHEMA),
    warehouse: readWarehouse(env),
    publish: {
      schema: trimmed(env.EMISSIONS_PUBLISH_SCHEMA) ?? null,
      table: trimmed(env.EMISSIONS_PUBLISH_TABLE) ?? null,
      bucket: publishBucket === undefined ? 'month' : parseBucket(publishBucket) ?? publishBucket,
      incremental: toBool(env.EMISSIONS_PUBLISH_INCREMENTAL, false)
    }
  };

  const parsed = configSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new ServiceConfigError(parsed.error.issues.map((issue) => issue.message));
  }
  return parsed.data;
};
