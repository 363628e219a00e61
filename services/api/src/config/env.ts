import { z } from 'zod';
import { LOG_LEVELS } from '../logger.js';

const DEFAULTS = {
  erddapUrl: 'https://erddap.emso.eu/erddap',
  publicUrl: 'http://localhost:5000/covjson/v1.0',
  port: 5000,
  basePath: '/covjson/v1.0',
  catalogTtlSeconds: 3600,
  upstreamTimeoutMs: 30_000,
  vocabHost: 'vocab.nerc.ac.uk',
  logLevel: 'debug',
  logDir: 'log',
  usageIntervalSeconds: 1,
};

const trimSlash = (s: string) => s.replace(/\/+$/, '');

export const ConfigSchema = z.object({
  erddapUrl: z.string().url().transform(trimSlash),
  publicUrl: z.string().url().transform(trimSlash),
  port: z.coerce.number().int().min(0).max(65535),
  basePath: z
    .string()
    .regex(/^\/.*$/, 'basePath must start with /')
    .transform((p) => (p === '/' ? '' : trimSlash(p))),
  catalogTtlSeconds: z.coerce.number().min(0),
  upstreamTimeoutMs: z.coerce.number().int().positive(),
  vocabHost: z.string().min(1),
  logLevel: z.enum(LOG_LEVELS),
  logDir: z.string(),
  usageIntervalSeconds: z.coerce.number().min(0),
});

export type AppConfig = z.infer<typeof ConfigSchema>;
export type ConfigOverrides = Partial<Record<keyof AppConfig, string | number | undefined>>;

function fromEnv(env: NodeJS.ProcessEnv): ConfigOverrides {
  // Empty variables count as unset, except LOG_DIR where "" turns file output off
  const v = (name: string) => (env[name] === '' ? undefined : env[name]);
  return {
    erddapUrl: v('ERDDAP_URL'),
    publicUrl: v('PUBLIC_URL'),
    port: v('PORT'),
    basePath: v('BASE_PATH'),
    catalogTtlSeconds: v('CATALOG_TTL_SECONDS'),
    upstreamTimeoutMs: v('UPSTREAM_TIMEOUT_MS'),
    vocabHost: v('VOCAB_HOST'),
    logLevel: v('LOG_LEVEL'),
    logDir: env.LOG_DIR,
    usageIntervalSeconds: v('USAGE_INTERVAL_SECONDS'),
  };
}

function defined(o: ConfigOverrides): ConfigOverrides {
  const out: ConfigOverrides = {};
  for (const key of ConfigSchema.keyof().options) {
    if (o[key] !== undefined) out[key] = o[key];
  }
  return out;
}

/**
 * Resolves the service configuration. Precedence: CLI flags, then
 * environment, then defaults. Throws a ZodError when a value is invalid.
 */
export function loadConfig(flags: ConfigOverrides = {}, env: NodeJS.ProcessEnv = process.env): AppConfig {
  return ConfigSchema.parse({ ...DEFAULTS, ...defined(fromEnv(env)), ...defined(flags) });
}
