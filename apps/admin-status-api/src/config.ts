import {LogLevelSchema, type LogLevel} from '@credential-agent/logging';
import {z} from 'zod';

const portFromEnv = z.preprocess(value => {
  if (typeof value !== 'string' || value.trim().length === 0) {
    return value;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? value : parsed;
}, z.number().int().min(0).max(65_535));

const numberFromEnv = z.preprocess(value => {
  if (typeof value !== 'string' || value.trim().length === 0) {
    return value;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? value : parsed;
}, z.number().int().positive());

const booleanFromEnv = z.preprocess(value => {
  if (typeof value !== 'string') {
    return value;
  }

  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') {
    return true;
  }
  if (normalized === 'false' || normalized === '0') {
    return false;
  }

  return value;
}, z.boolean());

const optionalString = z.preprocess(value => {
  if (typeof value !== 'string') {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}, z.string().optional());

export const DEFAULT_UNPROTECTED_PATHS = [
  '/api/doc',
  '/api/doc/',
  '/api/docs/swagger.json',
  '/favicon.ico',
  '/static/swagger/'
] as const;

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    ADMIN_STATUS_API_HOST: z.string().min(1).default('0.0.0.0'),
    ADMIN_STATUS_API_PORT: portFromEnv.default(8031),
    ADMIN_STATUS_API_KEY: optionalString,
    ADMIN_STATUS_API_INSECURE_MODE: booleanFromEnv.default(false),
    ADMIN_STATUS_API_UNPROTECTED_PATHS: optionalString,
    ADMIN_STATUS_API_MAX_REQUEST_SIZE_MB: numberFromEnv.default(1),
    ADMIN_STATUS_API_AGENT_LABEL: z.string().min(1).default('Credential Agent'),
    ADMIN_STATUS_API_VERSION: z.string().min(1).default('11'),
    ADMIN_STATUS_API_TIMING_ENABLED: booleanFromEnv.default(false),
    ADMIN_STATUS_API_LOG_LEVEL: LogLevelSchema.optional(),
    ADMIN_STATUS_API_LOG_REDACT_EXTRA_KEYS: optionalString
  })
  .strict();

export type ApiKeyAuthConfig = {
  mode: 'api_key';
  apiKey: string;
  unprotectedPaths: string[];
};

export type InsecureAuthConfig = {
  mode: 'insecure';
};

export type AdminAuthConfig = ApiKeyAuthConfig | InsecureAuthConfig;

export type ServiceConfig = {
  nodeEnv: 'development' | 'test' | 'production';
  host: string;
  port: number;
  auth: AdminAuthConfig;
  maxRequestBytes: number;
  documentation: {
    agentLabel: string;
    version: string;
  };
  timing: {
    enabled: boolean;
  };
  logging: {
    level: LogLevel;
    redactExtraKeys: string[];
  };
};

const parseCommaSeparated = (raw: string | undefined) => {
  if (!raw) {
    return [];
  }

  return raw
    .split(',')
    .map(value => value.trim())
    .filter(value => value.length > 0);
};

const parseUnprotectedPaths = (raw: string | undefined) => {
  if (raw === undefined) {
    return [...DEFAULT_UNPROTECTED_PATHS];
  }

  const paths = parseCommaSeparated(raw);
  for (const path of paths) {
    if (!path.startsWith('/')) {
      throw new Error(`ADMIN_STATUS_API_UNPROTECTED_PATHS entries must start with '/': ${path}`);
    }
  }

  return paths;
};

const parseAuthConfig = ({
  apiKey,
  insecureMode,
  unprotectedPaths,
  nodeEnv
}: {
  apiKey?: string;
  insecureMode: boolean;
  unprotectedPaths?: string;
  nodeEnv: ServiceConfig['nodeEnv'];
}): AdminAuthConfig => {
  if (insecureMode) {
    if (apiKey) {
      throw new Error('ADMIN_STATUS_API_INSECURE_MODE cannot be combined with ADMIN_STATUS_API_KEY');
    }

    if (nodeEnv === 'production') {
      throw new Error('ADMIN_STATUS_API_INSECURE_MODE is not allowed in production');
    }

    return {mode: 'insecure'};
  }

  if (!apiKey) {
    throw new Error('ADMIN_STATUS_API_KEY is required unless ADMIN_STATUS_API_INSECURE_MODE is enabled');
  }

  return {
    mode: 'api_key',
    apiKey,
    unprotectedPaths: parseUnprotectedPaths(unprotectedPaths)
  };
};

const toEnvInput = (env: NodeJS.ProcessEnv) => ({
  NODE_ENV: env.NODE_ENV,
  ADMIN_STATUS_API_HOST: env.ADMIN_STATUS_API_HOST,
  ADMIN_STATUS_API_PORT: env.ADMIN_STATUS_API_PORT,
  ADMIN_STATUS_API_KEY: env.ADMIN_STATUS_API_KEY,
  ADMIN_STATUS_API_INSECURE_MODE: env.ADMIN_STATUS_API_INSECURE_MODE,
  ADMIN_STATUS_API_UNPROTECTED_PATHS: env.ADMIN_STATUS_API_UNPROTECTED_PATHS,
  ADMIN_STATUS_API_MAX_REQUEST_SIZE_MB: env.ADMIN_STATUS_API_MAX_REQUEST_SIZE_MB,
  ADMIN_STATUS_API_AGENT_LABEL: env.ADMIN_STATUS_API_AGENT_LABEL,
  ADMIN_STATUS_API_VERSION: env.ADMIN_STATUS_API_VERSION,
  ADMIN_STATUS_API_TIMING_ENABLED: env.ADMIN_STATUS_API_TIMING_ENABLED,
  ADMIN_STATUS_API_LOG_LEVEL: env.ADMIN_STATUS_API_LOG_LEVEL,
  ADMIN_STATUS_API_LOG_REDACT_EXTRA_KEYS: env.ADMIN_STATUS_API_LOG_REDACT_EXTRA_KEYS
});

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): ServiceConfig => {
  const parsed = envSchema.parse(toEnvInput(env));

  return {
    nodeEnv: parsed.NODE_ENV,
    host: parsed.ADMIN_STATUS_API_HOST,
    port: parsed.ADMIN_STATUS_API_PORT,
    auth: parseAuthConfig({
      apiKey: parsed.ADMIN_STATUS_API_KEY,
      insecureMode: parsed.ADMIN_STATUS_API_INSECURE_MODE,
      unprotectedPaths: env.ADMIN_STATUS_API_UNPROTECTED_PATHS,
      nodeEnv: parsed.NODE_ENV
    }),
    maxRequestBytes: parsed.ADMIN_STATUS_API_MAX_REQUEST_SIZE_MB * 1024 * 1024,
    documentation: {
      agentLabel: parsed.ADMIN_STATUS_API_AGENT_LABEL,
      version: parsed.ADMIN_STATUS_API_VERSION
    },
    timing: {
      enabled: parsed.ADMIN_STATUS_API_TIMING_ENABLED
    },
    logging: {
      level: parsed.ADMIN_STATUS_API_LOG_LEVEL ?? (parsed.NODE_ENV === 'test' ? 'silent' : 'info'),
      redactExtraKeys: parseCommaSeparated(parsed.ADMIN_STATUS_API_LOG_REDACT_EXTRA_KEYS)
    }
  };
};
