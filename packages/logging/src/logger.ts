import type {Writable} from 'node:stream';

import {LogEventSchema, type LogEvent} from '@credential-agent/schemas';
import {z} from 'zod';

import {getLogContext, type LogContext} from './context';
import {sanitizeMetadataForLog} from './redaction';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'fatal', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

const EmittableLogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'fatal']);
type EmittableLogLevel = z.infer<typeof EmittableLogLevelSchema>;

export const LogEventInputSchema = z
  .object({
    level: EmittableLogLevelSchema,
    event: z.string().min(1),
    component: z.string().min(1),
    message: z.string().min(1).optional(),
    correlation_id: z.string().min(1).max(128).optional(),
    request_id: z.string().min(1).max(128).optional(),
    profile: z.string().min(1).optional(),
    reason_code: z.string().min(1).optional(),
    duration_ms: z.number().int().gte(0).optional(),
    status_code: z.number().int().gte(100).lte(599).optional(),
    route: z.string().min(1).optional(),
    method: z.string().min(1).optional(),
    metadata: z.record(z.string(), z.unknown()).optional()
  })
  .strict();

export type LogEventInput = z.infer<typeof LogEventInputSchema>;

const levelOrder: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
  silent: 90
};

export type StructuredLogWriter = {
  stdout: Pick<Writable, 'write'>;
  stderr: Pick<Writable, 'write'>;
};

export type StructuredLoggerOptions = {
  service: string;
  env: string;
  level: LogLevel;
  now?: () => Date;
  writer?: StructuredLogWriter;
  extraSensitiveKeys?: string[];
};

type LevelInput = Omit<LogEventInput, 'level'>;

export type StructuredLogger = {
  log: (input: LogEventInput) => void;
  debug: (input: LevelInput) => void;
  info: (input: LevelInput) => void;
  warn: (input: LevelInput) => void;
  error: (input: LevelInput) => void;
  fatal: (input: LevelInput) => void;
};

const defaultWriter: StructuredLogWriter = {
  stdout: process.stdout,
  stderr: process.stderr
};

const createEnvelope = ({
  input,
  options,
  context
}: {
  input: LogEventInput;
  options: Required<Pick<StructuredLoggerOptions, 'service' | 'env' | 'extraSensitiveKeys'>> & {now: () => Date};
  context: LogContext | undefined;
}): LogEvent => {
  const profile = input.profile ?? context?.profile;
  const route = input.route ?? context?.route;
  const method = input.method ?? context?.method;

  return LogEventSchema.parse({
    ts: options.now().toISOString(),
    level: input.level,
    service: options.service,
    env: options.env,
    event: input.event,
    component: input.component,
    correlation_id: input.correlation_id ?? context?.correlation_id ?? 'n/a',
    request_id: input.request_id ?? context?.request_id ?? 'n/a',
    ...(input.message ? {message: input.message} : {}),
    ...(profile ? {profile} : {}),
    ...(input.reason_code ? {reason_code: input.reason_code} : {}),
    ...(input.duration_ms !== undefined ? {duration_ms: input.duration_ms} : {}),
    ...(input.status_code !== undefined ? {status_code: input.status_code} : {}),
    ...(route ? {route} : {}),
    ...(method ? {method} : {}),
    metadata: sanitizeMetadataForLog({
      metadata: input.metadata ?? {},
      extraSensitiveKeys: options.extraSensitiveKeys
    })
  });
};

export const createStructuredLogger = (options: StructuredLoggerOptions): StructuredLogger => {
  const configuredLevel = LogLevelSchema.parse(options.level);
  const writer = options.writer ?? defaultWriter;
  const envelopeOptions = {
    service: z.string().min(1).parse(options.service),
    env: z.string().min(1).parse(options.env),
    extraSensitiveKeys: options.extraSensitiveKeys ?? [],
    now: options.now ?? (() => new Date())
  };

  const isLevelEnabled = (level: EmittableLogLevel) => levelOrder[level] >= levelOrder[configuredLevel];

  const log = (rawInput: LogEventInput) => {
    const input = LogEventInputSchema.parse(rawInput);
    if (!isLevelEnabled(input.level)) {
      return;
    }

    try {
      const envelope = createEnvelope({input, options: envelopeOptions, context: getLogContext()});
      const stream = input.level === 'error' || input.level === 'fatal' ? writer.stderr : writer.stdout;
      stream.write(`${JSON.stringify(envelope)}\n`);
    } catch {
      // Logging failures must never break runtime behavior.
    }
  };

  return {
    log,
    debug: input => log({...input, level: 'debug'}),
    info: input => log({...input, level: 'info'}),
    warn: input => log({...input, level: 'warn'}),
    error: input => log({...input, level: 'error'}),
    fatal: input => log({...input, level: 'fatal'})
  };
};

export const createNoopLogger = (): StructuredLogger => ({
  log: () => undefined,
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  fatal: () => undefined
});
