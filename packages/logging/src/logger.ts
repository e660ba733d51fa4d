import type {Writable} from 'node:stream';

import {LogEventSchema, type LogEvent} from '@prefab-gateway/schemas';
import {z} from 'zod';

import {getLogContext, type LogContext} from './context';
import {sanitizeRecordForLog} from './redaction';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'fatal', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

type EmittableLogLevel = Exclude<LogLevel, 'silent'>;

export const LogEventInputSchema = z
  .object({
    level: z.enum(['debug', 'info', 'warn', 'error', 'fatal']),
    event: z.string().min(1),
    component: z.string().min(1),
    message: z.string().min(1).optional(),
    correlation_id: z.string().min(1).max(128).optional(),
    request_id: z.string().min(1).max(128).optional(),
    caller_id: z.string().min(1).optional(),
    job_id: z.string().min(1).optional(),
    service_id: z.string().min(1).optional(),
    call_index: z.number().int().gte(0).optional(),
    reason_code: z.string().min(1).optional(),
    duration_ms: z.number().int().gte(0).optional(),
    status_code: z.number().int().gte(100).lte(599).optional(),
    route: z.string().min(1).optional(),
    method: z.string().min(1).optional(),
    metadata: z.record(z.string(), z.unknown()).optional()
  })
  .strict();

export type LogEventInput = z.infer<typeof LogEventInputSchema>;

const LEVEL_ORDER: Record<LogLevel, number> = {
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

type LevelMethod = (input: Omit<LogEventInput, 'level'>) => void;

export type StructuredLogger = {
  log: (input: LogEventInput) => void;
  debug: LevelMethod;
  info: LevelMethod;
  warn: LevelMethod;
  error: LevelMethod;
  fatal: LevelMethod;
};

const defaultWriter: StructuredLogWriter = {
  stdout: process.stdout,
  stderr: process.stderr
};

const CONTEXT_FIELDS = ['caller_id', 'job_id', 'service_id', 'call_index', 'route', 'method'] as const;

const resolveContextFields = ({context, input}: {context: LogContext | undefined; input: LogEventInput}) => {
  const resolved: Partial<Pick<LogEvent, (typeof CONTEXT_FIELDS)[number]>> = {};
  for (const field of CONTEXT_FIELDS) {
    const value = input[field] ?? context?.[field];
    if (value !== undefined) {
      Object.assign(resolved, {[field]: value});
    }
  }

  return resolved;
};

const createEnvelope = ({
  input,
  options,
  context
}: {
  input: LogEventInput;
  options: Required<Omit<StructuredLoggerOptions, 'now'>> & {now: () => Date};
  context: LogContext | undefined;
}): LogEvent =>
  LogEventSchema.parse({
    ts: options.now().toISOString(),
    level: input.level,
    service: options.service,
    env: options.env,
    event: input.event,
    component: input.component,
    correlation_id: input.correlation_id ?? context?.correlation_id ?? 'n/a',
    request_id: input.request_id ?? context?.request_id ?? 'n/a',
    ...(input.message ? {message: input.message} : {}),
    ...resolveContextFields({context, input}),
    ...(input.reason_code ? {reason_code: input.reason_code} : {}),
    ...(input.duration_ms !== undefined ? {duration_ms: input.duration_ms} : {}),
    ...(input.status_code !== undefined ? {status_code: input.status_code} : {}),
    metadata: sanitizeRecordForLog({
      value: input.metadata ?? {},
      extraSensitiveKeys: options.extraSensitiveKeys
    })
  });

const streamFor = (level: EmittableLogLevel, writer: StructuredLogWriter) =>
  level === 'error' || level === 'fatal' ? writer.stderr : writer.stdout;

export const createStructuredLogger = (options: StructuredLoggerOptions): StructuredLogger => {
  const resolvedOptions = {
    service: z.string().min(1).parse(options.service),
    env: z.string().min(1).parse(options.env),
    level: LogLevelSchema.parse(options.level),
    now: options.now ?? (() => new Date()),
    writer: options.writer ?? defaultWriter,
    extraSensitiveKeys: options.extraSensitiveKeys ?? []
  };

  const log = (rawInput: LogEventInput) => {
    if (LEVEL_ORDER[rawInput.level] < LEVEL_ORDER[resolvedOptions.level]) {
      return;
    }

    try {
      const input = LogEventInputSchema.parse(rawInput);
      const envelope = createEnvelope({input, options: resolvedOptions, context: getLogContext()});
      streamFor(input.level, resolvedOptions.writer).write(`${JSON.stringify(envelope)}\n`);
    } catch {
      // a malformed log event must never fail the request that emitted it
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
