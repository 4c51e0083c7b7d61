import type {Writable} from 'node:stream';

import {z} from 'zod';

import {getLogContext, type LogContext} from './context.js';
import {redactSecretsInText, sanitizeForLog} from './redaction.js';

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
    run_id: z.string().min(1).max(128).optional(),
    stage: z.string().min(1).optional(),
    revision_id: z.string().min(1).optional(),
    reason_code: z.string().min(1).optional(),
    duration_ms: z.number().int().gte(0).optional(),
    metadata: z.record(z.string(), z.unknown()).optional()
  })
  .strict();

export type LogEventInput = z.infer<typeof LogEventInputSchema>;

export const LogEventSchema = z
  .object({
    ts: z.string().datetime(),
    level: EmittableLogLevelSchema,
    service: z.string().min(1),
    env: z.string().min(1),
    event: z.string().min(1),
    component: z.string().min(1),
    correlation_id: z.string().min(1),
    message: z.string().min(1).optional(),
    run_id: z.string().min(1).optional(),
    command: z.string().min(1).optional(),
    stage: z.string().min(1).optional(),
    revision_id: z.string().min(1).optional(),
    reason_code: z.string().min(1).optional(),
    duration_ms: z.number().int().gte(0).optional(),
    metadata: z.record(z.string(), z.unknown())
  })
  .strict();

export type LogEvent = z.infer<typeof LogEventSchema>;

const toLevelOrder = (level: LogLevel | EmittableLogLevel) => {
  switch (level) {
    case 'debug':
      return 10;
    case 'info':
      return 20;
    case 'warn':
      return 30;
    case 'error':
      return 40;
    case 'fatal':
      return 50;
    case 'silent':
      return 90;
  }
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

export type StructuredLogger = {
  log: (input: LogEventInput) => void;
  debug: (input: Omit<LogEventInput, 'level'>) => void;
  info: (input: Omit<LogEventInput, 'level'>) => void;
  warn: (input: Omit<LogEventInput, 'level'>) => void;
  error: (input: Omit<LogEventInput, 'level'>) => void;
  fatal: (input: Omit<LogEventInput, 'level'>) => void;
};

const defaultWriter: StructuredLogWriter = {
  stdout: process.stdout,
  stderr: process.stderr
};

const shouldEmit = ({configuredLevel, eventLevel}: {configuredLevel: LogLevel; eventLevel: EmittableLogLevel}) =>
  toLevelOrder(eventLevel) >= toLevelOrder(configuredLevel);

const chooseStream = ({level, writer}: {level: EmittableLogLevel; writer: StructuredLogWriter}) =>
  level === 'error' || level === 'fatal' ? writer.stderr : writer.stdout;

const extractContext = ({context, input}: {context: LogContext | undefined; input: LogEventInput}) => ({
  correlation_id: input.correlation_id ?? context?.correlation_id ?? 'n/a',
  run_id: input.run_id ?? context?.run_id,
  command: context?.command,
  stage: input.stage ?? context?.stage,
  revision_id: input.revision_id ?? context?.revision_id
});

const createEnvelope = ({
  input,
  options,
  context
}: {
  input: LogEventInput;
  options: StructuredLoggerOptions;
  context: LogContext | undefined;
}): LogEvent => {
  const resolvedContext = extractContext({context, input});
  const sanitizedMetadata = z.record(z.string(), z.unknown()).parse(
    sanitizeForLog({
      value: input.metadata ?? {},
      extraSensitiveKeys: options.extraSensitiveKeys
    })
  );

  return LogEventSchema.parse({
    ts: (options.now ?? (() => new Date()))().toISOString(),
    level: input.level,
    service: options.service,
    env: options.env,
    event: input.event,
    component: input.component,
    correlation_id: resolvedContext.correlation_id,
    ...(input.message ? {message: redactSecretsInText(input.message)} : {}),
    ...(resolvedContext.run_id ? {run_id: resolvedContext.run_id} : {}),
    ...(resolvedContext.command ? {command: resolvedContext.command} : {}),
    ...(resolvedContext.stage ? {stage: resolvedContext.stage} : {}),
    ...(resolvedContext.revision_id ? {revision_id: resolvedContext.revision_id} : {}),
    ...(input.reason_code ? {reason_code: input.reason_code} : {}),
    ...(input.duration_ms !== undefined ? {duration_ms: input.duration_ms} : {}),
    metadata: sanitizedMetadata
  });
};

export const createStructuredLogger = (options: StructuredLoggerOptions): StructuredLogger => {
  const parsedOptions = {
    ...options,
    level: LogLevelSchema.parse(options.level),
    service: z.string().min(1).parse(options.service),
    env: z.string().min(1).parse(options.env),
    writer: options.writer ?? defaultWriter,
    extraSensitiveKeys: options.extraSensitiveKeys ?? []
  };

  const log = (rawInput: LogEventInput) => {
    const input = LogEventInputSchema.parse(rawInput);
    if (!shouldEmit({configuredLevel: parsedOptions.level, eventLevel: input.level})) {
      return;
    }

    try {
      const envelope = createEnvelope({
        input,
        options: parsedOptions,
        context: getLogContext()
      });
      chooseStream({level: input.level, writer: parsedOptions.writer}).write(`${JSON.stringify(envelope)}\n`);
    } catch {
      // Logging failures must never break a reconcile run.
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
