export {
  getLogContext,
  LogContextSchema,
  runWithLogContext,
  setLogContextFields,
  type LogContext
} from './context.js';
export {
  createNoopLogger,
  createStructuredLogger,
  LogEventInputSchema,
  LogEventSchema,
  LogLevelSchema,
  type LogEvent,
  type LogEventInput,
  type LogLevel,
  type StructuredLogger,
  type StructuredLoggerOptions,
  type StructuredLogWriter
} from './logger.js';
export {redactSecretsInText, sanitizeForLog} from './redaction.js';
