import pino from 'pino';
import { scrubMessage, scrubPII } from './redact.js';

export type Logger = pino.Logger;

/**
 * Creates a pino logger with secret redaction unless LOG_LEVEL=debug.
 */
export function createLogger(level: string = process.env.LOG_LEVEL ?? 'info'): Logger {
  const redactEnabled = level !== 'debug';
  return pino({
    level,
    hooks: {
      logMethod(args, method) {
        const scrubbed = args.map((a: unknown) =>
          typeof a === 'string' ? scrubMessage(a, redactEnabled) : scrubPII(a, redactEnabled),
        );
        method.apply(this, scrubbed as Parameters<typeof method>);
      },
    },
  });
}

/** Logger that drops everything; handy for tests and library callers. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
