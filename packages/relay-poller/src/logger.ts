import pino, { type Logger } from 'pino';

// stdout carries the poller's own output lines, so diagnostics go to stderr.
export function createLogger(level = process.env['LOG_LEVEL'] ?? 'info'): Logger {
  return pino(
    {
      level,
      base: { service: 'relay-poller' },
      timestamp: pino.stdTimeFunctions.isoTime,
      errorKey: 'error',
      serializers: { error: pino.stdSerializers.err },
    },
    pino.destination(2),
  );
}
