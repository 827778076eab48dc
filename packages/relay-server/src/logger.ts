import pino, { type Logger, type LoggerOptions } from 'pino';

export type { Logger };

export interface LogOptions {
  level: string;
  /** Rotated log file; stdout only when omitted. */
  file?: string;
  /** Rotation threshold understood by pino-roll, e.g. `5m`. */
  maxSize?: string;
  /** Rotated files kept besides the active one. */
  backupCount?: number;
}

let rootLogger: Logger | null = null;

function isUnitTestRun(): boolean {
  return process.env['VITEST'] !== undefined || process.env['NODE_ENV'] === 'test';
}

export function createLogger(opts: LogOptions): Logger {
  const options: LoggerOptions = {
    level: opts.level,
    base: { service: 'agent-relay' },
    timestamp: pino.stdTimeFunctions.isoTime,
    errorKey: 'error',
    serializers: { error: pino.stdSerializers.err },
  };

  if (opts.level === 'silent' || !opts.file) return pino(options);

  const transport = pino.transport({
    targets: [
      { target: 'pino/file', level: opts.level, options: { destination: 1 } },
      {
        target: 'pino-roll',
        level: opts.level,
        options: {
          file: opts.file,
          size: opts.maxSize ?? '5m',
          limit: { count: opts.backupCount ?? 10 },
          mkdir: true,
        },
      },
    ],
  });
  return pino(options, transport);
}

/** Builds the process-wide logger once; later calls return the same instance. */
export function initLogging(opts?: LogOptions): Logger {
  if (rootLogger) return rootLogger;
  rootLogger = createLogger(opts ?? { level: isUnitTestRun() ? 'silent' : 'info' });
  return rootLogger;
}

export function getLogger(module: string): Logger {
  return (rootLogger ?? initLogging()).child({ module });
}

export function resetLogging(): void {
  rootLogger = null;
}
