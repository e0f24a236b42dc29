import pino from 'pino';

export type LoggerOptions = {
  level?: string;
  debugFile?: string;
};

/**
 * Logger factory - creates structured logger instances
 *
 * With `debugFile` set, every record at debug level and above is also
 * appended to that file, independent of the console level.
 */
export function createLogger(serviceName: string, options: LoggerOptions = {}) {
  const level = options.level || process.env.LOG_LEVEL || 'info';

  const baseOptions: pino.LoggerOptions = {
    name: serviceName,
    level,
    formatters: {
      level: (label) => {
        return { level: label };
      }
    },
    timestamp: pino.stdTimeFunctions.isoTime
  };

  if (!options.debugFile) {
    return pino(baseOptions);
  }

  const streams: pino.StreamEntry[] = [
    { level: toStreamLevel(level), stream: process.stdout },
    { level: 'debug', stream: pino.destination({ dest: options.debugFile, sync: true }) }
  ];

  return pino({ ...baseOptions, level: 'debug' }, pino.multistream(streams));
}

function toStreamLevel(level: string): pino.Level {
  switch (level) {
    case 'fatal':
    case 'error':
    case 'warn':
    case 'info':
    case 'debug':
    case 'trace':
      return level;
    default:
      return 'info';
  }
}

export type Logger = ReturnType<typeof createLogger>;
