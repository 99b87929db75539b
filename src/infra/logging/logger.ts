import winston, { format, transports } from 'winston';

export type { Logger } from 'winston';

export interface LoggerOptions {
  level?: string;
  silent?: boolean;
}

function getLogFormat(): winston.Logform.Format {
  if (process.env.NODE_ENV === 'production') {
    return format.combine(format.timestamp(), format.errors({ stack: true }), format.json());
  }

  return format.combine(
    format.colorize(),
    format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
    format.errors({ stack: true }),
    format.printf((info) => {
      const { timestamp, level, message, stack, ...meta } = info;
      let line = `${String(timestamp)} [${level}]: ${String(message)}`;
      if (Object.keys(meta).length > 0) {
        line += ` ${JSON.stringify(meta)}`;
      }
      if (typeof stack === 'string') {
        line += `\n${stack}`;
      }
      return line;
    })
  );
}

export function createLogger(options: LoggerOptions = {}): winston.Logger {
  return winston.createLogger({
    level: options.level ?? process.env.LOG_LEVEL ?? 'info',
    silent: options.silent ?? process.env.NODE_ENV === 'test',
    format: getLogFormat(),
    transports: [new transports.Console()],
  });
}

export const logger = createLogger();
