/**
 * Logger factory for the CLI
 * Lines look like `2025-03-25 10:00:00: INFO: message` on stderr and in the optional log file
 */

import { createLogger as createWinstonLogger, format, Logger, transports } from 'winston';

export interface LoggerOptions {
  verbose?: boolean;
  color?: boolean;
  logFile?: string;
}

const line = format.printf(
  ({ timestamp, level, message }) => `${timestamp}: ${level}: ${message}`
);

const upperLevel = format(info => {
  info.level = info.level.toUpperCase();
  return info;
});

/**
 * Color only goes to a terminal that can show it
 */
export function shouldColor(stream: { isTTY?: boolean }, env: NodeJS.ProcessEnv): boolean {
  return Boolean(stream.isTTY) && !env.NO_COLOR && env.TERM !== 'dumb';
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const color = options.color ?? shouldColor(process.stderr, process.env);

  const consoleFormat = color
    ? format.combine(upperLevel(), format.colorize(), line)
    : format.combine(upperLevel(), line);

  return createWinstonLogger({
    level: options.verbose ? 'debug' : 'info',
    format: format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    transports: [
      new transports.Console({
        format: consoleFormat,
        stderrLevels: ['error', 'warn', 'info', 'debug'],
      }),
      ...(options.logFile
        ? [
            new transports.File({
              filename: options.logFile,
              format: format.combine(upperLevel(), line),
            }),
          ]
        : []),
    ],
  });
}
