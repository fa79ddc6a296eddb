import pino, { type Logger, type TransportTargetOptions } from 'pino';
import type { AppConfig, LogLevel } from './types';

interface LoggerOptions {
  level?: LogLevel;
}

export function createLogger(config: AppConfig, options: LoggerOptions = {}): Logger {
  const level = options.level ?? config.logLevel;
  const pretty = process.stdout.isTTY;

  const targets: TransportTargetOptions[] = [];

  if (pretty) {
    targets.push({
      target: 'pino-pretty',
      level,
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    });
  } else if (config.logFile) {
    targets.push({ target: 'pino/file', level, options: { destination: 1 } });
  }

  if (config.logFile) {
    targets.push({
      target: 'pino/file',
      level,
      options: { destination: config.logFile, mkdir: true },
    });
  }

  if (targets.length === 0) {
    return pino({ level });
  }

  return pino({ level, transport: { targets } });
}
