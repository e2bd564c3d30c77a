import pino, { DestinationStream, Level, Logger, LoggerOptions } from 'pino';
import { LoggerConfig, LogLevel } from '@fillway/interfaces';

const PINO_LEVELS: Record<LogLevel, Level> = {
  [LogLevel.DEBUG]: 'debug',
  [LogLevel.INFO]: 'info',
  [LogLevel.WARN]: 'warn',
  [LogLevel.ERROR]: 'error',
  [LogLevel.FATAL]: 'fatal'
};

export function toPinoLevel(level: LogLevel): Level {
  return PINO_LEVELS[level];
}

export class LoggerFactory {
  private static instance: LoggerFactory | undefined;
  private defaultLogger: Logger | null = null;

  static getInstance(): LoggerFactory {
    if (!this.instance) {
      this.instance = new LoggerFactory();
    }
    return this.instance;
  }

  static resetInstance(): void {
    this.instance = undefined;
  }

  create(name: string, config?: Partial<LoggerConfig>, destination?: DestinationStream): Logger {
    const level = config?.level ?? LogLevel.INFO;
    const options: LoggerOptions = {
      name,
      level: toPinoLevel(level),
      base: { ...config?.base },
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level: (label: string) => ({ level: label })
      }
    };
    return destination ? pino(options, destination) : pino(options);
  }

  setDefault(logger: Logger | null): void {
    this.defaultLogger = logger;
  }

  getDefault(): Logger | null {
    return this.defaultLogger;
  }
}

export function createLogger(
  name: string,
  config?: Partial<LoggerConfig>,
  destination?: DestinationStream
): Logger {
  return LoggerFactory.getInstance().create(name, config, destination);
}
