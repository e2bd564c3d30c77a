export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  FATAL = 4
}

export interface LoggerConfig {
  level: LogLevel;
  /** Extra fields bound to every line */
  base?: Record<string, unknown>;
}
