import { type LogLevel, LOG_LEVEL_ORDER } from './config';

export class Logger {
  constructor(private getLogLevel: () => LogLevel) {}

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_ORDER[level] <= LOG_LEVEL_ORDER[this.getLogLevel()];
  }

  verbose(msg: string, ...data: unknown[]): void {
    if (this.shouldLog('verbose')) {
      console.log(msg, ...data);
    }
  }

  log(msg: string, ...data: unknown[]): void {
    if (this.shouldLog('log')) {
      console.log(msg, ...data);
    }
  }

  warn(msg: string, ...data: unknown[]): void {
    if (this.shouldLog('warn')) {
      console.warn(msg, ...data);
    }
  }

  error(msg: string, ...data: unknown[]): void {
    if (this.shouldLog('error')) {
      console.error(msg, ...data);
    }
  }
}
