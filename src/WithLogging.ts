import type { Logger } from './Logger';

/**
 * Anything that can hand out the shared logger (the ConfigManager in practice)
 */
export interface LoggerSource {
  getLogger(): Logger;
}

export interface ComponentLogger {
  verbose(msg: string, ...data: unknown[]): void;
  log(msg: string, ...data: unknown[]): void;
  warn(msg: string, ...data: unknown[]): void;
  error(msg: string, ...data: unknown[]): void;
}

export function createComponentLogger(
  source: LoggerSource,
  componentName: string
): ComponentLogger {
  const prefix = `[SupportAgent.${componentName}]`;
  return {
    verbose: (msg, ...data) =>
      source.getLogger().verbose(`${prefix} ${msg}`, ...data),
    log: (msg, ...data) => source.getLogger().log(`${prefix} ${msg}`, ...data),
    warn: (msg, ...data) =>
      source.getLogger().warn(`${prefix} ${msg}`, ...data),
    error: (msg, ...data) =>
      source.getLogger().error(`${prefix} ${msg}`, ...data),
  };
}

/**
 * Base class providing logging functionality through the shared logger
 * Automatically formats log messages with component name prefix
 */
export abstract class WithLogging {
  protected abstract readonly configManager: LoggerSource;
  protected abstract readonly componentName: string;

  protected verbose(msg: string, ...data: unknown[]): void {
    this.configManager
      .getLogger()
      .verbose(`[SupportAgent.${this.componentName}] ${msg}`, ...data);
  }

  protected log(msg: string, ...data: unknown[]): void {
    this.configManager
      .getLogger()
      .log(`[SupportAgent.${this.componentName}] ${msg}`, ...data);
  }

  protected error(msg: string, ...data: unknown[]): void {
    this.configManager
      .getLogger()
      .error(`[SupportAgent.${this.componentName}] ${msg}`, ...data);
  }

  protected warn(msg: string, ...data: unknown[]): void {
    this.configManager
      .getLogger()
      .warn(`[SupportAgent.${this.componentName}] ${msg}`, ...data);
  }
}
