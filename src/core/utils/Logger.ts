import { loadClientSettings } from '../../config/config';

/**
 * Logger de traçage des opérations, rattaché à un contexte (nom d'opération).
 */
export interface Logger {
  debug(message: string, ...meta: unknown[]): void;
  info(message: string, ...meta: unknown[]): void;
  warn(message: string, ...meta: unknown[]): void;
  error(message: string, ...meta: unknown[]): void;
  child(scope: string): Logger;
}

/**
 * Console-backed logger. Debug output only when APPSEC_DEBUG=1.
 */
export class ConsoleLogger implements Logger {
  constructor(
    private readonly scope?: string,
    private readonly debugEnabled: boolean = loadClientSettings().APPSEC_DEBUG === '1',
  ) {}

  public debug(message: string, ...meta: unknown[]): void {
    if (!this.debugEnabled) return;
    console.debug(this.format(message), ...meta);
  }

  public info(message: string, ...meta: unknown[]): void {
    console.info(this.format(message), ...meta);
  }

  public warn(message: string, ...meta: unknown[]): void {
    console.warn(this.format(message), ...meta);
  }

  public error(message: string, ...meta: unknown[]): void {
    console.error(this.format(message), ...meta);
  }

  public child(scope: string): Logger {
    return new ConsoleLogger(this.scope ? `${this.scope}:${scope}` : scope, this.debugEnabled);
  }

  private format(message: string): string {
    return this.scope ? `[${this.scope}] ${message}` : message;
  }
}
