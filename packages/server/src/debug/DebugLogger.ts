import createDebug from 'debug';
import type { Debugger } from 'debug';

export type LogLevel = 'debug' | 'log' | 'warn' | 'error';

const REDACT_PATTERNS: readonly string[] = [
  'token',
  'password',
  'secret',
];

export class DebugLogger {
  // Singleton-per-namespace registry
  private static instances: Map<string, DebugLogger> = new Map();

  private readonly debugInstance: Debugger;
  private readonly _namespace: string;

  /**
   * Factory method to get or create a DebugLogger for a namespace.
   * Returns cached instance if one exists.
   */
  static getLogger(namespace: string): DebugLogger {
    let logger = DebugLogger.instances.get(namespace);
    if (!logger) {
      logger = new DebugLogger(namespace);
      DebugLogger.instances.set(namespace, logger);
    }
    return logger;
  }

  /**
   * Enables the given `debug`-style namespace list (e.g. `proofpad:*`),
   * replacing whatever `DEBUG` selected at startup.
   */
  static enable(namespaces: string): void {
    createDebug.enable(namespaces);
  }

  /**
   * Reset for testing - clears cached instances
   */
  static resetForTesting(): void {
    DebugLogger.instances.clear();
  }

  constructor(namespace: string) {
    this._namespace = namespace;
    this.debugInstance = createDebug(namespace);
  }

  get namespace(): string {
    return this._namespace;
  }

  get enabled(): boolean {
    return this.debugInstance.enabled;
  }

  log(messageOrFn: string | (() => string), ...args: unknown[]): void {
    this.write('log', messageOrFn, args);
  }

  debug(messageOrFn: string | (() => string), ...args: unknown[]): void {
    this.write('debug', messageOrFn, args);
  }

  warn(messageOrFn: string | (() => string), ...args: unknown[]): void {
    this.write('warn', messageOrFn, args);
  }

  error(messageOrFn: string | (() => string), ...args: unknown[]): void {
    this.write('error', messageOrFn, args);
  }

  private write(
    level: LogLevel,
    messageOrFn: string | (() => string),
    args: unknown[],
  ): void {
    // Warnings and errors are written even when the namespace is filtered out.
    const forced = level === 'warn' || level === 'error';
    if (!this.debugInstance.enabled && !forced) {
      return; // Zero overhead - no processing when disabled
    }

    let message: string;
    if (typeof messageOrFn === 'function') {
      try {
        message = messageOrFn();
      } catch (_error) {
        message = '[Error evaluating log function]';
      }
    } else {
      message = messageOrFn;
    }

    message = this.redactSensitive(message);
    const line =
      level === 'log' || level === 'debug'
        ? message
        : `${level.toUpperCase()} ${message}`;

    if (this.debugInstance.enabled) {
      this.debugInstance(line, ...args);
      return;
    }

    createDebug.log(
      `${new Date().toISOString()} ${this._namespace} ${line}`,
      ...args,
    );
  }

  private redactSensitive(message: string): string {
    let result = message;

    for (const pattern of REDACT_PATTERNS) {
      const regex = new RegExp(`${pattern}["']?:\\s*["']?([^"'\\s]+)`, 'gi');
      result = result.replace(regex, `${pattern}: [REDACTED]`);
    }

    return result;
  }
}
