/**
 * Structured logging contract shared by the pool core and the claimer.
 *
 * Implementations wrap pino; child loggers carry a `component` binding so
 * pool and scheduler output can be told apart in one log file.
 */
export interface ILogger {
  fatal(...args: readonly unknown[]): void;
  error(...args: readonly unknown[]): void;
  warn(...args: readonly unknown[]): void;
  info(...args: readonly unknown[]): void;
  debug(...args: readonly unknown[]): void;
  trace(...args: readonly unknown[]): void;

  /**
   * Create a scoped child logger whose entries all include `bindings`.
   */
  child(bindings: Record<string, unknown>): ILogger;
}
