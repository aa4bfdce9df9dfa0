/**
 * Scoped loggers in the "[SCOPE]: message" style.
 *
 * The core never prints by itself: callers hand in a sink, and the CLI decides
 * what reaches the terminal.
 */

export type LogLevel = 'debug' | 'warn';

export type LogSink = (level: LogLevel, line: string) => void;

export interface Logger {
  debug(...args: unknown[]): void;
  warn(...args: unknown[]): void;
}

function render(args: unknown[]): string {
  return args.map((a) => (typeof a === 'string' ? a : JSON.stringify(a))).join(' ');
}

export const silentSink: LogSink = () => {};

export function createLogger(scope: string, sink: LogSink = silentSink): Logger {
  const prefix = `[${scope.toUpperCase()}]:`;
  return {
    debug: (...args) => sink('debug', `${prefix} ${render(args)}`),
    warn: (...args) => sink('warn', `${prefix} ${render(args)}`),
  };
}
