// Colors for console output
export const colors = {
  reset: "\x1b[0m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  red: "\x1b[31m",
  cyan: "\x1b[36m",
  gray: "\x1b[90m"
};

export type LogLevel = 'debug' | 'info' | 'success' | 'warn' | 'error';

const levelColor: Record<LogLevel, string> = {
  debug: colors.gray,
  info: '',
  success: colors.green,
  warn: colors.yellow,
  error: colors.red
};

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string, err?: unknown): void;
  child(scope: string): Logger;
}

const describeError = (err: unknown): string => {
  if (err instanceof Error) return err.stack || err.message;
  return String(err);
};

export const createLogger = (scope: string, write: (line: string) => void = console.log): Logger => {
  const emit = (level: LogLevel, message: string) => {
    const color = levelColor[level];
    const reset = color ? colors.reset : '';
    write(`${color}[${scope}] ${message}${reset}`);
  };

  return {
    debug: (message) => emit('debug', message),
    info: (message) => emit('info', message),
    success: (message) => emit('success', message),
    warn: (message) => emit('warn', message),
    error: (message, err) => emit('error', err === undefined ? message : `${message}: ${describeError(err)}`),
    child: (childScope) => createLogger(childScope, write)
  };
};

export const logger = createLogger('app');
