export type LogLevel = 'info' | 'warn' | 'error' | 'silent';

const ORDER: Record<LogLevel, number> = { info: 0, warn: 1, error: 2, silent: 3 };

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function createLogger(scope: string, level: LogLevel = 'info'): Logger {
  const tag = `[${scope}]`;
  const enabled = (l: LogLevel) => ORDER[l] >= ORDER[level];
  return {
    info: (message) => { if (enabled('info')) console.log(`${tag} ${message}`); },
    warn: (message) => { if (enabled('warn')) console.warn(`${tag} WARNING: ${message}`); },
    error: (message) => { if (enabled('error')) console.error(`${tag} ${message}`); },
  };
}
