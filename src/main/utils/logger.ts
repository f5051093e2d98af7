/**
 * Console logging with a bracketed component prefix, e.g. "[VerbService] ...".
 * Debug lines are printed only when LOG_LEVEL=debug.
 */

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export function isDebugEnabled(): boolean {
  return process.env.LOG_LEVEL?.toLowerCase() === 'debug';
}

export function createLogger(component: string): Logger {
  const prefix = `[${component}]`;
  return {
    debug: (message, ...details) => {
      if (isDebugEnabled()) console.debug(prefix, message, ...details);
    },
    info: (message, ...details) => console.log(prefix, message, ...details),
    warn: (message, ...details) => console.warn(prefix, message, ...details),
    error: (message, ...details) => console.error(prefix, message, ...details),
  };
}
