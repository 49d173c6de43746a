/**
 * Scoped console logging for the page controllers.
 * Debug lines only go out when the site runs with debug enabled; warnings and errors always do.
 */

export interface ScopedLogger {
  debug: (message: string, details?: Record<string, unknown>) => void;
  warn: (message: string, details?: Record<string, unknown>) => void;
  error: (message: string, details?: Record<string, unknown>) => void;
}

export function createLogger(scope: string, isVerbose: () => boolean): ScopedLogger {
  const prefix = `[${scope}]`;

  return {
    debug: (message, details) => {
      if (!isVerbose()) return;
      if (details) {
        console.log(`${prefix} ${message}`, details);
      } else {
        console.log(`${prefix} ${message}`);
      }
    },
    warn: (message, details) => {
      if (details) {
        console.warn(`${prefix} ${message}`, details);
      } else {
        console.warn(`${prefix} ${message}`);
      }
    },
    error: (message, details) => {
      if (details) {
        console.error(`${prefix} ${message}`, details);
      } else {
        console.error(`${prefix} ${message}`);
      }
    }
  };
}
