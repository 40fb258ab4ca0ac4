export interface DalDebugLogger {
  db: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

let debugLogger: DalDebugLogger = {
  db: () => undefined,
  error: () => undefined,
};

export const debug = {
  db: (...args: unknown[]) => {
    debugLogger.db(...args);
  },
  error: (...args: unknown[]) => {
    debugLogger.error(...args);
  },
};

export const setDebugLogger = (logger: DalDebugLogger): void => {
  debugLogger = logger;
};

/**
 * Render an unknown thrown value for a log line.
 */
export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
