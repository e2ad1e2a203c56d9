/**
 * Logging utilities for Cloud Functions
 *
 * Level-tagged console output, which Cloud Functions forwards to Cloud Logging.
 */

/**
 * Log informational messages.
 *
 * @param message - The info message to log
 * @param args - Additional arguments to log
 */
export function logInfo(message: string, ...args: unknown[]): void {
  console.log(`[INFO] ${message}`, ...args);
}

/**
 * Log warning messages.
 *
 * @param message - The warning message to log
 * @param args - Additional arguments to log
 */
export function logWarn(message: string, ...args: unknown[]): void {
  console.warn(`[WARN] ${message}`, ...args);
}

/**
 * Log error messages.
 *
 * @param message - The error message to log
 * @param error - The error object
 */
export function logError(message: string, error?: unknown): void {
  if (error === undefined) {
    console.error(`[ERROR] ${message}`);
    return;
  }
  console.error(`[ERROR] ${message}`, error);
}

/**
 * Logger that prefixes every message with a component tag, e.g. "[uploadExposureData]"
 */
export interface ScopedLogger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, error?: unknown): void;
}

export function createLogger(scope: string): ScopedLogger {
  return {
    info: (message, ...args) => logInfo(`[${scope}] ${message}`, ...args),
    warn: (message, ...args) => logWarn(`[${scope}] ${message}`, ...args),
    error: (message, error) => logError(`[${scope}] ${message}`, error),
  };
}
