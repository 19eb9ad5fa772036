/**
 * Logging utilities for consistent formatted output with log level support.
 *
 * Every line goes to stderr prefixed with its component context. Only 'info'
 * lines are shown by default; set PORTAL_DEBUG=1 or pass --debug to see
 * 'debug' lines (frame traces, dispatch decisions, connection lifecycle).
 */

// ============================================================================
// Global Debug State
// ============================================================================

let debugEnabled = false;

/**
 * Enable debug logging globally.
 *
 * Called during CLI initialization when the --debug flag is present.
 */
export function enableDebugLogging(): void {
  debugEnabled = true;
}

/**
 * Check if debug logging is currently enabled.
 */
export function isDebugEnabled(): boolean {
  return debugEnabled || process.env['PORTAL_DEBUG'] === '1';
}

// ============================================================================
// Log Levels
// ============================================================================

/**
 * Log level determines visibility of log messages.
 *
 * - 'info': Always shown (startup, shutdown, peer deaths, protocol violations)
 * - 'debug': Only shown in debug mode (per-frame traces, pending call bookkeeping)
 */
export type LogLevel = 'info' | 'debug';

/**
 * Log contexts for different components.
 */
export type LogContext =
  | 'portal'
  | 'server'
  | 'client'
  | 'connection'
  | 'transport'
  | 'stub'
  | 'session'
  | 'request';

// ============================================================================
// Logger Interface
// ============================================================================

/**
 * Logger instance with support for different log levels.
 */
export interface Logger {
  /** Log an info message (always shown). */
  info: (message: string) => void;

  /** Log a debug message (only shown in debug mode). */
  debug: (message: string) => void;

  /** Log a message at debug level. */
  (message: string): void;
}

// ============================================================================
// Logger Implementation
// ============================================================================

/**
 * Create a logger instance for a specific context.
 *
 * A scope narrows the prefix to one instance of the component, such as the
 * client a server-side connection belongs to: `[server#3] accepted`.
 *
 * @example
 * ```typescript
 * const log = createLogger('server');
 *
 * log.info('Listening on /tmp/session/default/portal/request');
 * createLogger('connection', 3).debug('-> getHeaders #7');
 * ```
 */
export function createLogger(context: LogContext, scope?: string | number): Logger {
  const prefix = scope === undefined ? `[${context}]` : `[${context}#${scope}]`;
  const logMessage = (message: string, level: LogLevel = 'debug'): void => {
    if (level === 'debug' && !isDebugEnabled()) {
      return;
    }
    console.error(`${prefix} ${message}`);
  };

  return Object.assign((message: string) => logMessage(message, 'debug'), {
    info: (message: string) => logMessage(message, 'info'),
    debug: (message: string) => logMessage(message, 'debug'),
  });
}
