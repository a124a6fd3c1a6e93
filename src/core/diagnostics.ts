/**
 * anchor-scroll - Diagnostics
 * Logging, contract-violation reporting and the error type thrown in strict mode
 */

import { LOG_PREFIX } from "../constants";
import type { Diagnostic, DiagnosticCode, Logger } from "../types";

// =============================================================================
// Error
// =============================================================================

export class VirtualScrollError extends Error {
  readonly code: DiagnosticCode;

  constructor(code: DiagnosticCode, message: string) {
    super(`${LOG_PREFIX} ${message}`);
    this.name = "VirtualScrollError";
    this.code = code;
  }
}

// =============================================================================
// Logger
// =============================================================================

/**
 * Create a prefixed logger on top of `sink` (console by default).
 * Debug output is dropped unless `debug` is set.
 */
export const createLogger = (
  debug = false,
  sink: Logger = console,
): Logger => ({
  debug: (...args: unknown[]): void => {
    if (debug) sink.debug(LOG_PREFIX, ...args);
  },
  warn: (...args: unknown[]): void => sink.warn(LOG_PREFIX, ...args),
  error: (...args: unknown[]): void => sink.error(LOG_PREFIX, ...args),
});

// =============================================================================
// Reporter
// =============================================================================

export interface DiagnosticsConfig {
  logger: Logger;
  strict: boolean;
  /** Forwarded every reported diagnostic */
  onDiagnostic?: (diagnostic: Diagnostic) => void;
}

export interface Diagnostics {
  /** Log a recoverable problem; never throws */
  warn(code: DiagnosticCode, message: string): void;

  /** Log an error which does not break the controller's contract */
  error(code: DiagnosticCode, message: string): void;

  /**
   * Report a broken contract. Throws in strict mode; otherwise logs and runs
   * `recover`, the documented fallback.
   */
  violation(code: DiagnosticCode, message: string, recover?: () => void): void;
}

export const createDiagnostics = (config: DiagnosticsConfig): Diagnostics => {
  const { logger, strict, onDiagnostic } = config;

  const report = (diagnostic: Diagnostic): void => {
    if (diagnostic.level === "warn") {
      logger.warn(diagnostic.message);
    } else {
      logger.error(diagnostic.message);
    }
    onDiagnostic?.(diagnostic);
  };

  return {
    warn: (code, message) => report({ code, level: "warn", message }),

    error: (code, message) => report({ code, level: "error", message }),

    violation: (code, message, recover) => {
      report({ code, level: "error", message });
      if (strict) {
        throw new VirtualScrollError(code, message);
      }
      recover?.();
    },
  };
};
