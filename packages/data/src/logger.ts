/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * gds-kit logger - consistent console logging across packages
 *
 * Log levels:
 * - error: Always logged - critical failures that affect functionality
 * - warn: Always logged - recoverable issues, e.g. a structure that failed to parse
 * - info: Logged when debug is enabled - general operational info
 * - debug: Logged when debug is enabled - detailed decoding info
 *
 * Enable debug logging by setting GDS_DEBUG=true in the environment.
 */

export interface LogContext {
  /** Component/module name (e.g., 'LibraryCache', 'ElementBuilder') */
  component: string;
  /** Operation being performed (e.g., 'scanStructures', 'parseElements') */
  operation?: string;
  /** Structure name if applicable */
  structure?: string;
  /** Byte offset into the stream if applicable */
  offset?: number;
  /** Additional context data */
  data?: Record<string, unknown>;
}

export function isDebugEnabled(): boolean {
  if (typeof process !== 'undefined' && process.env) {
    return process.env.GDS_DEBUG === 'true';
  }
  return false;
}

export function formatContext(ctx: LogContext): string {
  let prefix = `[${ctx.component}]`;
  if (ctx.operation) {
    prefix += ` ${ctx.operation}`;
  }
  if (ctx.structure !== undefined) {
    prefix += ` "${ctx.structure}"`;
  }
  if (ctx.offset !== undefined) {
    prefix += ` @${ctx.offset}`;
  }
  return prefix;
}

function formatError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}${error.stack ? `\n${error.stack}` : ''}`;
  }
  return String(error);
}

export type Logger = ReturnType<typeof createLogger>;

/**
 * Create a logger instance for a specific component
 */
export function createLogger(component: string) {
  return {
    /**
     * Log an error - always visible in console
     */
    error(message: string, error?: unknown, ctx?: Partial<LogContext>) {
      const prefix = formatContext({ component, ...ctx });
      if (error !== undefined) {
        if (ctx?.data !== undefined) {
          console.error(`${prefix} ${message}:`, formatError(error), ctx.data);
        } else {
          console.error(`${prefix} ${message}:`, formatError(error));
        }
      } else {
        if (ctx?.data !== undefined) {
          console.error(`${prefix} ${message}`, ctx.data);
        } else {
          console.error(`${prefix} ${message}`);
        }
      }
    },

    /**
     * Log a warning - always visible in console
     */
    warn(message: string, ctx?: Partial<LogContext>) {
      const prefix = formatContext({ component, ...ctx });
      if (ctx?.data !== undefined) {
        console.warn(`${prefix} ${message}`, ctx.data);
      } else {
        console.warn(`${prefix} ${message}`);
      }
    },

    /**
     * Log info - only visible when GDS_DEBUG=true
     */
    info(message: string, ctx?: Partial<LogContext>) {
      if (!isDebugEnabled()) return;
      const prefix = formatContext({ component, ...ctx });
      if (ctx?.data !== undefined) {
        console.log(`${prefix} ${message}`, ctx.data);
      } else {
        console.log(`${prefix} ${message}`);
      }
    },

    /**
     * Log debug - only visible when GDS_DEBUG=true
     */
    debug(message: string, data?: unknown, ctx?: Partial<LogContext>) {
      if (!isDebugEnabled()) return;
      const prefix = formatContext({ component, ...ctx });
      if (data !== undefined) {
        console.debug(`${prefix} ${message}`, data);
      } else {
        console.debug(`${prefix} ${message}`);
      }
    },

    /**
     * Log a caught error with context - visible when GDS_DEBUG=true
     * Use where the error is turned into a returned result
     */
    caught(message: string, error: unknown, ctx?: Partial<LogContext>) {
      if (!isDebugEnabled()) return;
      const prefix = formatContext({ component, ...ctx });
      if (ctx?.data !== undefined) {
        console.debug(`${prefix} ${message} (recovered):`, formatError(error), ctx.data);
      } else {
        console.debug(`${prefix} ${message} (recovered):`, formatError(error));
      }
    },
  };
}
