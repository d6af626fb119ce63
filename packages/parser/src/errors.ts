/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Error taxonomy for the decoder.
 *
 *   input    - rejected before parsing (empty buffer, bad index, freed cache)
 *   format   - malformed or truncated stream
 *   resource - anything thrown by the runtime while building (allocation etc.)
 *
 * Scanner and builder throw; LibraryCache converts to GdsResult at its
 * public boundary so nothing escapes to the caller.
 */

export type GdsErrorKind = 'input' | 'format' | 'resource';

export interface GdsErrorContext {
  offset?: number;
  structure?: string;
  cause?: unknown;
}

export class GdsError extends Error {
  readonly kind: GdsErrorKind;
  readonly offset?: number;
  readonly structure?: string;

  constructor(kind: GdsErrorKind, message: string, context: GdsErrorContext = {}) {
    super(message, context.cause !== undefined ? { cause: context.cause } : undefined);
    this.name = 'GdsError';
    this.kind = kind;
    this.offset = context.offset;
    this.structure = context.structure;
  }
}

export class GdsInputError extends GdsError {
  constructor(message: string, context?: GdsErrorContext) {
    super('input', message, context);
    this.name = 'GdsInputError';
  }
}

export class GdsFormatError extends GdsError {
  constructor(message: string, offset: number, structure?: string) {
    super('format', `${message} at offset ${offset}`, { offset, structure });
    this.name = 'GdsFormatError';
  }
}

export type GdsResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: GdsError };

export function ok<T>(value: T): GdsResult<T> {
  return { ok: true, value };
}

export function fail<T>(error: GdsError): GdsResult<T> {
  return { ok: false, error };
}

/**
 * Normalize anything caught at a public boundary into a GdsError.
 * Errors we did not raise ourselves are reported as resource failures.
 */
export function toGdsError(error: unknown, structure?: string): GdsError {
  if (error instanceof GdsError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new GdsError('resource', message, { structure, cause: error });
}
