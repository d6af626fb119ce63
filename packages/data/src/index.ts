/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @gds-kit/data - Decoded layout model, bounds helpers and logging
 */

export * from './types.js';
export { createEmptyBounds, isEmptyBounds, expandBounds, mergeBounds, boundsFromVertices } from './bounds.js';
export { StransBits, decodeTransformFlags, decodePresentation } from './flags.js';
export { createLogger, isDebugEnabled, formatContext } from './logger.js';
export type { LogContext, Logger } from './logger.js';
