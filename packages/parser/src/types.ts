/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Core types for library decoding
 */

import type { GdsDate, GdsElement } from '@gds-kit/data';
import type { GdsError } from './errors.js';

export interface ParseOptions {
  /** Properties allowed on one element before its structure fails (default 50) */
  maxPropertiesPerElement?: number;
  /** Elements allowed in one structure before it fails (default 100000) */
  maxElementsPerStructure?: number;
  /** Run scanStructures() while opening (default false) */
  scan?: boolean;
}

export const DEFAULT_MAX_PROPERTIES_PER_ELEMENT = 50;
export const DEFAULT_MAX_ELEMENTS_PER_STRUCTURE = 100_000;

export interface LibraryHeader {
  /** HEADER record value (stream format version) */
  version: number;
  name: string;
  created: GdsDate;
  modified: GdsDate;
  userUnitsPerDbUnit: number;
  metersPerDbUnit: number;
  /** REFLIBS slots, empty when absent */
  referenceLibraries: string[];
  /** FONTS slots, empty when absent */
  fonts: string[];
  generations: number | null;
  /** FORMAT record value; null for plain stream format */
  formatType: number | null;
  /** Position just past the UNITS record, where structures begin */
  bodyOffset: number;
}

/**
 * Lazily materialized structure. Elements exist only in the `parsed` state;
 * a `failed` structure keeps the error and may be retried.
 */
export type StructureState =
  | { status: 'scanned' }
  | { status: 'parsed'; elements: readonly GdsElement[] }
  | { status: 'failed'; error: GdsError };

export interface StructureEntry {
  name: string;
  created: GdsDate;
  modified: GdsDate;
  /** Offset of the BGNSTR record */
  byteOffset: number;
  /** Through the end of the ENDSTR record */
  byteLength: number;
  state: StructureState;
}

export interface CacheStats {
  structureCount: number;
  parsedStructureCount: number;
  failedStructureCount: number;
  elementCount: number;
  memoryUsage: number;
}
