/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @gds-kit/parser - Lazy, bounds-checked stream decoder
 */

export { ByteCursor, SeekOrigin } from './byte-cursor.js';
export {
  RecordType,
  DataType,
  DATA_TYPE_WIDTHS,
  RECORD_HEADER_SIZE,
  makeRecordCode,
  decodeRecordHeader,
  encodeRecordHeader,
  recordName,
  readRecord,
  skipRecord,
  type RecordHeader,
  type GdsRecord,
} from './record.js';
export { LibraryScanner, type ScannedStructure } from './library-scanner.js';
export { ElementBuilder, type ElementBuilderOptions, type StructureExtent } from './element-builder.js';
export {
  LibraryCache,
  openLibrary,
  createLibraryCache,
  freeLibraryCache,
  type LibraryInput,
} from './library-cache.js';
export {
  GdsError,
  GdsInputError,
  GdsFormatError,
  toGdsError,
  type GdsErrorKind,
  type GdsErrorContext,
  type GdsResult,
} from './errors.js';
export * from './types.js';
