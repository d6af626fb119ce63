/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Library/structure scanner - reads the preamble, then walks the stream
 * record by record to find structure boundaries without decoding elements.
 */

import { decodeGdsDate, decodeGdsNameSlots, TIMESTAMP_SIZE } from '@gds-kit/encoding';
import type { GdsDate } from '@gds-kit/data';
import { SeekOrigin, type ByteCursor } from './byte-cursor.js';
import { GdsFormatError } from './errors.js';
import {
  readRecord,
  skipRecord,
  recordName,
  DataType,
  RecordType,
  type GdsRecord,
  type RecordHeader,
} from './record.js';
import { readAscii, readInt16, readRealValues } from './payload.js';
import type { LibraryHeader } from './types.js';

export interface ScannedStructure {
  name: string;
  created: GdsDate;
  modified: GdsDate;
  byteOffset: number;
  byteLength: number;
  /** Set when the block is not closed by its own ENDSTR */
  error: GdsFormatError | null;
}

/** How the walk over one structure's records ended */
type StructureEnd =
  | { status: 'closed' }
  | { status: 'nested'; offset: number; error: GdsFormatError }
  | { status: 'endlib'; error: GdsFormatError }
  | { status: 'truncated'; error: GdsFormatError };

/** Element openers are never legal between structures */
const ELEMENT_OPENERS = new Set<number>([
  RecordType.BOUNDARY,
  RecordType.PATH,
  RecordType.SREF,
  RecordType.AREF,
  RecordType.TEXT,
  RecordType.NODE,
  RecordType.BOX,
]);

/** Records tolerated between BGNLIB and LIBNAME */
const PRE_NAME_RECORDS = new Set<number>([
  RecordType.LIBDIRSIZE,
  RecordType.SRFNAME,
  RecordType.LIBSECUR,
]);

/** Records tolerated between LIBNAME and UNITS */
const PRE_UNITS_RECORDS = new Set<number>([
  RecordType.REFLIBS,
  RecordType.FONTS,
  RecordType.ATTRTABLE,
  RecordType.GENERATIONS,
  RecordType.FORMAT,
  RecordType.MASK,
  RecordType.ENDMASKS,
]);

/** Two 12-byte timestamps: creation then modification */
function readTimestamps(record: GdsRecord, structure?: string): [GdsDate, GdsDate] {
  const { header, offset, payload } = record;
  if (header.dataType !== DataType.Int16 || header.payloadLength !== TIMESTAMP_SIZE * 2) {
    throw new GdsFormatError(
      `${recordName(header.recordType)} must hold two ${TIMESTAMP_SIZE}-byte timestamps, got ${header.payloadLength} bytes`,
      offset,
      structure,
    );
  }
  return [decodeGdsDate(payload, 0), decodeGdsDate(payload, TIMESTAMP_SIZE)];
}

function expectRecord(record: GdsRecord, expected: RecordType, structure?: string): void {
  if (record.header.recordType !== expected) {
    throw new GdsFormatError(
      `expected ${RecordType[expected]}, found ${recordName(record.header.recordType)}`,
      record.offset,
      structure,
    );
  }
}

export class LibraryScanner {
  private cursor: ByteCursor;

  constructor(cursor: ByteCursor) {
    this.cursor = cursor;
  }

  /**
   * Consume HEADER, BGNLIB, LIBNAME and UNITS from the start of the stream,
   * accepting the optional library records that may sit between them.
   */
  readHeader(): LibraryHeader {
    const cursor = this.cursor;
    cursor.seek(0);

    const headerRecord = readRecord(cursor);
    expectRecord(headerRecord, RecordType.HEADER);
    const version = readInt16(headerRecord);

    const bgnlib = readRecord(cursor);
    expectRecord(bgnlib, RecordType.BGNLIB);
    const [created, modified] = readTimestamps(bgnlib);

    let record = readRecord(cursor);
    while (PRE_NAME_RECORDS.has(record.header.recordType)) {
      record = readRecord(cursor);
    }
    expectRecord(record, RecordType.LIBNAME);
    const name = readAscii(record);

    const referenceLibraries: string[] = [];
    const fonts: string[] = [];
    let generations: number | null = null;
    let formatType: number | null = null;

    record = readRecord(cursor);
    while (PRE_UNITS_RECORDS.has(record.header.recordType)) {
      switch (record.header.recordType) {
        case RecordType.REFLIBS:
          referenceLibraries.push(...decodeGdsNameSlots(record.payload));
          break;
        case RecordType.FONTS:
          fonts.push(...decodeGdsNameSlots(record.payload));
          break;
        case RecordType.GENERATIONS:
          generations = readInt16(record);
          break;
        case RecordType.FORMAT:
          formatType = readInt16(record);
          break;
        default:
          // ATTRTABLE, MASK, ENDMASKS carry nothing we expose
          break;
      }
      record = readRecord(cursor);
    }
    expectRecord(record, RecordType.UNITS);
    if (record.header.dataType !== DataType.Real64 || record.header.payloadLength !== 16) {
      throw new GdsFormatError(
        `UNITS must hold two 8-byte reals, got ${record.header.payloadLength} bytes`,
        record.offset,
      );
    }
    const [userUnitsPerDbUnit, metersPerDbUnit] = readRealValues(record);
    if (!(userUnitsPerDbUnit > 0) || !(metersPerDbUnit > 0) ||
        !Number.isFinite(userUnitsPerDbUnit) || !Number.isFinite(metersPerDbUnit)) {
      throw new GdsFormatError(
        `UNITS must be positive, got ${userUnitsPerDbUnit} and ${metersPerDbUnit}`,
        record.offset,
      );
    }

    return {
      version,
      name,
      created,
      modified,
      userUnitsPerDbUnit,
      metersPerDbUnit,
      referenceLibraries,
      fonts,
      generations,
      formatType,
      bodyOffset: cursor.tell(),
    };
  }

  /**
   * Yield each BGNSTR...ENDSTR block in file order, starting at `bodyOffset`.
   * Element records are skipped by their declared length, as are unknown
   * records between structures. Stops at ENDLIB.
   *
   * When the stream runs out, the structures found so far are kept: an
   * unterminated last block is yielded with its error, and the generator
   * returns the problem instead of throwing. It returns null for a stream
   * closed by ENDLIB.
   */
  *scanStructures(bodyOffset: number): Generator<ScannedStructure, GdsFormatError | null> {
    const cursor = this.cursor;
    if (!cursor.seek(bodyOffset)) {
      throw new GdsFormatError('structure section lies outside the buffer', bodyOffset);
    }

    while (true) {
      if (cursor.remaining === 0) {
        return new GdsFormatError('missing ENDLIB', cursor.tell());
      }
      const record = this.readOrDrain();
      if (record instanceof GdsFormatError) return record;
      const type = record.header.recordType;

      if (type === RecordType.ENDLIB) return null;
      if (ELEMENT_OPENERS.has(type)) {
        throw new GdsFormatError(`unexpected ${recordName(type)} outside a structure`, record.offset);
      }
      if (type !== RecordType.BGNSTR) continue;

      const [created, modified] = readTimestamps(record);
      const nameRecord = this.readOrDrain();
      if (nameRecord instanceof GdsFormatError) return nameRecord;
      expectRecord(nameRecord, RecordType.STRNAME);
      const name = readAscii(nameRecord);

      const end = this.skipToEndOfStructure(name);
      const structure = { name, created, modified, byteOffset: record.offset };
      switch (end.status) {
        case 'closed':
          yield { ...structure, byteLength: cursor.tell() - record.offset, error: null };
          break;
        case 'nested':
          yield { ...structure, byteLength: end.offset - record.offset, error: end.error };
          cursor.seek(end.offset);
          break;
        case 'endlib':
          yield { ...structure, byteLength: cursor.tell() - record.offset, error: end.error };
          return null;
        case 'truncated':
          yield { ...structure, byteLength: cursor.tell() - record.offset, error: end.error };
          return end.error;
      }
    }
  }

  /** readRecord(), but a record that cannot be read drains the cursor and is returned as the error */
  private readOrDrain(): GdsRecord | GdsFormatError {
    try {
      return readRecord(this.cursor);
    } catch (error) {
      if (!(error instanceof GdsFormatError)) throw error;
      this.cursor.seek(0, SeekOrigin.End);
      return error;
    }
  }

  private skipToEndOfStructure(name: string): StructureEnd {
    const cursor = this.cursor;
    while (true) {
      if (cursor.remaining === 0) {
        return { status: 'truncated', error: new GdsFormatError('missing ENDSTR', cursor.tell(), name) };
      }
      let skipped: { header: RecordHeader; offset: number };
      try {
        skipped = skipRecord(cursor, name);
      } catch (error) {
        if (!(error instanceof GdsFormatError)) throw error;
        cursor.seek(0, SeekOrigin.End);
        return { status: 'truncated', error };
      }
      switch (skipped.header.recordType) {
        case RecordType.ENDSTR:
          return { status: 'closed' };
        case RecordType.BGNSTR:
          return {
            status: 'nested',
            offset: skipped.offset,
            error: new GdsFormatError('nested BGNSTR', skipped.offset, name),
          };
        case RecordType.ENDLIB:
          return { status: 'endlib', error: new GdsFormatError('ENDLIB before ENDSTR', skipped.offset, name) };
        default:
          break;
      }
    }
  }
}
