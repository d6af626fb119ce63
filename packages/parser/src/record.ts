/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Record header codec
 *
 * Every unit of the stream starts with:
 *   [0..1]  total_length  u16 BE  (header included, >= 4)
 *   [2..3]  record_code   u16 BE  (high byte: record type, low byte: data type)
 */

import type { ByteCursor } from './byte-cursor.js';
import { GdsFormatError } from './errors.js';

export const RECORD_HEADER_SIZE = 4;

/** Record type (high byte of record_code) */
export enum RecordType {
  HEADER = 0x00,
  BGNLIB = 0x01,
  LIBNAME = 0x02,
  UNITS = 0x03,
  ENDLIB = 0x04,
  BGNSTR = 0x05,
  STRNAME = 0x06,
  ENDSTR = 0x07,
  BOUNDARY = 0x08,
  PATH = 0x09,
  SREF = 0x0a,
  AREF = 0x0b,
  TEXT = 0x0c,
  LAYER = 0x0d,
  DATATYPE = 0x0e,
  WIDTH = 0x0f,
  XY = 0x10,
  ENDEL = 0x11,
  SNAME = 0x12,
  COLROW = 0x13,
  TEXTNODE = 0x14,
  NODE = 0x15,
  TEXTTYPE = 0x16,
  PRESENTATION = 0x17,
  SPACING = 0x18,
  STRING = 0x19,
  STRANS = 0x1a,
  MAG = 0x1b,
  ANGLE = 0x1c,
  UINTEGER = 0x1d,
  USTRING = 0x1e,
  REFLIBS = 0x1f,
  FONTS = 0x20,
  PATHTYPE = 0x21,
  GENERATIONS = 0x22,
  ATTRTABLE = 0x23,
  STYPTABLE = 0x24,
  STRTYPE = 0x25,
  ELFLAGS = 0x26,
  ELKEY = 0x27,
  LINKTYPE = 0x28,
  LINKKEYS = 0x29,
  NODETYPE = 0x2a,
  PROPATTR = 0x2b,
  PROPVALUE = 0x2c,
  BOX = 0x2d,
  BOXTYPE = 0x2e,
  PLEX = 0x2f,
  BGNEXTN = 0x30,
  ENDEXTN = 0x31,
  TAPENUM = 0x32,
  TAPECODE = 0x33,
  STRCLASS = 0x34,
  RESERVED = 0x35,
  FORMAT = 0x36,
  MASK = 0x37,
  ENDMASKS = 0x38,
  LIBDIRSIZE = 0x39,
  SRFNAME = 0x3a,
  LIBSECUR = 0x3b,
}

/** Payload primitive (low byte of record_code) */
export enum DataType {
  None = 0,
  BitArray = 1,
  Int16 = 2,
  Int32 = 3,
  Real32 = 4,
  Real64 = 5,
  Ascii = 6,
}

/** Element size in bytes per data type (0 for none / variable) */
export const DATA_TYPE_WIDTHS: Readonly<Record<DataType, number>> = {
  [DataType.None]: 0,
  [DataType.BitArray]: 2,
  [DataType.Int16]: 2,
  [DataType.Int32]: 4,
  [DataType.Real32]: 4,
  [DataType.Real64]: 8,
  [DataType.Ascii]: 1,
};

export interface RecordHeader {
  totalLength: number;
  recordCode: number;
  recordType: number;
  dataType: number;
  payloadLength: number;
}

/** A header plus its copied payload; `offset` is where the header starts */
export interface GdsRecord {
  header: RecordHeader;
  offset: number;
  payload: Uint8Array;
}

export function makeRecordCode(recordType: RecordType, dataType: DataType): number {
  return ((recordType & 0xff) << 8) | (dataType & 0xff);
}

/**
 * Decode a header at `offset`. Returns null when fewer than four bytes are
 * available or the declared total length is below the header size.
 */
export function decodeRecordHeader(bytes: Uint8Array, offset: number = 0): RecordHeader | null {
  if (offset < 0 || offset + RECORD_HEADER_SIZE > bytes.length) return null;
  const totalLength = (bytes[offset] << 8) | bytes[offset + 1];
  const recordCode = (bytes[offset + 2] << 8) | bytes[offset + 3];
  if (totalLength < RECORD_HEADER_SIZE) return null;
  return {
    totalLength,
    recordCode,
    recordType: recordCode >> 8,
    dataType: recordCode & 0xff,
    payloadLength: totalLength - RECORD_HEADER_SIZE,
  };
}

export function encodeRecordHeader(totalLength: number, recordCode: number): Uint8Array {
  const bytes = new Uint8Array(RECORD_HEADER_SIZE);
  bytes[0] = (totalLength >> 8) & 0xff;
  bytes[1] = totalLength & 0xff;
  bytes[2] = (recordCode >> 8) & 0xff;
  bytes[3] = recordCode & 0xff;
  return bytes;
}

export function recordName(recordType: number): string {
  return RecordType[recordType] ?? `0x${recordType.toString(16).padStart(2, '0')}`;
}

/**
 * Read one whole record. Throws GdsFormatError on a truncated header,
 * a declared length below four, or a payload running past the range.
 */
export function readRecord(cursor: ByteCursor, structure?: string): GdsRecord {
  const offset = cursor.tell();
  const header = readCheckedHeader(cursor, offset, structure);
  const payload = cursor.read(header.payloadLength);
  return { header, offset, payload };
}

/** Like readRecord() but seeks past the payload without copying it */
export function skipRecord(cursor: ByteCursor, structure?: string): { header: RecordHeader; offset: number } {
  const offset = cursor.tell();
  const header = readCheckedHeader(cursor, offset, structure);
  cursor.seek(offset + header.totalLength);
  return { header, offset };
}

function readCheckedHeader(cursor: ByteCursor, offset: number, structure?: string): RecordHeader {
  if (!cursor.isOpen) {
    throw new GdsFormatError('cursor is closed', offset, structure);
  }
  const header = cursor.readRecordHeader();
  if (!header) {
    if (cursor.atEnd) {
      throw new GdsFormatError('truncated record header', offset, structure);
    }
    throw new GdsFormatError('record length below header size', offset, structure);
  }
  if (header.payloadLength > cursor.remaining) {
    throw new GdsFormatError(
      `truncated record: ${recordName(header.recordType)} declares ${header.payloadLength} payload bytes, ${cursor.remaining} remain`,
      offset,
      structure,
    );
  }
  return header;
}
