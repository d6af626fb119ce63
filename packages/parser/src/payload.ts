/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Typed payload readers. Each checks the record's data type and that the
 * payload holds a whole, non-zero number of values before decoding.
 */

import { decodeGdsReal32, decodeGdsReal64, decodeGdsString } from '@gds-kit/encoding';
import { DATA_TYPE_WIDTHS, DataType, recordName, type GdsRecord } from './record.js';
import { GdsFormatError } from './errors.js';

/** 2-byte payloads: bit arrays and int16 are interchangeable in practice */
const SHORT_TYPES: readonly DataType[] = [DataType.Int16, DataType.BitArray];

function valueCount(record: GdsRecord, accepted: readonly DataType[], structure?: string): number {
  const { header, offset } = record;
  if (!accepted.includes(header.dataType)) {
    throw new GdsFormatError(
      `${recordName(header.recordType)} has data type ${header.dataType}, expected ${accepted.map((t) => DataType[t]).join(' or ')}`,
      offset,
      structure,
    );
  }
  const width = DATA_TYPE_WIDTHS[accepted[0]];
  if (header.payloadLength === 0 || header.payloadLength % width !== 0) {
    throw new GdsFormatError(
      `${recordName(header.recordType)} payload of ${header.payloadLength} bytes is not a whole number of ${width}-byte values`,
      offset,
      structure,
    );
  }
  return header.payloadLength / width;
}

function payloadView(record: GdsRecord): DataView {
  const { payload } = record;
  return new DataView(payload.buffer, payload.byteOffset, payload.byteLength);
}

export function readInt16Values(record: GdsRecord, structure?: string): number[] {
  const count = valueCount(record, SHORT_TYPES, structure);
  const view = payloadView(record);
  const values: number[] = [];
  for (let i = 0; i < count; i++) {
    values.push(view.getInt16(i * 2, false));
  }
  return values;
}

export function readInt16(record: GdsRecord, structure?: string): number {
  return readInt16Values(record, structure)[0];
}

/** First 16-bit word as unsigned (bit arrays, layer numbers) */
export function readUint16(record: GdsRecord, structure?: string): number {
  valueCount(record, SHORT_TYPES, structure);
  return payloadView(record).getUint16(0, false);
}

export function readInt32Values(record: GdsRecord, structure?: string): Int32Array {
  const count = valueCount(record, [DataType.Int32], structure);
  const view = payloadView(record);
  const values = new Int32Array(count);
  for (let i = 0; i < count; i++) {
    values[i] = view.getInt32(i * 4, false);
  }
  return values;
}

export function readInt32(record: GdsRecord, structure?: string): number {
  return readInt32Values(record, structure)[0];
}

/** 8-byte reals; 4-byte reals are widened so either encoding is accepted */
export function readRealValues(record: GdsRecord, structure?: string): number[] {
  const values: number[] = [];
  if (record.header.dataType === DataType.Real32) {
    const count = valueCount(record, [DataType.Real32], structure);
    for (let i = 0; i < count; i++) {
      values.push(decodeGdsReal32(record.payload, i * 4));
    }
    return values;
  }
  const count = valueCount(record, [DataType.Real64], structure);
  for (let i = 0; i < count; i++) {
    values.push(decodeGdsReal64(record.payload, i * 8));
  }
  return values;
}

export function readReal(record: GdsRecord, structure?: string): number {
  return readRealValues(record, structure)[0];
}

/** ASCII payload; an empty string record is legal */
export function readAscii(record: GdsRecord, structure?: string): string {
  const { header, offset } = record;
  if (header.dataType !== DataType.Ascii) {
    throw new GdsFormatError(
      `${recordName(header.recordType)} has data type ${header.dataType}, expected Ascii`,
      offset,
      structure,
    );
  }
  return decodeGdsString(record.payload);
}
