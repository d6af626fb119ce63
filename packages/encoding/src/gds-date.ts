/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import type { GdsDate } from '@gds-kit/data';

/** Byte size of one timestamp: six big-endian int16 fields */
export const TIMESTAMP_SIZE = 12;

/**
 * Decode year, month, day, hour, minute, second starting at `offset`.
 * Values are returned as stored; some writers count years from 1900.
 */
export function decodeGdsDate(bytes: Uint8Array, offset: number = 0): GdsDate {
  const field = (index: number): number => {
    const pos = offset + index * 2;
    return (((bytes[pos] << 8) | bytes[pos + 1]) << 16) >> 16;
  };
  return {
    year: field(0),
    month: field(1),
    day: field(2),
    hour: field(3),
    minute: field(4),
    second: field(5),
  };
}
