/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * ASCII record strings.
 * Writers pad odd-length strings with a NUL to keep records even-sized;
 * some pad further. All trailing NULs are dropped.
 */

/** Width of one name slot in REFLIBS / FONTS records */
export const NAME_SLOT_SIZE = 44;

export function decodeGdsString(bytes: Uint8Array, offset: number = 0, length: number = bytes.length - offset): string {
  let end = Math.min(offset + length, bytes.length);
  while (end > offset && bytes[end - 1] === 0) {
    end--;
  }

  let result = '';
  // Chunked to stay under the argument-count limit of fromCharCode
  const CHUNK = 8192;
  for (let pos = offset; pos < end; pos += CHUNK) {
    result += String.fromCharCode(...bytes.subarray(pos, Math.min(pos + CHUNK, end)));
  }
  return result;
}

/**
 * Split a payload made of fixed 44-byte name slots (REFLIBS, FONTS).
 * Empty slots are kept as '' so slot positions stay meaningful.
 */
export function decodeGdsNameSlots(bytes: Uint8Array): string[] {
  const names: string[] = [];
  for (let pos = 0; pos + NAME_SLOT_SIZE <= bytes.length; pos += NAME_SLOT_SIZE) {
    names.push(decodeGdsString(bytes, pos, NAME_SLOT_SIZE));
  }
  return names;
}
