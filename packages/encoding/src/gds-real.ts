/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Decode GDSII excess-64 reals.
 *
 * Layout (big-endian): 1 sign bit, 7-bit base-16 exponent biased by 64,
 * then an unsigned fraction of 56 bits (8-byte) or 24 bits (4-byte):
 *
 *   value = (-1)^sign * (fraction / 2^bits) * 16^(exponent - 64)
 *
 * These are not IEEE-754 bit patterns; DataView.getFloat64 gives garbage.
 */

const TWO_POW_56 = 2 ** 56;
const TWO_POW_24 = 2 ** 24;

/** Decode an 8-byte real starting at `offset` */
export function decodeGdsReal64(bytes: Uint8Array, offset: number = 0): number {
  const head = bytes[offset];
  // Fractions past 2^53 round to the nearest double, same as any 56-bit source
  let fraction = 0;
  for (let i = 1; i < 8; i++) {
    fraction = fraction * 256 + bytes[offset + i];
  }
  return compose(head, fraction / TWO_POW_56);
}

/** Decode a 4-byte real starting at `offset` */
export function decodeGdsReal32(bytes: Uint8Array, offset: number = 0): number {
  const head = bytes[offset];
  const fraction = (bytes[offset + 1] << 16) | (bytes[offset + 2] << 8) | bytes[offset + 3];
  return compose(head, fraction / TWO_POW_24);
}

function compose(head: number, fraction: number): number {
  if (fraction === 0) return 0;
  const exponent = (head & 0x7f) - 64;
  const magnitude = fraction * 16 ** exponent;
  return (head & 0x80) !== 0 ? -magnitude : magnitude;
}
