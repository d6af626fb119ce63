/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Bit-array payload decoding (STRANS, PRESENTATION).
 * Bits are numbered from the most significant end of the 16-bit word.
 */

import type { TextPresentation, TransformFlags } from './types.js';

export enum StransBits {
  Reflection = 0x8000,
  AbsoluteMagnification = 0x0004,
  AbsoluteAngle = 0x0002,
}

export function decodeTransformFlags(flags: number): TransformFlags {
  return {
    reflection: (flags & StransBits.Reflection) !== 0,
    absoluteMagnification: (flags & StransBits.AbsoluteMagnification) !== 0,
    absoluteAngle: (flags & StransBits.AbsoluteAngle) !== 0,
  };
}

/**
 * PRESENTATION: bits 10-11 font, 12-13 vertical, 14-15 horizontal justification.
 * The reserved value 3 in either justification field is clamped to 2.
 */
export function decodePresentation(bits: number): TextPresentation {
  const vertical = Math.min((bits >> 2) & 0x3, 2);
  const horizontal = Math.min(bits & 0x3, 2);
  return {
    font: (bits >> 4) & 0x3,
    vertical,
    horizontal,
  };
}
