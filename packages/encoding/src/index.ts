/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

export { decodeGdsReal64, decodeGdsReal32 } from './gds-real.js';
export { decodeGdsString, decodeGdsNameSlots, NAME_SLOT_SIZE } from './gds-string.js';
export { decodeGdsDate, TIMESTAMP_SIZE } from './gds-date.js';
