/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * ByteCursor - bounded big-endian reader over a caller-owned byte range
 *
 * Never throws and never reads past the range. Short reads return what is
 * available and raise the end-of-range flag; a rejected seek raises the
 * error flag and leaves the position where it was. After close() every
 * read returns nothing. The underlying buffer is never copied or written.
 */

import { decodeGdsReal64 } from '@gds-kit/encoding';
import { decodeRecordHeader, RECORD_HEADER_SIZE, type RecordHeader } from './record.js';

export enum SeekOrigin {
  Start = 0,
  Current = 1,
  End = 2,
}

const EMPTY = new Uint8Array(0);

export class ByteCursor {
  private bytes: Uint8Array | null;
  private view: DataView | null;
  private offset: number = 0;
  private eof: boolean = false;
  private error: boolean = false;

  private constructor(bytes: Uint8Array) {
    this.bytes = bytes;
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  /**
   * Open a cursor over the first `length` bytes of `buffer`
   * (the whole buffer when omitted). Returns null for a missing buffer,
   * a zero or out-of-range length.
   */
  static open(buffer: ArrayBuffer | Uint8Array | null | undefined, length?: number): ByteCursor | null {
    if (!buffer) return null;
    const bytes = buffer instanceof Uint8Array ? buffer : new Uint8Array(buffer);
    const size = length ?? bytes.length;
    if (!Number.isInteger(size) || size <= 0 || size > bytes.length) return null;
    return new ByteCursor(bytes.subarray(0, size));
  }

  /** Idempotent; the caller's buffer is left untouched */
  close(): void {
    this.bytes = null;
    this.view = null;
    this.offset = 0;
  }

  get isOpen(): boolean {
    return this.bytes !== null;
  }

  get length(): number {
    return this.bytes?.length ?? 0;
  }

  get remaining(): number {
    return this.bytes ? this.bytes.length - this.offset : 0;
  }

  /** Set when a read came up short */
  get atEnd(): boolean {
    return this.eof;
  }

  /** Set when a seek or record header was rejected */
  get hasError(): boolean {
    return this.error;
  }

  /** Current position, or -1 on a closed cursor */
  tell(): number {
    return this.bytes ? this.offset : -1;
  }

  /**
   * Move to `offset` relative to `origin`. The target must lie in
   * [0, length]; otherwise the error flag is set and false returned.
   */
  seek(offset: number, origin: SeekOrigin = SeekOrigin.Start): boolean {
    if (!this.bytes || !Number.isInteger(offset)) {
      this.error = true;
      return false;
    }
    let base = 0;
    if (origin === SeekOrigin.Current) base = this.offset;
    else if (origin === SeekOrigin.End) base = this.bytes.length;

    const target = base + offset;
    if (target < 0 || target > this.bytes.length) {
      this.error = true;
      return false;
    }
    this.offset = target;
    this.eof = false;
    return true;
  }

  /** Copy up to `count` bytes and advance past them */
  read(count: number): Uint8Array {
    if (!this.bytes || !(count > 0)) return EMPTY;
    const end = Math.min(this.offset + Math.floor(count), this.bytes.length);
    const slice = this.bytes.slice(this.offset, end);
    this.offset = end;
    if (slice.length < count) this.eof = true;
    return slice;
  }

  readUint16(): number | null {
    if (!this.take(2) || !this.view) return null;
    return this.view.getUint16(this.offset - 2, false);
  }

  readInt16(): number | null {
    if (!this.take(2) || !this.view) return null;
    return this.view.getInt16(this.offset - 2, false);
  }

  readUint32(): number | null {
    if (!this.take(4) || !this.view) return null;
    return this.view.getUint32(this.offset - 4, false);
  }

  readInt32(): number | null {
    if (!this.take(4) || !this.view) return null;
    return this.view.getInt32(this.offset - 4, false);
  }

  /** 8-byte excess-64 real */
  readReal64(): number | null {
    if (!this.take(8) || !this.bytes) return null;
    return decodeGdsReal64(this.bytes, this.offset - 8);
  }

  /**
   * Read the 4-byte record header. Returns null when fewer than four bytes
   * remain (end flag) or the declared length is below four (error flag).
   */
  readRecordHeader(): RecordHeader | null {
    if (!this.take(RECORD_HEADER_SIZE) || !this.bytes) return null;
    const header = decodeRecordHeader(this.bytes, this.offset - RECORD_HEADER_SIZE);
    if (!header) {
      this.error = true;
      return null;
    }
    return header;
  }

  /**
   * Advance by `count` if that many bytes remain. On a short range the
   * cursor drains to the end, as read() would.
   */
  private take(count: number): boolean {
    if (!this.bytes) return false;
    if (this.bytes.length - this.offset < count) {
      this.offset = this.bytes.length;
      this.eof = true;
      return false;
    }
    this.offset += count;
    return true;
  }
}
