/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { ElementKind, HorizontalJustification, VerticalJustification } from '@gds-kit/data';
import {
  LibraryCache,
  createLibraryCache,
  freeLibraryCache,
  openLibrary,
  type LibraryInput,
} from '../src/library-cache.js';
import { ElementBuilder } from '../src/element-builder.js';
import type { ParseOptions } from '../src/types.js';
import { DataType, RecordType } from '../src/record.js';
import { CREATED, GdsBuilder, NONAGON, SQUARE, twoStructureLibrary } from './gds-builder.js';

function mustOpen(bytes: LibraryInput, options?: ParseOptions): LibraryCache {
  const result = openLibrary(bytes, undefined, options);
  if (!result.ok) throw result.error;
  return result.value;
}

/** STR1 (valid square) then BAD (boundary without XY) */
function libraryWithBadStructure(): Uint8Array {
  return new GdsBuilder()
    .library('LIB')
    .beginStructure('STR1')
    .boundary({ layer: 1, xy: SQUARE })
    .endStructure()
    .beginStructure('BAD')
    .none(RecordType.BOUNDARY)
    .int16(RecordType.LAYER, 1)
    .none(RecordType.ENDEL)
    .endStructure()
    .endLibrary()
    .build();
}

/** One structure MIX: path, text, sref, aref, boundary with properties */
function mixedLibrary(): Uint8Array {
  return new GdsBuilder()
    .library('MIXED')
    .beginStructure('STR1')
    .boundary({ layer: 1, xy: SQUARE })
    .endStructure()
    .beginStructure('MIX')
    .path({ layer: 6, datatype: 2, width: 20, pathType: 1, xy: [0, 0, 100, 0] })
    .text({ layer: 4, textType: 2, presentation: 0x16, x: 5, y: 5, text: 'label' })
    .sref('STR1', 100, -50, { flags: 0x8000, magnification: 2 })
    .aref('STR1', 3, 2, [0, 0, 300, 0, 0, 200])
    .boundary({ layer: 1, xy: SQUARE, properties: [[1, 'net'], [7, 'vdd']] })
    .endStructure()
    .endLibrary()
    .build();
}

describe('openLibrary', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('reads a minimal library without scanning it', () => {
    const cache = mustOpen(new GdsBuilder().library('TEST', 3).endLibrary().build());
    expect(cache.getLibraryName()).toBe('TEST');
    expect(cache.getVersion()).toBe(3);
    expect(cache.getUserUnitsPerDbUnit()).toBeGreaterThan(0);
    expect(cache.getMetersPerDbUnit()).toBeGreaterThan(0);
    expect(cache.getCreated()).toEqual(CREATED);
    expect(cache.getStructureCount()).toBe(0);
    expect(cache.validate()).toBe(true);
  });

  it('rejects null and empty input before parsing', () => {
    const nullResult = openLibrary(null);
    expect(nullResult.ok).toBe(false);
    if (!nullResult.ok) {
      expect(nullResult.error.kind).toBe('input');
      expect(nullResult.error.message).toBe('buffer is null');
    }
    const emptyResult = openLibrary(new Uint8Array(0));
    expect(emptyResult.ok).toBe(false);
    if (!emptyResult.ok) expect(emptyResult.error.kind).toBe('input');

    const zeroLength = openLibrary(twoStructureLibrary(), 0);
    expect(zeroLength.ok).toBe(false);
    if (!zeroLength.ok) expect(zeroLength.error.message).toBe('buffer is empty');
  });

  it('rejects a length beyond the buffer', () => {
    const result = openLibrary(new Uint8Array(8), 9);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('input');
      expect(result.error.message).toBe('length 9 is outside the 8-byte buffer');
    }
  });

  it('fails cleanly on a 3-byte buffer', () => {
    const result = openLibrary(new Uint8Array([0x00, 0x06, 0x00]));
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('format');
      expect(result.error.message).toBe('truncated record header at offset 0');
    }
    expect(createLibraryCache(new Uint8Array([0x00, 0x06, 0x00]))).toBeNull();
  });

  it('decodes only the requested prefix', () => {
    const bytes = twoStructureLibrary();
    // Cut inside the UNITS record
    const result = openLibrary(bytes, 50);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toContain('truncated record: UNITS');
  });

  it('rejects invalid limits', () => {
    const result = openLibrary(twoStructureLibrary(), undefined, { maxPropertiesPerElement: -1 });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('input');
      expect(result.error.message).toBe('maxPropertiesPerElement must be a non-negative integer, got -1');
    }
  });

  it('scans while opening when asked', () => {
    const cache = mustOpen(twoStructureLibrary(), { scan: true });
    expect(cache.getStructureCount()).toBe(2);
  });

  it('fails the whole open when the requested scan fails', () => {
    const bytes = new GdsBuilder().library('LOOSE').boundary({ xy: SQUARE }).endLibrary().build();
    const result = openLibrary(bytes, undefined, { scan: true });
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe('unexpected BOUNDARY outside a structure at offset 64');
  });

  it('opens a library without ENDLIB when scanning', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const bytes = new GdsBuilder().library('OPEN').beginStructure('A').endStructure().build();
    const cache = mustOpen(bytes, { scan: true });
    expect(cache.getStructureCount()).toBe(1);
    expect(cache.getScanError()?.message).toBe('missing ENDLIB at offset 100');
  });
});

describe('LibraryCache.scanStructures', () => {
  it('lists structures in file order', () => {
    const cache = mustOpen(twoStructureLibrary());
    const result = cache.scanStructures();
    expect(result).toEqual({ ok: true, value: ['STR1', 'STR2'] });
    expect(cache.getStructureCount()).toBe(2);
    expect(cache.getStructureName(0)).toBe('STR1');
    expect(cache.getStructureName(1)).toBe('STR2');
    expect(cache.getStructureName(2)).toBeNull();
    expect(cache.findStructure('STR2')).toBe(1);
    expect(cache.findStructure('NOPE')).toBe(-1);
  });

  it('is a no-op the second time', () => {
    const cache = mustOpen(twoStructureLibrary());
    cache.scanStructures();
    cache.parseElements(0);
    expect(cache.scanStructures()).toEqual({ ok: true, value: ['STR1', 'STR2'] });
    expect(cache.isStructureParsed(0)).toBe(true);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('reports no scan error for a complete library', () => {
    const cache = mustOpen(twoStructureLibrary(), { scan: true });
    expect(cache.getScanError()).toBeNull();
  });

  it('keeps nothing when the scan fails', () => {
    const bytes = new GdsBuilder()
      .library('HALF')
      .beginStructure('A').endStructure()
      .boundary({ xy: SQUARE })
      .endLibrary()
      .build();
    const cache = mustOpen(bytes);
    const result = cache.scanStructures();
    expect(result.ok).toBe(false);
    expect(cache.getStructureCount()).toBe(0);
  });

  it('keeps the structures found before a missing ENDLIB', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const bytes = new GdsBuilder()
      .library('LIB')
      .beginStructure('STR1')
      .boundary({ layer: 1, xy: SQUARE })
      .endStructure()
      .build();
    const cache = mustOpen(bytes);

    expect(cache.scanStructures()).toEqual({ ok: true, value: ['STR1'] });
    expect(cache.getStructureCount()).toBe(1);
    expect(cache.getStructureError(0)).toBeNull();
    expect(cache.getScanError()?.message).toBe('missing ENDLIB at offset 166');
    expect(cache.parseElements(0)).toEqual({ ok: true, value: 1 });
    expect(Array.from(cache.getPolygonVertices(0, 0, 0) ?? [])).toEqual(SQUARE);
    expect(warn).toHaveBeenCalledWith('[LibraryCache] scanStructures @166 stream ended early', {
      error: 'missing ENDLIB at offset 166',
      structureCount: 1,
    });
  });

  it('keeps a truncated last structure as failed', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const bytes = twoStructureLibrary();
    // Cut inside the XY record of STR2
    const cache = mustOpen(bytes.subarray(0, 230));

    expect(cache.scanStructures()).toEqual({ ok: true, value: ['STR1', 'STR2'] });
    const message = 'truncated record: XY declares 72 payload bytes, 8 remain at offset 218';
    expect(cache.getScanError()?.message).toBe(message);
    expect(cache.getStructureError(0)).toBeNull();
    expect(cache.getStructureError(1)?.message).toBe(message);
    expect(cache.getStructureError(1)?.structure).toBe('STR2');

    expect(cache.parseElements(0)).toEqual({ ok: true, value: 1 });
    expect(cache.isStructureParsed(0)).toBe(true);
    const retry = cache.parseElements(1);
    expect(retry.ok).toBe(false);
    if (!retry.ok) expect(retry.error.message).toBe(message);
    expect(cache.getStats()).toMatchObject({ structureCount: 2, parsedStructureCount: 1, failedStructureCount: 1 });
  });

  it('keeps a structure cut off before ENDSTR as failed', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const bytes = new GdsBuilder()
      .library('LIB')
      .beginStructure('STR1')
      .boundary({ layer: 1, xy: SQUARE })
      .endStructure()
      .beginStructure('CUT')
      .boundary({ layer: 2, xy: SQUARE })
      .build();
    const cache = mustOpen(bytes);

    expect(cache.scanStructures()).toEqual({ ok: true, value: ['STR1', 'CUT'] });
    // CUT starts at 166: BGNSTR 28 + STRNAME 8 + BOUNDARY 4 + LAYER 6 + DATATYPE 6 + XY 44 + ENDEL 4
    expect(cache.getStructureError(1)?.message).toBe('missing ENDSTR at offset 266');
    expect(cache.getScanError()?.message).toBe('missing ENDSTR at offset 266');
    expect(cache.parseElements(0).ok).toBe(true);
  });

  it('skips unknown records between structures', () => {
    const bytes = new GdsBuilder()
      .library('LIB')
      .beginStructure('STR1')
      .boundary({ layer: 1, xy: SQUARE })
      .endStructure()
      .record(0x3c, DataType.None, [])
      .beginStructure('STR2')
      .boundary({ layer: 2, xy: NONAGON })
      .endStructure()
      .endLibrary()
      .build();
    const cache = mustOpen(bytes);
    expect(cache.scanStructures()).toEqual({ ok: true, value: ['STR1', 'STR2'] });
    expect(cache.getScanError()).toBeNull();
    expect(cache.parseElements(1)).toEqual({ ok: true, value: 1 });
    expect(cache.getPolygonVertexCount(1, 0, 0)).toBe(9);
  });
});

describe('LibraryCache.parseElements', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('decodes the two-structure library', () => {
    const cache = mustOpen(twoStructureLibrary(), { scan: true });
    expect(cache.getElementCount(0)).toBe(-1);

    expect(cache.parseElements(0)).toEqual({ ok: true, value: 1 });
    expect(cache.getElementCount(0)).toBe(1);
    expect(cache.getElementKind(0, 0)).toBe(ElementKind.Boundary);
    expect(cache.getElementLayer(0, 0)).toBe(1);
    expect(cache.getElementDatatype(0, 0)).toBe(0);
    expect(cache.getPolygonCount(0, 0)).toBe(1);
    expect(cache.getPolygonVertexCount(0, 0, 0)).toBe(5);
    expect(Array.from(cache.getPolygonVertices(0, 0, 0) ?? [])).toEqual(SQUARE);
    expect(cache.getElementBounds(0, 0)).toEqual({ minX: 0, minY: 0, maxX: 50, maxY: 50 });

    expect(cache.parseElements(1)).toEqual({ ok: true, value: 1 });
    expect(cache.getPolygonVertexCount(1, 0, 0)).toBe(9);
    expect(Array.from(cache.getPolygonVertices(1, 0, 0) ?? [])).toEqual(NONAGON);
  });

  it('rejects out-of-range indices without touching other structures', () => {
    const cache = mustOpen(twoStructureLibrary(), { scan: true });
    cache.parseElements(0);

    for (const index of [-1, 2, 0.5]) {
      const result = cache.parseElements(index);
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.kind).toBe('input');
    }
    expect(cache.isStructureParsed(0)).toBe(true);
    expect(cache.isStructureParsed(1)).toBe(false);
    expect(cache.getElementCount(0)).toBe(1);
  });

  it('is idempotent', () => {
    const build = vi.spyOn(ElementBuilder.prototype, 'buildStructure');
    const cache = mustOpen(twoStructureLibrary(), { scan: true });
    expect(cache.parseElements(0)).toEqual({ ok: true, value: 1 });
    const elementBefore = cache.getElement(0, 0);
    expect(cache.parseElements(0)).toEqual({ ok: true, value: 1 });
    expect(cache.getElementCount(0)).toBe(1);
    expect(cache.getElement(0, 0)).toEqual(elementBefore);
    expect(build).toHaveBeenCalledTimes(1);
  });

  it('hands out copies of vertex data', () => {
    const cache = mustOpen(twoStructureLibrary(), { scan: true });
    cache.parseElements(0);

    const vertices = cache.getPolygonVertices(0, 0, 0);
    expect(vertices).not.toBeNull();
    if (vertices) vertices[2] = 9999;
    expect(Array.from(cache.getPolygonVertices(0, 0, 0) ?? [])).toEqual(SQUARE);

    const element = cache.getElement(0, 0);
    if (element) element.polygons[0].vertices[3] = -9999;
    expect(Array.from(cache.getElement(0, 0)?.polygons[0].vertices ?? [])).toEqual(SQUARE);
    expect(cache.getElementBounds(0, 0)).toEqual({ minX: 0, minY: 0, maxX: 50, maxY: 50 });
  });

  it('isolates a failing structure and logs it', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const cache = mustOpen(libraryWithBadStructure(), { scan: true });

    expect(cache.parseElements(0).ok).toBe(true);
    const result = cache.parseElements(1);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('format');
      expect(result.error.structure).toBe('BAD');
      expect(result.error.message).toBe('Boundary element has no XY record at offset 202');
    }

    expect(cache.getStructureError(1)?.message).toBe('Boundary element has no XY record at offset 202');
    expect(cache.getStructureError(0)).toBeNull();
    expect(cache.getElementCount(1)).toBe(-1);
    expect(cache.getElementCount(0)).toBe(1);
    expect(warn).toHaveBeenCalledWith('[LibraryCache] parseElements "BAD" @202 structure failed', {
      error: 'Boundary element has no XY record at offset 202',
    });
  });

  it('parses everything it can with parseAll', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const cache = mustOpen(libraryWithBadStructure(), { scan: true });
    const result = cache.parseAll();
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.structure).toBe('BAD');
    expect(cache.getStats()).toMatchObject({
      structureCount: 2,
      parsedStructureCount: 1,
      failedStructureCount: 1,
      elementCount: 1,
    });

    const good = mustOpen(twoStructureLibrary(), { scan: true });
    expect(good.parseAll()).toEqual({ ok: true, value: 2 });
  });
});

describe('LibraryCache accessors', () => {
  const cache = mustOpen(mixedLibrary(), { scan: true });
  const mix = cache.findStructure('MIX');
  cache.parseElements(mix);

  it('exposes path payload', () => {
    expect(cache.getElementKind(mix, 0)).toBe(ElementKind.Path);
    expect(cache.getPathWidth(mix, 0)).toBe(20);
    expect(cache.getPathType(mix, 0)).toBe(1);
    expect(cache.getPathExtensions(mix, 0)).toEqual({ begin: 0, end: 0 });
    expect(cache.getPathWidth(mix, 1)).toBeNull();
  });

  it('exposes text payload', () => {
    expect(cache.getTextString(mix, 1)).toBe('label');
    expect(cache.getTextType(mix, 1)).toBe(2);
    expect(cache.getTextPosition(mix, 1)).toEqual({ x: 5, y: 5 });
    expect(cache.getTextPresentation(mix, 1)).toEqual({
      font: 1,
      vertical: VerticalJustification.Middle,
      horizontal: HorizontalJustification.Right,
    });
    expect(cache.getTextString(mix, 0)).toBeNull();
  });

  it('exposes reference payload and transforms', () => {
    expect(cache.getReferenceName(mix, 2)).toBe('STR1');
    expect(cache.getReferencePosition(mix, 2)).toEqual({ x: 100, y: -50 });
    expect(cache.getTransform(mix, 2)).toEqual({ flags: 0x8000, magnification: 2, angle: 0 });
    expect(cache.getTransformFlags(mix, 2)).toEqual({
      reflection: true,
      absoluteMagnification: false,
      absoluteAngle: false,
    });

    expect(cache.getReferenceName(mix, 3)).toBe('STR1');
    expect(cache.getReferencePosition(mix, 3)).toEqual({ x: 0, y: 0 });
    expect(cache.getArrayDimensions(mix, 3)).toEqual({ columns: 3, rows: 2 });
    expect(cache.getArrayDimensions(mix, 2)).toBeNull();
    expect(cache.getTransform(mix, 4)).toBeNull();
  });

  it('exposes properties', () => {
    expect(cache.getPropertyCount(mix, 4)).toBe(2);
    expect(cache.getPropertyAttribute(mix, 4, 1)).toBe(7);
    expect(cache.getPropertyValue(mix, 4, 0)).toBe('net');
    expect(cache.getPropertyValue(mix, 4, 2)).toBeNull();
    expect(cache.getPropertyAttribute(mix, 4, -1)).toBe(-1);
    expect(cache.getPropertyCount(mix, 0)).toBe(0);
  });

  it('returns sentinels for bad indices and unparsed structures', () => {
    expect(cache.getElement(mix, 5)).toBeNull();
    expect(cache.getElementKind(mix, -1)).toBe(-1);
    expect(cache.getElementLayer(9, 0)).toBe(-1);
    expect(cache.getPolygonCount(0, 0)).toBe(-1);
    expect(cache.getPolygonVertexCount(mix, 4, 1)).toBe(-1);
    expect(cache.getPolygonVertices(mix, 2, 0)).toBeNull();
    expect(cache.getElementBounds(0, 0)).toBeNull();
    expect(cache.getStructureBounds(0)).toBeNull();
  });

  it('merges element bounds into structure bounds', () => {
    // path (0,0)-(100,0), text (5,5), sref (100,-50), aref up to (300,200), square to (50,50)
    expect(cache.getStructureBounds(mix)).toEqual({ minX: 0, minY: -50, maxX: 300, maxY: 200 });
  });

  it('lists the layers of parsed structures', () => {
    expect(cache.getLayers()).toEqual([
      { layer: 1, datatype: 0 },
      { layer: 4, datatype: 2 },
      { layer: 6, datatype: 2 },
    ]);
  });
});

describe('LibraryCache diagnostics and teardown', () => {
  it('reports memory growth as structures are parsed', () => {
    const bytes = twoStructureLibrary();
    const cache = mustOpen(bytes);
    const opened = cache.getMemoryUsage();
    expect(opened).toBeGreaterThan(bytes.length);
    cache.scanStructures();
    const scanned = cache.getMemoryUsage();
    expect(scanned).toBeGreaterThan(opened);
    cache.parseElements(1);
    expect(cache.getMemoryUsage()).toBeGreaterThan(scanned + 9 * 2 * 8 - 1);
    expect(cache.getStats()).toEqual({
      structureCount: 2,
      parsedStructureCount: 1,
      failedStructureCount: 0,
      elementCount: 1,
      memoryUsage: cache.getMemoryUsage(),
    });
  });

  it('validates a scanned library', () => {
    const cache = mustOpen(twoStructureLibrary(), { scan: true });
    expect(cache.validate()).toBe(true);
  });

  it('frees safely and leaves the caller buffer intact', () => {
    const bytes = twoStructureLibrary();
    const copy = bytes.slice();
    const cache = mustOpen(bytes, { scan: true });
    cache.parseAll();

    freeLibraryCache(cache);
    freeLibraryCache(cache);
    freeLibraryCache(null);
    freeLibraryCache(undefined);

    expect(cache.isFreed).toBe(true);
    expect(bytes).toEqual(copy);
    expect(cache.getStructureCount()).toBe(-1);
    expect(cache.getLibraryName()).toBeNull();
    expect(cache.getVersion()).toBe(-1);
    expect(cache.getElementCount(0)).toBe(-1);
    expect(cache.getMemoryUsage()).toBe(-1);
    expect(cache.getStats()).toBeNull();
    expect(cache.validate()).toBe(false);

    const result = cache.parseElements(0);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe('library cache has been freed');
    expect(cache.scanStructures().ok).toBe(false);
  });
});
