/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * LibraryCache - owns the cursor, the library header and the lazily
 * populated structure list.
 *
 * Lifecycle: openLibrary() / createLibraryCache() -> scanStructures() ->
 * parseElements(i) as needed -> free(). Operations return GdsResult;
 * index-based accessors return -1 or null for anything they cannot answer
 * (freed cache, bad index, structure not parsed yet). Nothing throws.
 */

import {
  ElementKind,
  createEmptyBounds,
  createLogger,
  decodePresentation,
  decodeTransformFlags,
  mergeBounds,
  type Bounds,
  type GdsDate,
  type GdsElement,
  type LayerKey,
  type Point,
  type Polygon,
  type TextPresentation,
  type Transform,
  type TransformFlags,
} from '@gds-kit/data';
import { ByteCursor } from './byte-cursor.js';
import { ElementBuilder } from './element-builder.js';
import { GdsError, GdsInputError, fail, ok, toGdsError, type GdsResult } from './errors.js';
import { LibraryScanner } from './library-scanner.js';
import {
  DEFAULT_MAX_ELEMENTS_PER_STRUCTURE,
  DEFAULT_MAX_PROPERTIES_PER_ELEMENT,
  type CacheStats,
  type LibraryHeader,
  type ParseOptions,
  type StructureEntry,
} from './types.js';

const log = createLogger('LibraryCache');

// Rough per-object costs for getMemoryUsage()
const CACHE_OVERHEAD_BYTES = 256;
const STRUCTURE_ENTRY_BYTES = 96;
const ELEMENT_BYTES = 160;
const POLYGON_BYTES = 32;
const PROPERTY_BYTES = 24;

export type LibraryInput = ArrayBuffer | Uint8Array | null | undefined;

interface Limits {
  maxPropertiesPerElement: number;
  maxElementsPerStructure: number;
}

function resolveLimits(options: ParseOptions): Limits | GdsError {
  const {
    maxPropertiesPerElement = DEFAULT_MAX_PROPERTIES_PER_ELEMENT,
    maxElementsPerStructure = DEFAULT_MAX_ELEMENTS_PER_STRUCTURE,
  } = options;
  for (const [key, value] of [
    ['maxPropertiesPerElement', maxPropertiesPerElement],
    ['maxElementsPerStructure', maxElementsPerStructure],
  ] as const) {
    if (!Number.isInteger(value) || value < 0) {
      return new GdsInputError(`${key} must be a non-negative integer, got ${value}`);
    }
  }
  return { maxPropertiesPerElement, maxElementsPerStructure };
}

/**
 * Validate the input, open a cursor over it and read the library header.
 * `length` limits decoding to a prefix of the buffer. On any failure the
 * cursor is closed again and nothing is returned but the error.
 */
export function openLibrary(
  buffer: LibraryInput,
  length?: number,
  options: ParseOptions = {}
): GdsResult<LibraryCache> {
  if (!buffer) {
    return fail(new GdsInputError('buffer is null'));
  }
  if (buffer.byteLength === 0 || length === 0) {
    return fail(new GdsInputError('buffer is empty'));
  }
  const limits = resolveLimits(options);
  if (limits instanceof GdsError) {
    return fail(limits);
  }

  const cursor = ByteCursor.open(buffer, length);
  if (!cursor) {
    return fail(new GdsInputError(`length ${length} is outside the ${buffer.byteLength}-byte buffer`));
  }

  const opened = readLibrary(cursor, limits);
  if (!opened.ok) {
    cursor.close();
    return opened;
  }

  const cache = opened.value;
  if (options.scan) {
    const scanned = cache.scanStructures();
    if (!scanned.ok) {
      cache.free();
      return fail(scanned.error);
    }
  }
  return ok(cache);
}

function readLibrary(cursor: ByteCursor, limits: Limits): GdsResult<LibraryCache> {
  try {
    const header = new LibraryScanner(cursor).readHeader();
    return ok(new LibraryCache(cursor, header, limits));
  } catch (error) {
    return fail(toGdsError(error));
  }
}

/** openLibrary() for callers that only need a cache or null */
export function createLibraryCache(
  buffer: LibraryInput,
  length?: number,
  options?: ParseOptions
): LibraryCache | null {
  const result = openLibrary(buffer, length, options);
  if (!result.ok) {
    log.caught('createLibraryCache failed', result.error, { offset: result.error.offset });
    return null;
  }
  return result.value;
}

/** Null-safe teardown */
export function freeLibraryCache(cache: LibraryCache | null | undefined): void {
  cache?.free();
}

export class LibraryCache {
  private cursor: ByteCursor;
  private header: LibraryHeader | null;
  private structures: StructureEntry[] = [];
  private scanned = false;
  private scanIssue: GdsError | null = null;
  private scanner: LibraryScanner;
  private builder: ElementBuilder;

  constructor(cursor: ByteCursor, header: LibraryHeader, limits: Limits) {
    this.cursor = cursor;
    this.header = header;
    this.scanner = new LibraryScanner(cursor);
    this.builder = new ElementBuilder(cursor, limits);
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  get isFreed(): boolean {
    return this.header === null;
  }

  /** Release the cursor and every structure. The caller's buffer is untouched. */
  free(): void {
    if (this.header === null) return;
    const name = this.header.name;
    const structureCount = this.structures.length;
    this.cursor.close();
    this.structures = [];
    this.scanned = false;
    this.scanIssue = null;
    this.header = null;
    log.info('freed', { operation: 'free', data: { library: name, structureCount } });
  }

  /**
   * Enumerate structures without decoding their elements. A second call
   * returns the names found by the first.
   *
   * A stream that ends early keeps every structure found before the damage;
   * an unterminated block is kept in the failed state and the problem is
   * reported by getScanError(). Only a scan that cannot continue at all
   * (an element outside any structure) fails and keeps nothing.
   */
  scanStructures(): GdsResult<string[]> {
    if (this.header === null) return fail(freedError());
    if (this.scanned) return ok(this.structures.map((s) => s.name));

    try {
      const entries: StructureEntry[] = [];
      const walk = this.scanner.scanStructures(this.header.bodyOffset);
      let step = walk.next();
      while (!step.done) {
        const { error, ...found } = step.value;
        entries.push({ ...found, state: error ? { status: 'failed', error } : { status: 'scanned' } });
        step = walk.next();
      }
      this.structures = entries;
      this.scanIssue = step.value;
      this.scanned = true;
      if (step.value) {
        log.warn('stream ended early', {
          operation: 'scanStructures',
          offset: step.value.offset,
          data: { error: step.value.message, structureCount: entries.length },
        });
      }
      log.debug(`found ${entries.length} structures`, undefined, { operation: 'scanStructures' });
      return ok(entries.map((s) => s.name));
    } catch (error) {
      const gdsError = toGdsError(error);
      log.caught('scan failed', gdsError, { operation: 'scanStructures', offset: gdsError.offset });
      return fail(gdsError);
    }
  }

  /** Why the last scan stopped short of ENDLIB, or null */
  getScanError(): GdsError | null {
    return this.header === null ? null : this.scanIssue;
  }

  /**
   * Materialize the elements of structure `index`; the value is its element
   * count. Already parsed structures succeed without re-reading; a failed
   * one is retried. Other structures are never touched.
   */
  parseElements(index: number): GdsResult<number> {
    if (this.header === null) return fail(freedError());
    const entry = this.structureAt(index);
    if (!entry) {
      return fail(new GdsInputError(`structure index ${index} out of range (count ${this.structures.length})`));
    }
    if (entry.state.status === 'parsed') return ok(entry.state.elements.length);

    try {
      const elements = this.builder.buildStructure(entry);
      entry.state = { status: 'parsed', elements };
      return ok(elements.length);
    } catch (error) {
      const gdsError = toGdsError(error, entry.name);
      entry.state = { status: 'failed', error: gdsError };
      log.warn('structure failed', {
        operation: 'parseElements',
        structure: entry.name,
        offset: gdsError.offset ?? entry.byteOffset,
        data: { error: gdsError.message },
      });
      return fail(gdsError);
    }
  }

  /**
   * Parse every scanned structure, continuing past failures. Succeeds with
   * the total element count, or fails with the first structure's error.
   */
  parseAll(): GdsResult<number> {
    if (this.header === null) return fail(freedError());
    let total = 0;
    let firstError: GdsError | null = null;
    for (let i = 0; i < this.structures.length; i++) {
      const result = this.parseElements(i);
      if (result.ok) {
        total += result.value;
      } else if (!firstError) {
        firstError = result.error;
      }
    }
    return firstError ? fail(firstError) : ok(total);
  }

  // ==========================================================================
  // Library
  // ==========================================================================

  getHeader(): Readonly<LibraryHeader> | null {
    return this.header;
  }

  getLibraryName(): string | null {
    return this.header?.name ?? null;
  }

  getVersion(): number {
    return this.header?.version ?? -1;
  }

  getUserUnitsPerDbUnit(): number {
    return this.header?.userUnitsPerDbUnit ?? -1;
  }

  getMetersPerDbUnit(): number {
    return this.header?.metersPerDbUnit ?? -1;
  }

  getCreated(): GdsDate | null {
    return this.header?.created ?? null;
  }

  getModified(): GdsDate | null {
    return this.header?.modified ?? null;
  }

  // ==========================================================================
  // Structures
  // ==========================================================================

  /** 0 until scanStructures() has run */
  getStructureCount(): number {
    return this.header === null ? -1 : this.structures.length;
  }

  getStructureName(index: number): string | null {
    return this.structureAt(index)?.name ?? null;
  }

  isStructureParsed(index: number): boolean {
    return this.structureAt(index)?.state.status === 'parsed';
  }

  /** Error left by the last failed parseElements(index), if any */
  getStructureError(index: number): GdsError | null {
    const state = this.structureAt(index)?.state;
    return state?.status === 'failed' ? state.error : null;
  }

  /** First structure with this name, or -1 */
  findStructure(name: string): number {
    return this.structures.findIndex((s) => s.name === name);
  }

  /** Union of the element bounds of a parsed structure */
  getStructureBounds(index: number): Bounds | null {
    const elements = this.elementsOf(index);
    if (!elements) return null;
    let bounds = createEmptyBounds();
    for (const element of elements) {
      bounds = mergeBounds(bounds, element.bounds);
    }
    return bounds;
  }

  // ==========================================================================
  // Elements
  // ==========================================================================

  /** -1 while the structure is not parsed */
  getElementCount(index: number): number {
    return this.elementsOf(index)?.length ?? -1;
  }

  /** A copy of the element; its vertex arrays may be modified freely */
  getElement(index: number, element: number): GdsElement | null {
    const found = this.elementAt(index, element);
    return found ? copyElement(found) : null;
  }

  getElementKind(index: number, element: number): ElementKind | -1 {
    return this.elementAt(index, element)?.kind ?? -1;
  }

  getElementLayer(index: number, element: number): number {
    return this.elementAt(index, element)?.layer ?? -1;
  }

  getElementDatatype(index: number, element: number): number {
    return this.elementAt(index, element)?.datatype ?? -1;
  }

  getElementBounds(index: number, element: number): Bounds | null {
    const found = this.elementAt(index, element);
    return found ? { ...found.bounds } : null;
  }

  getElementFlags(index: number, element: number): number {
    return this.elementAt(index, element)?.elflags ?? -1;
  }

  getElementPlex(index: number, element: number): number {
    return this.elementAt(index, element)?.plex ?? -1;
  }

  // ==========================================================================
  // Geometry
  // ==========================================================================

  getPolygonCount(index: number, element: number): number {
    return this.elementAt(index, element)?.polygons.length ?? -1;
  }

  getPolygonVertexCount(index: number, element: number, polygon: number): number {
    return this.polygonAt(index, element, polygon)?.vertexCount ?? -1;
  }

  /** Interleaved [x0, y0, x1, y1, ...] in database units; a copy */
  getPolygonVertices(index: number, element: number, polygon: number): Float64Array | null {
    return this.polygonAt(index, element, polygon)?.vertices.slice() ?? null;
  }

  // ==========================================================================
  // Properties
  // ==========================================================================

  getPropertyCount(index: number, element: number): number {
    return this.elementAt(index, element)?.properties.length ?? -1;
  }

  getPropertyAttribute(index: number, element: number, property: number): number {
    return this.elementAt(index, element)?.properties[property]?.attribute ?? -1;
  }

  getPropertyValue(index: number, element: number, property: number): string | null {
    return this.elementAt(index, element)?.properties[property]?.value ?? null;
  }

  // ==========================================================================
  // Kind-specific payload
  // ==========================================================================

  getTextString(index: number, element: number): string | null {
    const found = this.elementAt(index, element);
    return found?.kind === ElementKind.Text ? found.text : null;
  }

  getTextPosition(index: number, element: number): Point | null {
    const found = this.elementAt(index, element);
    return found?.kind === ElementKind.Text ? { ...found.position } : null;
  }

  getTextType(index: number, element: number): number {
    const found = this.elementAt(index, element);
    return found?.kind === ElementKind.Text ? found.textType : -1;
  }

  getTextPresentation(index: number, element: number): TextPresentation | null {
    const found = this.elementAt(index, element);
    return found?.kind === ElementKind.Text ? decodePresentation(found.presentation) : null;
  }

  getPathType(index: number, element: number): number {
    const found = this.elementAt(index, element);
    return found?.kind === ElementKind.Path ? found.pathType : -1;
  }

  /** Null for non-paths; a negative width is a legal absolute width */
  getPathWidth(index: number, element: number): number | null {
    const found = this.elementAt(index, element);
    return found?.kind === ElementKind.Path ? found.width : null;
  }

  getPathExtensions(index: number, element: number): { begin: number; end: number } | null {
    const found = this.elementAt(index, element);
    if (found?.kind !== ElementKind.Path) return null;
    return { begin: found.beginExtension, end: found.endExtension };
  }

  getReferenceName(index: number, element: number): string | null {
    const found = this.elementAt(index, element);
    if (found?.kind === ElementKind.SRef || found?.kind === ElementKind.ARef) {
      return found.referenceName;
    }
    return null;
  }

  /** SREF placement or AREF origin */
  getReferencePosition(index: number, element: number): Point | null {
    const found = this.elementAt(index, element);
    if (found?.kind === ElementKind.SRef) return { ...found.position };
    if (found?.kind === ElementKind.ARef) return { ...found.origin };
    return null;
  }

  getArrayDimensions(index: number, element: number): { columns: number; rows: number } | null {
    const found = this.elementAt(index, element);
    if (found?.kind !== ElementKind.ARef) return null;
    return { columns: found.columns, rows: found.rows };
  }

  /** STRANS/MAG/ANGLE of a reference or text element */
  getTransform(index: number, element: number): Transform | null {
    const found = this.elementAt(index, element);
    if (found?.kind === ElementKind.SRef || found?.kind === ElementKind.ARef || found?.kind === ElementKind.Text) {
      return { ...found.transform };
    }
    return null;
  }

  getTransformFlags(index: number, element: number): TransformFlags | null {
    const transform = this.getTransform(index, element);
    return transform ? decodeTransformFlags(transform.flags) : null;
  }

  // ==========================================================================
  // Queries across structures
  // ==========================================================================

  /** Distinct layer/datatype pairs of parsed, layered elements, sorted */
  getLayers(): LayerKey[] {
    const seen = new Map<string, LayerKey>();
    for (const entry of this.structures) {
      if (entry.state.status !== 'parsed') continue;
      for (const element of entry.state.elements) {
        if (element.kind === ElementKind.SRef || element.kind === ElementKind.ARef) continue;
        const key = `${element.layer}/${element.datatype}`;
        if (!seen.has(key)) {
          seen.set(key, { layer: element.layer, datatype: element.datatype });
        }
      }
    }
    return [...seen.values()].sort((a, b) => a.layer - b.layer || a.datatype - b.datatype);
  }

  // ==========================================================================
  // Diagnostics
  // ==========================================================================

  /** Estimated bytes held by the cache, including the buffer it reads; -1 once freed */
  getMemoryUsage(): number {
    if (this.header === null) return -1;
    let bytes = CACHE_OVERHEAD_BYTES + this.cursor.length;
    for (const entry of this.structures) {
      bytes += STRUCTURE_ENTRY_BYTES + entry.name.length * 2;
      if (entry.state.status !== 'parsed') continue;
      for (const element of entry.state.elements) {
        bytes += ELEMENT_BYTES;
        for (const polygon of element.polygons) {
          bytes += POLYGON_BYTES + polygon.vertices.byteLength;
        }
        for (const property of element.properties) {
          bytes += PROPERTY_BYTES + property.value.length * 2;
        }
      }
    }
    return bytes;
  }

  getStats(): CacheStats | null {
    if (this.header === null) return null;
    let parsedStructureCount = 0;
    let failedStructureCount = 0;
    let elementCount = 0;
    for (const entry of this.structures) {
      if (entry.state.status === 'parsed') {
        parsedStructureCount++;
        elementCount += entry.state.elements.length;
      } else if (entry.state.status === 'failed') {
        failedStructureCount++;
      }
    }
    return {
      structureCount: this.structures.length,
      parsedStructureCount,
      failedStructureCount,
      elementCount,
      memoryUsage: this.getMemoryUsage(),
    };
  }

  /**
   * Internal consistency check: open cursor, structure extents inside the
   * buffer, in file order and not overlapping.
   */
  validate(): boolean {
    if (this.header === null || !this.cursor.isOpen) return false;
    const length = this.cursor.length;
    if (this.header.bodyOffset <= 0 || this.header.bodyOffset > length) return false;

    let previousEnd = this.header.bodyOffset;
    for (const entry of this.structures) {
      if (entry.byteOffset < previousEnd || entry.byteLength <= 0) return false;
      previousEnd = entry.byteOffset + entry.byteLength;
      if (previousEnd > length) return false;
    }
    return true;
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private structureAt(index: number): StructureEntry | null {
    if (this.header === null || !Number.isInteger(index) || index < 0 || index >= this.structures.length) {
      return null;
    }
    return this.structures[index];
  }

  private elementsOf(index: number): readonly GdsElement[] | null {
    const state = this.structureAt(index)?.state;
    return state?.status === 'parsed' ? state.elements : null;
  }

  private elementAt(index: number, element: number): GdsElement | null {
    const elements = this.elementsOf(index);
    if (!elements || !Number.isInteger(element) || element < 0 || element >= elements.length) {
      return null;
    }
    return elements[element];
  }

  private polygonAt(index: number, element: number, polygon: number): Polygon | null {
    const polygons = this.elementAt(index, element)?.polygons;
    if (!polygons || !Number.isInteger(polygon) || polygon < 0 || polygon >= polygons.length) {
      return null;
    }
    return polygons[polygon];
  }
}

/** Elements are shared by every caller; hand out copies of their vertex arrays */
function copyElement(element: GdsElement): GdsElement {
  return {
    ...element,
    polygons: element.polygons.map((p) => ({ vertices: p.vertices.slice(), vertexCount: p.vertexCount })),
  };
}

function freedError(): GdsInputError {
  return new GdsInputError('library cache has been freed');
}
