/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Element builder - materializes the elements of one scanned structure
 *
 * Walks BGNSTR...ENDSTR and turns every element block into an immutable
 * GdsElement. Unknown records are skipped by length; anything that breaks
 * the block structure throws GdsFormatError tagged with the structure name.
 */

import {
  ElementKind,
  createEmptyBounds,
  expandBounds,
  type Bounds,
  type GdsElement,
  type GdsProperty,
  type Point,
  type Polygon,
} from '@gds-kit/data';
import type { ByteCursor } from './byte-cursor.js';
import { GdsFormatError } from './errors.js';
import { readRecord, recordName, RecordType, type GdsRecord } from './record.js';
import {
  readAscii,
  readInt16,
  readInt16Values,
  readInt32,
  readInt32Values,
  readReal,
  readUint16,
} from './payload.js';

const ELEMENT_KINDS = new Map<number, ElementKind>([
  [RecordType.BOUNDARY, ElementKind.Boundary],
  [RecordType.PATH, ElementKind.Path],
  [RecordType.BOX, ElementKind.Box],
  [RecordType.NODE, ElementKind.Node],
  [RecordType.TEXT, ElementKind.Text],
  [RecordType.SREF, ElementKind.SRef],
  [RecordType.AREF, ElementKind.ARef],
]);

/** Records that can only appear outside an element block */
const BLOCK_RECORDS = new Set<number>([
  RecordType.ENDSTR,
  RecordType.BGNSTR,
  RecordType.ENDLIB,
  ...ELEMENT_KINDS.keys(),
]);

/** Where a structure's BGNSTR...ENDSTR block lies in the stream */
export interface StructureExtent {
  name: string;
  byteOffset: number;
  byteLength: number;
}

export interface ElementBuilderOptions {
  maxPropertiesPerElement: number;
  maxElementsPerStructure: number;
}

/** Mutable accumulator for one element block */
interface ElementDraft {
  kind: ElementKind;
  offset: number;
  layer: number;
  datatype: number;
  kindType: number;
  pathType: number;
  width: number;
  beginExtension: number;
  endExtension: number;
  presentation: number;
  text: string | null;
  referenceName: string | null;
  strans: number;
  magnification: number;
  angle: number;
  columns: number;
  rows: number;
  hasColRow: boolean;
  elflags: number;
  plex: number;
  xy: Int32Array | null;
  properties: GdsProperty[];
  pendingAttribute: number | null;
}

function createDraft(kind: ElementKind, offset: number): ElementDraft {
  return {
    kind,
    offset,
    layer: 0,
    datatype: 0,
    kindType: 0,
    pathType: 0,
    width: 0,
    beginExtension: 0,
    endExtension: 0,
    presentation: 0,
    text: null,
    referenceName: null,
    strans: 0,
    magnification: 1,
    angle: 0,
    columns: 0,
    rows: 0,
    hasColRow: false,
    elflags: 0,
    plex: 0,
    xy: null,
    properties: [],
    pendingAttribute: null,
  };
}

export class ElementBuilder {
  private cursor: ByteCursor;
  private options: ElementBuilderOptions;

  constructor(cursor: ByteCursor, options: ElementBuilderOptions) {
    this.cursor = cursor;
    this.options = options;
  }

  /**
   * Decode every element of `structure`. The cursor is repositioned to the
   * structure's scanned offset first, so calls may come in any order.
   */
  buildStructure(structure: StructureExtent): GdsElement[] {
    const { name, byteOffset, byteLength } = structure;
    const cursor = this.cursor;
    const end = byteOffset + byteLength;

    if (!cursor.seek(byteOffset) || end > cursor.length) {
      throw new GdsFormatError('structure extent lies outside the buffer', byteOffset, name);
    }

    const bgnstr = readRecord(cursor, name);
    if (bgnstr.header.recordType !== RecordType.BGNSTR) {
      throw new GdsFormatError(`expected BGNSTR, found ${recordName(bgnstr.header.recordType)}`, bgnstr.offset, name);
    }
    const strname = readRecord(cursor, name);
    if (strname.header.recordType !== RecordType.STRNAME) {
      throw new GdsFormatError(`expected STRNAME, found ${recordName(strname.header.recordType)}`, strname.offset, name);
    }

    const elements: GdsElement[] = [];
    while (true) {
      const record = this.nextRecord(end, name);
      const type = record.header.recordType;

      if (type === RecordType.ENDSTR) break;
      if (type === RecordType.BGNSTR || type === RecordType.ENDLIB) {
        throw new GdsFormatError(`unexpected ${recordName(type)} inside structure`, record.offset, name);
      }

      const kind = ELEMENT_KINDS.get(type);
      if (kind === undefined) continue; // STRCLASS and unknown structure-level records

      if (elements.length >= this.options.maxElementsPerStructure) {
        throw new GdsFormatError(
          `more than ${this.options.maxElementsPerStructure} elements`,
          record.offset,
          name,
        );
      }
      elements.push(this.buildElement(kind, record.offset, end, name));
    }

    return elements;
  }

  private nextRecord(end: number, name: string): GdsRecord {
    if (this.cursor.tell() >= end) {
      throw new GdsFormatError('missing ENDSTR', this.cursor.tell(), name);
    }
    return readRecord(this.cursor, name);
  }

  private buildElement(kind: ElementKind, offset: number, end: number, name: string): GdsElement {
    const draft = createDraft(kind, offset);

    while (true) {
      const record = this.nextRecord(end, name);
      const type = record.header.recordType;

      if (type === RecordType.ENDEL) break;
      if (BLOCK_RECORDS.has(type)) {
        throw new GdsFormatError(`missing ENDEL before ${recordName(type)}`, record.offset, name);
      }
      this.applyRecord(draft, record, name);
    }

    if (draft.pendingAttribute !== null) {
      throw new GdsFormatError(`PROPATTR ${draft.pendingAttribute} has no PROPVALUE`, offset, name);
    }
    return finishElement(draft, name);
  }

  private applyRecord(draft: ElementDraft, record: GdsRecord, name: string): void {
    if (draft.pendingAttribute !== null && record.header.recordType !== RecordType.PROPVALUE) {
      throw new GdsFormatError(`PROPATTR ${draft.pendingAttribute} has no PROPVALUE`, record.offset, name);
    }
    switch (record.header.recordType) {
      case RecordType.LAYER:
        draft.layer = readUint16(record, name);
        break;
      case RecordType.DATATYPE:
        draft.datatype = readUint16(record, name);
        break;
      case RecordType.BOXTYPE:
      case RecordType.NODETYPE:
      case RecordType.TEXTTYPE:
        // The kind's own type record fills its datatype slot
        draft.kindType = readUint16(record, name);
        draft.datatype = draft.kindType;
        break;
      case RecordType.PATHTYPE:
        draft.pathType = readInt16(record, name);
        break;
      case RecordType.WIDTH:
        draft.width = readInt32(record, name);
        break;
      case RecordType.BGNEXTN:
        draft.beginExtension = readInt32(record, name);
        break;
      case RecordType.ENDEXTN:
        draft.endExtension = readInt32(record, name);
        break;
      case RecordType.PRESENTATION:
        draft.presentation = readUint16(record, name);
        break;
      case RecordType.STRING:
        draft.text = readAscii(record, name);
        break;
      case RecordType.SNAME:
        draft.referenceName = readAscii(record, name);
        break;
      case RecordType.STRANS:
        draft.strans = readUint16(record, name);
        break;
      case RecordType.MAG:
        draft.magnification = readReal(record, name);
        break;
      case RecordType.ANGLE:
        draft.angle = readReal(record, name);
        break;
      case RecordType.COLROW: {
        const counts = readInt16Values(record, name);
        if (counts.length !== 2) {
          throw new GdsFormatError(`COLROW holds ${counts.length} values, expected 2`, record.offset, name);
        }
        [draft.columns, draft.rows] = counts;
        draft.hasColRow = true;
        break;
      }
      case RecordType.ELFLAGS:
        draft.elflags = readUint16(record, name);
        break;
      case RecordType.PLEX:
        draft.plex = readInt32(record, name);
        break;
      case RecordType.XY: {
        if (draft.xy !== null) {
          throw new GdsFormatError('second XY record in one element', record.offset, name);
        }
        const xy = readInt32Values(record, name);
        if (xy.length % 2 !== 0) {
          throw new GdsFormatError(`XY holds an odd number of coordinates (${xy.length})`, record.offset, name);
        }
        draft.xy = xy;
        break;
      }
      case RecordType.PROPATTR:
        draft.pendingAttribute = readUint16(record, name);
        break;
      case RecordType.PROPVALUE: {
        if (draft.pendingAttribute === null) {
          throw new GdsFormatError('PROPVALUE without PROPATTR', record.offset, name);
        }
        if (draft.properties.length >= this.options.maxPropertiesPerElement) {
          throw new GdsFormatError(
            `more than ${this.options.maxPropertiesPerElement} properties on one element`,
            record.offset,
            name,
          );
        }
        draft.properties.push({ attribute: draft.pendingAttribute, value: readAscii(record, name) });
        draft.pendingAttribute = null;
        break;
      }
      default:
        // Unknown or unused (ELKEY, TEXTNODE payloads, ...): already consumed by length
        break;
    }
  }
}

function requirePoints(draft: ElementDraft, name: string, exact?: number): Int32Array {
  const kindName = ElementKind[draft.kind];
  if (draft.xy === null) {
    throw new GdsFormatError(`${kindName} element has no XY record`, draft.offset, name);
  }
  const count = draft.xy.length / 2;
  if (count === 0 || (exact !== undefined && count !== exact)) {
    throw new GdsFormatError(
      `${kindName} element has ${count} points, expected ${exact ?? 'at least 1'}`,
      draft.offset,
      name,
    );
  }
  return draft.xy;
}

function requireReferenceName(draft: ElementDraft, name: string): string {
  if (draft.referenceName === null) {
    throw new GdsFormatError(`${ElementKind[draft.kind]} element has no SNAME record`, draft.offset, name);
  }
  return draft.referenceName;
}

function pointAt(xy: Int32Array, index: number): Point {
  return { x: xy[index * 2], y: xy[index * 2 + 1] };
}

/** Copy coordinates into a polygon while folding them into `bounds` */
function toPolygon(xy: Int32Array, bounds: Bounds): Polygon {
  const vertices = new Float64Array(xy.length);
  for (let i = 0; i < xy.length; i += 2) {
    vertices[i] = xy[i];
    vertices[i + 1] = xy[i + 1];
    expandBounds(bounds, xy[i], xy[i + 1]);
  }
  return { vertices, vertexCount: xy.length / 2 };
}

function finishElement(draft: ElementDraft, name: string): GdsElement {
  const bounds = createEmptyBounds();
  const base = {
    layer: draft.layer,
    datatype: draft.datatype,
    transform: { flags: draft.strans, magnification: draft.magnification, angle: draft.angle },
    elflags: draft.elflags,
    plex: draft.plex,
    properties: draft.properties,
    bounds,
  };

  switch (draft.kind) {
    case ElementKind.Boundary:
      return { ...base, kind: ElementKind.Boundary, polygons: [toPolygon(requirePoints(draft, name), bounds)] };

    case ElementKind.Box:
      return {
        ...base,
        kind: ElementKind.Box,
        boxType: draft.kindType,
        polygons: [toPolygon(requirePoints(draft, name), bounds)],
      };

    case ElementKind.Node:
      return {
        ...base,
        kind: ElementKind.Node,
        nodeType: draft.kindType,
        polygons: [toPolygon(requirePoints(draft, name), bounds)],
      };

    case ElementKind.Path:
      return {
        ...base,
        kind: ElementKind.Path,
        pathType: draft.pathType,
        width: draft.width,
        beginExtension: draft.beginExtension,
        endExtension: draft.endExtension,
        polygons: [toPolygon(requirePoints(draft, name), bounds)],
      };

    case ElementKind.Text: {
      const position = pointAt(requirePoints(draft, name, 1), 0);
      if (draft.text === null) {
        throw new GdsFormatError('TEXT element has no STRING record', draft.offset, name);
      }
      expandBounds(bounds, position.x, position.y);
      return {
        ...base,
        kind: ElementKind.Text,
        textType: draft.kindType,
        presentation: draft.presentation,
        pathType: draft.pathType,
        width: draft.width,
        text: draft.text,
        position,
        polygons: [],
      };
    }

    case ElementKind.SRef: {
      const referenceName = requireReferenceName(draft, name);
      const position = pointAt(requirePoints(draft, name, 1), 0);
      expandBounds(bounds, position.x, position.y);
      return { ...base, kind: ElementKind.SRef, referenceName, position, polygons: [] };
    }

    case ElementKind.ARef: {
      const referenceName = requireReferenceName(draft, name);
      const xy = requirePoints(draft, name, 3);
      if (!draft.hasColRow) {
        throw new GdsFormatError('AREF element has no COLROW record', draft.offset, name);
      }
      const [origin, columnPoint, rowPoint] = [pointAt(xy, 0), pointAt(xy, 1), pointAt(xy, 2)];
      for (const p of [origin, columnPoint, rowPoint]) {
        expandBounds(bounds, p.x, p.y);
      }
      return {
        ...base,
        kind: ElementKind.ARef,
        referenceName,
        origin,
        columnPoint,
        rowPoint,
        columns: draft.columns,
        rows: draft.rows,
        polygons: [],
      };
    }
  }
}
