/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Core types for the decoded layout model
 */

export enum ElementKind {
  Boundary = 0,
  Path = 1,
  Box = 2,
  Node = 3,
  Text = 4,
  SRef = 5,
  ARef = 6,
}

export interface Point {
  x: number;
  y: number;
}

/** Axis-aligned rectangle in database units */
export interface Bounds {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

/**
 * Ordered vertex list, interleaved as [x0, y0, x1, y1, ...].
 * Boundaries and boxes are closed (first vertex repeated last), paths are open,
 * nodes are a set of discrete points.
 */
export interface Polygon {
  readonly vertices: Float64Array;
  readonly vertexCount: number;
}

export interface GdsProperty {
  /** PROPATTR number */
  attribute: number;
  /** PROPVALUE string with NUL padding removed */
  value: string;
}

export interface GdsDate {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

/** STRANS/MAG/ANGLE as stored; see decodeTransformFlags() for the flag bits */
export interface Transform {
  flags: number;
  magnification: number;
  /** Counterclockwise rotation in degrees */
  angle: number;
}

export interface TransformFlags {
  /** Reflect about the x-axis before rotation */
  reflection: boolean;
  absoluteMagnification: boolean;
  absoluteAngle: boolean;
}

export enum VerticalJustification {
  Top = 0,
  Middle = 1,
  Bottom = 2,
}

export enum HorizontalJustification {
  Left = 0,
  Center = 1,
  Right = 2,
}

export interface TextPresentation {
  /** Font number, 0-3 */
  font: number;
  vertical: VerticalJustification;
  horizontal: HorizontalJustification;
}

interface ElementBase {
  readonly layer: number;
  readonly datatype: number;
  readonly polygons: readonly Polygon[];
  readonly transform: Readonly<Transform>;
  readonly elflags: number;
  readonly plex: number;
  readonly properties: readonly Readonly<GdsProperty>[];
  readonly bounds: Readonly<Bounds>;
}

export interface BoundaryElement extends ElementBase {
  readonly kind: ElementKind.Boundary;
}

export interface PathElement extends ElementBase {
  readonly kind: ElementKind.Path;
  /** 0 flush, 1 round, 2 half-width extension, 4 custom extension */
  readonly pathType: number;
  /** Negative widths are absolute (not scaled by references) */
  readonly width: number;
  readonly beginExtension: number;
  readonly endExtension: number;
}

export interface BoxElement extends ElementBase {
  readonly kind: ElementKind.Box;
  readonly boxType: number;
}

export interface NodeElement extends ElementBase {
  readonly kind: ElementKind.Node;
  readonly nodeType: number;
}

export interface TextElement extends ElementBase {
  readonly kind: ElementKind.Text;
  readonly textType: number;
  /** Raw PRESENTATION bits; see decodePresentation() */
  readonly presentation: number;
  readonly pathType: number;
  readonly width: number;
  readonly text: string;
  readonly position: Readonly<Point>;
}

export interface SRefElement extends ElementBase {
  readonly kind: ElementKind.SRef;
  readonly referenceName: string;
  readonly position: Readonly<Point>;
}

export interface ARefElement extends ElementBase {
  readonly kind: ElementKind.ARef;
  readonly referenceName: string;
  readonly origin: Readonly<Point>;
  /** Origin displaced by `columns` column pitches */
  readonly columnPoint: Readonly<Point>;
  /** Origin displaced by `rows` row pitches */
  readonly rowPoint: Readonly<Point>;
  readonly columns: number;
  readonly rows: number;
}

export type GdsElement =
  | BoundaryElement
  | PathElement
  | BoxElement
  | NodeElement
  | TextElement
  | SRefElement
  | ARefElement;

export type ReferenceElement = SRefElement | ARefElement;

export interface LayerKey {
  layer: number;
  datatype: number;
}
