/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Bounding box helpers. An empty box has min > max on both axes so that
 * the first expandBounds() call snaps it to that point.
 */

import type { Bounds } from './types.js';

export function createEmptyBounds(): Bounds {
  return {
    minX: Infinity,
    minY: Infinity,
    maxX: -Infinity,
    maxY: -Infinity,
  };
}

export function isEmptyBounds(bounds: Bounds): boolean {
  return bounds.minX > bounds.maxX || bounds.minY > bounds.maxY;
}

/** Grow `bounds` in place to include (x, y) */
export function expandBounds(bounds: Bounds, x: number, y: number): Bounds {
  if (x < bounds.minX) bounds.minX = x;
  if (x > bounds.maxX) bounds.maxX = x;
  if (y < bounds.minY) bounds.minY = y;
  if (y > bounds.maxY) bounds.maxY = y;
  return bounds;
}

export function mergeBounds(a: Bounds, b: Bounds): Bounds {
  if (isEmptyBounds(a)) return { ...b };
  if (isEmptyBounds(b)) return { ...a };
  return {
    minX: Math.min(a.minX, b.minX),
    minY: Math.min(a.minY, b.minY),
    maxX: Math.max(a.maxX, b.maxX),
    maxY: Math.max(a.maxY, b.maxY),
  };
}

/** Bounds of an interleaved [x0, y0, x1, y1, ...] list */
export function boundsFromVertices(vertices: ArrayLike<number>): Bounds {
  const bounds = createEmptyBounds();
  for (let i = 0; i + 1 < vertices.length; i += 2) {
    expandBounds(bounds, vertices[i], vertices[i + 1]);
  }
  return bounds;
}
