/**
 * Geographic utility types.
 */

/** Axis-aligned bounding box in geographic (NAD83/WGS84) coordinates */
export interface BoundingBox {
  minLat: number;
  maxLat: number;
  minLng: number;
  maxLng: number;
}

/** Bounding box as passed on the wire: south, west, north, east */
export type BoundingBoxTuple = readonly [south: number, west: number, north: number, east: number];

/** Convert a [south, west, north, east] tuple into a BoundingBox */
export function bboxFromTuple([south, west, north, east]: BoundingBoxTuple): BoundingBox {
  return { minLat: south, minLng: west, maxLat: north, maxLng: east };
}

/** Convert a BoundingBox back into [south, west, north, east] order */
export function bboxToTuple(bbox: BoundingBox): BoundingBoxTuple {
  return [bbox.minLat, bbox.minLng, bbox.maxLat, bbox.maxLng];
}
