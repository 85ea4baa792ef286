/**
 * Monitoring sites ("features of interest").
 */

import type { BoundingBox } from "./geo.js";
import type { Table } from "./table.js";

export type LocationRow = {
  /** Normalized feature identifier, e.g. "USGS.272838082142201" */
  site: string;
  description: string | null;
  decLat: number | null;
  decLon: number | null;
};

/** Site locations, annotated with the request that produced them */
export interface LocationTable extends Table<LocationRow> {
  url: string;
  queryTime: Date;
}

/** Selects features of interest either by identifier or by area */
export type FeatureSelector =
  | { kind: "featureId"; featureIds: string[] }
  | { kind: "bbox"; bbox: BoundingBox };
