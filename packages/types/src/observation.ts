/**
 * Groundwater-level observations and the metadata that travels with them.
 */

import type { Table } from "./table.js";
import type { LocationTable } from "./site.js";

// ---------------------------------------------------------------------------
// Metadata attribute set
// ---------------------------------------------------------------------------

/**
 * Attributes captured from every observation response. They are pulled off
 * each per-site table before rows are merged and returned as their own
 * metadata table.
 */
export const METADATA_ATTRIBUTES = [
  "url",
  "identifier",
  "generationDate",
  "responsibleParty",
  "contact",
] as const;

export type MetadataAttributeName = (typeof METADATA_ATTRIBUTES)[number];

/** One metadata row per requested site */
export type MetadataRow = { [K in MetadataAttributeName]: string | null };

export type MetadataTable = Table<MetadataRow>;

// ---------------------------------------------------------------------------
// Observations
// ---------------------------------------------------------------------------

/** One recorded groundwater-level reading */
export type ObservationRow = {
  /** Bare site number (agency code stripped); leftmost column */
  site?: string;
  /** Date part of the timestamp, YYYY-MM-DD when well-formed */
  date: string | null;
  /** Time part of the timestamp (HH:MM:SS), null for date-only readings */
  time: string | null;
  /** Parsed instant, or the raw timestamp when datetime parsing is off */
  dateTime: Date | string | null;
  /** UTC offset embedded in the timestamp (e.g. "-05:00") */
  tzOffset: string | null;
  /** Zone the instant is reported in */
  tzCode: string | null;
  value: number | null;
  uom: string | null;
  qualifier: string | null;
  comment: string | null;
};

export type ObservationTable = Table<ObservationRow>;

/**
 * Combined result of an observation request: the merged rows of every site
 * plus the site locations and per-site metadata as named side tables.
 */
export interface ObservationResult {
  columns: string[];
  rows: ObservationRow[];
  /** Location of every requested site */
  locations: LocationTable;
  /** One row per requested site, in request order */
  metadata: MetadataTable;
}
