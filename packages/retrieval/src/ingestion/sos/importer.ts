/**
 * Response importer.
 *
 * Fetches one SOS document through a transport and turns it into a table.
 * Observation tables carry the document metadata as attributes; every
 * table records where it came from in its `url` attribute.
 */

import type { SosTransport } from "@gwsos/clients-core";
import type { LocationRow, ObservationRow, ObservationTable, Table, TableAttributes } from "@gwsos/types";
import { ServiceResponseError } from "../../errors.js";
import { parseTimestamp, splitTimestamp } from "./datetime.js";
import { parseSosDocument, type ObservationPoint } from "./parser.js";

export const OBSERVATION_COLUMNS = [
  "date",
  "time",
  "dateTime",
  "tzOffset",
  "tzCode",
  "value",
  "uom",
  "qualifier",
  "comment",
];

export const LOCATION_COLUMNS = ["site", "description", "decLat", "decLon"];

export interface ImportOptions {
  /** Convert timestamps to Date values (default true at the entry points) */
  parseDateTime: boolean;
  /** IANA zone for timestamps without an offset; "" means UTC */
  timezone: string;
}

function toObservationRow(point: ObservationPoint, options: ImportOptions): ObservationRow {
  const raw = point.time;
  const parts = raw !== null ? splitTimestamp(raw) : { date: null, time: null, tzOffset: null };
  return {
    date: parts.date,
    time: parts.time,
    dateTime: raw === null ? null : options.parseDateTime ? parseTimestamp(raw, options.timezone) : raw,
    tzOffset: parts.tzOffset,
    tzCode: options.parseDateTime ? options.timezone || "UTC" : null,
    value: point.value,
    uom: point.uom,
    qualifier: point.qualifier,
    comment: point.comment,
  };
}

/**
 * Build an observation table from parsed points.
 *
 * @throws DateTimeParseError when parsing is on and any timestamp is invalid
 */
export function toObservationTable(
  points: ObservationPoint[],
  attributes: TableAttributes,
  options: ImportOptions,
): ObservationTable {
  return {
    columns: [...OBSERVATION_COLUMNS],
    rows: points.map((point) => toObservationRow(point, options)),
    attributes: { ...attributes },
  };
}

/**
 * Import groundwater-level observations.
 *
 * An ExceptionReport (no data for the feature) yields an empty table.
 *
 * @param source - Request URL (or file path for a file transport)
 */
export async function importObservations(
  source: string,
  transport: SosTransport,
  options: ImportOptions,
): Promise<ObservationTable> {
  const document = parseSosDocument(await transport.getXml(source), source);

  switch (document.kind) {
    case "observation":
      return toObservationTable(document.points, { url: source, ...document.attributes }, options);
    case "exception":
      return toObservationTable([], { url: source }, options);
    default:
      throw new ServiceResponseError("Expected a GetObservation response", source);
  }
}

/** Import site locations. Datetime handling never applies here. */
export async function importFeaturesOfInterest(
  source: string,
  transport: SosTransport,
): Promise<Table<LocationRow>> {
  const document = parseSosDocument(await transport.getXml(source), source);

  switch (document.kind) {
    case "featureOfInterest":
      return { columns: [...LOCATION_COLUMNS], rows: document.sites, attributes: { url: source } };
    case "exception":
      return { columns: [...LOCATION_COLUMNS], rows: [], attributes: { url: source } };
    default:
      throw new ServiceResponseError("Expected a GetFeatureOfInterest response", source);
  }
}
