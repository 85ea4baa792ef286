/**
 * SOS response ingestion.
 *
 * XML parsing, timestamp handling and conversion of responses to tables.
 */

export {
  importObservations,
  importFeaturesOfInterest,
  toObservationTable,
  OBSERVATION_COLUMNS,
  LOCATION_COLUMNS,
  type ImportOptions,
} from "./importer.js";
export { parseSosDocument, type SosDocument, type ObservationPoint } from "./parser.js";
export { splitTimestamp, parseTimestamp, assertTimeZone, zoneOffsetAt, type TimestampParts } from "./datetime.js";
export { createFileTransport } from "./file.js";
