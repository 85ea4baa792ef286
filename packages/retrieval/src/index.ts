/**
 * @gwsos/retrieval
 *
 * Groundwater-level and site retrieval from the National Ground-Water
 * Monitoring Network Sensor Observation Service.
 *
 * Pipeline:
 * 1. Normalize feature identifiers
 * 2. Fetch each site's GetObservation response -> table + metadata
 * 3. Merge rows and metadata across sites
 * 4. Fetch site locations (GetFeatureOfInterest)
 */

// Entry points
export {
  fetchData,
  fetchLevels,
  fetchSites,
  resolveSelector,
  SERVICES,
  PROVISIONAL_NOTICE,
  type ServiceName,
  type FetchParams,
  type SitesOptions,
} from "./fetch.js";
export { resolveSettings, type FetchOptions, type RetrievalSettings } from "./settings.js";

// Configuration
export { resolveServiceConfig, DEFAULT_BASE_URL, DEFAULT_SERVICE_CONFIG } from "./config.js";

// Errors
export { ConfigurationError, DateTimeParseError, ServiceResponseError } from "./errors.js";

// Identifiers
export {
  normalizeFeatureIds,
  siteNumber,
  stripViewPrefix,
  type FeatureIdInput,
} from "./identifiers/index.js";

// Retrieval steps
export { retrieveObservation, aggregateObservations, toMetadataRow, type SiteObservations } from "./observations/index.js";
export { retrieveFeatureOfInterest } from "./sites/index.js";

// SOS ingestion
export {
  importObservations,
  importFeaturesOfInterest,
  toObservationTable,
  parseSosDocument,
  splitTimestamp,
  parseTimestamp,
  assertTimeZone,
  createFileTransport,
  OBSERVATION_COLUMNS,
  LOCATION_COLUMNS,
  type ImportOptions,
  type SosDocument,
  type ObservationPoint,
  type TimestampParts,
} from "./ingestion/sos/index.js";

// Table operations
export {
  emptyTable,
  saveAttributes,
  stripAttributes,
  withAttributes,
  bindRows,
  prependColumn,
  relocateColumnFirst,
  type SavedAttributes,
} from "./table/index.js";
