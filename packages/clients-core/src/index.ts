// Base
export { BaseClient, renderUrl, type ClientConfig, type QueryParams } from "./baseClient.js";

// SOS
export { SosClient } from "./sosClient.js";
export {
  SOS_SERVICE,
  DEFAULT_SOS_VERSION,
  RESPONSE_FORMAT,
  GROUNDWATER_LEVEL_PROPERTY,
  FEATURE_VIEW_PREFIX,
  DEFAULT_SRS_NAME,
  toFeatureOfInterest,
  observationQuery,
  featureOfInterestQuery,
  buildObservationUrl,
  buildFeatureOfInterestUrl,
} from "./sosUrl.js";

// Errors
export { ConfigurationError } from "./errors.js";

// Types
export type { SosServiceConfig, SosTransport } from "./types.js";
