/**
 * SOS 2.0 request URL construction.
 *
 * Only the two operations this client needs are built: GetObservation for a
 * single feature, and GetFeatureOfInterest by identifier list or bounding
 * box. Service, version and response format are fixed per request; the
 * endpoint and version come from the injected config.
 */

import { bboxToTuple, type FeatureSelector } from "@gwsos/types";
import { renderUrl, type QueryParams } from "./baseClient.js";
import { ConfigurationError } from "./errors.js";
import type { SosServiceConfig } from "./types.js";

export const SOS_SERVICE = "SOS";
export const DEFAULT_SOS_VERSION = "2.0.0";
export const RESPONSE_FORMAT = "text/xml";
export const GROUNDWATER_LEVEL_PROPERTY = "urn:ogc:def:property:OGC:GroundWaterLevel";
/** View name the service expects in front of every feature identifier */
export const FEATURE_VIEW_PREFIX = "VW_GWDP_GEOSERVER";
export const DEFAULT_SRS_NAME = "urn:ogc:def:crs:EPSG::4269";

/** Prefix a normalized feature identifier with the service's view name */
export function toFeatureOfInterest(featureId: string): string {
  return `${FEATURE_VIEW_PREFIX}.${featureId}`;
}

/** Query parameters for a single-feature GetObservation request */
export function observationQuery(featureId: string, version: string = DEFAULT_SOS_VERSION): QueryParams {
  return [
    ["request", "GetObservation"],
    ["service", SOS_SERVICE],
    ["version", version],
    ["observedProperty", GROUNDWATER_LEVEL_PROPERTY],
    ["responseFormat", RESPONSE_FORMAT],
    ["featureOfInterest", toFeatureOfInterest(featureId)],
  ];
}

/**
 * Query parameters for a GetFeatureOfInterest request.
 *
 * Identifiers are joined with commas into one featureOfInterest value.
 * Bounding boxes are serialized south,west,north,east with an srsName.
 */
export function featureOfInterestQuery(
  selector: FeatureSelector,
  version: string = DEFAULT_SOS_VERSION,
  srsName: string = DEFAULT_SRS_NAME,
): QueryParams {
  const base: [string, string][] = [
    ["request", "GetFeatureOfInterest"],
    ["service", SOS_SERVICE],
    ["version", version],
    ["responseFormat", RESPONSE_FORMAT],
  ];

  switch (selector.kind) {
    case "featureId": {
      if (selector.featureIds.length === 0) {
        throw new ConfigurationError("Geographical filter not specified. Please use featureId or bbox");
      }
      const features = selector.featureIds.map(toFeatureOfInterest).join(",");
      return [...base, ["featureOfInterest", features]];
    }
    case "bbox": {
      const bounds = bboxToTuple(selector.bbox);
      if (!bounds.every(Number.isFinite)) {
        throw new ConfigurationError(`Bounding box must be four finite numbers, got [${bounds.join(", ")}]`);
      }
      return [...base, ["bbox", bounds.join(",")], ["srsName", srsName]];
    }
    default:
      throw new ConfigurationError("Geographical filter not specified. Please use featureId or bbox");
  }
}

export function buildObservationUrl(config: SosServiceConfig, featureId: string): string {
  return renderUrl(config.baseUrl, observationQuery(featureId, config.version));
}

export function buildFeatureOfInterestUrl(
  config: SosServiceConfig,
  selector: FeatureSelector,
  srsName?: string,
): string {
  return renderUrl(config.baseUrl, featureOfInterestQuery(selector, config.version, srsName));
}
