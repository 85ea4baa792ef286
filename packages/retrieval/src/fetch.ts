/**
 * Public entry points.
 *
 * - fetchData: dispatch by service name
 * - fetchLevels: groundwater levels for one or more sites
 * - fetchSites: site locations by identifier
 *
 * Request parameters are resolved once into a FeatureSelector; settings
 * are validated before any request is sent.
 */

import {
  bboxFromTuple,
  type BoundingBoxTuple,
  type FeatureSelector,
  type LocationTable,
  type ObservationResult,
} from "@gwsos/types";
import { ConfigurationError } from "./errors.js";
import { normalizeFeatureIds, type FeatureIdInput } from "./identifiers/index.js";
import { aggregateObservations } from "./observations/aggregate.js";
import { resolveSettings, type FetchOptions } from "./settings.js";
import { retrieveFeatureOfInterest } from "./sites/index.js";

export const SERVICES = ["observation", "featureOfInterest"] as const;

export type ServiceName = (typeof SERVICES)[number];

export interface FetchParams {
  /** Feature identifiers, "AGENCY.NUMBER" or "AGENCY:NUMBER" */
  featureId?: FeatureIdInput;
  /** Bounding box as [south, west, north, east] */
  bbox?: BoundingBoxTuple;
}

export const PROVISIONAL_NOTICE =
  "DISCLAIMER: groundwater retrieval functions are still in flux, and no future behavior or output is guaranteed";

function isServiceName(service: string): service is ServiceName {
  return SERVICES.some((name) => name === service);
}

/**
 * Resolve request parameters into a selector.
 *
 * Exactly one of `featureId` and `bbox` must be given. Identifiers are
 * normalized and de-duplicated in request order.
 *
 * @throws ConfigurationError when both, neither, or an unusable value is given
 */
export function resolveSelector(params: FetchParams): FeatureSelector {
  if (params.featureId !== undefined && params.bbox !== undefined) {
    throw new ConfigurationError("Supply either featureId or bbox, not both");
  }

  if (params.featureId !== undefined) {
    const featureIds = [...new Set(normalizeFeatureIds(params.featureId))];
    if (featureIds.length === 0) {
      throw new ConfigurationError("No valid feature identifiers supplied");
    }
    return { kind: "featureId", featureIds };
  }

  if (params.bbox !== undefined) {
    const bbox = params.bbox;
    if (bbox.length !== 4 || !bbox.every(Number.isFinite)) {
      throw new ConfigurationError("bbox must be four finite numbers: [south, west, north, east]");
    }
    return { kind: "bbox", bbox: bboxFromTuple(bbox) };
  }

  throw new ConfigurationError("Geographical filter not specified. Please use featureId or bbox");
}

/**
 * Retrieve data from the groundwater monitoring SOS.
 *
 * `observation` returns merged groundwater levels with site locations and
 * per-site metadata; `featureOfInterest` returns site locations only.
 *
 * @throws ConfigurationError for an unsupported service or bad parameters,
 *   before any request is sent
 */
export function fetchData(
  service: "observation",
  params: FetchParams,
  options?: FetchOptions,
): Promise<ObservationResult>;
export function fetchData(
  service: "featureOfInterest",
  params: FetchParams,
  options?: FetchOptions,
): Promise<LocationTable>;
export function fetchData(
  service: string,
  params: FetchParams,
  options?: FetchOptions,
): Promise<ObservationResult | LocationTable>;
export async function fetchData(
  service: string,
  params: FetchParams,
  options: FetchOptions = {},
): Promise<ObservationResult | LocationTable> {
  console.warn(PROVISIONAL_NOTICE);

  if (!isServiceName(service)) {
    throw new ConfigurationError(`Unsupported service "${service}". Use one of: ${SERVICES.join(", ")}`);
  }

  const selector = resolveSelector(params);
  const settings = resolveSettings(options);

  if (service === "observation") {
    if (selector.kind !== "featureId") {
      throw new ConfigurationError("The observation service requires featureId");
    }
    return aggregateObservations(selector.featureIds, settings);
  }

  return retrieveFeatureOfInterest(selector, settings);
}

/** Groundwater levels for one or more sites */
export function fetchLevels(featureId: FeatureIdInput, options: FetchOptions = {}): Promise<ObservationResult> {
  return fetchData("observation", { featureId }, options);
}

export type SitesOptions = Pick<FetchOptions, "client" | "config" | "quiet">;

/** Location and description of one or more sites */
export function fetchSites(featureId: FeatureIdInput, options: SitesOptions = {}): Promise<LocationTable> {
  return fetchData("featureOfInterest", { featureId }, options);
}
