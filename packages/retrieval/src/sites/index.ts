/**
 * Feature-of-interest (site location) retrieval.
 */

import { buildFeatureOfInterestUrl } from "@gwsos/clients-core";
import type { FeatureSelector, LocationTable } from "@gwsos/types";
import { importFeaturesOfInterest } from "../ingestion/sos/importer.js";
import { logInfo, type RetrievalSettings } from "../settings.js";

/**
 * Fetch site locations by identifier list or bounding box.
 *
 * The result is annotated with the request URL and the time the query was
 * made.
 *
 * @throws ConfigurationError when the selector names no identifiers
 */
export async function retrieveFeatureOfInterest(
  selector: FeatureSelector,
  settings: Pick<RetrievalSettings, "config" | "transport" | "srsName" | "quiet">,
): Promise<LocationTable> {
  const url = buildFeatureOfInterestUrl(settings.config, selector, settings.srsName);
  logInfo(settings, `GET ${url}`);

  const table = await importFeaturesOfInterest(url, settings.transport);
  logInfo(settings, `${table.rows.length} site(s)`);

  return { ...table, url, queryTime: new Date() };
}
