/**
 * Multi-site aggregation.
 *
 * Sites are fetched one at a time. Each site's metadata attributes are
 * taken off its table before the rows are merged, collected into a
 * metadata table of their own, and returned next to the merged rows with
 * the site locations.
 */

import {
  METADATA_ATTRIBUTES,
  type MetadataRow,
  type ObservationResult,
  type ObservationRow,
} from "@gwsos/types";
import { retrieveFeatureOfInterest } from "../sites/index.js";
import { logInfo, type RetrievalSettings } from "../settings.js";
import { bindRows, emptyTable, relocateColumnFirst, stripAttributes } from "../table/index.js";
import { retrieveObservation } from "./retrieve.js";

/**
 * Fetch and merge the groundwater levels of several sites.
 *
 * Any failure aborts the whole call; no partial result is returned.
 *
 * @param featureIds - Normalized feature identifiers, in request order
 */
export async function aggregateObservations(
  featureIds: readonly string[],
  settings: RetrievalSettings,
): Promise<ObservationResult> {
  let observations = emptyTable<ObservationRow>();
  let metadata = emptyTable<MetadataRow>();

  for (const featureId of featureIds) {
    const site = await retrieveObservation(featureId, settings);
    observations = bindRows(observations, stripAttributes(METADATA_ATTRIBUTES, site.table));
    metadata = bindRows(metadata, {
      columns: [...METADATA_ATTRIBUTES],
      rows: [site.metadata],
      attributes: {},
    });
    logInfo(settings, `${featureId}: ${site.table.rows.length} observation(s)`);
  }

  // A leading site without data contributes columns but no site column
  observations = relocateColumnFirst(observations, "site");

  const locations = await retrieveFeatureOfInterest(
    { kind: "featureId", featureIds: [...featureIds] },
    settings,
  );

  return {
    columns: observations.columns,
    rows: observations.rows,
    locations,
    metadata,
  };
}
