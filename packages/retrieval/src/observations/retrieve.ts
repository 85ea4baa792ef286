/**
 * Per-site observation retrieval.
 */

import { buildObservationUrl } from "@gwsos/clients-core";
import { METADATA_ATTRIBUTES, type MetadataRow, type ObservationTable } from "@gwsos/types";
import { siteNumber } from "../identifiers/index.js";
import { importObservations } from "../ingestion/sos/importer.js";
import { logInfo, type RetrievalSettings } from "../settings.js";
import { prependColumn, saveAttributes, withAttributes, type SavedAttributes } from "../table/index.js";

export interface SiteObservations {
  /** Observation rows, `site` leftmost when there are any */
  table: ObservationTable;
  /** Metadata attribute values captured from the response */
  metadata: MetadataRow;
}

export function toMetadataRow(saved: SavedAttributes): MetadataRow {
  return {
    url: saved["url"] ?? null,
    identifier: saved["identifier"] ?? null,
    generationDate: saved["generationDate"] ?? null,
    responsibleParty: saved["responsibleParty"] ?? null,
    contact: saved["contact"] ?? null,
  };
}

/**
 * Fetch the groundwater levels of one site.
 *
 * A site without data still produces a metadata row: its identifier and
 * generation date are set to null so rows line up across sites.
 *
 * @param featureId - Normalized feature identifier
 */
export async function retrieveObservation(
  featureId: string,
  settings: RetrievalSettings,
): Promise<SiteObservations> {
  const url = buildObservationUrl(settings.config, featureId);
  logInfo(settings, `GET ${url}`);

  let table = await importObservations(url, settings.transport, settings);
  if (table.rows.length === 0) {
    table = withAttributes(table, { identifier: null, generationDate: null });
  }

  const metadata = toMetadataRow(saveAttributes(METADATA_ATTRIBUTES, table));

  if (table.rows.length > 0) {
    table = prependColumn(table, "site", siteNumber(featureId));
  }

  return { table, metadata };
}
