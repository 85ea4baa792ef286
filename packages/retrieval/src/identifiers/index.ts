/**
 * Feature identifier handling.
 *
 * A feature identifier is an agency code and a site number, e.g.
 * "USGS.272838082142201". Callers may separate the two with a colon; the
 * service only accepts periods.
 */

import { FEATURE_VIEW_PREFIX } from "@gwsos/clients-core";

/**
 * Raw identifier input: one identifier or a list that may contain gaps.
 * null, undefined, blank strings and the literal "NA" count as missing and
 * are dropped, so a site whose code is "NA" cannot be requested.
 */
export type FeatureIdInput = string | readonly (string | null | undefined)[];

function isMissing(id: string | null | undefined): id is null | undefined {
  if (id === null || id === undefined) return true;
  const trimmed = id.trim();
  return trimmed === "" || trimmed === "NA";
}

/**
 * Canonicalize feature identifiers: every ":" becomes ".", surrounding
 * whitespace is trimmed, and missing entries are dropped.
 */
export function normalizeFeatureIds(ids: FeatureIdInput): string[] {
  const list = typeof ids === "string" ? [ids] : ids;
  const normalized: string[] = [];
  for (const id of list) {
    if (isMissing(id)) continue;
    normalized.push(id.trim().replaceAll(":", "."));
  }
  return normalized;
}

/** Site number with the agency code stripped ("USGS.123" -> "123") */
export function siteNumber(featureId: string): string {
  return featureId.slice(featureId.lastIndexOf(".") + 1);
}

/** Remove the service's view-name prefix from a returned identifier */
export function stripViewPrefix(id: string): string {
  const prefix = `${FEATURE_VIEW_PREFIX}.`;
  return id.startsWith(prefix) ? id.slice(prefix.length) : id;
}
