/**
 * SOS XML response parser.
 *
 * Converts GetObservation and GetFeatureOfInterest documents into plain
 * records. The document root decides the shape:
 *
 * - GetObservationResponse: one point per wml2:MeasurementTVP, plus the
 *   document metadata (identifier, generation date, responsible party,
 *   contact)
 * - GetFeatureOfInterestResponse: one site per sos:featureMember
 * - ExceptionReport: the service has no data for the request
 */

import type { Element } from "@xmldom/xmldom";
import type { LocationRow, TableAttributes } from "@gwsos/types";
import { stripViewPrefix } from "../../identifiers/index.js";
import { ServiceResponseError } from "../../errors.js";
import { attributeOf, descendants, firstDescendant, parseXml, textOf } from "./xml.js";

/** A single time-value pair before any date handling */
export interface ObservationPoint {
  time: string | null;
  value: number | null;
  uom: string | null;
  qualifier: string | null;
  comment: string | null;
}

export type SosDocument =
  | { kind: "observation"; points: ObservationPoint[]; attributes: TableAttributes }
  | { kind: "featureOfInterest"; sites: LocationRow[] }
  | { kind: "exception"; message: string | null };

function parseNumber(text: string | null): number | null {
  if (text === null || text.trim() === "") return null;
  const value = Number(text);
  return Number.isFinite(value) ? value : null;
}

function parsePoint(tvp: Element, defaultUom: string | null): ObservationPoint {
  const valueEl = firstDescendant(tvp, "value");
  const nil = attributeOf(valueEl, "nil") === "true";
  const qualifierEl = firstDescendant(tvp, "qualifier");

  return {
    time: textOf(firstDescendant(tvp, "time")),
    value: nil ? null : parseNumber(textOf(valueEl)),
    uom: attributeOf(firstDescendant(tvp, "uom"), "code") ?? defaultUom,
    qualifier: attributeOf(qualifierEl, "title") ?? textOf(qualifierEl),
    comment: textOf(firstDescendant(tvp, "comment")),
  };
}

function parseObservationResponse(root: Element): SosDocument {
  const observations = descendants(root, "OM_Observation");
  const scopes = observations.length > 0 ? observations : [root];

  const points: ObservationPoint[] = [];
  for (const scope of scopes) {
    const defaults = firstDescendant(scope, "DefaultTVPMeasurementMetadata");
    const defaultUom = defaults ? attributeOf(firstDescendant(defaults, "uom"), "code") : null;
    for (const tvp of descendants(scope, "MeasurementTVP")) {
      points.push(parsePoint(tvp, defaultUom));
    }
  }

  // Absent fields stay unset rather than null
  const attributes: TableAttributes = {};
  const identifier = textOf(firstDescendant(root, "identifier"));
  if (identifier !== null) attributes["identifier"] = identifier;
  const generationDate = textOf(firstDescendant(root, "generationDate"));
  if (generationDate !== null) attributes["generationDate"] = generationDate;

  const contact = firstDescendant(root, "contact");
  const href = attributeOf(contact, "href");
  if (href !== null) attributes["contact"] = href;

  const party = firstDescendant(root, "CI_ResponsibleParty");
  if (party) {
    const names = descendants(party, "CharacterString")
      .map((el) => textOf(el))
      .filter((text): text is string => text !== null);
    if (names.length > 0) attributes["responsibleParty"] = names.join("; ");
  }

  return { kind: "observation", points, attributes };
}

function parseFeatureOfInterestResponse(root: Element): SosDocument {
  const sites: LocationRow[] = [];
  for (const member of descendants(root, "featureMember")) {
    const identifier = textOf(firstDescendant(member, "identifier"));
    if (identifier === null) continue;

    const [lat, lon] = (textOf(firstDescendant(member, "pos")) ?? "").split(/\s+/);
    sites.push({
      site: stripViewPrefix(identifier),
      description: textOf(firstDescendant(member, "description")),
      decLat: parseNumber(lat ?? null),
      decLon: parseNumber(lon ?? null),
    });
  }
  return { kind: "featureOfInterest", sites };
}

/**
 * Parse a raw SOS response.
 *
 * @param xml - Response body
 * @param source - URL or path the body came from, for error messages
 * @throws ServiceResponseError for malformed XML or an unrecognized root
 */
export function parseSosDocument(xml: string, source: string): SosDocument {
  const root = parseXml(xml, source).documentElement;
  if (!root) {
    throw new ServiceResponseError("Empty response document", source);
  }

  switch (root.localName) {
    case "GetObservationResponse":
      return parseObservationResponse(root);
    case "GetFeatureOfInterestResponse":
      return parseFeatureOfInterestResponse(root);
    case "ExceptionReport":
      return { kind: "exception", message: textOf(firstDescendant(root, "ExceptionText")) };
    default:
      throw new ServiceResponseError(`Unrecognized response "${root.nodeName}" from the web service`, source);
  }
}
