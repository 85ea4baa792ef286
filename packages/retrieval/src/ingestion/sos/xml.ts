/**
 * Namespace-agnostic element lookup over @xmldom/xmldom documents.
 *
 * SOS responses mix sos:, om:, gml:, wml2:, gmd: and gco: prefixes whose
 * bindings vary between deployments, so elements are matched by local
 * name only.
 */

import { DOMParser, type Document, type Element } from "@xmldom/xmldom";
import { ServiceResponseError } from "../../errors.js";

type Scope = Pick<Element, "getElementsByTagNameNS">;

/** Parse an XML document, failing on any well-formedness error */
export function parseXml(xml: string, source: string): Document {
  const problems: string[] = [];
  const parser = new DOMParser({
    onError: (level, message) => {
      if (level !== "warning") problems.push(message);
    },
  });

  let doc: Document;
  try {
    doc = parser.parseFromString(xml, "text/xml");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ServiceResponseError(`Malformed XML: ${reason}`, source);
  }

  if (problems.length > 0) {
    throw new ServiceResponseError(`Malformed XML: ${problems[0]}`, source);
  }
  return doc;
}

/** All descendants with the given local name, in document order */
export function descendants(scope: Scope, localName: string): Element[] {
  const list = scope.getElementsByTagNameNS("*", localName);
  const elements: Element[] = [];
  for (let i = 0; i < list.length; i++) {
    const el = list.item(i);
    if (el) elements.push(el);
  }
  return elements;
}

export function firstDescendant(scope: Scope, localName: string): Element | null {
  return scope.getElementsByTagNameNS("*", localName).item(0) ?? null;
}

/** Trimmed text content, or null when absent or blank */
export function textOf(el: Element | null): string | null {
  const text = el?.textContent?.trim();
  return text ? text : null;
}

/** Value of the attribute with the given local name, whatever its prefix */
export function attributeOf(el: Element | null, localName: string): string | null {
  if (!el) return null;
  const attrs = el.attributes;
  for (let i = 0; i < attrs.length; i++) {
    const attr = attrs.item(i);
    if (attr && (attr.localName ?? attr.name) === localName) return attr.value;
  }
  return null;
}
