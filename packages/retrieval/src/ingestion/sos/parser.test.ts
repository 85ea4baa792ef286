import { describe, it, expect } from "vitest";
import { parseSosDocument } from "./parser.js";
import { ServiceResponseError } from "../../errors.js";
import { exceptionXml, featureOfInterestXml, observationXml } from "../../testing/sos-fixtures.js";

const SOURCE = "https://example.test/sos";

describe("parseSosDocument", () => {
  describe("GetObservationResponse", () => {
    it("reads one point per MeasurementTVP in document order", () => {
      const doc = parseSosDocument(
        observationXml({
          points: [
            { time: "2015-07-02T10:45:00.000-05:00", value: 12.5, uom: "ft", qualifier: "Approved", comment: "static" },
            { time: "2015-08-02T10:45:00.000-05:00", value: 13.25, uom: "ft" },
          ],
        }),
        SOURCE,
      );

      expect(doc.kind).toBe("observation");
      if (doc.kind !== "observation") return;
      expect(doc.points).toEqual([
        {
          time: "2015-07-02T10:45:00.000-05:00",
          value: 12.5,
          uom: "ft",
          qualifier: "Approved",
          comment: "static",
        },
        {
          time: "2015-08-02T10:45:00.000-05:00",
          value: 13.25,
          uom: "ft",
          qualifier: null,
          comment: null,
        },
      ]);
    });

    it("reads nil values as null", () => {
      const doc = parseSosDocument(observationXml({ points: [{ time: "2015-07-02", value: null }] }), SOURCE);
      expect(doc.kind === "observation" && doc.points[0]?.value).toBeNull();
    });

    it("falls back to the series default unit", () => {
      const doc = parseSosDocument(
        observationXml({ defaultUom: "m", points: [{ time: "2015-07-02", value: 1 }] }),
        SOURCE,
      );
      expect(doc.kind === "observation" && doc.points[0]?.uom).toBe("m");
    });

    it("captures document metadata", () => {
      const doc = parseSosDocument(
        observationXml({
          identifier: "USGS.272838082142201",
          generationDate: "2024-03-01T12:00:00Z",
          contactHref: "https://example.test/contact",
          responsibleParty: ["Survey Office", "Data Desk"],
          points: [{ time: "2015-07-02", value: 1 }],
        }),
        SOURCE,
      );

      expect(doc.kind === "observation" && doc.attributes).toEqual({
        identifier: "USGS.272838082142201",
        generationDate: "2024-03-01T12:00:00Z",
        contact: "https://example.test/contact",
        responsibleParty: "Survey Office; Data Desk",
      });
    });

    it("leaves absent metadata unset", () => {
      const doc = parseSosDocument(observationXml({ points: [] }), SOURCE);
      expect(doc).toEqual({ kind: "observation", points: [], attributes: {} });
    });
  });

  describe("GetFeatureOfInterestResponse", () => {
    it("reads one site per feature member", () => {
      const doc = parseSosDocument(
        featureOfInterestXml([
          { site: "USGS.272838082142201", description: "Well 1", lat: 27.47, lon: -82.24 },
          { site: "MBMG.702934", lat: 45.5, lon: -111.1 },
        ]),
        SOURCE,
      );

      expect(doc).toEqual({
        kind: "featureOfInterest",
        sites: [
          { site: "USGS.272838082142201", description: "Well 1", decLat: 27.47, decLon: -82.24 },
          { site: "MBMG.702934", description: null, decLat: 45.5, decLon: -111.1 },
        ],
      });
    });

    it("returns no sites for an empty response", () => {
      expect(parseSosDocument(featureOfInterestXml([]), SOURCE)).toEqual({ kind: "featureOfInterest", sites: [] });
    });
  });

  it("recognizes an exception report", () => {
    expect(parseSosDocument(exceptionXml("No data"), SOURCE)).toEqual({ kind: "exception", message: "No data" });
  });

  it("rejects an unrecognized root element", () => {
    expect(() => parseSosDocument("<Capabilities/>", SOURCE)).toThrow(ServiceResponseError);
  });

  it("rejects malformed XML", () => {
    expect(() => parseSosDocument("<a><b></a>", SOURCE)).toThrow(ServiceResponseError);
  });
});
