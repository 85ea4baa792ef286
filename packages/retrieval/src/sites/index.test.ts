import { describe, it, expect } from "vitest";
import { buildFeatureOfInterestUrl, DEFAULT_SRS_NAME } from "@gwsos/clients-core";
import { bboxFromTuple } from "@gwsos/types";
import { ConfigurationError } from "../errors.js";
import { FakeTransport, sosRouter } from "../testing/sos-fixtures.js";
import { retrieveFeatureOfInterest } from "./index.js";

const config = { baseUrl: "https://example.test/sos", version: "2.0.0", timeout: 0 };

const SITES = [
  { site: "USGS.1", description: "Well one", lat: 30.2, lon: 100.5 },
  { site: "USGS.2", lat: 30.9, lon: 101.75 },
];

describe("retrieveFeatureOfInterest", () => {
  it("returns sites inside a bounding box", async () => {
    const transport = new FakeTransport(sosRouter({}, SITES));
    const bbox = bboxFromTuple([30, -99, 31, 102]);

    const table = await retrieveFeatureOfInterest({ kind: "bbox", bbox }, { transport, config, quiet: true });

    expect(table.rows).toHaveLength(2);
    for (const row of table.rows) {
      expect(row.decLat).toBeGreaterThanOrEqual(30);
      expect(row.decLat).toBeLessThanOrEqual(31);
      expect(row.decLon).toBeGreaterThanOrEqual(-99);
      expect(row.decLon).toBeLessThanOrEqual(102);
    }
  });

  it("annotates the result with the request url and query time", async () => {
    const transport = new FakeTransport(sosRouter({}, SITES));
    const selector = { kind: "bbox" as const, bbox: bboxFromTuple([30, -99, 31, 102]) };
    const before = Date.now();

    const table = await retrieveFeatureOfInterest(selector, { transport, config, quiet: true });

    expect(table.url).toBe(buildFeatureOfInterestUrl(config, selector));
    expect(table.url).toContain(`srsName=${encodeURIComponent(DEFAULT_SRS_NAME)}`);
    expect(transport.requests).toEqual([table.url]);
    expect(table.queryTime.getTime()).toBeGreaterThanOrEqual(before);
    expect(table.attributes).toEqual({ url: table.url });
  });

  it("uses the given spatial reference", async () => {
    const transport = new FakeTransport(sosRouter({}, SITES));
    const selector = { kind: "bbox" as const, bbox: bboxFromTuple([30, -99, 31, 102]) };

    const table = await retrieveFeatureOfInterest(selector, {
      transport,
      config,
      srsName: "urn:ogc:def:crs:EPSG::4326",
      quiet: true,
    });

    expect(new URL(table.url).searchParams.get("srsName")).toBe("urn:ogc:def:crs:EPSG::4326");
  });

  it("selects sites by identifier", async () => {
    const transport = new FakeTransport(sosRouter({}, SITES));

    const table = await retrieveFeatureOfInterest(
      { kind: "featureId", featureIds: ["USGS.2"] },
      { transport, config, quiet: true },
    );

    expect(table.columns).toEqual(["site", "description", "decLat", "decLon"]);
    expect(table.rows).toEqual([{ site: "USGS.2", description: null, decLat: 30.9, decLon: 101.75 }]);
  });

  it("rejects an empty identifier list before any request", async () => {
    const transport = new FakeTransport(sosRouter({}, SITES));

    await expect(
      retrieveFeatureOfInterest({ kind: "featureId", featureIds: [] }, { transport, config, quiet: true }),
    ).rejects.toThrow(ConfigurationError);
    expect(transport.requests).toEqual([]);
  });
});
