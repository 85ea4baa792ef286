import { describe, it, expect } from "vitest";
import { normalizeFeatureIds, siteNumber, stripViewPrefix } from "./index.js";

describe("normalizeFeatureIds", () => {
  it("treats colon and period separators as the same identifier", () => {
    expect(normalizeFeatureIds("USGS:272838082142201")).toEqual(normalizeFeatureIds("USGS.272838082142201"));
    expect(normalizeFeatureIds("USGS:272838082142201")).toEqual(["USGS.272838082142201"]);
  });

  it("accepts a single identifier or a list", () => {
    expect(normalizeFeatureIds(["MBMG:702934", "USGS.404159100494601"])).toEqual([
      "MBMG.702934",
      "USGS.404159100494601",
    ]);
  });

  it("drops missing entries without failing", () => {
    expect(normalizeFeatureIds(["USGS.1", null, undefined, "", "  ", "NA", "MBMG:2"])).toEqual([
      "USGS.1",
      "MBMG.2",
    ]);
  });

  it("treats the literal NA as missing", () => {
    expect(normalizeFeatureIds("NA")).toEqual([]);
    expect(normalizeFeatureIds([" NA ", "USGS.NA"])).toEqual(["USGS.NA"]);
  });

  it("trims surrounding whitespace", () => {
    expect(normalizeFeatureIds(" USGS:1 ")).toEqual(["USGS.1"]);
  });

  it("keeps duplicates (de-duplication happens at the entry point)", () => {
    expect(normalizeFeatureIds(["USGS.1", "USGS:1"])).toEqual(["USGS.1", "USGS.1"]);
  });
});

describe("siteNumber", () => {
  it("strips the agency code", () => {
    expect(siteNumber("USGS.272838082142201")).toBe("272838082142201");
  });

  it("returns identifiers without a separator unchanged", () => {
    expect(siteNumber("272838082142201")).toBe("272838082142201");
  });
});

describe("stripViewPrefix", () => {
  it("removes the service view name", () => {
    expect(stripViewPrefix("VW_GWDP_GEOSERVER.USGS.272838082142201")).toBe("USGS.272838082142201");
  });

  it("leaves other identifiers alone", () => {
    expect(stripViewPrefix("USGS.1")).toBe("USGS.1");
  });
});
