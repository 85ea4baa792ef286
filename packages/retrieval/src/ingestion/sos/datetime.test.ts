import { describe, it, expect } from "vitest";
import { assertTimeZone, parseTimestamp, splitTimestamp, zoneOffsetAt } from "./datetime.js";
import { ConfigurationError, DateTimeParseError } from "../../errors.js";

describe("splitTimestamp", () => {
  it("splits a full timestamp with offset", () => {
    expect(splitTimestamp("2015-07-02T10:45:00.000-05:00")).toEqual({
      date: "2015-07-02",
      time: "10:45:00",
      tzOffset: "-05:00",
    });
  });

  it("normalizes Z and compact offsets", () => {
    expect(splitTimestamp("2001-02-03T04:05:06Z").tzOffset).toBe("+00:00");
    expect(splitTimestamp("2001-02-03T04:05:06-0700").tzOffset).toBe("-07:00");
    expect(splitTimestamp("2001-02-03T04:05-06").tzOffset).toBe("-06:00");
  });

  it("fills missing seconds", () => {
    expect(splitTimestamp("2001-02-03T04:05").time).toBe("04:05:00");
  });

  it("returns a date-only timestamp without time", () => {
    expect(splitTimestamp("1985-08-28")).toEqual({ date: "1985-08-28", time: null, tzOffset: null });
  });

  it("keeps the date part of text it cannot read", () => {
    expect(splitTimestamp("1909-xx-00T00")).toEqual({ date: "1909-xx-00", time: null, tzOffset: null });
  });

  it("returns nulls for blank text", () => {
    expect(splitTimestamp("  ")).toEqual({ date: null, time: null, tzOffset: null });
  });
});

describe("parseTimestamp", () => {
  it("applies the embedded offset", () => {
    expect(parseTimestamp("2015-07-02T10:45:00.000-05:00", "").toISOString()).toBe("2015-07-02T15:45:00.000Z");
  });

  it("keeps milliseconds", () => {
    expect(parseTimestamp("2015-07-02T10:45:00.25Z", "").toISOString()).toBe("2015-07-02T10:45:00.250Z");
  });

  it("lets the embedded offset win over a timezone override", () => {
    expect(parseTimestamp("2015-07-02T10:45:00-05:00", "America/Denver").toISOString()).toBe(
      "2015-07-02T15:45:00.000Z",
    );
  });

  it("reads a date-only value as UTC midnight without a timezone", () => {
    expect(parseTimestamp("1985-08-28", "").toISOString()).toBe("1985-08-28T00:00:00.000Z");
  });

  it("reads values without an offset as wall time in the given zone", () => {
    expect(parseTimestamp("1985-08-28", "America/Chicago").toISOString()).toBe("1985-08-28T05:00:00.000Z");
    expect(parseTimestamp("1990-01-15T12:00:00", "America/Chicago").toISOString()).toBe(
      "1990-01-15T18:00:00.000Z",
    );
  });

  it("rejects impossible calendar dates", () => {
    expect(() => parseTimestamp("1909-00-00", "")).toThrow(DateTimeParseError);
    expect(() => parseTimestamp("2015-02-30", "")).toThrow(DateTimeParseError);
    expect(() => parseTimestamp("2015-07-02T25:00:00Z", "")).toThrow(DateTimeParseError);
  });

  it("takes years below 100 literally", () => {
    const date = parseTimestamp("0015-07-02T10:45:00Z", "");
    expect(date.getUTCFullYear()).toBe(15);
    expect(date.toISOString()).toBe("0015-07-02T10:45:00.000Z");
  });

  it("applies leap years to years below 100", () => {
    expect(parseTimestamp("0000-02-29", "").toISOString()).toBe("0000-02-29T00:00:00.000Z");
    expect(() => parseTimestamp("0100-02-29", "")).toThrow(DateTimeParseError);
  });

  it("rejects unreadable text and reports the value", () => {
    try {
      parseTimestamp("circa 1950", "");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(DateTimeParseError);
      expect(err instanceof DateTimeParseError && err.value).toBe("circa 1950");
    }
  });
});

describe("zoneOffsetAt", () => {
  it("follows daylight saving time", () => {
    expect(zoneOffsetAt(Date.UTC(2020, 0, 15), "America/New_York")).toBe(-300);
    expect(zoneOffsetAt(Date.UTC(2020, 6, 15), "America/New_York")).toBe(-240);
  });

  it("is zero for UTC", () => {
    expect(zoneOffsetAt(Date.UTC(2020, 6, 15, 12, 30, 15, 500), "UTC")).toBe(0);
  });
});

describe("assertTimeZone", () => {
  it("accepts an empty zone and IANA identifiers", () => {
    expect(() => assertTimeZone("")).not.toThrow();
    expect(() => assertTimeZone("America/Anchorage")).not.toThrow();
  });

  it("rejects unknown zones", () => {
    expect(() => assertTimeZone("Mars/Olympus_Mons")).toThrow(ConfigurationError);
  });
});
