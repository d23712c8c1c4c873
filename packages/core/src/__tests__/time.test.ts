import { describe, expect, it } from "vitest";
import { MalformedTimestampError } from "../errors.js";
import { convertFromIso8601, formatEpoch, makeTime, parseTimestamp, resolveQueryTime } from "../time.js";

describe("time conversion", () => {
  it("extracts calendar fields by fixed offsets", () => {
    expect(convertFromIso8601("2018-10-17T17:25:00")).toEqual({
      year: 2018,
      month: 10,
      day: 17,
      hour: 17,
      minute: 25,
      second: 0,
    });
  });

  it("converts to UTC epoch seconds", () => {
    expect(makeTime(convertFromIso8601("2018-10-17T17:25:00"))).toBe(1539797100);
    expect(parseTimestamp("2000-02-29T00:00:00")).toBe(951782400);
    expect(parseTimestamp("1970-01-01T00:00:00")).toBe(0);
    expect(parseTimestamp("1969-12-31T23:59:59")).toBe(-1);
  });

  it("ignores fractional seconds and zone suffixes", () => {
    expect(parseTimestamp("2018-10-17T17:25:00.123")).toBe(1539797100);
    expect(parseTimestamp("2018-10-17T17:25:00.5Z")).toBe(1539797100);
  });

  it("rejects short strings", () => {
    expect(() => convertFromIso8601("2018-10-17T17:25")).toThrow(MalformedTimestampError);
    expect(() => convertFromIso8601("")).toThrow('malformed timestamp "": expected at least 19 characters');
  });

  it("rejects non-numeric fields", () => {
    expect(() => convertFromIso8601("2018-1O-17T17:25:00")).toThrow('month "1O" is not numeric');
    expect(() => convertFromIso8601("2018-10-17T17:25:+1")).toThrow('second "+1" is not numeric');
  });

  it("rejects out-of-range calendar fields", () => {
    expect(() => convertFromIso8601("2018-13-01T00:00:00")).toThrow("month 13 out of range");
    expect(() => convertFromIso8601("2019-02-29T00:00:00")).toThrow("day 29 out of range");
    expect(() => convertFromIso8601("2018-10-17T24:00:00")).toThrow("time of day out of range");
  });

  it("formats epoch seconds compactly", () => {
    expect(formatEpoch(1539797100)).toBe("2018-10-17T17:25:00Z");
  });

  it("resolves query times from now, epoch seconds and timestamps", () => {
    expect(resolveQueryTime(undefined, 1_700_000_000_500)).toBe(1_700_000_000);
    expect(resolveQueryTime("now", 1_700_000_000_500)).toBe(1_700_000_000);
    expect(resolveQueryTime("1539797100")).toBe(1539797100);
    expect(resolveQueryTime("2018-10-17T08:00:00")).toBe(1539763200);
    expect(() => resolveQueryTime("tomorrow")).toThrow(MalformedTimestampError);
  });

  it("rejects epoch seconds outside the representable range", () => {
    expect(resolveQueryTime("8640000000000")).toBe(8_640_000_000_000);
    expect(resolveQueryTime("-8640000000000")).toBe(-8_640_000_000_000);
    expect(() => resolveQueryTime("99999999999999")).toThrow(
      'malformed timestamp "99999999999999": epoch seconds out of range',
    );
    expect(() => resolveQueryTime("-8640000000001")).toThrow(MalformedTimestampError);
    expect(() => resolveQueryTime("90071992547409930")).toThrow(MalformedTimestampError);
  });
});
