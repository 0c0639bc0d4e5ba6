import { describe, expect, it } from "vitest";
import { parseRfc3339 } from "./time.js";

describe("parseRfc3339", () => {
  it("normalizes offsets to UTC", () => {
    expect(parseRfc3339("2022-06-30T18:06:39.894-07:00")).toBe("2022-07-01T01:06:39.894Z");
    expect(parseRfc3339("2019-03-02T08:15:00-08:00")).toBe("2019-03-02T16:15:00.000Z");
  });

  it("accepts lowercase separators and long fractions", () => {
    expect(parseRfc3339("2024-01-02t03:04:05.123456z")).toBe("2024-01-02T03:04:05.123Z");
    expect(parseRfc3339("2024-01-02T03:04:05.5Z")).toBe("2024-01-02T03:04:05.500Z");
  });

  it("rejects values that are not RFC 3339", () => {
    expect(parseRfc3339("2023-08-21 18:02:19")).toBeNull();
    expect(parseRfc3339("Sep 17, 2009")).toBeNull();
    expect(parseRfc3339("2023-08-21T18:02:19")).toBeNull();
    expect(parseRfc3339("")).toBeNull();
  });

  it("rejects calendar dates that do not exist", () => {
    expect(parseRfc3339("2023-02-30T00:00:00Z")).toBeNull();
    expect(parseRfc3339("2023-13-01T00:00:00Z")).toBeNull();
  });
});
