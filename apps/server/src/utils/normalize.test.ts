import { describe, expect, it } from "vitest";
import { collapseWhitespace, telNumber, trimParens } from "./normalize.js";

describe("normalize", () => {
  it("collapses runs of whitespace", () => {
    expect(collapseWhitespace("  Me to\n   Iris  Holt ")).toBe("Me to Iris Holt");
  });

  it("strips surrounding parentheses", () => {
    expect(trimParens("(00:00:18)")).toBe("00:00:18");
    expect(trimParens("00:00:18")).toBe("00:00:18");
  });

  it("reads the number from a tel link", () => {
    expect(telNumber("tel:+15550001111")).toBe("+15550001111");
    expect(telNumber("tel:")).toBe("");
    expect(telNumber("https://voice.google.com")).toBeNull();
  });
});
