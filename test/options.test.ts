import { InvalidArgumentError } from "commander";
import { describe, expect, it } from "vitest";
import { integerOption } from "../src/utils/options.js";

describe("integerOption", () => {
  const positive = integerOption(1);

  it("parses whole numbers", () => {
    expect(positive("20")).toBe(20);
    expect(positive(" 3 ")).toBe(3);
    expect(integerOption(0)("0")).toBe(0);
  });

  it("rejects values that are not whole numbers", () => {
    for (const bad of ["abc", "", "2.5", "-1", "5abc"]) {
      expect(() => positive(bad)).toThrow(InvalidArgumentError);
    }
    expect(() => positive("abc")).toThrow('Expected a whole number >= 1, got "abc".');
  });

  it("rejects values below the minimum", () => {
    expect(() => positive("0")).toThrow('Expected a whole number >= 1, got "0".');
  });
});
