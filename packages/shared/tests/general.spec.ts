import { describe, expect, it } from "vitest";
import { isStringArray, slugify, titleFromFileName } from "../src";

describe("shared/general", () => {
  describe("slugify", () => {
    it("lowercases and joins words with dashes", () => {
      expect(slugify("What is a Roofline?")).toBe("what-is-a-roofline");
    });

    it("strips diacritics and punctuation", () => {
      expect(slugify("Héllo,  World!")).toBe("hello-world");
    });

    it("treats underscores as separators", () => {
      expect(slugify("snake_case name")).toBe("snake-case-name");
    });

    it("returns an empty string when nothing is left", () => {
      expect(slugify("?!")).toBe("");
    });
  });

  describe("titleFromFileName", () => {
    it("drops the numeric prefix and title-cases the rest", () => {
      expect(titleFromFileName("03-sharded_matrices")).toBe("Sharded Matrices");
    });

    it("title-cases a bare name", () => {
      expect(titleFromFileName("index")).toBe("Index");
    });
  });

  it("isStringArray", () => {
    expect(isStringArray(["a", "b"])).toBe(true);
    expect(isStringArray(["a", 1])).toBe(false);
    expect(isStringArray("a")).toBe(false);
  });
});
