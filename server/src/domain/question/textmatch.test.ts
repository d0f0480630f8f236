import { describe, expect, it } from "vitest";
import { isCorrect, normalize, toAcceptedSet } from "./textmatch";

describe("normalize", () => {
  it("lower-cases and strips punctuation", () => {
    expect(normalize("Hello, World!")).toBe("hello world");
    expect(normalize("What's up?")).toBe("whats up");
  });

  it("collapses and trims whitespace", () => {
    expect(normalize("  hello   world  ")).toBe("hello world");
    expect(normalize("new\t\nyork")).toBe("new york");
  });

  it("keeps digits, underscores and accented letters", () => {
    expect(normalize("Route_66!")).toBe("route_66");
    expect(normalize("\u00c7a va, Zo\u00eb?")).toBe("\u00e7a va zo\u00eb");
  });

  it("is total", () => {
    expect(normalize("")).toBe("");
    expect(normalize("?!...")).toBe("");
    expect(normalize(undefined)).toBe("");
    expect(normalize(42)).toBe("");
  });

  it("folds composed, decomposed and fullwidth forms together", () => {
    expect(normalize("Cafe\u0301")).toBe("caf\u00e9");
    expect(normalize("Caf\u00e9")).toBe("caf\u00e9");
    expect(normalize("\uff30\uff41\uff52\uff49\uff53")).toBe("paris");
    expect(isCorrect(normalize("CAFE\u0301!"), toAcceptedSet("Caf\u00e9"))).toBe(true);
  });

  it("gives the same form to variants a human reads as the same answer", () => {
    const variants = ["Paris", " paris ", "PARIS!", "Paris.", "  PaRiS?  "];
    expect(new Set(variants.map(normalize))).toEqual(new Set(["paris"]));
  });
});

describe("isCorrect", () => {
  const accepted = toAcceptedSet("Paris|City of Light");

  it("matches exact members only", () => {
    expect(isCorrect("paris", accepted)).toBe(true);
    expect(isCorrect("city of light", accepted)).toBe(true);
    expect(isCorrect("pari", accepted)).toBe(false);
    expect(isCorrect("paris france", accepted)).toBe(false);
    expect(isCorrect("light", accepted)).toBe(false);
  });

  it("never accepts an empty submission", () => {
    expect(isCorrect("", new Set([""]))).toBe(false);
  });

  it("treats an empty accepted set as unanswerable", () => {
    expect(isCorrect("paris", new Set())).toBe(false);
  });
});

describe("toAcceptedSet", () => {
  it("splits on pipes, normalizes and drops empties", () => {
    expect(toAcceptedSet(" Four | 4 || four! ")).toEqual(new Set(["four", "4"]));
    expect(toAcceptedSet("")).toEqual(new Set());
  });
});
