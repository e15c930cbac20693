import { describe, it, expect } from "vitest";
import { createHash } from "crypto";
import { cacheKey, hashGloss, normalizeText } from "@/lib/cache/hash";

describe("normalizeText", () => {
  it("trims, collapses whitespace and lowercases", () => {
    expect(normalizeText("  I   eat\trice \n")).toBe("i eat rice");
  });

  it("leaves punctuation alone", () => {
    expect(normalizeText("Rice.")).toBe("rice.");
  });
});

describe("cacheKey", () => {
  it("is the sha256 hex of `${normalizedText}_${language}`", () => {
    const expected = createHash("sha256").update("i eat rice_isl").digest("hex");
    expect(cacheKey("I eat rice", "isl")).toBe(expected);
  });

  it("returns a 64-char hex string", () => {
    expect(cacheKey("hello", "asl")).toMatch(/^[0-9a-f]{64}$/);
  });

  it("is stable across calls", () => {
    expect(cacheKey("I eat rice", "isl")).toBe(cacheKey("I eat rice", "isl"));
  });

  it("treats whitespace and case variants as the same text", () => {
    expect(cacheKey("  I  EAT rice", "ISL")).toBe(cacheKey("i eat rice", "isl"));
  });

  it("differs by language", () => {
    expect(cacheKey("I eat rice", "isl")).not.toBe(cacheKey("I eat rice", "asl"));
  });

  it("differs by text", () => {
    expect(cacheKey("I eat rice", "isl")).not.toBe(cacheKey("I eat bread", "isl"));
  });
});

describe("hashGloss", () => {
  it("returns the first 8 hex chars of sha256 over the space-joined gloss", () => {
    const expected = createHash("sha256").update("I RICE EAT").digest("hex").slice(0, 8);
    expect(hashGloss(["I", "RICE", "EAT"])).toBe(expected);
  });

  it("depends on order", () => {
    expect(hashGloss(["I", "RICE", "EAT"])).not.toBe(hashGloss(["I", "EAT", "RICE"]));
  });
});
