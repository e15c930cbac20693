import { describe, it, expect } from "vitest";
import { isSignLanguage, isTranslationResult, type TranslationResult } from "@/lib/sign/types";

const SUCCESS: TranslationResult = {
  success: true,
  language: "isl",
  assetRef: "isl_1700000000.txt",
  gloss: "I RICE EAT",
  glossTokens: ["I", "RICE", "EAT"],
  processingTimeMs: 3,
  error: null,
  errorKind: null,
  cached: false,
};

const FAILURE: TranslationResult = {
  success: false,
  language: "asl",
  assetRef: null,
  gloss: null,
  glossTokens: null,
  processingTimeMs: 1,
  error: "encoder crashed",
  errorKind: "rendering",
  cached: false,
};

describe("isSignLanguage", () => {
  it("accepts registered codes only", () => {
    expect(isSignLanguage("isl")).toBe(true);
    expect(isSignLanguage("asl")).toBe(true);
    expect(isSignLanguage("ISL")).toBe(false);
    expect(isSignLanguage("bsl")).toBe(false);
  });
});

describe("isTranslationResult", () => {
  it("accepts well-formed success and failure results", () => {
    expect(isTranslationResult(SUCCESS)).toBe(true);
    expect(isTranslationResult(FAILURE)).toBe(true);
  });

  it("rejects non-objects and unknown languages", () => {
    expect(isTranslationResult(null)).toBe(false);
    expect(isTranslationResult("I RICE EAT")).toBe(false);
    expect(isTranslationResult({ ...SUCCESS, language: "bsl" })).toBe(false);
  });

  it("rejects an unknown error kind", () => {
    expect(isTranslationResult({ ...FAILURE, errorKind: "exploded" })).toBe(false);
  });

  it.each([
    ["a success with an error", { ...SUCCESS, gloss: null, error: "x" }],
    ["a success without an asset", { ...SUCCESS, assetRef: null }],
    ["a success without gloss tokens", { ...SUCCESS, glossTokens: null }],
    ["a success with an error kind", { ...SUCCESS, errorKind: "rendering" }],
    ["a failure without an error", { ...FAILURE, error: null }],
    ["a failure without an error kind", { ...FAILURE, errorKind: null }],
    ["a failure with a gloss", { ...FAILURE, gloss: "I RICE EAT" }],
    ["a failure with an asset", { ...FAILURE, assetRef: "asl_1.txt" }],
  ])("rejects %s", (_label, value) => {
    expect(isTranslationResult(value)).toBe(false);
  });
});
