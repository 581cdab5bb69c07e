import { describe, it, expect } from "vitest";
import { extractJson, parseJsonPermissive, unwrapSingleKeyObject } from "../llm.js";

describe("parseJsonPermissive", () => {
  it("parses strict JSON", () => {
    expect(parseJsonPermissive('{"a":1}')).toEqual({ a: 1 });
  });

  it("ignores trailing commentary after the object", () => {
    expect(parseJsonPermissive('{"tone":"Casual","note":"a } b"}\nHope this helps!')).toEqual({
      tone: "Casual",
      note: "a } b",
    });
  });

  it("rethrows when no object can be recovered", () => {
    expect(() => parseJsonPermissive("not json")).toThrow(SyntaxError);
  });
});

describe("unwrapSingleKeyObject", () => {
  it("unwraps a single nested object", () => {
    expect(unwrapSingleKeyObject({ metadata: { tone: "Casual" } })).toEqual({ tone: "Casual" });
  });

  it("leaves other shapes alone", () => {
    expect(unwrapSingleKeyObject({ tags: ["a"] })).toEqual({ tags: ["a"] });
    expect(unwrapSingleKeyObject({ a: {}, b: {} })).toEqual({ a: {}, b: {} });
  });
});

describe("extractJson", () => {
  it("prefers a fenced block", () => {
    expect(extractJson('Here you go:\n```json\n{"language":"English"}\n```')).toEqual({
      language: "English",
    });
  });
});
