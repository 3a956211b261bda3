import { describe, it, expect } from "vitest";
import { canonicalize, canonicalJson } from "../src/audit/canonical.js";

describe("canonicalJson", () => {
  it("orders keys at every depth", () => {
    expect(canonicalJson({ z: 1, a: { y: 2, b: [{ d: 1, c: 2 }] } })).toBe(
      '{"a":{"b":[{"c":2,"d":1}],"y":2},"z":1}',
    );
  });

  it("keeps array order", () => {
    expect(canonicalJson({ scans: ["3", "1", "2"] })).toBe('{"scans":["3","1","2"]}');
  });

  it("drops undefined members and keeps null", () => {
    expect(canonicalJson({ a: 1, b: undefined, c: null })).toBe('{"a":1,"c":null}');
  });

  it("writes undefined array slots as null", () => {
    expect(canonicalJson([1, undefined, 3])).toBe("[1,null,3]");
  });

  it("converts dates to ISO strings", () => {
    expect(canonicalJson({ at: new Date("2024-03-02T09:30:00.000Z") })).toBe(
      '{"at":"2024-03-02T09:30:00.000Z"}',
    );
  });

  it("gives the same bytes regardless of insertion order", () => {
    const a = { subjectLabel: "LD4001_v1", sessionId: "S1", rename: [] };
    const b = { rename: [], sessionId: "S1", subjectLabel: "LD4001_v1" };
    expect(canonicalJson(a)).toBe(canonicalJson(b));
  });

  it("indents on request", () => {
    expect(canonicalJson({ b: 1, a: 2 }, 2)).toBe('{\n  "a": 2,\n  "b": 1\n}');
  });

  it("serializes top-level primitives", () => {
    expect(canonicalJson("x")).toBe('"x"');
    expect(canonicalJson(3)).toBe("3");
    expect(canonicalJson(undefined)).toBe("null");
  });
});

describe("canonicalize", () => {
  it("maps non-finite numbers to null and bigints to strings", () => {
    expect(canonicalize({ n: Number.NaN, big: 10n })).toEqual({ big: "10", n: null });
  });
});
