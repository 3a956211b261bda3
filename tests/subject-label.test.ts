import { describe, it, expect } from "vitest";
import { studyCodeOf, validateSubjectLabel } from "../src/engine/subject-label.js";

// Deterministic PRNG so fuzz failures reproduce.
function mulberry32(seed: number): () => number {
  let a = seed;
  return () => {
    a = (a + 0x6d2b79f5) | 0;
    let t = Math.imul(a ^ (a >>> 15), 1 | a);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

const UPPER = "ABCDEFGHIJKLMNOPQRSTUVWXYZ";
const LOWER = "abcdefghijklmnopqrstuvwxyz";
const DIGITS = "0123456789";
const FUZZ_ALPHABET = `${UPPER}${LOWER}${DIGITS}_-. v/#`;

/** Characters accepted at each position of a label. */
const POSITION_CLASSES = [
  UPPER,
  UPPER,
  DIGITS,
  DIGITS,
  DIGITS,
  DIGITS,
  "_",
  "v",
  `${UPPER}${DIGITS}`,
];

function pick(rand: () => number, chars: string): string {
  return chars.charAt(Math.floor(rand() * chars.length));
}

function validLabel(rand: () => number): string {
  return POSITION_CLASSES.map((cls) => pick(rand, cls)).join("");
}

describe("validateSubjectLabel", () => {
  it("accepts conforming labels", () => {
    expect(validateSubjectLabel("LD4001_v1")).toBe(true);
    expect(validateSubjectLabel("AB0000_vZ")).toBe(true);
  });

  it("rejects a lowercase study prefix", () => {
    expect(validateSubjectLabel("ld4001_v1")).toBe(false);
  });

  it("rejects a lowercase visit character", () => {
    for (const visit of LOWER) {
      expect(validateSubjectLabel(`LD4001_v${visit}`), visit).toBe(false);
    }
  });

  it("rejects structural near misses", () => {
    for (const label of [
      "",
      "LD4001",
      "LD4001_v",
      "LD4001_v12",
      "LD401_v1",
      "LD40011_v1",
      "LD4001-v1",
      "LD4001_V1",
      "LD4001_va",
      " LD4001_v1",
      "LD4001_v1\n",
      "L4001_v1",
      "LDD001_v1",
    ]) {
      expect(validateSubjectLabel(label), label).toBe(false);
    }
  });

  it("accepts every generated conforming label", () => {
    const rand = mulberry32(7);
    for (let i = 0; i < 500; i++) {
      const label = validLabel(rand);
      expect(validateSubjectLabel(label), label).toBe(true);
    }
  });

  it("rejects labels with one position replaced by a disallowed character", () => {
    const rand = mulberry32(11);
    let checked = 0;
    while (checked < 500) {
      const chars = validLabel(rand).split("");
      const position = Math.floor(rand() * chars.length);
      const replacement = pick(rand, FUZZ_ALPHABET);
      if ((POSITION_CLASSES[position] ?? "").includes(replacement)) continue;
      chars[position] = replacement;
      const label = chars.join("");
      expect(validateSubjectLabel(label), label).toBe(false);
      checked++;
    }
  });

  it("rejects labels with an extra or missing character", () => {
    const rand = mulberry32(13);
    for (let i = 0; i < 200; i++) {
      const label = validLabel(rand);
      expect(validateSubjectLabel(label + pick(rand, FUZZ_ALPHABET))).toBe(false);
      expect(validateSubjectLabel(label.slice(1))).toBe(false);
    }
  });
});

describe("studyCodeOf", () => {
  it("returns the three-character study prefix", () => {
    expect(studyCodeOf("LD4001_v1")).toBe("LD4");
  });
});
