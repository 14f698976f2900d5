import { describe, it, expect } from "vitest";
import { SeededRng, createDice, createRng } from "./prng.js";

// ─── Tests ─────────────────────────────────────────────────────────

describe("prng", () => {
  // ══════════════════════════════════════════════════════════════════
  // ── Determinism ──────────────────────────────────────────────────
  // ══════════════════════════════════════════════════════════════════

  describe("determinism", () => {
    it("returns an instance of SeededRng", () => {
      expect(createRng(42)).toBeInstanceOf(SeededRng);
    });

    it("produces the same sequence for the same seed", () => {
      const rng1 = createRng(12345);
      const rng2 = createRng(12345);

      const seq1 = Array.from({ length: 50 }, () => rng1.next());
      const seq2 = Array.from({ length: 50 }, () => rng2.next());

      expect(seq1).toEqual(seq2);
    });

    it("produces different sequences for different seeds", () => {
      const rng1 = createRng(1);
      const rng2 = createRng(2);

      const seq1 = Array.from({ length: 20 }, () => rng1.next());
      const seq2 = Array.from({ length: 20 }, () => rng2.next());

      expect(seq1).not.toEqual(seq2);
    });
  });

  // ══════════════════════════════════════════════════════════════════
  // ── nextInt(min, max) ────────────────────────────────────────────
  // ══════════════════════════════════════════════════════════════════

  describe("nextInt", () => {
    it("returns integers in [min, max)", () => {
      const rng = createRng(42);
      for (let i = 0; i < 5_000; i++) {
        const val = rng.nextInt(5, 10);
        expect(Number.isInteger(val)).toBe(true);
        expect(val).toBeGreaterThanOrEqual(5);
        expect(val).toBeLessThan(10);
      }
    });

    it("throws RangeError when min >= max", () => {
      const rng = createRng(42);
      expect(() => rng.nextInt(5, 5)).toThrow(RangeError);
      expect(() => rng.nextInt(10, 5)).toThrow(RangeError);
    });

    it("throws RangeError for non-integer bounds", () => {
      const rng = createRng(42);
      expect(() => rng.nextInt(0.5, 3)).toThrow(RangeError);
    });
  });

  // ══════════════════════════════════════════════════════════════════
  // ── shuffle ──────────────────────────────────────────────────────
  // ══════════════════════════════════════════════════════════════════

  describe("shuffle", () => {
    it("returns a permutation without mutating the input", () => {
      const input = [1, 2, 3, 4, 5, 6, 7, 8];
      const copy = [...input];
      const shuffled = createRng(3).shuffle(input);

      expect(input).toEqual(copy);
      expect([...shuffled].sort((a, b) => a - b)).toEqual(copy);
    });

    it("is reproducible for a seed", () => {
      const input = ["a", "b", "c", "d", "e"];
      expect(createRng(77).shuffle(input)).toEqual(createRng(77).shuffle(input));
    });
  });

  // ══════════════════════════════════════════════════════════════════
  // ── Dice ─────────────────────────────────────────────────────────
  // ══════════════════════════════════════════════════════════════════

  describe("createDice", () => {
    it("rolls faces in [1, sides]", () => {
      const dice = createDice(createRng(9));
      const seen = new Set<number>();
      for (let i = 0; i < 2_000; i++) {
        const face = dice.roll(4);
        expect(face).toBeGreaterThanOrEqual(1);
        expect(face).toBeLessThanOrEqual(4);
        seen.add(face);
      }
      expect([...seen].sort()).toEqual([1, 2, 3, 4]);
    });

    it("follows the seed", () => {
      const a = createDice(createRng(5));
      const b = createDice(createRng(5));
      const rollsA = Array.from({ length: 10 }, () => a.roll(6));
      const rollsB = Array.from({ length: 10 }, () => b.roll(6));
      expect(rollsA).toEqual(rollsB);
    });
  });
});
