// ─── Schema Validation Tests ───────────────────────────────────────
// The parse boundary for game data files and untrusted action
// payloads: valid input passes through typed, invalid input is
// rejected with readable `path: message` issues.

import { describe, it, expect } from "vitest";
import {
  formatIssues,
  parseAction,
  parseBoard,
  safeParseBoard,
  safeParseCardCatalog,
  safeParseCharacterCatalog,
} from "../index.js";

// ─── Helpers ───────────────────────────────────────────────────────

function makeCharacter(id: string, overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id,
    name: id.toUpperCase(),
    faction: "hunter",
    hpMax: 10,
    ability: {
      name: "Test Ability",
      description: "Does something.",
      kind: "active",
      trigger: "manual",
      usage: "once",
      requiresReveal: true,
    },
    winCondition: "Survive.",
    ...overrides,
  };
}

function makeZone(id: string, position: number, overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return { id, name: id, position, area: 0, decks: [], effect: null, ...overrides };
}

// ─── Tests ─────────────────────────────────────────────────────────

describe("parseAction", () => {
  it("accepts a well-formed move", () => {
    const result = parseAction({ kind: "move", playerId: 2, zoneId: "church" });
    expect(result).toEqual({ ok: true, action: { kind: "move", playerId: 2, zoneId: "church" } });
  });

  it("accepts activate_ability with optional fields", () => {
    const result = parseAction({ kind: "activate_ability", playerId: 0, targets: [1], cardId: "talisman#1" });
    expect(result.ok).toBe(true);
  });

  it("rejects an unknown action kind with a verdict instead of throwing", () => {
    expect(parseAction({ kind: "teleport", playerId: 0 })).toEqual({
      ok: false,
      reason: "Unknown action: teleport",
    });
  });

  it("rejects a payload without a kind", () => {
    expect(parseAction({ playerId: 0 })).toEqual({ ok: false, reason: "Unknown action: undefined" });
    expect(parseAction(null)).toEqual({ ok: false, reason: "Unknown action: undefined" });
  });

  it("reports the missing field of a malformed action", () => {
    const result = parseAction({ kind: "move", playerId: 0 });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.reason).toMatch(/^Malformed move action: zoneId: /);
    }
  });

  it("rejects a negative player id", () => {
    const result = parseAction({ kind: "end_turn", playerId: -1 });
    expect(result.ok).toBe(false);
  });
});

describe("character catalog", () => {
  it("accepts a valid catalog", () => {
    const result = safeParseCharacterCatalog({ characters: [makeCharacter("emi"), makeCharacter("bob")] });
    expect(result.success).toBe(true);
  });

  it("rejects duplicate character ids", () => {
    const result = safeParseCharacterCatalog({ characters: [makeCharacter("emi"), makeCharacter("emi")] });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatIssues(result.error)).toEqual(["characters: character ids must be unique"]);
    }
  });

  it("rejects an unknown faction", () => {
    const result = safeParseCharacterCatalog({ characters: [makeCharacter("emi", { faction: "pirate" })] });
    expect(result.success).toBe(false);
  });

  it("rejects a non-positive max hp", () => {
    const result = safeParseCharacterCatalog({ characters: [makeCharacter("emi", { hpMax: 0 })] });
    expect(result.success).toBe(false);
  });
});

describe("card catalog", () => {
  const equipment = {
    id: "holy_robe",
    name: "Holy Robe",
    deck: "white",
    type: "equipment",
    copies: 1,
    effect: { kind: "defense_bonus", value: 1 },
  };

  it("accepts equipment with a faction restriction", () => {
    const result = safeParseCardCatalog({
      cards: [{ ...equipment, effect: { kind: "attack_bonus", value: 2, factions: ["hunter"] } }],
    });
    expect(result.success).toBe(true);
  });

  it("rejects an effect kind that belongs to another card type", () => {
    const result = safeParseCardCatalog({ cards: [{ ...equipment, effect: { kind: "heal_self", value: 1 } }] });
    expect(result.success).toBe(false);
  });

  it("rejects zero copies", () => {
    const result = safeParseCardCatalog({ cards: [{ ...equipment, copies: 0 }] });
    expect(result.success).toBe(false);
  });
});

describe("board", () => {
  it("parses a valid board", () => {
    const board = parseBoard({ zones: [makeZone("a", 2), makeZone("b", 4, { effect: "weird_woods" })] });
    expect(board.zones.map((zone) => zone.id)).toEqual(["a", "b"]);
    expect(board.zones[1]?.effect).toBe("weird_woods");
  });

  it("rejects two zones on the same track position", () => {
    const result = safeParseBoard({ zones: [makeZone("a", 2), makeZone("b", 2)] });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatIssues(result.error)).toEqual(["zones: zone positions must be unique"]);
    }
  });

  it("labels issues at the root", () => {
    const result = safeParseBoard(null);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatIssues(result.error)).toEqual(["(root): Expected object, received null"]);
    }
  });
});
