import { describe, it, expect } from "vitest";
import { DataParseError } from "../engine/errors.js";
import {
  createCharacterLookup,
  createDeckLookup,
  instantiateDeck,
  loadBoard,
  loadCards,
  loadCharacters,
} from "./catalog.js";

describe("bundled data", () => {
  it("loads twenty characters across the three factions", () => {
    const { characters } = loadCharacters();
    expect(characters).toHaveLength(20);
    expect(characters.filter((c) => c.faction === "hunter")).toHaveLength(6);
    expect(characters.filter((c) => c.faction === "shadow")).toHaveLength(6);
    expect(characters.filter((c) => c.faction === "neutral")).toHaveLength(8);
  });

  it("loads a board of six zones in three areas", () => {
    const board = loadBoard();
    expect(board.zones.map((zone) => zone.id)).toEqual([
      "hermit_cabin",
      "underworld_gate",
      "church",
      "cemetery",
      "weird_woods",
      "erstwhile_altar",
    ]);
    expect(new Set(board.zones.map((zone) => zone.area))).toEqual(new Set([0, 1, 2]));
  });
});

describe("loaders", () => {
  it("throws DataParseError with formatted issues", () => {
    try {
      loadBoard({ zones: [] });
      expect.unreachable("loadBoard should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(DataParseError);
      if (err instanceof DataParseError) {
        expect(err.issues).toHaveLength(1);
        expect(err.issues[0]).toMatch(/^zones: /);
      }
    }
  });

  it("rejects a character catalog that is not an object", () => {
    expect(() => loadCharacters("characters")).toThrow(DataParseError);
  });
});

describe("lookups", () => {
  it("finds characters by id", () => {
    const lookup = createCharacterLookup(loadCharacters());
    expect(lookup("werewolf")?.hpMax).toBe(14);
    expect(lookup("nobody")).toBeUndefined();
  });

  it("lists the decks a zone offers", () => {
    const lookup = createDeckLookup(loadBoard());
    expect(lookup("underworld_gate")).toEqual(["white", "black", "green"]);
    expect(lookup("weird_woods")).toEqual([]);
    expect(lookup("nowhere")).toEqual([]);
  });
});

describe("instantiateDeck", () => {
  const cards = loadCards();

  it("creates one card per copy with numbered instance ids", () => {
    const black = instantiateDeck(cards, "black");
    expect(black).toHaveLength(12);
    expect(black.filter((card) => card.definitionId === "vampire_bat").map((card) => card.id)).toEqual([
      "vampire_bat#1",
      "vampire_bat#2",
      "vampire_bat#3",
    ]);
  });

  it("keeps each card in its own deck", () => {
    expect(instantiateDeck(cards, "white").every((card) => card.deck === "white")).toBe(true);
    expect(instantiateDeck(cards, "green").every((card) => card.type === "vision")).toBe(true);
  });
});
