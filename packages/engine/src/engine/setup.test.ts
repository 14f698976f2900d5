import { describe, it, expect } from "vitest";
import { loadBoard, loadCards, loadCharacters } from "../deck/catalog.js";
import { EngineError, EngineErrorCode } from "./errors.js";
import { createRng } from "./prng.js";
import { createSession, dealCharacters, type SetupOptions } from "./setup.js";

const characters = loadCharacters();
const cards = loadCards();
const board = loadBoard();

function options(seatCount: number, overrides: Partial<SetupOptions> = {}): SetupOptions {
  return {
    seats: Array.from({ length: seatCount }, (_, index) => ({ name: `P${index}` })),
    characters,
    cards,
    board,
    rng: createRng(11),
    ...overrides,
  };
}

function setupError(run: () => unknown): EngineError {
  try {
    run();
  } catch (err) {
    if (err instanceof EngineError) return err;
    throw err;
  }
  throw new Error("expected an EngineError");
}

describe("dealCharacters", () => {
  it.each([
    [4, { hunter: 2, shadow: 2, neutral: 0 }],
    [5, { hunter: 2, shadow: 2, neutral: 1 }],
    [8, { hunter: 3, shadow: 3, neutral: 2 }],
  ])("deals the faction split for %i players", (count, expected) => {
    const dealt = dealCharacters(characters, count, createRng(4));

    expect(dealt).toHaveLength(count);
    expect(new Set(dealt.map((character) => character.id)).size).toBe(count);
    expect({
      hunter: dealt.filter((character) => character.faction === "hunter").length,
      shadow: dealt.filter((character) => character.faction === "shadow").length,
      neutral: dealt.filter((character) => character.faction === "neutral").length,
    }).toEqual(expected);
  });

  it("is reproducible for a seed", () => {
    const first = dealCharacters(characters, 6, createRng(21)).map((character) => character.id);
    const second = dealCharacters(characters, 6, createRng(21)).map((character) => character.id);
    expect(first).toEqual(second);
  });

  it("rejects an unsupported player count", () => {
    const error = setupError(() => dealCharacters(characters, 3, createRng(1)));
    expect(error.code).toBe(EngineErrorCode.INVALID_SETUP);
    expect(error.message).toBe("Unsupported player count 3 (expected 4-8)");
  });
});

describe("createSession", () => {
  it("seats players at full hp, unrevealed and off the board", () => {
    const session = createSession(options(4));

    expect(session.players.map((player) => player.id)).toEqual([0, 1, 2, 3]);
    expect(session.players.map((player) => player.name)).toEqual(["P0", "P1", "P2", "P3"]);
    for (const player of session.players) {
      expect(player.hp).toBe(player.hpMax);
      expect(player.revealed).toBe(false);
      expect(player.position).toBeNull();
    }
    expect(session.phase).toBe("movement");
    expect(session.turnNumber).toBe(1);
    expect(session.status).toEqual({ kind: "in_progress" });
    expect(session.winTracking).toEqual({ firstKillerId: null, firstDeathId: null, deaths: [] });
  });

  it("shuffles full decks", () => {
    const session = createSession(options(4));

    expect(session.decks.white.drawCount).toBe(11);
    expect(session.decks.black.drawCount).toBe(12);
    expect(session.decks.green.drawCount).toBe(12);
  });

  it("uses the forced deal in seat order", () => {
    const session = createSession(options(2, { forcedCharacters: ["bob", "emi"], sessionId: "fixed" }));

    expect(session.id).toBe("fixed");
    expect(session.players.map((player) => player.characterId)).toEqual(["bob", "emi"]);
  });

  it("rejects too few seats for a random deal", () => {
    expect(setupError(() => createSession(options(3))).message).toBe("A game needs 4-8 players, got 3");
  });

  it("rejects a forced deal that does not match the table", () => {
    expect(setupError(() => createSession(options(2, { forcedCharacters: ["emi"] }))).message).toBe(
      "Forced deal names 1 character(s) for 2 seat(s)"
    );
    expect(setupError(() => createSession(options(2, { forcedCharacters: ["emi", "zorro"] }))).message).toBe(
      'Unknown character "zorro"'
    );
  });
});
