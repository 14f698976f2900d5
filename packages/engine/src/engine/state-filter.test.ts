import { describe, it, expect } from "vitest";
import { createPlayerView, createRosterSnapshot } from "./state-filter.js";
import { createTestContext, playerAt, testEquipment, testInstant } from "./testing.js";

function setup() {
  const ctx = createTestContext(["emi", "vampire", "allie"]);
  playerAt(ctx, 0).equipment.push(testEquipment("holy_robe"));
  playerAt(ctx, 1).revealed = true;
  return ctx;
}

describe("createRosterSnapshot", () => {
  it("includes every identity", () => {
    const ctx = setup();

    const roster = createRosterSnapshot(ctx.session);

    expect(roster[0]).toEqual({
      id: 0,
      name: "emi",
      isBot: false,
      faction: "hunter",
      characterId: "emi",
      hp: 10,
      hpMax: 10,
      alive: true,
      revealed: false,
      equipment: ["Holy Robe"],
      position: null,
    });
    expect(roster.map((entry) => entry.faction)).toEqual(["hunter", "shadow", "neutral"]);
  });
});

describe("createPlayerView", () => {
  it("hides unrevealed identities from other players", () => {
    const ctx = setup();

    const view = createPlayerView(ctx.session, 0);

    expect(view.players.map((entry) => entry.characterId)).toEqual(["emi", "vampire", null]);
    expect(view.players[2]).toMatchObject({ faction: null, hpMax: null, hp: 8, name: "allie" });
  });

  it("always shows the viewer their own identity", () => {
    const ctx = setup();

    const view = createPlayerView(ctx.session, 2);

    expect(view.players[2]?.characterId).toBe("allie");
    expect(view.players[0]?.characterId).toBeNull();
  });

  it("lists the viewer's hand and enabled actions on their turn", () => {
    const ctx = setup();
    playerAt(ctx, 0).hand.push(testInstant("first_aid"));

    const view = createPlayerView(ctx.session, 0);

    expect(view).toMatchObject({
      sessionId: "test-session",
      status: { kind: "in_progress" },
      phase: "movement",
      turnNumber: 1,
      currentPlayerId: 0,
      myPlayerId: 0,
      isMyTurn: true,
      hand: ["First Aid"],
    });
    expect(view.validActions).toEqual(["roll_movement", "reveal", "end_turn"]);
  });

  it("offers nothing to a player waiting for their turn", () => {
    const ctx = setup();

    const view = createPlayerView(ctx.session, 1);

    expect(view.isMyTurn).toBe(false);
    expect(view.validActions).toEqual([]);
  });

  it("throws for a viewer who is not seated", () => {
    const ctx = setup();
    expect(() => createPlayerView(ctx.session, 9)).toThrow("Player not found: 9");
  });
});
