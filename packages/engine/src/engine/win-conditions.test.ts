import { describe, it, expect } from "vitest";
import { createTestContext, playerAt, testEquipment } from "./testing.js";
import { WinConditionEvaluator } from "./win-conditions.js";

function setup(characters: string[]) {
  const ctx = createTestContext(characters);
  return { ctx, evaluator: new WinConditionEvaluator(ctx) };
}

// ══════════════════════════════════════════════════════════════════
// Faction victory
// ══════════════════════════════════════════════════════════════════

describe("faction victory", () => {
  it("is not over while both factions have a living member", () => {
    const { evaluator } = setup(["emi", "vampire", "allie"]);

    expect(evaluator.checkWinConditions({ event: "none" })).toEqual({
      gameOver: false,
      winningFaction: null,
      winnerIds: [],
    });
  });

  it("lets the hunters win when the last shadow dies, with satisfied neutrals", () => {
    const { ctx, evaluator } = setup(["emi", "vampire", "allie"]);
    playerAt(ctx, 1).alive = false;

    expect(evaluator.checkWinConditions({ event: "kill" })).toEqual({
      gameOver: true,
      winningFaction: "hunter",
      winnerIds: [0, 2],
    });
  });

  it("ends with no faction winner when both factions die out together", () => {
    const { ctx, evaluator } = setup(["emi", "vampire", "allie"]);
    playerAt(ctx, 0).alive = false;
    playerAt(ctx, 1).alive = false;

    expect(evaluator.winningFaction()).toBeNull();
    expect(evaluator.checkWinConditions({ event: "kill" })).toEqual({
      gameOver: true,
      winningFaction: null,
      winnerIds: [2],
    });
  });
});

// ══════════════════════════════════════════════════════════════════
// Game-ending neutrals
// ══════════════════════════════════════════════════════════════════

describe("game-ending neutrals", () => {
  it("ends the game when Bob holds five pieces of equipment, not four", () => {
    const { ctx, evaluator } = setup(["emi", "vampire", "bob"]);
    const bob = playerAt(ctx, 2);
    bob.equipment.push(
      testEquipment("holy_robe"),
      testEquipment("talisman"),
      testEquipment("chainsaw"),
      testEquipment("handgun")
    );

    expect(evaluator.checkWinConditions({ event: "none" }).gameOver).toBe(false);

    bob.equipment.push(testEquipment("butcher_knife"));
    expect(evaluator.checkWinConditions({ event: "none" })).toEqual({
      gameOver: true,
      winningFaction: null,
      winnerIds: [2],
    });
  });

  it("ends the game when Charles makes the kill that leaves three dead", () => {
    const { ctx, evaluator } = setup(["charles", "emi", "franklin", "vampire", "werewolf", "allie"]);
    const charles = playerAt(ctx, 0);
    for (const seat of [1, 3, 5]) playerAt(ctx, seat).alive = false;

    expect(evaluator.checkWinConditions({ event: "none" }).gameOver).toBe(false);
    expect(
      evaluator.checkWinConditions({ event: "kill", killer: playerAt(ctx, 2), victim: playerAt(ctx, 5) }).gameOver
    ).toBe(false);
    expect(evaluator.checkWinConditions({ event: "kill", killer: charles, victim: playerAt(ctx, 5) })).toEqual({
      gameOver: true,
      winningFaction: null,
      winnerIds: [0],
    });
  });

  it("ends the game when David holds three relics", () => {
    const { ctx, evaluator } = setup(["david", "emi", "vampire"]);
    const david = playerAt(ctx, 0);
    david.equipment.push(testEquipment("talisman"), testEquipment("holy_robe"), testEquipment("chainsaw"));

    expect(evaluator.checkWinConditions({ event: "none" }).gameOver).toBe(false);

    david.equipment.push(testEquipment("silver_rosary"));
    expect(evaluator.checkWinConditions({ event: "none" }).winnerIds).toEqual([0]);
  });

  it("ends the game when Catherine dies first", () => {
    const { ctx, evaluator } = setup(["catherine", "emi", "vampire", "allie"]);
    const catherine = playerAt(ctx, 0);
    evaluator.registerKill(playerAt(ctx, 1), catherine);
    catherine.alive = false;

    expect(evaluator.checkWinConditions({ event: "kill" })).toEqual({
      gameOver: true,
      winningFaction: null,
      winnerIds: [0, 3],
    });
  });

  it("ends the game when Bryan kills a character with 13 or more max hp", () => {
    const { ctx, evaluator } = setup(["bryan", "emi", "werewolf", "vampire"]);
    const bryan = playerAt(ctx, 0);
    const werewolf = playerAt(ctx, 2);
    evaluator.registerKill(bryan, werewolf);
    werewolf.alive = false;

    expect(evaluator.checkWinConditions({ event: "kill", killer: bryan, victim: werewolf }).winnerIds).toEqual([0]);
  });
});

// ══════════════════════════════════════════════════════════════════
// Neutrals judged at game end
// ══════════════════════════════════════════════════════════════════

describe("neutrals judged when the game ends", () => {
  it("lets Agnes share her right neighbor's victory", () => {
    const { ctx, evaluator } = setup(["agnes", "emi", "vampire"]);
    playerAt(ctx, 2).alive = false;

    expect(evaluator.checkWinConditions({ event: "kill" }).winnerIds).toEqual([0, 1]);
  });

  it("makes Agnes follow her left neighbor under Capriccio", () => {
    const { ctx, evaluator } = setup(["agnes", "emi", "vampire"]);
    playerAt(ctx, 0).flags.capriccioActive = true;
    playerAt(ctx, 2).alive = false;

    expect(evaluator.checkWinConditions({ event: "kill" }).winnerIds).toEqual([1]);
  });

  it("lets Daniel win as the first to die", () => {
    const { ctx, evaluator } = setup(["daniel", "emi", "vampire"]);
    const daniel = playerAt(ctx, 0);
    evaluator.registerKill(playerAt(ctx, 2), daniel);
    daniel.alive = false;
    playerAt(ctx, 2).alive = false;

    expect(evaluator.checkWinConditions({ event: "kill" })).toEqual({
      gameOver: true,
      winningFaction: "hunter",
      winnerIds: [0, 1],
    });
  });

  it("lets Bryan win by standing at the altar when the game ends", () => {
    const { ctx, evaluator } = setup(["bryan", "emi", "vampire"]);
    const bryan = playerAt(ctx, 0);
    bryan.position = "erstwhile_altar";

    expect(evaluator.neutralSatisfied(bryan, { event: "none" })).toBe(false);
    expect(evaluator.neutralSatisfied(bryan, { event: "game_ending" })).toBe(true);
  });
});

// ══════════════════════════════════════════════════════════════════
// Kill tracking
// ══════════════════════════════════════════════════════════════════

describe("registerKill", () => {
  it("records the first killer, the first death and every death", () => {
    const { ctx, evaluator } = setup(["emi", "vampire", "allie"]);
    ctx.session.turnNumber = 3;

    evaluator.registerKill(playerAt(ctx, 1), playerAt(ctx, 2));
    evaluator.registerKill(playerAt(ctx, 0), playerAt(ctx, 1));

    expect(ctx.session.winTracking).toEqual({
      firstKillerId: 1,
      firstDeathId: 2,
      deaths: [
        { victimId: 2, killerId: 1, victimHpMax: 8, turnNumber: 3 },
        { victimId: 1, killerId: 0, victimHpMax: 13, turnNumber: 3 },
      ],
    });
  });

  it("does not count a self-inflicted death as a kill", () => {
    const { ctx, evaluator } = setup(["charles", "emi"]);
    const charles = playerAt(ctx, 0);

    evaluator.registerKill(charles, charles);

    expect(ctx.session.winTracking.firstKillerId).toBeNull();
    expect(ctx.session.winTracking.firstDeathId).toBe(0);
    expect(ctx.session.winTracking.deaths[0]?.killerId).toBeNull();
  });
});
