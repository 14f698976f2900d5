import { PASSIVE_TRIGGERS } from "@umbral/schema";
import { describe, it, expect, vi } from "vitest";
import { createCharacterLookup, loadCharacters } from "../../deck/catalog.js";
import { CombatResolver } from "../combat.js";
import type { EngineContext } from "../context.js";
import { EngineErrorCode } from "../errors.js";
import { createPlayer } from "../player.js";
import { createTestContext, playerAt, scriptedDice, testEquipment } from "../testing.js";
import { AbilityTriggerSystem, isPassiveTrigger } from "./trigger-system.js";

function setup(characters: string[], ...faces: number[]) {
  const ctx = createTestContext(characters, scriptedDice(...faces));
  const combat = new CombatResolver(ctx);
  const triggers = new AbilityTriggerSystem(ctx, combat);
  triggers.registerAll();
  return { ctx, combat, triggers };
}

function recordTriggers(ctx: EngineContext): string[] {
  const fired: string[] = [];
  ctx.events.on("ability-triggered", (p) => fired.push(`${p.characterId} ${p.trigger}: ${p.description}`));
  return fired;
}

// ══════════════════════════════════════════════════════════════════
// Registry
// ══════════════════════════════════════════════════════════════════

describe("registry", () => {
  it("registers passive abilities only", () => {
    const { ctx, triggers } = setup(["vampire", "emi", "catherine", "unknown"]);

    expect(triggers.isRegistered(0)).toBe(true);
    expect(triggers.isRegistered(1)).toBe(false);
    expect(triggers.isRegistered(2)).toBe(true);
    expect(triggers.isRegistered(3)).toBe(false);
    expect(ctx.session.abilityRegistry.get(2)).toEqual({ playerId: 2, trigger: "on_turn_start", usage: "unlimited" });
  });

  it("rejects an unknown trigger key with a warning", () => {
    const { ctx, triggers } = setup(["emi", "allie"]);
    const vampire = createCharacterLookup(loadCharacters())("vampire");
    if (!vampire) throw new Error("bundled data lacks the vampire");
    const mystery = createPlayer(9, { name: "mystery" }, {
      ...vampire,
      ability: { ...vampire.ability, trigger: "on_sneeze" },
    });
    const warn = vi.spyOn(ctx.logger, "warn");

    expect(triggers.register(mystery)).toBe(false);
    expect(triggers.isRegistered(9)).toBe(false);
    expect(warn).toHaveBeenCalledWith(expect.stringContaining('unknown trigger "on_sneeze"'), {
      code: EngineErrorCode.CONFIGURATION_GAP,
      allowed: PASSIVE_TRIGGERS,
    });
  });

  it("refuses to register a dead player", () => {
    const { ctx, triggers } = setup(["emi", "bob"]);
    const bob = playerAt(ctx, 1);
    triggers.unregister(1);
    bob.alive = false;

    expect(triggers.register(bob)).toBe(false);
  });

  it("recognises the fixed trigger keys", () => {
    expect(isPassiveTrigger("on_kill")).toBe(true);
    expect(isPassiveTrigger("manual")).toBe(false);
  });
});

// ══════════════════════════════════════════════════════════════════
// Damage triggers
// ══════════════════════════════════════════════════════════════════

describe("on_attack and on_attacked", () => {
  it("heals a revealed Vampire after a successful attack", () => {
    const { ctx, combat } = setup(["vampire", "emi"], 6, 4);
    const vampire = playerAt(ctx, 0);
    vampire.revealed = true;
    vampire.hp = 9;
    const fired = recordTriggers(ctx);

    combat.attack(vampire, playerAt(ctx, 1));

    expect(vampire.hp).toBe(11);
    expect(fired).toEqual(["vampire on_attack: Suck Blood healed 2"]);
  });

  it("heals a hidden Vampire too, but not a disabled one", () => {
    const { ctx, combat } = setup(["vampire", "emi"], 6, 4, 6, 4);
    const vampire = playerAt(ctx, 0);
    vampire.hp = 9;

    combat.attack(vampire, playerAt(ctx, 1));
    expect(vampire.hp).toBe(11);

    vampire.abilityDisabled = true;
    combat.attack(vampire, playerAt(ctx, 1));
    expect(vampire.hp).toBe(11);
  });

  it("does not heal the Vampire for card damage", () => {
    const { ctx, combat } = setup(["vampire", "emi"]);
    const vampire = playerAt(ctx, 0);
    vampire.revealed = true;
    vampire.hp = 9;

    combat.applyDamage(vampire, playerAt(ctx, 1), 2, "card");

    expect(vampire.hp).toBe(9);
  });

  it("lets a revealed Werewolf strike back once", () => {
    const { ctx, combat } = setup(["emi", "werewolf"], 6, 4, 5, 2);
    const emi = playerAt(ctx, 0);
    const werewolf = playerAt(ctx, 1);
    werewolf.revealed = true;
    const fired = recordTriggers(ctx);

    combat.attack(emi, werewolf);

    expect(werewolf.hp).toBe(12);
    expect(emi.hp).toBe(7);
    expect(werewolf.flags.counterattacking).toBe(false);
    expect(fired).toEqual(["werewolf on_attacked: Counterattack dealt 3 to emi"]);
  });

  it("does not counterattack damage that is not an attack", () => {
    const { ctx, combat } = setup(["emi", "werewolf"]);
    const werewolf = playerAt(ctx, 1);
    werewolf.revealed = true;

    combat.applyDamage(playerAt(ctx, 0), werewolf, 2, "ability");

    expect(playerAt(ctx, 0).hp).toBe(10);
  });
});

// ══════════════════════════════════════════════════════════════════
// Death triggers
// ══════════════════════════════════════════════════════════════════

describe("player-died ordering", () => {
  it("runs the killer's on_kill before the on_character_death broadcast", () => {
    const { ctx, combat } = setup(["emi", "bob", "daniel"]);
    const emi = playerAt(ctx, 0);
    const bob = playerAt(ctx, 1);
    bob.revealed = true;
    emi.equipment.push(testEquipment("holy_robe"));
    const fired = recordTriggers(ctx);

    combat.applyDamage(bob, emi, 10);

    expect(fired).toEqual([
      "bob on_kill: Robbery took 1 equipment card(s) from emi",
      "daniel on_character_death: Scream forced a reveal",
    ]);
    expect(bob.equipment.map((card) => card.id)).toEqual(["holy_robe#1"]);
    expect(playerAt(ctx, 2).revealed).toBe(true);
  });

  it("unregisters the victim before anything else fires", () => {
    const { ctx, combat, triggers } = setup(["emi", "catherine"]);

    combat.applyDamage(playerAt(ctx, 0), playerAt(ctx, 1), 11);

    expect(triggers.isRegistered(1)).toBe(false);
  });

  it("does not let Daniel scream at his own death", () => {
    const { ctx, combat } = setup(["emi", "daniel"]);
    const fired = recordTriggers(ctx);

    combat.applyDamage(playerAt(ctx, 0), playerAt(ctx, 1), 13);

    expect(fired).toEqual([]);
  });

  it("reports a scream with no effect once Daniel is already revealed", () => {
    const { ctx, combat } = setup(["emi", "allie", "daniel"]);
    playerAt(ctx, 2).revealed = true;
    const fired = recordTriggers(ctx);

    combat.applyDamage(playerAt(ctx, 0), playerAt(ctx, 1), 8);

    expect(fired).toHaveLength(1);
    expect(fired[0]).toMatch(/^daniel on_character_death: .+ had no effect$/);
  });

  it("forces Bryan to reveal after killing a low-hp character", () => {
    const { ctx, combat } = setup(["bryan", "emi", "werewolf"]);
    const bryan = playerAt(ctx, 0);
    const reveals = vi.fn();
    ctx.events.on("character-revealed", reveals);

    combat.applyDamage(bryan, playerAt(ctx, 2), 14);
    expect(bryan.revealed).toBe(false);

    combat.applyDamage(bryan, playerAt(ctx, 1), 10);
    expect(bryan.revealed).toBe(true);
    expect(reveals).toHaveBeenLastCalledWith(expect.objectContaining({ playerId: 0, forced: true }));
  });
});

// ══════════════════════════════════════════════════════════════════
// Turn start
// ══════════════════════════════════════════════════════════════════

describe("on_turn_start", () => {
  it("heals a revealed Catherine by one, capped at max hp", () => {
    const { ctx } = setup(["catherine", "emi"]);
    const catherine = playerAt(ctx, 0);
    catherine.revealed = true;
    catherine.hp = 8;
    const fired = recordTriggers(ctx);

    ctx.events.emit("turn-started", { playerId: 0, turnNumber: 2, isBot: false });
    expect(catherine.hp).toBe(9);

    catherine.hp = 11;
    ctx.events.emit("turn-started", { playerId: 0, turnNumber: 3, isBot: false });
    expect(catherine.hp).toBe(11);
    expect(fired).toEqual(["catherine on_turn_start: Stigmata healed 1", "catherine on_turn_start: Stigmata healed 0"]);
  });

  it("heals an unrevealed healer from 8 to 9 when their turn starts", () => {
    const { ctx } = setup(["catherine", "emi"]);
    const catherine = playerAt(ctx, 0);
    catherine.hp = 8;

    ctx.events.emit("turn-started", { playerId: 0, turnNumber: 2, isBot: false });

    expect(catherine.revealed).toBe(false);
    expect(catherine.hp).toBe(9);
  });

  it("ignores other players' turns", () => {
    const { ctx } = setup(["catherine", "emi"]);
    const catherine = playerAt(ctx, 0);
    catherine.revealed = true;
    catherine.hp = 8;

    ctx.events.emit("turn-started", { playerId: 1, turnNumber: 1, isBot: false });

    expect(catherine.hp).toBe(8);
  });

  it("stops reacting after dispose", () => {
    const { ctx, triggers } = setup(["catherine", "emi"]);
    const catherine = playerAt(ctx, 0);
    catherine.revealed = true;
    catherine.hp = 8;

    triggers.dispose();
    ctx.events.emit("turn-started", { playerId: 0, turnNumber: 2, isBot: false });

    expect(catherine.hp).toBe(8);
  });
});
