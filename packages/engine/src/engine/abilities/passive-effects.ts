// ─── Passive Effects ───────────────────────────────────────────────
// One rule per character, exactly as printed on the card. Each effect
// checks that the trigger it receives is the one it cares about, so a
// character registered on an unexpected trigger does nothing.

import type { Player } from "../../types/index.js";
import type { CombatResolver } from "../combat.js";
import type { EngineContext } from "../context.js";
import { transferAllEquipment } from "../equipment.js";
import { revealPlayer } from "../identity.js";
import { findPlayer, heal } from "../player.js";
import { assertNever, type CharacterId } from "./characters.js";
import type { TriggerContext } from "./trigger-context.js";

/** Max hp at or below which Bryan must reveal after a kill. */
export const BRYAN_REVEAL_THRESHOLD = 12;
export const VAMPIRE_HEAL = 2;
export const CATHERINE_HEAL = 1;

export interface PassiveEffectDeps {
  readonly ctx: EngineContext;
  readonly combat: CombatResolver;
}

/**
 * Runs a character's passive rule.
 * @returns a description of what happened, or null when the rule did
 *          not apply to this trigger.
 */
export function runPassiveEffect(
  characterId: CharacterId,
  holder: Player,
  context: TriggerContext,
  deps: PassiveEffectDeps
): string | null {
  switch (characterId) {
    case "vampire":
      return suckBlood(holder, context);
    case "werewolf":
      return counterattack(holder, context, deps);
    case "bob":
      return robbery(holder, context, deps);
    case "daniel":
      return scream(holder, context, deps);
    case "bryan":
      return ohMyGod(holder, context, deps);
    case "catherine":
      return stigmata(holder, context);

    // Active or continuous abilities: nothing fires on a trigger.
    case "emi":
    case "franklin":
    case "george":
    case "fuka":
    case "ellen":
    case "gregor":
    case "ultra_soul":
    case "unknown":
    case "valkyrie":
    case "wight":
    case "allie":
    case "charles":
    case "agnes":
    case "david":
      return null;

    default:
      return assertNever(characterId);
  }
}

function suckBlood(holder: Player, context: TriggerContext): string | null {
  if (context.trigger !== "on_attack" || context.source !== "attack" || context.amount <= 0) {
    return null;
  }
  const healed = heal(holder, VAMPIRE_HEAL);
  return `Suck Blood healed ${healed}`;
}

function counterattack(
  holder: Player,
  context: TriggerContext,
  { ctx, combat }: PassiveEffectDeps
): string | null {
  if (context.trigger !== "on_attacked" || context.source !== "attack") return null;
  if (context.attackerId === null || holder.flags.counterattacking) return null;

  const attacker = findPlayer(ctx.session, context.attackerId);
  if (!attacker?.alive) return null;

  holder.flags.counterattacking = true;
  try {
    const outcome = combat.attack(holder, attacker);
    return outcome.damage > 0
      ? `Counterattack dealt ${outcome.damage} to ${attacker.name}`
      : `Counterattack on ${attacker.name} missed`;
  } finally {
    holder.flags.counterattacking = false;
  }
}

function robbery(
  holder: Player,
  context: TriggerContext,
  { ctx }: PassiveEffectDeps
): string | null {
  if (context.trigger !== "on_kill") return null;
  const victim = findPlayer(ctx.session, context.victimId);
  if (!victim) return null;
  const taken = transferAllEquipment(ctx, victim, holder);
  return `Robbery took ${taken} equipment card(s) from ${victim.name}`;
}

function scream(holder: Player, context: TriggerContext, { ctx }: PassiveEffectDeps): string | null {
  if (context.trigger !== "on_character_death" || context.victimId === holder.id) return null;
  return revealPlayer(ctx, holder, true) ? "Scream forced a reveal" : null;
}

function ohMyGod(holder: Player, context: TriggerContext, { ctx }: PassiveEffectDeps): string | null {
  if (context.trigger !== "on_kill") return null;
  const victim = findPlayer(ctx.session, context.victimId);
  if (!victim || victim.hpMax > BRYAN_REVEAL_THRESHOLD) return null;
  return revealPlayer(ctx, holder, true) ? "Oh My God! forced a reveal" : null;
}

function stigmata(holder: Player, context: TriggerContext): string | null {
  if (context.trigger !== "on_turn_start") return null;
  const healed = heal(holder, CATHERINE_HEAL);
  return `Stigmata healed ${healed}`;
}
