// ─── Active Effects ────────────────────────────────────────────────
// What each manually invoked ability does. Every effect validates its
// own target count and preconditions first and mutates nothing when it
// fails, so a failed activation never consumes a once-per-game ability.

import type { AbilityOutcome, GameSession, Player, PlayerId } from "../../types/index.js";
import type { CombatResolver } from "../combat.js";
import type { EngineContext } from "../context.js";
import { equip } from "../equipment.js";
import {
  areAdjacent,
  deadCount,
  findPlayer,
  findZone,
  heal,
  isInAttackRange,
} from "../player.js";
import { assertNever, type CharacterId } from "./characters.js";

/** Damage Fu-ka's Dynamite Nurse leaves on the target. */
export const FUKA_DAMAGE_SET = 7;
export const ULTRA_SOUL_DAMAGE = 3;
export const ULTRA_SOUL_ZONE = "underworld_gate";
export const CHARLES_SELF_DAMAGE = 2;

/** Arguments an activation may carry, depending on the ability. */
export interface ActivationRequest {
  readonly targets: readonly PlayerId[];
  /** Teleport destination. */
  readonly zoneId?: string;
  /** Grave Digger: the discarded equipment card to take. */
  readonly cardId?: string;
}

export interface ActiveEffectDeps {
  readonly ctx: EngineContext;
  readonly combat: CombatResolver;
}

/** How many targets an ability takes, and whether one may be yourself. */
export interface TargetRule {
  readonly count: number;
  readonly allowSelf: boolean;
}

export function targetRule(characterId: CharacterId): TargetRule {
  switch (characterId) {
    case "fuka":
      return { count: 1, allowSelf: true };
    case "franklin":
    case "george":
    case "ellen":
    case "ultra_soul":
    case "charles":
      return { count: 1, allowSelf: false };
    default:
      return { count: 0, allowSelf: false };
  }
}

function failed(description: string): AbilityOutcome {
  return { success: false, description, value: 0 };
}

function succeeded(description: string, value: number): AbilityOutcome {
  return { success: true, description, value };
}

type TargetResolution =
  | { readonly ok: true; readonly players: readonly Player[] }
  | { readonly ok: false; readonly reason: string };

/**
 * Resolves exactly `count` living targets. Self-targeting is refused
 * unless `allowSelf` is set.
 */
export function resolveTargets(
  session: GameSession,
  holder: Player,
  targets: readonly PlayerId[],
  count: number,
  allowSelf = false
): TargetResolution {
  if (targets.length !== count) {
    return {
      ok: false,
      reason: `${holder.ability.name} takes exactly ${count} target(s), got ${targets.length}`,
    };
  }
  const players: Player[] = [];
  for (const id of targets) {
    const target = findPlayer(session, id);
    if (!target) return { ok: false, reason: `Unknown player ${id}` };
    if (!target.alive) return { ok: false, reason: `${target.name} is dead` };
    if (!allowSelf && target.id === holder.id) {
      return { ok: false, reason: `${holder.ability.name} cannot target yourself` };
    }
    players.push(target);
  }
  return { ok: true, players };
}

/** Resolves a single target, or the failure outcome. */
function singleTarget(
  deps: ActiveEffectDeps,
  holder: Player,
  request: ActivationRequest,
  allowSelf = false
): Player | AbilityOutcome {
  const resolution = resolveTargets(deps.ctx.session, holder, request.targets, 1, allowSelf);
  if (!resolution.ok) return failed(resolution.reason);
  const [target] = resolution.players;
  return target ?? failed(`${holder.ability.name} needs a target`);
}

function noTargets(holder: Player, request: ActivationRequest): AbilityOutcome | null {
  return request.targets.length === 0
    ? null
    : failed(`${holder.ability.name} takes no targets`);
}

function isOutcome(value: Player | AbilityOutcome): value is AbilityOutcome {
  return "success" in value;
}

/**
 * Runs a character's active ability. Characters whose ability is not
 * active fail without effect.
 */
export function runActiveEffect(
  characterId: CharacterId,
  holder: Player,
  request: ActivationRequest,
  deps: ActiveEffectDeps
): AbilityOutcome {
  switch (characterId) {
    case "emi":
      return teleport(holder, request, deps);
    case "franklin":
      return dieDamage(holder, request, deps, 6);
    case "george":
      return dieDamage(holder, request, deps, 4);
    case "fuka":
      return dynamiteNurse(holder, request, deps);
    case "ellen":
      return forbiddenCurse(holder, request, deps);
    case "gregor":
      return ghostlyBarrier(holder, request);
    case "ultra_soul":
      return murderRay(holder, request, deps);
    case "wight":
      return multiplication(holder, request, deps);
    case "allie":
      return mothersLove(holder, request);
    case "charles":
      return bloodyFeast(holder, request, deps);
    case "agnes":
      return capriccio(holder, request);
    case "david":
      return graveDigger(holder, request, deps);

    case "vampire":
    case "werewolf":
    case "unknown":
    case "valkyrie":
    case "bob":
    case "daniel":
    case "bryan":
    case "catherine":
      return failed(`${holder.ability.name} cannot be activated`);

    default:
      return assertNever(characterId);
  }
}

// ─── Hunters ───────────────────────────────────────────────────────

function teleport(holder: Player, request: ActivationRequest, { ctx }: ActiveEffectDeps): AbilityOutcome {
  const skip = noTargets(holder, request);
  if (skip) return skip;
  if (ctx.session.phase !== "movement") return failed("Teleport is only usable during movement");
  if (holder.turn.hasRolled || holder.turn.hasMoved) {
    return failed("Teleport replaces the movement roll");
  }
  if (holder.position === null) return failed(`${holder.name} is not on the board yet`);
  if (request.zoneId === undefined) return failed("Teleport needs a destination zone");

  const destination = findZone(ctx.session, request.zoneId);
  if (!destination) return failed(`Unknown zone ${request.zoneId}`);
  if (!areAdjacent(ctx.session, holder.position, destination.id)) {
    return failed(`${destination.name} is not adjacent`);
  }

  holder.position = destination.id;
  holder.turn.hasRolled = true;
  holder.turn.hasMoved = true;
  return succeeded(`Teleported to ${destination.name}`, 0);
}

function dieDamage(
  holder: Player,
  request: ActivationRequest,
  deps: ActiveEffectDeps,
  sides: 4 | 6
): AbilityOutcome {
  const target = singleTarget(deps, holder, request);
  if (isOutcome(target)) return target;

  const roll = deps.ctx.dice.roll(sides);
  const dealt = deps.combat.applyDamage(holder, target, roll, "ability");
  return succeeded(`${holder.ability.name} rolled ${roll}, dealt ${dealt} to ${target.name}`, dealt);
}

function dynamiteNurse(holder: Player, request: ActivationRequest, deps: ActiveEffectDeps): AbilityOutcome {
  const target = singleTarget(deps, holder, request, true);
  if (isOutcome(target)) return target;

  const desired = Math.max(0, target.hpMax - FUKA_DAMAGE_SET);
  if (desired < target.hp) {
    deps.combat.applyDamage(holder, target, target.hp - desired, "ability");
  } else {
    heal(target, desired - target.hp);
  }
  return succeeded(`${target.name} now has ${target.hp} hp`, target.hp);
}

function forbiddenCurse(holder: Player, request: ActivationRequest, deps: ActiveEffectDeps): AbilityOutcome {
  const target = singleTarget(deps, holder, request);
  if (isOutcome(target)) return target;
  if (target.abilityDisabled) return failed(`${target.name}'s ability is already disabled`);

  target.abilityDisabled = true;
  return succeeded(`Disabled ${target.name}'s ability`, 0);
}

function ghostlyBarrier(holder: Player, request: ActivationRequest): AbilityOutcome {
  const skip = noTargets(holder, request);
  if (skip) return skip;
  holder.flags.damageImmune = true;
  return succeeded(`${holder.name} is immune to damage until their next turn`, 0);
}

// ─── Shadows ───────────────────────────────────────────────────────

function murderRay(holder: Player, request: ActivationRequest, deps: ActiveEffectDeps): AbilityOutcome {
  if (holder.turn.abilityUsedThisTurn) return failed("Murder Ray was already used this turn");
  const target = singleTarget(deps, holder, request);
  if (isOutcome(target)) return target;
  if (target.position !== ULTRA_SOUL_ZONE) {
    return failed(`${target.name} is not in the Underworld Gate`);
  }

  holder.turn.abilityUsedThisTurn = true;
  const dealt = deps.combat.applyDamage(holder, target, ULTRA_SOUL_DAMAGE, "ability");
  return succeeded(`Murder Ray dealt ${dealt} to ${target.name}`, dealt);
}

function multiplication(holder: Player, request: ActivationRequest, { ctx }: ActiveEffectDeps): AbilityOutcome {
  const skip = noTargets(holder, request);
  if (skip) return skip;
  const dead = deadCount(ctx.session);
  if (dead === 0) return failed("No character has died yet");

  holder.flags.extraTurns += dead;
  return succeeded(`${holder.name} gains ${dead} extra turn(s)`, dead);
}

// ─── Neutrals ──────────────────────────────────────────────────────

function mothersLove(holder: Player, request: ActivationRequest): AbilityOutcome {
  const skip = noTargets(holder, request);
  if (skip) return skip;
  const healed = heal(holder, holder.hpMax);
  return succeeded(`Mother's Love healed ${healed}`, healed);
}

function bloodyFeast(holder: Player, request: ActivationRequest, deps: ActiveEffectDeps): AbilityOutcome {
  const { ctx, combat } = deps;
  if (ctx.session.phase !== "action" || !holder.turn.hasAttacked) {
    return failed("Bloody Feast follows an attack this turn");
  }
  const target = singleTarget(deps, holder, request);
  if (isOutcome(target)) return target;
  if (!isInAttackRange(ctx.session, holder, target)) {
    return failed(`${target.name} is out of range`);
  }

  combat.applyDamage(null, holder, CHARLES_SELF_DAMAGE, "self");
  if (!holder.alive) {
    return succeeded(`${holder.name} died paying for Bloody Feast`, 0);
  }
  const outcome = combat.attack(holder, target);
  return succeeded(
    outcome.missed ? `Bloody Feast on ${target.name} missed` : `Bloody Feast dealt ${outcome.damage} to ${target.name}`,
    outcome.damage
  );
}

function capriccio(holder: Player, request: ActivationRequest): AbilityOutcome {
  const skip = noTargets(holder, request);
  if (skip) return skip;
  holder.flags.capriccioActive = true;
  return succeeded(`${holder.name} now follows the left neighbor`, 0);
}

function graveDigger(holder: Player, request: ActivationRequest, { ctx }: ActiveEffectDeps): AbilityOutcome {
  const skip = noTargets(holder, request);
  if (skip) return skip;
  if (request.cardId === undefined) return failed("Grave Digger needs a discarded card");

  for (const deck of Object.values(ctx.session.decks)) {
    const candidate = deck.discards.find((card) => card.id === request.cardId);
    if (!candidate) continue;
    if (candidate.type !== "equipment") return failed(`${candidate.name} is not equipment`);

    deck.takeFromDiscard(candidate.id);
    equip(ctx, holder, candidate);
    return succeeded(`Grave Digger took ${candidate.name}`, 1);
  }
  return failed(`${request.cardId} is not in any discard pile`);
}
