// ─── Action Validator ──────────────────────────────────────────────
// Decides whether a requested action is legal for the current phase,
// turn flags and board position. Pure: reads the session, never
// mutates it, safe to call any number of times.

import { ACTION_KINDS, DECK_ORIGINS, parseAction } from "@umbral/schema";
import type {
  ActionKind,
  DeckOrigin,
  EngineAction,
  GameSession,
  Player,
  PlayerId,
} from "../types/index.js";
import type { DeckLookup } from "../deck/catalog.js";
import { canActivateAbility } from "./abilities/active-abilities.js";
import { resolveTargets, targetRule } from "./abilities/active-effects.js";
import { isCharacterId } from "./abilities/characters.js";
import { TARGETED_INSTANTS } from "./card-effects.js";
import { attackTargets, currentPlayer, findPlayer, findZone, isInAttackRange } from "./player.js";

/** Discriminated validation result: success or failure with reason. */
export type ActionValidationResult =
  | { readonly valid: true }
  | { readonly valid: false; readonly reason: string };

const VALID: ActionValidationResult = { valid: true };

function invalid(reason: string): ActionValidationResult {
  return { valid: false, reason };
}

/** Decks offered by the zone, from the board data itself. */
export function boardDeckLookup(session: GameSession): DeckLookup {
  return (zoneId) => findZone(session, zoneId)?.decks ?? [];
}

/**
 * Validates an untrusted payload: parses it, then checks legality.
 * Unknown action identifiers are rejected, not thrown.
 */
export function validateRawAction(
  session: GameSession,
  raw: unknown,
  deckLookup?: DeckLookup
): ActionValidationResult {
  const parsed = parseAction(raw);
  if (!parsed.ok) return invalid(parsed.reason);
  return validateAction(session, parsed.action, deckLookup);
}

/**
 * Validates whether a specific action is legal in the current state.
 * Returns a discriminated result, not a boolean, so callers get
 * the rejection reason without a separate error channel.
 */
export function validateAction(
  session: GameSession,
  action: EngineAction,
  deckLookup: DeckLookup = boardDeckLookup(session)
): ActionValidationResult {
  const turn = validatePlayerTurn(session, action.playerId);
  if (!turn.valid) return turn;
  const player = findPlayer(session, action.playerId);
  if (!player) return invalid("Player not found");

  switch (action.kind) {
    case "roll_movement":
      return validateRoll(session, player);
    case "move":
      return validateMove(session, player, action.zoneId);
    case "draw_card":
      return validateDraw(session, player, action.deck, deckLookup);
    case "attack":
      return validateAttack(session, player, action.targetId);
    case "play_card":
      return validatePlayCard(session, player, action);
    case "give_vision":
      return validateGiveVision(session, player, action);
    case "use_zone":
      return validateUseZone(session, player, action);
    case "activate_ability":
      return validateActivation(session, player, action);
    case "reveal":
      return player.revealed ? invalid("Already revealed") : VALID;
    case "end_turn":
      // Passing is legal in any phase.
      return VALID;
  }
}

/**
 * Common validation: game in progress, player seated, alive, and it
 * is their turn.
 */
function validatePlayerTurn(session: GameSession, playerId: PlayerId): ActionValidationResult {
  switch (session.status.kind) {
    case "finished":
      return invalid("Game is over");
    case "halted":
      return invalid(`Game is halted: ${session.status.reason}`);
    case "in_progress":
      break;
  }

  const player = findPlayer(session, playerId);
  if (!player) return invalid("Player not found");
  if (!player.alive) return invalid(`${player.name} is dead`);
  if (currentPlayer(session)?.id !== player.id) return invalid("It is not your turn");
  return VALID;
}

function requirePhase(session: GameSession, phase: GameSession["phase"], verb: string): ActionValidationResult {
  return session.phase === phase ? VALID : invalid(`Can only ${verb} during the ${phase} phase`);
}

// ─── Movement ──────────────────────────────────────────────────────

function validateRoll(session: GameSession, player: Player): ActionValidationResult {
  const phase = requirePhase(session, "movement", "roll");
  if (!phase.valid) return phase;
  if (player.turn.hasRolled) return invalid("Already rolled this turn");
  return VALID;
}

function validateMove(session: GameSession, player: Player, zoneId: string): ActionValidationResult {
  const phase = requirePhase(session, "movement", "move");
  if (!phase.valid) return phase;
  if (player.turn.hasMoved) return invalid("Already moved this turn");
  const roll = player.turn.movementRoll;
  if (!player.turn.hasRolled || roll === null) return invalid("Roll before moving");

  const destination = findZone(session, zoneId);
  if (!destination) return invalid(`Unknown zone ${zoneId}`);
  if (player.position === null) return VALID;
  if (player.position === destination.id) return invalid(`Already in ${destination.name}`);

  const origin = findZone(session, player.position);
  if (!origin) return invalid(`Unknown zone ${player.position}`);
  const distance = Math.abs(destination.position - origin.position);
  if (distance > roll) {
    return invalid(`${destination.name} is ${distance} away; rolled ${roll}`);
  }
  return VALID;
}

// ─── Action phase ──────────────────────────────────────────────────

function validateDraw(
  session: GameSession,
  player: Player,
  deck: DeckOrigin,
  deckLookup: DeckLookup
): ActionValidationResult {
  const phase = requirePhase(session, "action", "draw");
  if (!phase.valid) return phase;
  if (player.turn.hasDrawn) return invalid("Already drew this turn");
  if (player.position === null) return invalid("Not on the board");
  if (!deckLookup(player.position).includes(deck)) return invalid(`No ${deck} deck here`);
  if (!session.decks[deck].canDraw) return invalid(`The ${deck} deck is exhausted`);
  return VALID;
}

function validateAttack(session: GameSession, player: Player, targetId: PlayerId): ActionValidationResult {
  const phase = requirePhase(session, "action", "attack");
  if (!phase.valid) return phase;
  if (player.turn.hasAttacked) return invalid("Already attacked this turn");
  if (attackTargets(session, player).length === 0) return invalid("No target in range");

  const target = findPlayer(session, targetId);
  if (!target) return invalid("Target not found");
  if (!isInAttackRange(session, player, target)) return invalid(`${target.name} is out of range`);
  return VALID;
}

function validatePlayCard(
  session: GameSession,
  player: Player,
  action: Extract<EngineAction, { kind: "play_card" }>
): ActionValidationResult {
  const phase = requirePhase(session, "action", "play cards");
  if (!phase.valid) return phase;

  const card = player.hand.find((held) => held.id === action.cardId);
  if (!card) return invalid(`Card '${action.cardId}' not in hand`);
  if (card.type !== "instant") return invalid(`${card.name} is not an instant`);
  if (!TARGETED_INSTANTS.has(card.effect.kind)) return VALID;

  if (action.targetId === undefined) return invalid(`${card.name} needs a target`);
  const target = findPlayer(session, action.targetId);
  if (!target) return invalid("Target not found");
  if (target.id === player.id) return invalid(`${card.name} cannot target yourself`);
  if (!target.alive) return invalid(`${target.name} is dead`);
  if (card.effect.kind === "steal_equipment" && target.equipment.length === 0) {
    return invalid(`${target.name} has no equipment`);
  }
  return VALID;
}

function validateGiveVision(
  session: GameSession,
  player: Player,
  action: Extract<EngineAction, { kind: "give_vision" }>
): ActionValidationResult {
  const phase = requirePhase(session, "action", "give visions");
  if (!phase.valid) return phase;

  const card = player.hand.find((held) => held.id === action.cardId);
  if (!card) return invalid(`Card '${action.cardId}' not in hand`);
  if (card.type !== "vision") return invalid(`${card.name} is not a vision`);

  const receiver = findPlayer(session, action.targetId);
  if (!receiver) return invalid("Target not found");
  if (receiver.id === player.id) return invalid("Cannot give a vision to yourself");
  if (!receiver.alive) return invalid(`${receiver.name} is dead`);
  return VALID;
}

function validateUseZone(
  session: GameSession,
  player: Player,
  action: Extract<EngineAction, { kind: "use_zone" }>
): ActionValidationResult {
  const phase = requirePhase(session, "action", "use a zone");
  if (!phase.valid) return phase;
  if (player.position === null) return invalid("Not on the board");
  const zone = findZone(session, player.position);
  if (!zone?.effect) return invalid("This zone has no effect");
  if (player.turn.hasUsedZone) return invalid("Already used the zone this turn");

  const target = findPlayer(session, action.targetId);
  if (!target) return invalid("Target not found");
  if (!target.alive) return invalid(`${target.name} is dead`);

  switch (zone.effect) {
    case "weird_woods":
      return VALID;
    case "erstwhile_altar":
      if (target.id === player.id) return invalid("Cannot take your own equipment");
      if (target.equipment.length === 0) return invalid(`${target.name} has no equipment`);
      if (action.cardId !== undefined && !target.equipment.some((card) => card.id === action.cardId)) {
        return invalid(`${target.name} does not hold '${action.cardId}'`);
      }
      return VALID;
  }
}

function validateActivation(
  session: GameSession,
  player: Player,
  action: Extract<EngineAction, { kind: "activate_ability" }>
): ActionValidationResult {
  const verdict = canActivateAbility(player);
  if (!verdict.valid) return verdict;
  if (!isCharacterId(player.characterId)) return invalid(`${player.ability.name} has no rules`);

  const rule = targetRule(player.characterId);
  const targets = resolveTargets(session, player, action.targets, rule.count, rule.allowSelf);
  return targets.ok ? VALID : invalid(targets.reason);
}

// ─── Legal action listing ──────────────────────────────────────────

/**
 * One entry per action kind. Used by bots and UIs to render choices.
 */
export interface LegalAction {
  readonly kind: ActionKind;
  /** Whether at least one concrete request of this kind is legal. */
  readonly enabled: boolean;
  /** Why it is disabled; null when enabled. */
  readonly reason: string | null;
}

/**
 * Lists every action kind for a player with an enabled flag. Returns
 * an empty list when the player cannot act at all (not their turn,
 * dead, game not in progress).
 */
export function getLegalActions(
  session: GameSession,
  playerId: PlayerId,
  deckLookup: DeckLookup = boardDeckLookup(session)
): readonly LegalAction[] {
  if (!validatePlayerTurn(session, playerId).valid) return [];
  const player = findPlayer(session, playerId);
  if (!player) return [];

  return ACTION_KINDS.map((kind) => {
    const probes = probesFor(session, player, kind);
    const verdict = firstValid(session, probes, deckLookup, `Nothing to ${kind.replace("_", " ")}`);
    return { kind, enabled: verdict.valid, reason: verdict.valid ? null : verdict.reason };
  });
}

function firstValid(
  session: GameSession,
  probes: readonly EngineAction[],
  deckLookup: DeckLookup,
  fallback: string
): ActionValidationResult {
  let firstFailure: ActionValidationResult | null = null;
  for (const probe of probes) {
    const verdict = validateAction(session, probe, deckLookup);
    if (verdict.valid) return verdict;
    firstFailure ??= verdict;
  }
  return firstFailure ?? invalid(fallback);
}

/** Every concrete request of one kind worth trying for this player. */
function probesFor(session: GameSession, player: Player, kind: ActionKind): EngineAction[] {
  const playerId = player.id;
  const others = session.players.filter((other) => other.id !== playerId);

  switch (kind) {
    case "roll_movement":
    case "reveal":
    case "end_turn":
      return [{ kind, playerId }];
    case "move":
      return session.board.zones.map((zone): EngineAction => ({ kind, playerId, zoneId: zone.id }));
    case "draw_card":
      return DECK_ORIGINS.map((deck): EngineAction => ({ kind, playerId, deck }));
    case "attack":
      return others.map((target): EngineAction => ({ kind, playerId, targetId: target.id }));
    case "play_card":
      return player.hand.flatMap((card): EngineAction[] => [
        { kind, playerId, cardId: card.id },
        ...others.map((target): EngineAction => ({ kind, playerId, cardId: card.id, targetId: target.id })),
      ]);
    case "give_vision":
      return player.hand.flatMap((card) =>
        others.map((target): EngineAction => ({ kind, playerId, cardId: card.id, targetId: target.id }))
      );
    case "use_zone":
      return session.players.map((target): EngineAction => ({ kind, playerId, targetId: target.id }));
    case "activate_ability":
      return [
        { kind, playerId, targets: [] },
        ...session.players.map((target): EngineAction => ({ kind, playerId, targets: [target.id] })),
      ];
  }
}
