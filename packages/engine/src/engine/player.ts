// ─── Player Helpers ────────────────────────────────────────────────
// Queries and small mutations on the Player entity shared by every
// component: lookup, healing, equipment bonuses, seating, range.

import type {
  CharacterDefinition,
  EquipmentCard,
  EquipmentEffectKind,
  Faction,
  GameSession,
  Player,
  PlayerFlags,
  PlayerId,
  TurnFlags,
  ZoneDefinition,
} from "../types/index.js";

// ─── Construction ──────────────────────────────────────────────────

export interface SeatInfo {
  readonly name: string;
  readonly isBot?: boolean;
}

export function freshTurnFlags(): TurnFlags {
  return {
    hasRolled: false,
    movementRoll: null,
    hasMoved: false,
    hasDrawn: false,
    hasAttacked: false,
    hasUsedZone: false,
    abilityUsedThisTurn: false,
  };
}

function freshPlayerFlags(): PlayerFlags {
  return {
    shielded: false,
    damageImmune: false,
    capriccioActive: false,
    counterattacking: false,
    extraTurns: 0,
  };
}

/** A player at full health, unrevealed, off the board. */
export function createPlayer(
  id: PlayerId,
  seat: SeatInfo,
  character: CharacterDefinition
): Player {
  return {
    id,
    name: seat.name,
    isBot: seat.isBot ?? false,
    characterId: character.id,
    characterName: character.name,
    faction: character.faction,
    ability: character.ability,
    hpMax: character.hpMax,
    hp: character.hpMax,
    alive: true,
    revealed: false,
    position: null,
    hand: [],
    equipment: [],
    abilityUsed: false,
    abilityDisabled: false,
    flags: freshPlayerFlags(),
    turn: freshTurnFlags(),
  };
}

// ─── Queries ───────────────────────────────────────────────────────

export function findPlayer(session: GameSession, id: PlayerId): Player | undefined {
  return session.players.find((player) => player.id === id);
}

export function currentPlayer(session: GameSession): Player | undefined {
  return session.players[session.currentPlayerIndex];
}

export function livingPlayers(session: GameSession): Player[] {
  return session.players.filter((player) => player.alive);
}

export function deadCount(session: GameSession): number {
  return session.players.filter((player) => !player.alive).length;
}

/**
 * The neighbor in seating order: `right` is the next seat, `left` the
 * previous one. Dead players still occupy their seat.
 */
export function neighborOf(
  session: GameSession,
  player: Player,
  side: "left" | "right"
): Player | undefined {
  const count = session.players.length;
  const index = session.players.indexOf(player);
  if (index === -1 || count < 2) return undefined;
  const offset = side === "right" ? 1 : count - 1;
  return session.players[(index + offset) % count];
}

/**
 * Whether an ability with a reveal requirement can currently take
 * effect for its holder.
 */
export function isAbilityLive(player: Player): boolean {
  if (player.abilityDisabled) return false;
  return !player.ability.requiresReveal || player.revealed;
}

// ─── Equipment ─────────────────────────────────────────────────────

function restrictionMatches(card: EquipmentCard, faction: Faction): boolean {
  return card.effect.factions === undefined || card.effect.factions.includes(faction);
}

/** Equipment of the given kind that works for this holder. */
export function activeEquipment(player: Player, kind: EquipmentEffectKind): EquipmentCard[] {
  return player.equipment.filter(
    (card) => card.effect.kind === kind && restrictionMatches(card, player.faction)
  );
}

export function hasEquipmentEffect(player: Player, kind: EquipmentEffectKind): boolean {
  return activeEquipment(player, kind).length > 0;
}

export function attackBonus(player: Player): number {
  return activeEquipment(player, "attack_bonus").reduce((sum, card) => sum + card.effect.value, 0);
}

export function defenseBonus(player: Player): number {
  return activeEquipment(player, "defense_bonus").reduce((sum, card) => sum + card.effect.value, 0);
}

// ─── Vitality ──────────────────────────────────────────────────────

/**
 * Heals up to `amount`, never above hpMax.
 * @returns the hp actually restored.
 */
export function heal(player: Player, amount: number): number {
  if (!player.alive || amount <= 0) return 0;
  const before = player.hp;
  player.hp = Math.min(player.hpMax, player.hp + amount);
  return player.hp - before;
}

// ─── Board ─────────────────────────────────────────────────────────

export function findZone(session: GameSession, zoneId: string): ZoneDefinition | undefined {
  return session.board.zones.find((zone) => zone.id === zoneId);
}

/** Zones ordered along the movement track. */
export function trackOrder(session: GameSession): ZoneDefinition[] {
  return [...session.board.zones].sort((a, b) => a.position - b.position);
}

/** Track neighbors, wrapping from the last zone to the first. */
export function areAdjacent(session: GameSession, fromId: string, toId: string): boolean {
  const track = trackOrder(session);
  const index = track.findIndex((zone) => zone.id === fromId);
  if (index === -1) return false;
  const next = track[(index + 1) % track.length];
  const previous = track[(index + track.length - 1) % track.length];
  return next?.id === toId || previous?.id === toId;
}

/**
 * Attack range: same area, unless the attacker carries a ranged item,
 * which turns the range inside out.
 */
export function isInAttackRange(session: GameSession, attacker: Player, target: Player): boolean {
  if (attacker.id === target.id || !target.alive) return false;
  if (attacker.position === null || target.position === null) return false;
  const from = findZone(session, attacker.position);
  const to = findZone(session, target.position);
  if (!from || !to) return false;
  const sameArea = from.area === to.area;
  return hasEquipmentEffect(attacker, "ranged_attack") ? !sameArea : sameArea;
}

export function attackTargets(session: GameSession, attacker: Player): Player[] {
  return session.players.filter((target) => isInAttackRange(session, attacker, target));
}
