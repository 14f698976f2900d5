// ─── Session State ─────────────────────────────────────────────────
// Runtime state of one game. Created at setup, replaced wholesale on
// a new game, and mutated only by the engine components.

import type {
  AbilityDefinition,
  AbilityUsage,
  BoardDefinition,
  Card,
  DeckOrigin,
  EquipmentCard,
  Faction,
  PassiveTrigger,
  PlayerId,
} from "@umbral/schema";
import type { Deck } from "../deck/deck.js";

// ─── Player ────────────────────────────────────────────────────────

/**
 * Transient status a character effect can put on a player. A closed
 * set: every state a player can be in is listed here.
 */
export interface PlayerFlags {
  /** Ignores the next damage; consumed on use, expires at own turn start. */
  shielded: boolean;
  /** Ignores all damage until own next turn start. */
  damageImmune: boolean;
  /** Win condition follows the left neighbor instead of the right. */
  capriccioActive: boolean;
  /** A counterattack is resolving; blocks a nested one. */
  counterattacking: boolean;
  /** Turns still owed to this player after the current one. */
  extraTurns: number;
}

/** Reset at the start of each of the player's turns. */
export interface TurnFlags {
  hasRolled: boolean;
  movementRoll: number | null;
  hasMoved: boolean;
  hasDrawn: boolean;
  hasAttacked: boolean;
  hasUsedZone: boolean;
  abilityUsedThisTurn: boolean;
}

export interface Player {
  readonly id: PlayerId;
  readonly name: string;
  readonly isBot: boolean;

  // Secret identity, fixed once dealt.
  readonly characterId: string;
  readonly characterName: string;
  readonly faction: Faction;
  readonly ability: AbilityDefinition;

  readonly hpMax: number;
  hp: number;
  alive: boolean;
  revealed: boolean;
  /** Zone id, or null before the first move. */
  position: string | null;

  readonly hand: Card[];
  readonly equipment: EquipmentCard[];

  /** A once-per-game ability has been spent. */
  abilityUsed: boolean;
  /** Permanently disabled by another character's effect. */
  abilityDisabled: boolean;

  readonly flags: PlayerFlags;
  turn: TurnFlags;
}

// ─── Abilities ─────────────────────────────────────────────────────

export interface AbilityRegistration {
  readonly playerId: PlayerId;
  readonly trigger: PassiveTrigger;
  readonly usage: AbilityUsage;
}

// ─── Win tracking ──────────────────────────────────────────────────

export interface DeathRecord {
  readonly victimId: PlayerId;
  readonly killerId: PlayerId | null;
  readonly victimHpMax: number;
  readonly turnNumber: number;
}

/** Append-only for the lifetime of one session. */
export interface WinTracking {
  firstKillerId: PlayerId | null;
  firstDeathId: PlayerId | null;
  readonly deaths: DeathRecord[];
}

export interface WinResult {
  readonly gameOver: boolean;
  /** The faction that won by elimination, if any. */
  readonly winningFaction: Exclude<Faction, "neutral"> | null;
  readonly winnerIds: readonly PlayerId[];
}

// ─── Session ───────────────────────────────────────────────────────

export type TurnPhase = "movement" | "action" | "end";

/**
 * Discriminated union for the game lifecycle.
 * `halted` is the liveness error state: the game cannot progress.
 */
export type GameStatus =
  | { readonly kind: "in_progress" }
  | { readonly kind: "finished"; readonly result: WinResult }
  | { readonly kind: "halted"; readonly reason: string };

export interface GameSession {
  readonly id: string;
  /** Seating order; neighbors are adjacent entries (wrapping). */
  readonly players: readonly Player[];
  readonly board: BoardDefinition;
  readonly decks: Readonly<Record<DeckOrigin, Deck>>;
  phase: TurnPhase;
  currentPlayerIndex: number;
  /** Starts at 1; incremented when play wraps back to seat 0. */
  turnNumber: number;
  status: GameStatus;
  readonly winTracking: WinTracking;
  readonly abilityRegistry: Map<PlayerId, AbilityRegistration>;
}
