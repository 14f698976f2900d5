// ─── Engine Events ─────────────────────────────────────────────────
// Domain events raised by the engine. The ability trigger system and
// the engine facade listen internally; renderers, audio and network
// broadcasters subscribe from outside.

import type { AbilityDefinition, DeckOrigin, Faction, PassiveTrigger, PlayerId } from "@umbral/schema";
import type { TurnPhase, WinResult } from "./state.js";

/** What caused a point of damage. */
export type DamageSource = "attack" | "ability" | "card" | "vision" | "zone" | "self";

export interface DamageDealtPayload {
  readonly attackerId: PlayerId | null;
  readonly victimId: PlayerId;
  readonly amount: number;
  readonly source: DamageSource;
  readonly hpAfter: number;
}

export interface PlayerDiedPayload {
  readonly victimId: PlayerId;
  readonly killerId: PlayerId | null;
}

export interface CharacterRevealedPayload {
  readonly playerId: PlayerId;
  readonly characterId: string;
  readonly faction: Faction;
  readonly ability: AbilityDefinition;
  /** True when the reveal was not the player's choice (death, Scream…). */
  readonly forced: boolean;
}

export interface AbilityTriggeredPayload {
  readonly playerId: PlayerId;
  readonly characterId: string;
  readonly trigger: PassiveTrigger;
  readonly description: string;
}

/** Structured result of an active ability. */
export interface AbilityOutcome {
  readonly success: boolean;
  readonly description: string;
  /** Damage dealt, hp healed, turns granted… depending on the ability. */
  readonly value: number;
}

export interface AbilityActivatedPayload {
  readonly playerId: PlayerId;
  readonly characterId: string;
  readonly outcome: AbilityOutcome;
}

export interface AbilityFailedPayload {
  readonly playerId: PlayerId;
  readonly reason: string;
}

export interface TurnStartedPayload {
  readonly playerId: PlayerId;
  readonly turnNumber: number;
  readonly isBot: boolean;
}

export interface PhaseChangedPayload {
  readonly playerId: PlayerId;
  readonly from: TurnPhase;
  readonly to: TurnPhase;
}

export interface EquipmentChangedPayload {
  readonly playerId: PlayerId;
  readonly cardId: string;
  readonly change: "gained" | "lost";
}

export interface CardDrawnPayload {
  readonly playerId: PlayerId;
  readonly deck: DeckOrigin;
  /** Null when the deck was exhausted. */
  readonly cardId: string | null;
}

export interface GameOverPayload {
  readonly result: WinResult;
}

/**
 * Maps event names to their payload types.
 * Subscribing to a name not in this map is a compile-time error.
 */
export interface EngineEventMap {
  "damage-dealt": DamageDealtPayload;
  "player-died": PlayerDiedPayload;
  "character-revealed": CharacterRevealedPayload;
  "ability-triggered": AbilityTriggeredPayload;
  "ability-activated": AbilityActivatedPayload;
  "ability-failed": AbilityFailedPayload;
  "turn-started": TurnStartedPayload;
  "phase-changed": PhaseChangedPayload;
  "equipment-changed": EquipmentChangedPayload;
  "card-drawn": CardDrawnPayload;
  "game-over": GameOverPayload;
}

export type EngineEventName = keyof EngineEventMap;

export type EngineEventListener<K extends EngineEventName> = (payload: EngineEventMap[K]) => void;
