// ─── Character Types ───────────────────────────────────────────────
// Static character definitions: faction, vitality, and the declared
// ability that the engine registers or lets the player invoke.

/** The three secret alignments dealt at setup. */
export type Faction = "hunter" | "shadow" | "neutral";

export const FACTIONS = ["hunter", "shadow", "neutral"] as const satisfies readonly Faction[];

/**
 * How an ability is used.
 *
 * - `passive`    -- fires automatically on a registered trigger.
 * - `active`     -- invoked manually by its holder.
 * - `continuous` -- a standing rule consulted in place by other rules
 *                   (e.g. attack dice); never registered or activated.
 */
export type AbilityKind = "passive" | "active" | "continuous";

export type AbilityUsage = "unlimited" | "once";

/** The fixed set of events a passive ability may be bound to. */
export const PASSIVE_TRIGGERS = [
  "on_attacked",
  "on_attack",
  "on_turn_start",
  "on_kill",
  "on_death",
  "on_character_death",
  "on_reveal",
] as const;

export type PassiveTrigger = (typeof PASSIVE_TRIGGERS)[number];

export interface AbilityDefinition {
  readonly name: string;
  readonly description: string;
  readonly kind: AbilityKind;
  /**
   * A {@link PassiveTrigger} for passive abilities, `"manual"` for active
   * ones, `"none"` for continuous ones. Kept as a plain string here: the
   * trigger registry is what rejects unknown keys.
   */
  readonly trigger: string;
  readonly usage: AbilityUsage;
  /** The holder must be revealed before the ability takes effect. */
  readonly requiresReveal: boolean;
}

export interface CharacterDefinition {
  readonly id: string;
  readonly name: string;
  readonly faction: Faction;
  readonly hpMax: number;
  readonly ability: AbilityDefinition;
  /** Human-readable win condition, as printed on the character card. */
  readonly winCondition: string;
}

export interface CharacterCatalog {
  readonly characters: readonly CharacterDefinition[];
}
