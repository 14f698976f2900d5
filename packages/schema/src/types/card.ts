// ─── Card Types ────────────────────────────────────────────────────
// The three decks and the effect descriptors their cards carry.
// Card type and effect kind are tied together by the discriminant.

import type { Faction } from "./character.js";

export type DeckOrigin = "white" | "black" | "green";

export const DECK_ORIGINS = ["white", "black", "green"] as const satisfies readonly DeckOrigin[];

export type CardType = "instant" | "equipment" | "vision";

export type EquipmentEffectKind =
  | "attack_bonus"
  | "defense_bonus"
  | "forced_single_die"
  | "steal_equipment_on_kill"
  | "ranged_attack"
  | "card_damage_immunity"
  | "zone_damage_immunity";

export type InstantEffectKind =
  | "heal_self"
  | "shield"
  | "damage_all_others"
  | "damage_target_and_self"
  | "drain"
  | "steal_equipment";

export type VisionEffectKind = "vision_damage" | "vision_heal";

/**
 * An effect descriptor: kind + numeric value + optional faction
 * restriction. For equipment the restriction names the holder factions
 * the item works for; for visions it names the receiver factions the
 * effect applies to.
 */
export interface CardEffect<K extends string = string> {
  readonly kind: K;
  readonly value: number;
  readonly factions?: readonly Faction[];
}

interface CardDefinitionBase {
  readonly id: string;
  readonly name: string;
  readonly deck: DeckOrigin;
  /** How many physical copies the deck holds. */
  readonly copies: number;
}

export interface EquipmentCardDefinition extends CardDefinitionBase {
  readonly type: "equipment";
  readonly effect: CardEffect<EquipmentEffectKind>;
}

export interface InstantCardDefinition extends CardDefinitionBase {
  readonly type: "instant";
  readonly effect: CardEffect<InstantEffectKind>;
}

export interface VisionCardDefinition extends CardDefinitionBase {
  readonly type: "vision";
  readonly effect: CardEffect<VisionEffectKind>;
}

export type CardDefinition =
  | EquipmentCardDefinition
  | InstantCardDefinition
  | VisionCardDefinition;

export interface CardCatalog {
  readonly cards: readonly CardDefinition[];
}

export type CardInstanceId = string;

type Instantiate<D extends CardDefinition> = D extends CardDefinition
  ? Omit<D, "copies" | "id"> & {
      /** Unique per physical card, e.g. `"holy_robe#1"`. */
      readonly id: CardInstanceId;
      /** The definition this card was printed from. */
      readonly definitionId: string;
    }
  : never;

/** One physical card in play. */
export type Card = Instantiate<CardDefinition>;
export type EquipmentCard = Instantiate<EquipmentCardDefinition>;
export type InstantCard = Instantiate<InstantCardDefinition>;
export type VisionCard = Instantiate<VisionCardDefinition>;
