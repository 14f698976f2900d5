export type {
  Faction,
  AbilityKind,
  AbilityUsage,
  PassiveTrigger,
  AbilityDefinition,
  CharacterDefinition,
  CharacterCatalog,
} from "./character.js";
export { FACTIONS, PASSIVE_TRIGGERS } from "./character.js";
export type {
  DeckOrigin,
  CardType,
  EquipmentEffectKind,
  InstantEffectKind,
  VisionEffectKind,
  CardEffect,
  EquipmentCardDefinition,
  InstantCardDefinition,
  VisionCardDefinition,
  CardDefinition,
  CardCatalog,
  CardInstanceId,
  Card,
  EquipmentCard,
  InstantCard,
  VisionCard,
} from "./card.js";
export { DECK_ORIGINS } from "./card.js";
export type { ZoneEffectKind, ZoneDefinition, BoardDefinition } from "./board.js";
export type { PlayerId, ZoneChoice, EngineAction, ActionKind } from "./action.js";
export { ACTION_KINDS } from "./action.js";
