// Re-export the canonical data types from the schema package.
export type {
  AbilityDefinition,
  AbilityKind,
  AbilityUsage,
  ActionKind,
  BoardDefinition,
  Card,
  CardCatalog,
  CardDefinition,
  CardEffect,
  CardInstanceId,
  CharacterCatalog,
  CharacterDefinition,
  DeckOrigin,
  EngineAction,
  EquipmentCard,
  EquipmentEffectKind,
  Faction,
  InstantCard,
  InstantEffectKind,
  PassiveTrigger,
  PlayerId,
  VisionCard,
  ZoneChoice,
  ZoneDefinition,
  ZoneEffectKind,
} from "@umbral/schema";

export type {
  PlayerFlags,
  TurnFlags,
  Player,
  AbilityRegistration,
  DeathRecord,
  WinTracking,
  WinResult,
  TurnPhase,
  GameStatus,
  GameSession,
} from "./state.js";

export type {
  DamageSource,
  DamageDealtPayload,
  PlayerDiedPayload,
  CharacterRevealedPayload,
  AbilityTriggeredPayload,
  AbilityOutcome,
  AbilityActivatedPayload,
  AbilityFailedPayload,
  TurnStartedPayload,
  PhaseChangedPayload,
  EquipmentChangedPayload,
  CardDrawnPayload,
  GameOverPayload,
  EngineEventMap,
  EngineEventName,
  EngineEventListener,
} from "./events.js";
