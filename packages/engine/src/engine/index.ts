export { RulesEngine, type CreateEngineOptions, type ActionDetail, type PerformResult, type WinCheckRequest } from "./rules-engine.js";
export { CombatResolver, hasNoMissAttack, type RollOutcome } from "./combat.js";
export { AbilityTriggerSystem, isPassiveTrigger } from "./abilities/trigger-system.js";
export { ActiveAbilities, canActivateAbility } from "./abilities/active-abilities.js";
export { runActiveEffect, targetRule, type ActivationRequest, type TargetRule } from "./abilities/active-effects.js";
export { runPassiveEffect } from "./abilities/passive-effects.js";
export { CHARACTER_IDS, isCharacterId, type CharacterId } from "./abilities/characters.js";
export type { TriggerContext } from "./abilities/trigger-context.js";
export { WinConditionEvaluator, GAME_ENDING_NEUTRALS, type WinContext, type WinEvent } from "./win-conditions.js";
export { TurnOrchestrator, type PhaseTransition } from "./phase-machine.js";
export {
  validateAction,
  validateRawAction,
  getLegalActions,
  boardDeckLookup,
  type ActionValidationResult,
  type LegalAction,
} from "./action-validator.js";
export { CardEffects, mayIgnoreVision, visionApplies, type CardOutcome } from "./card-effects.js";
export { ZoneEffects, type ZoneRequest } from "./zone-effects.js";
export { createRosterSnapshot, createPlayerView, type RosterEntry, type VisibleRosterEntry, type PlayerView } from "./state-filter.js";
export { createSession, dealCharacters, FACTION_DISTRIBUTION, MIN_PLAYERS, MAX_PLAYERS, type SetupOptions } from "./setup.js";
export { EngineOptionsSchema, parseEngineOptions, type EngineConfig } from "./config.js";
export { EngineEventEmitter } from "./event-emitter.js";
export { Logger, LogLevel, createLogger, LOG_LEVEL_NAMES, type LogLevelName } from "./logger.js";
export { EngineError, EngineErrorCode, DataParseError } from "./errors.js";
export { SeededRng, createRng, createDice, type DiceRoller } from "./prng.js";
export { revealPlayer } from "./identity.js";
export { createPlayer, findPlayer, heal, isInAttackRange, neighborOf, type SeatInfo } from "./player.js";
export type { EngineContext } from "./context.js";
