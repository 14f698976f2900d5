// ─── Rules Engine ──────────────────────────────────────────────────
// The facade a driver talks to. One action at a time runs
// validate → resolve → propagate (synchronous event cascade) → win
// check; a second action arriving mid-resolution is refused.

import { parseAction } from "@umbral/schema";
import type {
  AbilityOutcome,
  BoardDefinition,
  Card,
  CardCatalog,
  CharacterCatalog,
  DamageSource,
  EngineAction,
  GameSession,
  Player,
  PlayerId,
  WinResult,
} from "../types/index.js";
import {
  createDeckLookup,
  loadBoard,
  loadCards,
  loadCharacters,
  type DeckLookup,
} from "../deck/catalog.js";
import { ActiveAbilities } from "./abilities/active-abilities.js";
import type { ActivationRequest } from "./abilities/active-effects.js";
import { AbilityTriggerSystem } from "./abilities/trigger-system.js";
import {
  getLegalActions,
  validateAction,
  type ActionValidationResult,
  type LegalAction,
} from "./action-validator.js";
import { CardEffects, type CardOutcome } from "./card-effects.js";
import { CombatResolver, type RollOutcome } from "./combat.js";
import { parseEngineOptions } from "./config.js";
import type { EngineContext } from "./context.js";
import { EngineErrorCode } from "./errors.js";
import { EngineEventEmitter } from "./event-emitter.js";
import { revealPlayer } from "./identity.js";
import { createLogger, type Logger, type LogLevelName } from "./logger.js";
import { TurnOrchestrator, type PhaseTransition } from "./phase-machine.js";
import { currentPlayer, findPlayer, findZone, type SeatInfo } from "./player.js";
import { createDice, createRng, type DiceRoller, type SeededRng } from "./prng.js";
import { createSession } from "./setup.js";
import {
  createPlayerView,
  createRosterSnapshot,
  type PlayerView,
  type RosterEntry,
} from "./state-filter.js";
import { WinConditionEvaluator, type WinEvent } from "./win-conditions.js";
import { ZoneEffects } from "./zone-effects.js";

export interface CreateEngineOptions {
  readonly players: readonly SeatInfo[];
  readonly seed?: number;
  readonly logLevel?: LogLevelName;
  /** Character ids in seat order, instead of a random deal. */
  readonly characters?: readonly string[];
  readonly dice?: DiceRoller;
  readonly logger?: Logger;
  /** Raw replacements for the bundled game data. */
  readonly data?: {
    readonly characters?: unknown;
    readonly cards?: unknown;
    readonly board?: unknown;
  };
  readonly deckLookup?: DeckLookup;
}

/** What a successful action did, by kind. */
export type ActionDetail =
  | { readonly kind: "roll_movement"; readonly d6: number; readonly d4: number; readonly total: number }
  | { readonly kind: "move"; readonly zoneId: string }
  | { readonly kind: "draw_card"; readonly card: Card | null }
  | { readonly kind: "attack"; readonly roll: RollOutcome }
  | { readonly kind: "play_card" | "give_vision" | "use_zone"; readonly outcome: CardOutcome }
  | { readonly kind: "activate_ability"; readonly outcome: AbilityOutcome }
  | { readonly kind: "reveal" }
  | { readonly kind: "end_turn"; readonly transition: PhaseTransition };

export type PerformResult =
  | { readonly ok: true; readonly detail: ActionDetail }
  | { readonly ok: false; readonly reason: string };

/** A win check requested from outside, by player id. */
export interface WinCheckRequest {
  readonly event: WinEvent;
  readonly killerId?: PlayerId | null;
  readonly victimId?: PlayerId | null;
}

interface GameData {
  readonly characters: CharacterCatalog;
  readonly cards: CardCatalog;
  readonly board: BoardDefinition;
}

export class RulesEngine {
  readonly events = new EngineEventEmitter();

  private readonly ctx: EngineContext;
  private readonly combat: CombatResolver;
  private readonly triggers: AbilityTriggerSystem;
  private readonly abilities: ActiveAbilities;
  private readonly wins: WinConditionEvaluator;
  private readonly turns: TurnOrchestrator;
  private readonly cards: CardEffects;
  private readonly zones: ZoneEffects;
  private resolving = false;

  /**
   * Loads and validates game data, deals characters and starts the
   * first turn.
   *
   * @throws {DataParseError} if supplied game data is malformed.
   * @throws {EngineError} INVALID_SETUP for bad options or seating.
   */
  static create(options: CreateEngineOptions): RulesEngine {
    const config = parseEngineOptions({ seed: options.seed, logLevel: options.logLevel });
    const data: GameData = {
      characters: loadCharacters(options.data?.characters),
      cards: loadCards(options.data?.cards),
      board: loadBoard(options.data?.board),
    };
    const rng = createRng(config.seed);
    const logger = options.logger ?? createLogger("Umbral", config.logLevel);
    return new RulesEngine(options, data, rng, options.dice ?? createDice(rng), logger);
  }

  private constructor(
    private readonly options: CreateEngineOptions,
    private readonly data: GameData,
    private readonly rng: SeededRng,
    dice: DiceRoller,
    logger: Logger
  ) {
    this.ctx = {
      session: this.freshSession(),
      events: this.events,
      dice,
      logger,
      deckLookup: options.deckLookup ?? createDeckLookup(data.board),
    };

    // Deaths are recorded before any trigger reacts to them, and
    // checked only after every trigger has run.
    this.events.on("player-died", ({ victimId, killerId }) => this.recordDeath(victimId, killerId));

    this.combat = new CombatResolver(this.ctx);
    this.triggers = new AbilityTriggerSystem(this.ctx, this.combat);
    this.abilities = new ActiveAbilities(this.ctx, this.combat);
    this.wins = new WinConditionEvaluator(this.ctx);
    this.turns = new TurnOrchestrator(this.ctx);
    this.cards = new CardEffects(this.ctx, this.combat);
    this.zones = new ZoneEffects(this.ctx, this.combat);

    this.events.on("player-died", ({ victimId, killerId }) => this.checkAfterDeath(victimId, killerId));
    this.events.on("equipment-changed", () => this.checkAfterEquipmentChange());

    this.begin();
  }

  // ─── State ───────────────────────────────────────────────────────

  get session(): GameSession {
    return this.ctx.session;
  }

  get logger(): Logger {
    return this.ctx.logger;
  }

  /** Read-only roster, identities included. */
  snapshot(): readonly RosterEntry[] {
    return createRosterSnapshot(this.ctx.session);
  }

  viewFor(playerId: PlayerId): PlayerView {
    return createPlayerView(this.ctx.session, playerId, this.ctx.deckLookup);
  }

  legalActions(playerId: PlayerId): readonly LegalAction[] {
    return getLegalActions(this.ctx.session, playerId, this.ctx.deckLookup);
  }

  validate(action: EngineAction): ActionValidationResult {
    return validateAction(this.ctx.session, action, this.ctx.deckLookup);
  }

  // ─── Actions ─────────────────────────────────────────────────────

  /**
   * Runs one action to completion. Rejections are values; state is
   * untouched when an action is refused.
   */
  perform(action: EngineAction): PerformResult {
    if (this.resolving) {
      return { ok: false, reason: "Another action is still resolving" };
    }
    const verdict = this.validate(action);
    if (!verdict.valid) {
      this.ctx.logger.debug(`Rejected ${action.kind} from player ${action.playerId}: ${verdict.reason}`);
      return { ok: false, reason: verdict.reason };
    }

    this.resolving = true;
    try {
      const result = this.resolve(action);
      this.passTurnOfDeadPlayer();
      return result;
    } finally {
      this.resolving = false;
    }
  }

  /** Parses an untrusted payload, then performs it. */
  performRaw(raw: unknown): PerformResult {
    if (this.resolving) {
      return { ok: false, reason: "Another action is still resolving" };
    }
    const parsed = parseAction(raw);
    return parsed.ok ? this.perform(parsed.action) : { ok: false, reason: parsed.reason };
  }

  /** Voluntary reveal: own turn, any phase, alive, not yet revealed. */
  reveal(playerId: PlayerId): PerformResult {
    return this.perform({ kind: "reveal", playerId });
  }

  /** Re-deals characters and decks for the same seats. */
  newGame(): void {
    this.resolving = false;
    this.ctx.session = this.freshSession();
    this.ctx.logger.info("New game", { sessionId: this.ctx.session.id });
    this.begin();
  }

  // ─── Direct mutators ─────────────────────────────────────────────

  rollAttack(attackerId: PlayerId, targetId: PlayerId): RollOutcome | null {
    const attacker = this.player(attackerId);
    const target = this.player(targetId);
    if (!attacker || !target) return null;
    return this.combat.rollAttack(attacker, target);
  }

  applyDamage(
    attackerId: PlayerId | null,
    targetId: PlayerId,
    amount: number,
    source: DamageSource = "attack"
  ): number {
    if (!Number.isInteger(amount) || amount <= 0) {
      this.ctx.logger.warn(`Rejected damage amount ${amount}: not a positive integer`);
      return 0;
    }
    const attacker = attackerId === null ? null : this.player(attackerId);
    const target = this.player(targetId);
    if (!target || attacker === undefined) return 0;
    const dealt = this.combat.applyDamage(attacker, target, amount, source);
    this.passTurnOfDeadPlayer();
    return dealt;
  }

  processDeath(victimId: PlayerId, killerId: PlayerId | null): boolean {
    const victim = this.player(victimId);
    const killer = killerId === null ? null : this.player(killerId);
    if (!victim || killer === undefined) return false;
    const died = this.combat.processDeath(victim, killer);
    this.passTurnOfDeadPlayer();
    return died;
  }

  registerPlayerAbility(playerId: PlayerId): boolean {
    const player = this.player(playerId);
    return player ? this.triggers.register(player) : false;
  }

  unregisterPlayerAbility(playerId: PlayerId): boolean {
    return this.triggers.unregister(playerId);
  }

  canActivateAbility(playerId: PlayerId): ActionValidationResult {
    const player = this.player(playerId);
    return player ? this.abilities.canActivate(player) : { valid: false, reason: "Player not found" };
  }

  activateAbility(playerId: PlayerId, request: ActivationRequest): AbilityOutcome {
    const player = this.player(playerId);
    if (!player) return { success: false, description: "Player not found", value: 0 };
    const outcome = this.abilities.activate(player, request);
    if (outcome.success) this.afterActivation(player);
    this.passTurnOfDeadPlayer();
    return outcome;
  }

  /** Evaluates win conditions and ends the game if they are met. */
  checkWinConditions(request: WinCheckRequest = { event: "none" }): WinResult {
    const killer = request.killerId == null ? null : findPlayer(this.ctx.session, request.killerId) ?? null;
    const victim = request.victimId == null ? null : findPlayer(this.ctx.session, request.victimId) ?? null;
    const result = this.wins.checkWinConditions({ event: request.event, killer, victim });
    if (result.gameOver) this.finish(result);
    return result;
  }

  advancePhase(): PhaseTransition {
    return this.turns.advancePhase();
  }

  // ─── Resolution ──────────────────────────────────────────────────

  private resolve(action: EngineAction): PerformResult {
    const player = this.player(action.playerId);
    if (!player) return { ok: false, reason: "Player not found" };

    switch (action.kind) {
      case "roll_movement": {
        const d6 = this.ctx.dice.roll(6);
        const d4 = this.ctx.dice.roll(4);
        player.turn.hasRolled = true;
        player.turn.movementRoll = d6 + d4;
        return { ok: true, detail: { kind: action.kind, d6, d4, total: d6 + d4 } };
      }
      case "move": {
        player.position = action.zoneId;
        player.turn.hasMoved = true;
        this.turns.advancePhase();
        return { ok: true, detail: { kind: action.kind, zoneId: action.zoneId } };
      }
      case "draw_card":
        return { ok: true, detail: { kind: action.kind, card: this.cards.draw(player, action.deck) } };
      case "attack": {
        const target = this.player(action.targetId);
        if (!target) return { ok: false, reason: "Target not found" };
        player.turn.hasAttacked = true;
        return { ok: true, detail: { kind: action.kind, roll: this.combat.attack(player, target) } };
      }
      case "play_card": {
        const card = player.hand.find((held) => held.id === action.cardId);
        if (card?.type !== "instant") return { ok: false, reason: "Card not in hand" };
        const target = action.targetId === undefined ? null : this.player(action.targetId) ?? null;
        const outcome = this.cards.playInstant(player, card, target);
        return { ok: true, detail: { kind: action.kind, outcome } };
      }
      case "give_vision": {
        const card = player.hand.find((held) => held.id === action.cardId);
        const receiver = this.player(action.targetId);
        if (card?.type !== "vision" || !receiver) return { ok: false, reason: "Card not in hand" };
        const outcome = this.cards.giveVision(player, card, receiver, action.receiverLies ?? false);
        return { ok: true, detail: { kind: action.kind, outcome } };
      }
      case "use_zone": {
        const zone = player.position === null ? undefined : findZone(this.ctx.session, player.position);
        const target = this.player(action.targetId);
        if (!zone?.effect || !target) return { ok: false, reason: "This zone has no effect" };
        const outcome = this.zones.use(player, zone.effect, {
          target,
          choice: action.choice,
          cardId: action.cardId,
        });
        return { ok: true, detail: { kind: action.kind, outcome } };
      }
      case "activate_ability": {
        const outcome = this.abilities.activate(player, {
          targets: action.targets,
          zoneId: action.zoneId,
          cardId: action.cardId,
        });
        if (!outcome.success) return { ok: false, reason: outcome.description };
        this.afterActivation(player);
        return { ok: true, detail: { kind: action.kind, outcome } };
      }
      case "reveal":
        revealPlayer(this.ctx, player, false);
        return { ok: true, detail: { kind: action.kind } };
      case "end_turn":
        return { ok: true, detail: { kind: action.kind, transition: this.turns.endTurn() } };
    }
  }

  /** An ability that moved the holder (Teleport) ends MOVEMENT like a move. */
  private afterActivation(player: Player): void {
    if (this.ctx.session.phase === "movement" && player.turn.hasMoved) {
      this.turns.advancePhase();
    }
  }

  /** A player who dies on their own turn cannot end it; the turn passes on. */
  private passTurnOfDeadPlayer(): void {
    const session = this.ctx.session;
    if (session.status.kind !== "in_progress") return;
    const current = currentPlayer(session);
    if (!current || current.alive) return;
    this.ctx.logger.info(`${current.name} died on their own turn; passing it on`);
    this.turns.endTurn();
  }

  // ─── Win checks ──────────────────────────────────────────────────

  private recordDeath(victimId: PlayerId, killerId: PlayerId | null): void {
    const victim = this.player(victimId);
    if (!victim) return;
    const killer = killerId === null ? null : findPlayer(this.ctx.session, killerId) ?? null;
    this.wins.registerKill(killer, victim);
  }

  private checkAfterDeath(victimId: PlayerId, killerId: PlayerId | null): void {
    if (this.ctx.session.status.kind !== "in_progress") return;
    this.checkWinConditions({ event: killerId === null ? "none" : "kill", killerId, victimId });
  }

  private checkAfterEquipmentChange(): void {
    const session = this.ctx.session;
    if (session.status.kind !== "in_progress") return;
    // A death still being processed is checked once player-died is out.
    const recorded = new Set(session.winTracking.deaths.map((death) => death.victimId));
    if (session.players.some((player) => !player.alive && !recorded.has(player.id))) return;
    this.checkWinConditions({ event: "none" });
  }

  private finish(result: WinResult): void {
    if (this.ctx.session.status.kind === "finished") return;
    this.ctx.session.status = { kind: "finished", result };
    this.events.emit("game-over", { result });
  }

  // ─── Helpers ─────────────────────────────────────────────────────

  private begin(): void {
    this.triggers.registerAll();
    this.turns.startFirstTurn();
  }

  private freshSession(): GameSession {
    return createSession({
      seats: this.options.players,
      characters: this.data.characters,
      cards: this.data.cards,
      board: this.data.board,
      rng: this.rng,
      forcedCharacters: this.options.characters,
    });
  }

  /** Looks up a seated player; a miss is an invalid reference. */
  private player(id: PlayerId): Player | undefined {
    const player = findPlayer(this.ctx.session, id);
    if (!player) {
      this.ctx.logger.warn(`Invalid reference: no player ${id}`, { code: EngineErrorCode.INVALID_REFERENCE });
    }
    return player;
  }
}
