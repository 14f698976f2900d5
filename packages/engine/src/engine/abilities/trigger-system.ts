// ─── Ability Trigger System ────────────────────────────────────────
// Keeps the registry of passive abilities (per session) and turns
// domain events into per-character effect dispatch.
//
// Ordering within one player-died resolution is fixed:
//   victim on_death → unregister victim → killer on_kill →
//   on_character_death broadcast to everyone still registered.

import { PASSIVE_TRIGGERS } from "@umbral/schema";
import type {
  CharacterRevealedPayload,
  DamageDealtPayload,
  PassiveTrigger,
  Player,
  PlayerDiedPayload,
  PlayerId,
  TurnStartedPayload,
} from "../../types/index.js";
import type { CombatResolver } from "../combat.js";
import type { EngineContext } from "../context.js";
import { EngineErrorCode } from "../errors.js";
import { findPlayer } from "../player.js";
import { isCharacterId } from "./characters.js";
import { runPassiveEffect } from "./passive-effects.js";
import type { TriggerContext } from "./trigger-context.js";

export function isPassiveTrigger(key: string): key is PassiveTrigger {
  const known: readonly string[] = PASSIVE_TRIGGERS;
  return known.includes(key);
}

export class AbilityTriggerSystem {
  private readonly unsubscribers: Array<() => void>;

  constructor(
    private readonly ctx: EngineContext,
    private readonly combat: CombatResolver
  ) {
    this.unsubscribers = [
      ctx.events.on("damage-dealt", (payload) => this.onDamageDealt(payload)),
      ctx.events.on("turn-started", (payload) => this.onTurnStarted(payload)),
      ctx.events.on("player-died", (payload) => this.onPlayerDied(payload)),
      ctx.events.on("character-revealed", (payload) => this.onCharacterRevealed(payload)),
    ];
  }

  // ─── Registry ────────────────────────────────────────────────────

  /**
   * Registers a player's passive ability. Active and continuous
   * abilities are not registered; an unknown trigger key is rejected.
   *
   * @returns whether the player is now registered.
   */
  register(player: Player): boolean {
    const { ability } = player;
    if (ability.kind !== "passive") {
      this.ctx.logger.debug(`${player.name}: ${ability.kind} ability is not trigger-bound`);
      return false;
    }
    if (!isPassiveTrigger(ability.trigger)) {
      this.ctx.logger.warn(
        `Rejected ${ability.name} for ${player.name}: unknown trigger "${ability.trigger}"`,
        { code: EngineErrorCode.CONFIGURATION_GAP, allowed: PASSIVE_TRIGGERS }
      );
      return false;
    }
    if (!player.alive) {
      this.ctx.logger.warn(`Rejected ${ability.name}: ${player.name} is dead`);
      return false;
    }

    this.ctx.session.abilityRegistry.set(player.id, {
      playerId: player.id,
      trigger: ability.trigger,
      usage: ability.usage,
    });
    return true;
  }

  /** Registers every living player of the current session. */
  registerAll(): void {
    for (const player of this.ctx.session.players) {
      this.register(player);
    }
  }

  unregister(playerId: PlayerId): boolean {
    return this.ctx.session.abilityRegistry.delete(playerId);
  }

  isRegistered(playerId: PlayerId): boolean {
    return this.ctx.session.abilityRegistry.has(playerId);
  }

  /** Stops listening to engine events. */
  dispose(): void {
    for (const unsubscribe of this.unsubscribers) unsubscribe();
    this.unsubscribers.length = 0;
  }

  // ─── Dispatch ────────────────────────────────────────────────────

  /**
   * Runs the player's character effect for a trigger and announces it.
   * Characters without rules are a configuration gap: logged, no-op.
   */
  execute(player: Player, context: TriggerContext): void {
    if (!isCharacterId(player.characterId)) {
      this.ctx.logger.warn(`No ability rules for character "${player.characterId}"`, {
        code: EngineErrorCode.CONFIGURATION_GAP,
      });
      return;
    }

    const description = runPassiveEffect(player.characterId, player, context, {
      ctx: this.ctx,
      combat: this.combat,
    });

    this.ctx.events.emit("ability-triggered", {
      playerId: player.id,
      characterId: player.characterId,
      trigger: context.trigger,
      description: description ?? `${player.ability.name} had no effect`,
    });
  }

  private fire(playerId: PlayerId | null, context: TriggerContext): void {
    if (playerId === null) return;

    const registration = this.ctx.session.abilityRegistry.get(playerId);
    if (!registration || registration.trigger !== context.trigger) return;

    const player = findPlayer(this.ctx.session, playerId);
    if (!player) {
      this.ctx.logger.warn(`Registered player ${playerId} is not seated; skipping ${context.trigger}`, {
        code: EngineErrorCode.INVALID_REFERENCE,
      });
      return;
    }

    // Only the dying player's own on_death runs at or below 0 hp.
    if (context.trigger !== "on_death" && (!player.alive || player.hp <= 0)) return;
    if (player.abilityDisabled) return;

    this.execute(player, context);
  }

  // ─── Event handlers ──────────────────────────────────────────────

  private onDamageDealt({ attackerId, victimId, amount, source }: DamageDealtPayload): void {
    this.fire(victimId, { trigger: "on_attacked", attackerId, amount, source });
    this.fire(attackerId, { trigger: "on_attack", victimId, amount, source });
  }

  private onTurnStarted({ playerId, turnNumber }: TurnStartedPayload): void {
    this.fire(playerId, { trigger: "on_turn_start", turnNumber });
  }

  private onPlayerDied({ victimId, killerId }: PlayerDiedPayload): void {
    this.fire(victimId, { trigger: "on_death", killerId });
    this.unregister(victimId);
    this.fire(killerId, { trigger: "on_kill", victimId });

    const broadcast = [...this.ctx.session.abilityRegistry.values()].filter(
      (registration) => registration.trigger === "on_character_death"
    );
    for (const registration of broadcast) {
      this.fire(registration.playerId, { trigger: "on_character_death", victimId, killerId });
    }
  }

  private onCharacterRevealed({ playerId, forced }: CharacterRevealedPayload): void {
    this.fire(playerId, { trigger: "on_reveal", forced });
  }
}
