// ─── Active Abilities ──────────────────────────────────────────────
// Two-step contract: canActivateAbility() is a read-only verdict,
// activate() re-checks it and dispatches to the character's effect.

import type { AbilityOutcome, Player } from "../../types/index.js";
import type { ActionValidationResult } from "../action-validator.js";
import type { CombatResolver } from "../combat.js";
import type { EngineContext } from "../context.js";
import { EngineErrorCode } from "../errors.js";
import { isCharacterId } from "./characters.js";
import { runActiveEffect, type ActivationRequest } from "./active-effects.js";

/**
 * Checks, in order: the ability is active, not disabled, a once-only
 * ability is unspent, the holder is revealed if required, and the
 * holder is alive. Never mutates.
 */
export function canActivateAbility(player: Player): ActionValidationResult {
  const { ability } = player;
  if (ability.kind !== "active") {
    return { valid: false, reason: `${ability.name} is not an active ability` };
  }
  if (player.abilityDisabled) {
    return { valid: false, reason: `${ability.name} has been disabled` };
  }
  if (ability.usage === "once" && player.abilityUsed) {
    return { valid: false, reason: `${ability.name} has already been used` };
  }
  if (ability.requiresReveal && !player.revealed) {
    return { valid: false, reason: `${ability.name} requires ${player.name} to be revealed` };
  }
  if (!player.alive) {
    return { valid: false, reason: `${player.name} is dead` };
  }
  return { valid: true };
}

export class ActiveAbilities {
  constructor(
    private readonly ctx: EngineContext,
    private readonly combat: CombatResolver
  ) {}

  canActivate(player: Player): ActionValidationResult {
    return canActivateAbility(player);
  }

  /**
   * Activates the player's ability. Raises ability-activated on success
   * and ability-failed otherwise; a once-only ability is spent only
   * when the effect succeeds.
   */
  activate(player: Player, request: ActivationRequest): AbilityOutcome {
    const verdict = canActivateAbility(player);
    if (!verdict.valid) {
      return this.fail(player, verdict.reason);
    }
    if (!isCharacterId(player.characterId)) {
      this.ctx.logger.warn(`No ability rules for character "${player.characterId}"`, {
        code: EngineErrorCode.CONFIGURATION_GAP,
      });
      return this.fail(player, `${player.ability.name} has no rules`);
    }

    const outcome = runActiveEffect(player.characterId, player, request, {
      ctx: this.ctx,
      combat: this.combat,
    });
    if (!outcome.success) {
      return this.fail(player, outcome.description);
    }

    if (player.ability.usage === "once") {
      player.abilityUsed = true;
    }
    this.ctx.logger.info(`${player.name} used ${player.ability.name}`, { outcome });
    this.ctx.events.emit("ability-activated", {
      playerId: player.id,
      characterId: player.characterId,
      outcome,
    });
    return outcome;
  }

  private fail(player: Player, reason: string): AbilityOutcome {
    this.ctx.logger.debug(`${player.name}: ${reason}`);
    this.ctx.events.emit("ability-failed", { playerId: player.id, reason });
    return { success: false, description: reason, value: 0 };
  }
}
