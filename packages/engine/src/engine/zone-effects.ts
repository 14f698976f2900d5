// ─── Zone Effects ──────────────────────────────────────────────────
// Zones without a deck carry an effect instead, usable once per turn
// by the player standing there.

import type { Player, ZoneChoice, ZoneEffectKind } from "../types/index.js";
import type { CardOutcome } from "./card-effects.js";
import type { CombatResolver } from "./combat.js";
import type { EngineContext } from "./context.js";
import { transferEquipment } from "./equipment.js";
import { hasEquipmentEffect, heal } from "./player.js";

export const WEIRD_WOODS_DAMAGE = 2;
export const WEIRD_WOODS_HEAL = 1;

export interface ZoneRequest {
  readonly target: Player;
  readonly choice?: ZoneChoice;
  readonly cardId?: string;
}

export class ZoneEffects {
  constructor(
    private readonly ctx: EngineContext,
    private readonly combat: CombatResolver
  ) {}

  use(player: Player, effect: ZoneEffectKind, request: ZoneRequest): CardOutcome {
    player.turn.hasUsedZone = true;
    switch (effect) {
      case "weird_woods":
        return this.weirdWoods(player, request);
      case "erstwhile_altar":
        return this.erstwhileAltar(player, request);
    }
  }

  /** Two damage or one heal; a Fortune Brooch stops the damage. */
  private weirdWoods(player: Player, { target, choice = "damage" }: ZoneRequest): CardOutcome {
    if (choice === "heal") {
      const healed = heal(target, WEIRD_WOODS_HEAL);
      return { applied: healed > 0, description: `${target.name} healed ${healed}`, value: healed };
    }
    if (hasEquipmentEffect(target, "zone_damage_immunity")) {
      return { applied: false, description: `${target.name}'s brooch turned the woods aside`, value: 0 };
    }
    const dealt = this.combat.applyDamage(player, target, WEIRD_WOODS_DAMAGE, "zone");
    return { applied: dealt > 0, description: `The woods dealt ${dealt} to ${target.name}`, value: dealt };
  }

  /** Takes the named equipment card, or the target's first one. */
  private erstwhileAltar(player: Player, { target, cardId }: ZoneRequest): CardOutcome {
    const chosen = cardId ?? target.equipment[0]?.id;
    const taken = chosen === undefined ? null : transferEquipment(this.ctx, target, player, chosen);
    if (!taken) {
      return { applied: false, description: `${target.name} has nothing to take`, value: 0 };
    }
    return { applied: true, description: `${player.name} took ${taken.name} from ${target.name}`, value: 1 };
  }
}
