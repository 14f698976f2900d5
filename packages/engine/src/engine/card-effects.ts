// ─── Card Effects ──────────────────────────────────────────────────
// Drawing, equipping and resolving instant and vision cards. Callers
// validate first; these functions assume a legal request.

import type {
  Card,
  DeckOrigin,
  InstantCard,
  InstantEffectKind,
  Player,
  VisionCard,
} from "../types/index.js";
import type { CombatResolver } from "./combat.js";
import type { EngineContext } from "./context.js";
import { equip, transferEquipment } from "./equipment.js";
import { hasEquipmentEffect, heal, isAbilityLive } from "./player.js";

/** Hp a Vampire Bat user recovers. */
export const DRAIN_HEAL = 1;

/** Instant kinds played at another player. */
export const TARGETED_INSTANTS: ReadonlySet<InstantEffectKind> = new Set<InstantEffectKind>([
  "damage_target_and_self",
  "drain",
  "steal_equipment",
]);

export interface CardOutcome {
  /** False when the card resolved without effect (blocked, ignored). */
  readonly applied: boolean;
  readonly description: string;
  readonly value: number;
}

/** Whether the Unknown's Deceit lets this receiver ignore a vision. */
export function mayIgnoreVision(receiver: Player): boolean {
  return receiver.characterId === "unknown" && receiver.ability.kind === "continuous" && isAbilityLive(receiver);
}

/** Whether a vision card's effect applies to this receiver. */
export function visionApplies(card: VisionCard, receiver: Player): boolean {
  return card.effect.factions === undefined || card.effect.factions.includes(receiver.faction);
}

export class CardEffects {
  constructor(
    private readonly ctx: EngineContext,
    private readonly combat: CombatResolver
  ) {}

  /**
   * Draws one card. Equipment goes straight into play; instants and
   * visions go to the hand.
   * @returns the card, or null when the deck is exhausted.
   */
  draw(player: Player, origin: DeckOrigin): Card | null {
    const card = this.ctx.session.decks[origin].draw();
    player.turn.hasDrawn = true;
    this.ctx.events.emit("card-drawn", { playerId: player.id, deck: origin, cardId: card?.id ?? null });

    if (!card) {
      this.ctx.logger.info(`The ${origin} deck is exhausted`);
      return null;
    }
    if (card.type === "equipment") {
      equip(this.ctx, player, card);
    } else {
      player.hand.push(card);
    }
    return card;
  }

  /** Resolves an instant from the player's hand and discards it. */
  playInstant(player: Player, card: InstantCard, target: Player | null): CardOutcome {
    this.removeFromHand(player, card);
    const outcome = this.resolveInstant(player, card, target);
    this.ctx.session.decks[card.deck].discard(card);
    this.ctx.logger.debug(`${player.name} played ${card.name}`, outcome);
    return outcome;
  }

  /**
   * Hands a vision to another player. The effect applies when the
   * receiver's faction is listed; Deceit lets the Unknown ignore it.
   */
  giveVision(giver: Player, card: VisionCard, receiver: Player, receiverLies = false): CardOutcome {
    this.removeFromHand(giver, card);
    const outcome = this.resolveVision(giver, card, receiver, receiverLies);
    this.ctx.session.decks[card.deck].discard(card);
    this.ctx.logger.debug(`${giver.name} gave ${card.name} to ${receiver.name}`, outcome);
    return outcome;
  }

  private resolveInstant(player: Player, card: InstantCard, target: Player | null): CardOutcome {
    const { kind, value } = card.effect;
    switch (kind) {
      case "heal_self": {
        const healed = heal(player, value);
        return { applied: true, description: `${player.name} healed ${healed}`, value: healed };
      }
      case "shield":
        player.flags.shielded = true;
        return { applied: true, description: `${player.name} is shielded`, value: 0 };
      case "damage_all_others": {
        let total = 0;
        for (const other of this.ctx.session.players) {
          if (other.id === player.id || !other.alive) continue;
          total += this.cardDamage(player, other, card, value);
        }
        return { applied: total > 0, description: `${card.name} dealt ${total} in total`, value: total };
      }
      case "damage_target_and_self": {
        if (!target) return this.missingTarget(card);
        const dealt = this.cardDamage(player, target, card, value);
        this.combat.applyDamage(null, player, value, "self");
        return { applied: true, description: `${card.name} dealt ${dealt} to ${target.name}`, value: dealt };
      }
      case "drain": {
        if (!target) return this.missingTarget(card);
        const dealt = this.cardDamage(player, target, card, value);
        const healed = dealt > 0 ? heal(player, DRAIN_HEAL) : 0;
        return {
          applied: dealt > 0,
          description: `${card.name} drained ${dealt} from ${target.name}, healing ${healed}`,
          value: dealt,
        };
      }
      case "steal_equipment": {
        if (!target) return this.missingTarget(card);
        const [first] = target.equipment;
        const stolen = first ? transferEquipment(this.ctx, target, player, first.id) : null;
        return stolen
          ? { applied: true, description: `${player.name} took ${stolen.name}`, value: 1 }
          : { applied: false, description: `${target.name} has no equipment`, value: 0 };
      }
    }
  }

  private resolveVision(giver: Player, card: VisionCard, receiver: Player, receiverLies: boolean): CardOutcome {
    if (!visionApplies(card, receiver)) {
      return { applied: false, description: `${receiver.name} shows no reaction`, value: 0 };
    }
    if (receiverLies && mayIgnoreVision(receiver)) {
      this.ctx.logger.debug(`${receiver.name} lied about ${card.name}`);
      return { applied: false, description: `${receiver.name} shows no reaction`, value: 0 };
    }

    const { kind, value } = card.effect;
    switch (kind) {
      case "vision_damage": {
        const dealt = this.combat.applyDamage(giver, receiver, value, "vision");
        return { applied: true, description: `${receiver.name} took ${dealt}`, value: dealt };
      }
      case "vision_heal": {
        const healed = heal(receiver, value);
        return { applied: true, description: `${receiver.name} healed ${healed}`, value: healed };
      }
    }
  }

  /** Damage from a card; a Talisman stops damage from black cards. */
  private cardDamage(user: Player, target: Player, card: Card, amount: number): number {
    if (card.deck === "black" && hasEquipmentEffect(target, "card_damage_immunity")) {
      this.ctx.logger.debug(`${target.name}'s talisman blocked ${card.name}`);
      return 0;
    }
    return this.combat.applyDamage(user, target, amount, "card");
  }

  private missingTarget(card: Card): CardOutcome {
    this.ctx.logger.warn(`${card.name} resolved without a target`);
    return { applied: false, description: `${card.name} needs a target`, value: 0 };
  }

  private removeFromHand(player: Player, card: Card): void {
    const index = player.hand.findIndex((held) => held.id === card.id);
    if (index !== -1) player.hand.splice(index, 1);
  }
}
