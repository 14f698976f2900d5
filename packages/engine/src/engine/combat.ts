// ─── Combat Resolver ───────────────────────────────────────────────
// Attack rolls, damage application and death processing. Every hp
// loss in the game goes through applyDamage so that shields, events
// and death checks apply uniformly.

import type { DamageSource, Player } from "../types/index.js";
import type { EngineContext } from "./context.js";
import { transferAllEquipment } from "./equipment.js";
import { revealPlayer } from "./identity.js";
import { attackBonus, defenseBonus, hasEquipmentEffect, isAbilityLive } from "./player.js";

/** Result of one attack roll. */
export interface RollOutcome {
  readonly d6: number;
  readonly d4: number;
  /** The attacker rolls the four-sided die alone and cannot miss. */
  readonly noMiss: boolean;
  readonly missed: boolean;
  /** Damage from the dice alone, before equipment. */
  readonly baseDamage: number;
  /** Final damage; 0 on a miss or against a target already at 0 hp. */
  readonly damage: number;
}

/**
 * Whether this attacker uses the four-sided die alone: a revealed,
 * undisabled Valkyrie, or anyone holding a forced-single-die item.
 */
export function hasNoMissAttack(attacker: Player): boolean {
  if (hasEquipmentEffect(attacker, "forced_single_die")) return true;
  return attacker.characterId === "valkyrie" && isAbilityLive(attacker);
}

export class CombatResolver {
  constructor(private readonly ctx: EngineContext) {}

  /**
   * Rolls a six-sided and a four-sided die. Damage is their difference;
   * equal faces miss. Modifiers apply only to a hit, with a floor of 1.
   */
  rollAttack(attacker: Player, target: Player): RollOutcome {
    const d6 = this.ctx.dice.roll(6);
    const d4 = this.ctx.dice.roll(4);
    const noMiss = hasNoMissAttack(attacker);
    const missed = !noMiss && d6 === d4;
    const baseDamage = noMiss ? d4 : Math.abs(d6 - d4);

    if (missed || target.hp <= 0 || !target.alive) {
      return { d6, d4, noMiss, missed, baseDamage, damage: 0 };
    }

    const damage = Math.max(1, baseDamage + attackBonus(attacker) - defenseBonus(target));
    return { d6, d4, noMiss, missed, baseDamage, damage };
  }

  /** Rolls and, on a hit, applies the damage as an attack. */
  attack(attacker: Player, target: Player): RollOutcome {
    const outcome = this.rollAttack(attacker, target);
    this.ctx.logger.debug(`${attacker.name} attacks ${target.name}`, outcome);
    if (outcome.damage > 0) {
      this.applyDamage(attacker, target, outcome.damage, "attack");
    }
    return outcome;
  }

  /**
   * Removes hp from the target and raises damage-dealt, then processes
   * the death if hp reached 0. A shield (consumed) or damage immunity
   * absorbs the whole amount.
   *
   * @returns the damage actually dealt.
   */
  applyDamage(
    attacker: Player | null,
    target: Player,
    amount: number,
    source: DamageSource = "attack"
  ): number {
    if (!target.alive) {
      this.ctx.logger.warn(`Ignoring damage to dead player ${target.name}`);
      return 0;
    }
    if (amount <= 0) return 0;

    if (target.flags.damageImmune) {
      this.ctx.logger.debug(`${target.name} is immune to damage`);
      return 0;
    }
    if (target.flags.shielded) {
      target.flags.shielded = false;
      this.ctx.logger.debug(`${target.name}'s shield absorbed ${amount} damage`);
      return 0;
    }

    target.hp = Math.max(0, target.hp - amount);
    this.ctx.events.emit("damage-dealt", {
      attackerId: attacker?.id ?? null,
      victimId: target.id,
      amount,
      source,
      hpAfter: target.hp,
    });

    if (target.hp <= 0) {
      this.processDeath(target, attacker);
    }
    return amount;
  }

  /**
   * Marks the victim dead and reveals them if still hidden. A killer holding a
   * steal-on-kill item takes the victim's equipment before player-died
   * is raised. A second call on a dead victim does nothing.
   *
   * @returns false if the victim was already dead.
   */
  processDeath(victim: Player, killer: Player | null): boolean {
    if (!victim.alive) {
      this.ctx.logger.debug(`${victim.name} is already dead`);
      return false;
    }

    victim.alive = false;
    victim.hp = 0;
    revealPlayer(this.ctx, victim, true);

    if (killer && killer.id !== victim.id && hasEquipmentEffect(killer, "steal_equipment_on_kill")) {
      transferAllEquipment(this.ctx, victim, killer);
    }

    this.discardHand(victim);
    this.ctx.logger.info(`${victim.name} (${victim.characterName}) died`, {
      killer: killer?.name ?? null,
    });
    this.ctx.events.emit("player-died", { victimId: victim.id, killerId: killer?.id ?? null });
    return true;
  }

  private discardHand(player: Player): void {
    for (const card of player.hand.splice(0, player.hand.length)) {
      this.ctx.session.decks[card.deck].discard(card);
    }
  }
}
