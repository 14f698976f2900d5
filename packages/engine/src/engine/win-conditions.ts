// ─── Win Condition Evaluator ───────────────────────────────────────
// Faction elimination plus one individual condition per neutral
// character. Which neutral conditions end the game by themselves is
// game data, not a uniform rule: see GAME_ENDING_NEUTRALS.

import type { Faction, Player, WinResult } from "../types/index.js";
import { isCharacterId, type CharacterId } from "./abilities/characters.js";
import type { EngineContext } from "./context.js";
import { EngineErrorCode } from "./errors.js";
import { deadCount, livingPlayers, neighborOf } from "./player.js";

export const BOB_EQUIPMENT_TARGET = 5;
export const CHARLES_DEAD_TARGET = 3;
export const BRYAN_VICTIM_HP = 13;
export const BRYAN_ZONE = "erstwhile_altar";
export const CATHERINE_LAST_STANDING = 2;
export const DAVID_RELICS: readonly string[] = [
  "talisman",
  "spear_of_longinus",
  "holy_robe",
  "silver_rosary",
];
export const DAVID_RELIC_TARGET = 3;

/** Neutrals whose condition ends the game as soon as it holds. */
export const GAME_ENDING_NEUTRALS: ReadonlySet<CharacterId> = new Set<CharacterId>([
  "bob",
  "charles",
  "bryan",
  "catherine",
  "david",
]);

export type WinEvent = "kill" | "game_ending" | "none";

/** The event that provoked a check, with its participants if any. */
export interface WinContext {
  readonly event: WinEvent;
  readonly killer?: Player | null;
  readonly victim?: Player | null;
}

type ArmedFaction = Exclude<Faction, "neutral">;

const NO_WINNER: WinResult = { gameOver: false, winningFaction: null, winnerIds: [] };

export class WinConditionEvaluator {
  constructor(private readonly ctx: EngineContext) {}

  /**
   * Records a death. Must run once per death, before the check that
   * the death provokes. A self-inflicted death is not a kill.
   */
  registerKill(killer: Player | null, victim: Player): void {
    const tracking = this.ctx.session.winTracking;
    const killerId = killer && killer.id !== victim.id ? killer.id : null;

    if (tracking.firstKillerId === null && killerId !== null) {
      tracking.firstKillerId = killerId;
    }
    if (tracking.firstDeathId === null) {
      tracking.firstDeathId = victim.id;
    }
    tracking.deaths.push({
      victimId: victim.id,
      killerId,
      victimHpMax: victim.hpMax,
      turnNumber: this.ctx.session.turnNumber,
    });
  }

  /**
   * The game is over when a faction has won by elimination, when both
   * armed factions are extinct at once (neither wins), or when a
   * game-ending neutral condition holds. Winners are then re-evaluated
   * under a game_ending context that keeps the provoking killer and
   * victim.
   */
  checkWinConditions(context: WinContext): WinResult {
    const hunters = this.livingCount("hunter");
    const shadows = this.livingCount("shadow");
    const winningFaction = this.winningFaction();
    const mutualExtinction = hunters === 0 && shadows === 0 && this.seated("hunter") && this.seated("shadow");

    const endingNeutral = this.neutrals().find(
      (player) =>
        isCharacterId(player.characterId) &&
        GAME_ENDING_NEUTRALS.has(player.characterId) &&
        this.neutralSatisfied(player, context, winningFaction)
    );

    if (winningFaction === null && !mutualExtinction && !endingNeutral) {
      return NO_WINNER;
    }

    const final: WinContext = { ...context, event: "game_ending" };
    const winnerIds = this.ctx.session.players
      .filter((player) =>
        player.faction === "neutral"
          ? this.neutralSatisfied(player, final, winningFaction)
          : player.faction === winningFaction
      )
      .map((player) => player.id);

    this.ctx.logger.info("Game over", {
      winningFaction,
      mutualExtinction,
      trigger: endingNeutral?.characterId ?? null,
      winnerIds,
    });
    return { gameOver: true, winningFaction, winnerIds };
  }

  /**
   * A faction wins iff it has a living member and the opposing one has
   * none. Both extinct is not a win for either side.
   */
  winningFaction(): ArmedFaction | null {
    const hunters = this.livingCount("hunter");
    const shadows = this.livingCount("shadow");
    if (hunters > 0 && shadows === 0) return "hunter";
    if (shadows > 0 && hunters === 0) return "shadow";
    return null;
  }

  /** Whether a neutral player's individual condition holds now. */
  neutralSatisfied(
    player: Player,
    context: WinContext,
    winningFaction: ArmedFaction | null = this.winningFaction()
  ): boolean {
    if (!isCharacterId(player.characterId)) {
      this.ctx.logger.warn(`No win condition for "${player.characterId}"; alive wins`, {
        code: EngineErrorCode.CONFIGURATION_GAP,
      });
      return player.alive;
    }
    const session = this.ctx.session;
    const tracking = session.winTracking;

    switch (player.characterId) {
      case "allie":
        return player.alive;
      case "bob":
        return player.alive && player.equipment.length >= BOB_EQUIPMENT_TARGET;
      case "charles":
        return (
          context.event !== "none" &&
          context.killer?.id === player.id &&
          deadCount(session) >= CHARLES_DEAD_TARGET
        );
      case "daniel":
        return tracking.firstKillerId === player.id || tracking.firstDeathId === player.id;
      case "agnes":
        return this.agnesSatisfied(player, context, winningFaction);
      case "bryan":
        return (
          tracking.deaths.some(
            (death) => death.killerId === player.id && death.victimHpMax >= BRYAN_VICTIM_HP
          ) ||
          (context.event === "game_ending" && player.position === BRYAN_ZONE)
        );
      case "catherine":
        return (
          tracking.firstDeathId === player.id ||
          (player.alive && livingPlayers(session).length <= CATHERINE_LAST_STANDING)
        );
      case "david":
        return this.relicCount(player) >= DAVID_RELIC_TARGET;

      // Characters printed for another faction: alive wins.
      default:
        return player.alive;
    }
  }

  // ─── Helpers ─────────────────────────────────────────────────────

  /**
   * Agnes wins with her right neighbor, or the left one under
   * Capriccio. A neighbor whose own condition depends on a neighbor
   * counts as not satisfied.
   */
  private agnesSatisfied(
    agnes: Player,
    context: WinContext,
    winningFaction: ArmedFaction | null
  ): boolean {
    const side = agnes.flags.capriccioActive ? "left" : "right";
    const neighbor = neighborOf(this.ctx.session, agnes, side);
    if (!neighbor || neighbor.id === agnes.id) return false;
    if (neighbor.characterId === "agnes") return false;
    if (neighbor.faction === "neutral") {
      return this.neutralSatisfied(neighbor, context, winningFaction);
    }
    return neighbor.faction === winningFaction;
  }

  private relicCount(player: Player): number {
    const held = new Set(player.equipment.map((card) => card.definitionId));
    return DAVID_RELICS.filter((relic) => held.has(relic)).length;
  }

  private neutrals(): Player[] {
    return this.ctx.session.players.filter((player) => player.faction === "neutral");
  }

  private livingCount(faction: Faction): number {
    return this.ctx.session.players.filter((player) => player.alive && player.faction === faction)
      .length;
  }

  private seated(faction: Faction): boolean {
    return this.ctx.session.players.some((player) => player.faction === faction);
  }
}
