// ─── Identity ──────────────────────────────────────────────────────
// Revealing a secret character, voluntarily or by force.

import type { Player } from "../types/index.js";
import type { EngineContext } from "./context.js";

/**
 * Flips the player's card face up and announces it.
 * @returns false if the player was already revealed (nothing emitted).
 */
export function revealPlayer(ctx: EngineContext, player: Player, forced: boolean): boolean {
  if (player.revealed) return false;
  player.revealed = true;
  ctx.logger.info(`${player.name} is revealed as ${player.characterName}`, { forced });
  ctx.events.emit("character-revealed", {
    playerId: player.id,
    characterId: player.characterId,
    faction: player.faction,
    ability: player.ability,
    forced,
  });
  return true;
}
