// ─── Equipment ─────────────────────────────────────────────────────
// Equipment is permanent until explicitly moved. Every change raises
// equipment-changed so the win evaluator can re-check.

import type { EquipmentCard, Player } from "../types/index.js";
import type { EngineContext } from "./context.js";

export function equip(ctx: EngineContext, player: Player, card: EquipmentCard): void {
  player.equipment.push(card);
  ctx.events.emit("equipment-changed", { playerId: player.id, cardId: card.id, change: "gained" });
}

/**
 * Moves one equipment card between players.
 * @returns the moved card, or null if `from` does not hold it.
 */
export function transferEquipment(
  ctx: EngineContext,
  from: Player,
  to: Player,
  cardId: string
): EquipmentCard | null {
  const index = from.equipment.findIndex((card) => card.id === cardId);
  if (index === -1) return null;
  const [card] = from.equipment.splice(index, 1);
  if (!card) return null;
  ctx.events.emit("equipment-changed", { playerId: from.id, cardId: card.id, change: "lost" });
  equip(ctx, to, card);
  return card;
}

/** Moves every equipment card; returns how many moved. */
export function transferAllEquipment(ctx: EngineContext, from: Player, to: Player): number {
  const ids = from.equipment.map((card) => card.id);
  for (const id of ids) {
    transferEquipment(ctx, from, to, id);
  }
  return ids.length;
}
