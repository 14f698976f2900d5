// ─── Board Types ───────────────────────────────────────────────────

import type { DeckOrigin } from "./card.js";

export type ZoneEffectKind = "weird_woods" | "erstwhile_altar";

export interface ZoneDefinition {
  readonly id: string;
  readonly name: string;
  /** Place on the movement track; move distance is measured on it. */
  readonly position: number;
  /** Attack range group: players in the same area can attack each other. */
  readonly area: number;
  readonly decks: readonly DeckOrigin[];
  readonly effect: ZoneEffectKind | null;
}

export interface BoardDefinition {
  readonly zones: readonly ZoneDefinition[];
}
