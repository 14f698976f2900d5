// ─── Actions ───────────────────────────────────────────────────────
// Everything a driver (human UI, bot, network peer) can ask the engine
// to do. Each variant carries exactly the data it needs.

import type { CardInstanceId, DeckOrigin } from "./card.js";

export type PlayerId = number;

export type ZoneChoice = "damage" | "heal";

export type EngineAction =
  | { readonly kind: "roll_movement"; readonly playerId: PlayerId }
  | { readonly kind: "move"; readonly playerId: PlayerId; readonly zoneId: string }
  | { readonly kind: "draw_card"; readonly playerId: PlayerId; readonly deck: DeckOrigin }
  | { readonly kind: "attack"; readonly playerId: PlayerId; readonly targetId: PlayerId }
  | {
      readonly kind: "play_card";
      readonly playerId: PlayerId;
      readonly cardId: CardInstanceId;
      readonly targetId?: PlayerId;
    }
  | {
      readonly kind: "give_vision";
      readonly playerId: PlayerId;
      readonly cardId: CardInstanceId;
      readonly targetId: PlayerId;
      /** Only honoured when the receiver may lie (Deceit). */
      readonly receiverLies?: boolean;
    }
  | {
      readonly kind: "use_zone";
      readonly playerId: PlayerId;
      readonly targetId: PlayerId;
      /** Weird Woods only. */
      readonly choice?: ZoneChoice;
      /** Erstwhile Altar only: which equipment to take (defaults to the first). */
      readonly cardId?: CardInstanceId;
    }
  | {
      readonly kind: "activate_ability";
      readonly playerId: PlayerId;
      readonly targets: readonly PlayerId[];
      readonly zoneId?: string;
      readonly cardId?: CardInstanceId;
    }
  | { readonly kind: "reveal"; readonly playerId: PlayerId }
  | { readonly kind: "end_turn"; readonly playerId: PlayerId };

export type ActionKind = EngineAction["kind"];

export const ACTION_KINDS = [
  "roll_movement",
  "move",
  "draw_card",
  "attack",
  "play_card",
  "give_vision",
  "use_zone",
  "activate_ability",
  "reveal",
  "end_turn",
] as const satisfies readonly ActionKind[];
