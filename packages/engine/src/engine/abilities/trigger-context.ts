import type { DamageSource, PassiveTrigger, PlayerId } from "../../types/index.js";

/**
 * What a passive ability is told when it fires. One variant per
 * trigger key, carrying only what that trigger knows.
 */
export type TriggerContext =
  | {
      readonly trigger: "on_attacked";
      readonly attackerId: PlayerId | null;
      readonly amount: number;
      readonly source: DamageSource;
    }
  | {
      readonly trigger: "on_attack";
      readonly victimId: PlayerId;
      readonly amount: number;
      readonly source: DamageSource;
    }
  | { readonly trigger: "on_turn_start"; readonly turnNumber: number }
  | { readonly trigger: "on_kill"; readonly victimId: PlayerId }
  | { readonly trigger: "on_death"; readonly killerId: PlayerId | null }
  | {
      readonly trigger: "on_character_death";
      readonly victimId: PlayerId;
      readonly killerId: PlayerId | null;
    }
  | { readonly trigger: "on_reveal"; readonly forced: boolean };

