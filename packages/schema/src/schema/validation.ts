// ─── Schema Validation ─────────────────────────────────────────────
// Zod schemas for runtime validation of game data files and incoming
// action payloads. This is the "parse boundary": raw JSON enters,
// typed data exits.

import { z } from "zod";
import type { CharacterCatalog, CharacterDefinition } from "../types/character.js";
import { FACTIONS } from "../types/character.js";
import type { CardCatalog, CardDefinition } from "../types/card.js";
import { DECK_ORIGINS } from "../types/card.js";
import type { BoardDefinition, ZoneDefinition } from "../types/board.js";
import type { EngineAction } from "../types/action.js";
import { ACTION_KINDS } from "../types/action.js";

// ─── Primitives ────────────────────────────────────────────────────

const FactionSchema = z.enum(FACTIONS);
const DeckOriginSchema = z.enum(DECK_ORIGINS);
const IdSchema = z.string().regex(/^[a-z0-9_]+$/);
const PlayerIdSchema = z.number().int().min(0);

// ─── Characters ────────────────────────────────────────────────────

const AbilitySchema = z.object({
  name: z.string().min(1),
  description: z.string().min(1),
  kind: z.enum(["passive", "active", "continuous"]),
  trigger: z.string().min(1),
  usage: z.enum(["unlimited", "once"]),
  requiresReveal: z.boolean(),
});

const CharacterSchema: z.ZodType<CharacterDefinition, z.ZodTypeDef, unknown> = z.object({
  id: IdSchema,
  name: z.string().min(1),
  faction: FactionSchema,
  hpMax: z.number().int().min(1),
  ability: AbilitySchema,
  winCondition: z.string().min(1),
});

export const CharacterCatalogSchema: z.ZodType<CharacterCatalog, z.ZodTypeDef, unknown> = z
  .object({ characters: z.array(CharacterSchema).min(1) })
  .refine((catalog) => hasUniqueIds(catalog.characters), {
    message: "character ids must be unique",
    path: ["characters"],
  });

// ─── Cards ─────────────────────────────────────────────────────────

function effectSchema<K extends z.ZodTypeAny>(kind: K) {
  return z.object({
    kind,
    value: z.number().int().min(0),
    factions: z.array(FactionSchema).min(1).optional(),
  });
}

const CardBase = {
  id: IdSchema,
  name: z.string().min(1),
  deck: DeckOriginSchema,
  copies: z.number().int().min(1),
};

const CardSchema: z.ZodType<CardDefinition, z.ZodTypeDef, unknown> = z.discriminatedUnion("type", [
  z.object({
    ...CardBase,
    type: z.literal("equipment"),
    effect: effectSchema(
      z.enum([
        "attack_bonus",
        "defense_bonus",
        "forced_single_die",
        "steal_equipment_on_kill",
        "ranged_attack",
        "card_damage_immunity",
        "zone_damage_immunity",
      ])
    ),
  }),
  z.object({
    ...CardBase,
    type: z.literal("instant"),
    effect: effectSchema(
      z.enum(["heal_self", "shield", "damage_all_others", "damage_target_and_self", "drain", "steal_equipment"])
    ),
  }),
  z.object({
    ...CardBase,
    type: z.literal("vision"),
    effect: effectSchema(z.enum(["vision_damage", "vision_heal"])),
  }),
]);

export const CardCatalogSchema: z.ZodType<CardCatalog, z.ZodTypeDef, unknown> = z
  .object({ cards: z.array(CardSchema).min(1) })
  .refine((catalog) => hasUniqueIds(catalog.cards), {
    message: "card ids must be unique",
    path: ["cards"],
  });

// ─── Board ─────────────────────────────────────────────────────────

const ZoneSchema: z.ZodType<ZoneDefinition, z.ZodTypeDef, unknown> = z.object({
  id: IdSchema,
  name: z.string().min(1),
  position: z.number().int().min(0),
  area: z.number().int().min(0),
  decks: z.array(DeckOriginSchema),
  effect: z.enum(["weird_woods", "erstwhile_altar"]).nullable(),
});

export const BoardSchema: z.ZodType<BoardDefinition, z.ZodTypeDef, unknown> = z
  .object({ zones: z.array(ZoneSchema).min(2) })
  .refine((board) => hasUniqueIds(board.zones), {
    message: "zone ids must be unique",
    path: ["zones"],
  })
  .refine(
    (board) => new Set(board.zones.map((zone) => zone.position)).size === board.zones.length,
    { message: "zone positions must be unique", path: ["zones"] }
  );

// ─── Actions ───────────────────────────────────────────────────────

const ActionSchema: z.ZodType<EngineAction, z.ZodTypeDef, unknown> = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("roll_movement"), playerId: PlayerIdSchema }),
  z.object({ kind: z.literal("move"), playerId: PlayerIdSchema, zoneId: z.string().min(1) }),
  z.object({ kind: z.literal("draw_card"), playerId: PlayerIdSchema, deck: DeckOriginSchema }),
  z.object({ kind: z.literal("attack"), playerId: PlayerIdSchema, targetId: PlayerIdSchema }),
  z.object({
    kind: z.literal("play_card"),
    playerId: PlayerIdSchema,
    cardId: z.string().min(1),
    targetId: PlayerIdSchema.optional(),
  }),
  z.object({
    kind: z.literal("give_vision"),
    playerId: PlayerIdSchema,
    cardId: z.string().min(1),
    targetId: PlayerIdSchema,
    receiverLies: z.boolean().optional(),
  }),
  z.object({
    kind: z.literal("use_zone"),
    playerId: PlayerIdSchema,
    targetId: PlayerIdSchema,
    choice: z.enum(["damage", "heal"]).optional(),
    cardId: z.string().min(1).optional(),
  }),
  z.object({
    kind: z.literal("activate_ability"),
    playerId: PlayerIdSchema,
    targets: z.array(PlayerIdSchema),
    zoneId: z.string().min(1).optional(),
    cardId: z.string().min(1).optional(),
  }),
  z.object({ kind: z.literal("reveal"), playerId: PlayerIdSchema }),
  z.object({ kind: z.literal("end_turn"), playerId: PlayerIdSchema }),
]);

/** Outcome of parsing an untrusted action payload. */
export type ActionParseResult =
  | { readonly ok: true; readonly action: EngineAction }
  | { readonly ok: false; readonly reason: string };

/**
 * Parses an untrusted action payload (e.g. off the wire).
 * Unknown action identifiers are a rule violation, not an exception.
 */
export function parseAction(raw: unknown): ActionParseResult {
  const kind =
    raw !== null && typeof raw === "object" && "kind" in raw ? raw.kind : undefined;
  if (typeof kind !== "string" || !isActionKind(kind)) {
    return { ok: false, reason: `Unknown action: ${String(kind)}` };
  }

  const result = ActionSchema.safeParse(raw);
  if (!result.success) {
    return { ok: false, reason: `Malformed ${kind} action: ${formatIssues(result.error).join("; ")}` };
  }
  return { ok: true, action: result.data };
}

// ─── Parse entry points ────────────────────────────────────────────

/**
 * Parses raw JSON into a validated character catalog.
 * Throws a ZodError with detailed issues on failure.
 */
export function parseCharacterCatalog(raw: unknown): CharacterCatalog {
  return CharacterCatalogSchema.parse(raw);
}

export function safeParseCharacterCatalog(
  raw: unknown
): z.SafeParseReturnType<unknown, CharacterCatalog> {
  return CharacterCatalogSchema.safeParse(raw);
}

export function parseCardCatalog(raw: unknown): CardCatalog {
  return CardCatalogSchema.parse(raw);
}

export function safeParseCardCatalog(raw: unknown): z.SafeParseReturnType<unknown, CardCatalog> {
  return CardCatalogSchema.safeParse(raw);
}

export function parseBoard(raw: unknown): BoardDefinition {
  return BoardSchema.parse(raw);
}

export function safeParseBoard(raw: unknown): z.SafeParseReturnType<unknown, BoardDefinition> {
  return BoardSchema.safeParse(raw);
}

/** Formats Zod issues as `path: message` lines. */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
}

// ─── Helpers ───────────────────────────────────────────────────────

function hasUniqueIds(items: readonly { readonly id: string }[]): boolean {
  return new Set(items.map((item) => item.id)).size === items.length;
}

function isActionKind(kind: string): kind is EngineAction["kind"] {
  const known: readonly string[] = ACTION_KINDS;
  return known.includes(kind);
}
