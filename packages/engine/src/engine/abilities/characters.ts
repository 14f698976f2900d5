// ─── Character Ids ─────────────────────────────────────────────────
// The closed set of characters the engine has rules for. Per-character
// dispatch switches over CharacterId, so a new character is a
// compile-time-checked addition rather than a silent default.

export const CHARACTER_IDS = [
  "emi",
  "franklin",
  "george",
  "fuka",
  "ellen",
  "gregor",
  "ultra_soul",
  "vampire",
  "werewolf",
  "unknown",
  "valkyrie",
  "wight",
  "allie",
  "bob",
  "charles",
  "daniel",
  "agnes",
  "bryan",
  "catherine",
  "david",
] as const;

export type CharacterId = (typeof CHARACTER_IDS)[number];

export function isCharacterId(id: string): id is CharacterId {
  const known: readonly string[] = CHARACTER_IDS;
  return known.includes(id);
}

/** Exhaustiveness guard for switches over closed unions. */
export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${String(value)}`);
}
