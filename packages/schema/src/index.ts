// ─── @umbral/schema ────────────────────────────────────────────────
// Canonical type definitions and Zod validation for the game data files
// (characters, cards, board) and for incoming action payloads.
// All types and schemas are re-exported from this single entry point.

export * from "./types/index.js";
export * from "./schema/index.js";
