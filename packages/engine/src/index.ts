// ─── @umbral/engine ────────────────────────────────────────────────
// Rule engine for a secret-identity board game. Pure TypeScript, no
// framework dependencies. Re-exports the public types, the engine
// facade and its components.

export * from "./types/index.js";
export * from "./engine/index.js";
export * from "./deck/index.js";
