// ─── Engine Context ────────────────────────────────────────────────
// What every component is handed at construction. The session is
// swapped in place on a new game; components always read it through
// the context rather than caching it.

import type { GameSession } from "../types/index.js";
import type { DeckLookup } from "../deck/catalog.js";
import type { EngineEventEmitter } from "./event-emitter.js";
import type { Logger } from "./logger.js";
import type { DiceRoller } from "./prng.js";

export interface EngineContext {
  session: GameSession;
  readonly events: EngineEventEmitter;
  readonly dice: DiceRoller;
  readonly logger: Logger;
  readonly deckLookup: DeckLookup;
}
