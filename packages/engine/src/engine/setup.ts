// ─── Game Setup ────────────────────────────────────────────────────
// Deals secret characters by player count and builds a fresh session.
// Nothing here runs after the first turn starts.

import type {
  BoardDefinition,
  CardCatalog,
  CharacterCatalog,
  CharacterDefinition,
  DeckOrigin,
  Faction,
  GameSession,
} from "../types/index.js";
import { Deck } from "../deck/deck.js";
import { createCharacterLookup, instantiateDeck } from "../deck/catalog.js";
import { EngineError, EngineErrorCode } from "./errors.js";
import { createPlayer, type SeatInfo } from "./player.js";
import type { SeededRng } from "./prng.js";

export const MIN_PLAYERS = 4;
export const MAX_PLAYERS = 8;
/** A forced deal may seat fewer players than a random one. */
export const MIN_FORCED_PLAYERS = 2;

/** Characters dealt per faction, keyed by player count. */
export const FACTION_DISTRIBUTION: Readonly<Record<number, Readonly<Record<Faction, number>>>> = {
  4: { hunter: 2, shadow: 2, neutral: 0 },
  5: { hunter: 2, shadow: 2, neutral: 1 },
  6: { hunter: 2, shadow: 2, neutral: 2 },
  7: { hunter: 2, shadow: 2, neutral: 3 },
  8: { hunter: 3, shadow: 3, neutral: 2 },
};

export interface SetupOptions {
  readonly seats: readonly SeatInfo[];
  readonly characters: CharacterCatalog;
  readonly cards: CardCatalog;
  readonly board: BoardDefinition;
  readonly rng: SeededRng;
  /** Character ids in seat order; skips the random deal. */
  readonly forcedCharacters?: readonly string[];
  readonly sessionId?: string;
}

/**
 * Picks characters per faction with the RNG, then shuffles them
 * across seats.
 *
 * @throws {EngineError} INVALID_SETUP for an unsupported player count
 *         or a catalog too small for the distribution.
 */
export function dealCharacters(
  catalog: CharacterCatalog,
  playerCount: number,
  rng: SeededRng
): CharacterDefinition[] {
  const distribution = FACTION_DISTRIBUTION[playerCount];
  if (!distribution) {
    throw new EngineError(
      `Unsupported player count ${playerCount} (expected ${MIN_PLAYERS}-${MAX_PLAYERS})`,
      EngineErrorCode.INVALID_SETUP,
      { playerCount }
    );
  }

  const chosen: CharacterDefinition[] = [];
  for (const [faction, needed] of Object.entries(distribution)) {
    const pool = rng.shuffle(catalog.characters.filter((character) => character.faction === faction));
    if (pool.length < needed) {
      throw new EngineError(
        `Need ${needed} ${faction} character(s), catalog has ${pool.length}`,
        EngineErrorCode.INVALID_SETUP,
        { faction, needed }
      );
    }
    chosen.push(...pool.slice(0, needed));
  }
  return rng.shuffle(chosen);
}

function forcedDeal(catalog: CharacterCatalog, ids: readonly string[], seatCount: number): CharacterDefinition[] {
  if (ids.length !== seatCount) {
    throw new EngineError(
      `Forced deal names ${ids.length} character(s) for ${seatCount} seat(s)`,
      EngineErrorCode.INVALID_SETUP
    );
  }
  const lookup = createCharacterLookup(catalog);
  return ids.map((id) => {
    const character = lookup(id);
    if (!character) {
      throw new EngineError(`Unknown character "${id}"`, EngineErrorCode.INVALID_SETUP, {
        characterId: id,
      });
    }
    return character;
  });
}

function buildDecks(cards: CardCatalog, rng: SeededRng): Record<DeckOrigin, Deck> {
  return {
    white: new Deck("white", instantiateDeck(cards, "white"), rng),
    black: new Deck("black", instantiateDeck(cards, "black"), rng),
    green: new Deck("green", instantiateDeck(cards, "green"), rng),
  };
}

/**
 * Creates a session: players at full hp, unrevealed and off the board,
 * shuffled decks, empty win tracking and ability registry. Player ids
 * are seat indices.
 *
 * @throws {EngineError} INVALID_SETUP before any state exists.
 */
export function createSession(options: SetupOptions): GameSession {
  const { seats, rng, forcedCharacters } = options;
  const minimum = forcedCharacters ? MIN_FORCED_PLAYERS : MIN_PLAYERS;
  if (seats.length < minimum || seats.length > MAX_PLAYERS) {
    throw new EngineError(
      `A game needs ${minimum}-${MAX_PLAYERS} players, got ${seats.length}`,
      EngineErrorCode.INVALID_SETUP,
      { playerCount: seats.length }
    );
  }

  const dealt = forcedCharacters
    ? forcedDeal(options.characters, forcedCharacters, seats.length)
    : dealCharacters(options.characters, seats.length, rng);

  const players = seats.map((seat, index) => {
    const character = dealt[index];
    if (!character) {
      throw new EngineError(`No character dealt to seat ${index}`, EngineErrorCode.INVALID_SETUP);
    }
    return createPlayer(index, seat, character);
  });

  return {
    id: options.sessionId ?? `game-${rng.nextInt(0, 0x7fffffff).toString(36)}`,
    players,
    board: options.board,
    decks: buildDecks(options.cards, rng),
    phase: "movement",
    currentPlayerIndex: 0,
    turnNumber: 1,
    status: { kind: "in_progress" },
    winTracking: { firstKillerId: null, firstDeathId: null, deaths: [] },
    abilityRegistry: new Map(),
  };
}
