// ─── Test Support ──────────────────────────────────────────────────
// Scripted dice and a ready-made context over the bundled game data,
// shared by the engine's tests and by scenario replays.

import type {
  Card,
  EquipmentCard,
  GameSession,
  InstantCard,
  Player,
  VisionCard,
} from "../types/index.js";
import {
  createDeckLookup,
  instantiateCard,
  loadBoard,
  loadCards,
  loadCharacters,
} from "../deck/catalog.js";
import type { EngineContext } from "./context.js";
import { EngineEventEmitter } from "./event-emitter.js";
import { createLogger } from "./logger.js";
import type { DiceRoller } from "./prng.js";
import { createRng } from "./prng.js";
import { createSession } from "./setup.js";

export interface ScriptedDice extends DiceRoller {
  /** Queues more faces. */
  push(...faces: number[]): void;
  readonly remaining: number;
}

/**
 * Dice that return the given faces in order, whatever the die size.
 * @throws {Error} when rolled with no face left, or a face does not fit the die.
 */
export function scriptedDice(...faces: number[]): ScriptedDice {
  const queue = [...faces];
  return {
    roll(sides) {
      const face = queue.shift();
      if (face === undefined) throw new Error(`No scripted face left for a d${sides}`);
      if (face < 1 || face > sides) throw new Error(`Scripted face ${face} does not fit a d${sides}`);
      return face;
    },
    push(...more) {
      queue.push(...more);
    },
    get remaining() {
      return queue.length;
    },
  };
}

/**
 * A context whose players hold the given characters, in seat order,
 * named after them ("emi", "vampire"…). Logging is silent.
 */
export function createTestContext(characterIds: readonly string[], dice: DiceRoller = scriptedDice()): EngineContext {
  const board = loadBoard();
  const session: GameSession = createSession({
    seats: characterIds.map((id) => ({ name: id })),
    characters: loadCharacters(),
    cards: loadCards(),
    board,
    rng: createRng(7),
    forcedCharacters: characterIds,
    sessionId: "test-session",
  });
  return {
    session,
    events: new EngineEventEmitter(),
    dice,
    logger: createLogger("Test", "silent"),
    deckLookup: createDeckLookup(board),
  };
}

/** @throws {Error} if the seat is empty. */
export function playerAt(ctx: EngineContext, seat: number): Player {
  const player = ctx.session.players[seat];
  if (!player) throw new Error(`No player in seat ${seat}`);
  return player;
}

/** A physical copy of a bundled card, outside any deck. */
export function testCard(definitionId: string, copy = 1): Card {
  const definition = loadCards().cards.find((card) => card.id === definitionId);
  if (!definition) throw new Error(`Unknown card "${definitionId}"`);
  return instantiateCard(definition, copy);
}

function isCardOfType<T extends Card["type"]>(card: Card, type: T): card is Extract<Card, { type: T }> {
  return card.type === type;
}

function testCardOfType<T extends Card["type"]>(type: T, definitionId: string, copy: number): Extract<Card, { type: T }> {
  const card = testCard(definitionId, copy);
  if (!isCardOfType(card, type)) throw new Error(`${definitionId} is not a ${type} card`);
  return card;
}

export function testEquipment(definitionId: string, copy = 1): EquipmentCard {
  return testCardOfType("equipment", definitionId, copy);
}

export function testInstant(definitionId: string, copy = 1): InstantCard {
  return testCardOfType("instant", definitionId, copy);
}

export function testVision(definitionId: string, copy = 1): VisionCard {
  return testCardOfType("vision", definitionId, copy);
}
