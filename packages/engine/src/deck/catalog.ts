// ─── Game Data Catalog ─────────────────────────────────────────────
// Loads the bundled character, card and board data through the schema
// parse boundary and turns card definitions into physical cards.

import {
  formatIssues,
  safeParseBoard,
  safeParseCardCatalog,
  safeParseCharacterCatalog,
  type BoardDefinition,
  type Card,
  type CardCatalog,
  type CardDefinition,
  type CharacterCatalog,
  type CharacterDefinition,
  type DeckOrigin,
} from "@umbral/schema";
import { readFileSync } from "node:fs";
import type { z } from "zod";
import { DataParseError } from "../engine/errors.js";

/** Lookup consumed by setup and the win evaluator. */
export type CharacterLookup = (characterId: string) => CharacterDefinition | undefined;

/** Which decks a zone offers. Supplied by the board configuration. */
export type DeckLookup = (zoneId: string) => readonly DeckOrigin[];

/** Reads one of the bundled files in `packages/engine/data`. */
export function readBundledData(file: "characters.json" | "cards.json" | "board.json"): unknown {
  const url = new URL(`../../data/${file}`, import.meta.url);
  const parsed: unknown = JSON.parse(readFileSync(url, "utf8"));
  return parsed;
}

function unwrap<T>(label: string, result: z.SafeParseReturnType<unknown, T>): T {
  if (result.success) return result.data;
  const issues = formatIssues(result.error);
  throw new DataParseError(`Invalid ${label}: ${issues.length} issue(s)`, issues);
}

/**
 * Validates raw JSON into a character catalog.
 * @throws {DataParseError} if the data does not conform to the schema.
 */
export function loadCharacters(raw: unknown = readBundledData("characters.json")): CharacterCatalog {
  return unwrap("character catalog", safeParseCharacterCatalog(raw));
}

/** @throws {DataParseError} */
export function loadCards(raw: unknown = readBundledData("cards.json")): CardCatalog {
  return unwrap("card catalog", safeParseCardCatalog(raw));
}

/** @throws {DataParseError} */
export function loadBoard(raw: unknown = readBundledData("board.json")): BoardDefinition {
  return unwrap("board", safeParseBoard(raw));
}

export function createCharacterLookup(catalog: CharacterCatalog): CharacterLookup {
  const byId = new Map(catalog.characters.map((character) => [character.id, character]));
  return (characterId) => byId.get(characterId);
}

export function createDeckLookup(board: BoardDefinition): DeckLookup {
  const byId = new Map(board.zones.map((zone) => [zone.id, zone.decks]));
  return (zoneId) => byId.get(zoneId) ?? [];
}

/**
 * Instantiates every physical copy of the definitions that belong to
 * the given deck. Instance ids are `<definition>#<copy>`.
 */
export function instantiateDeck(catalog: CardCatalog, origin: DeckOrigin): Card[] {
  const cards: Card[] = [];
  for (const definition of catalog.cards) {
    if (definition.deck !== origin) continue;
    for (let copy = 1; copy <= definition.copies; copy++) {
      cards.push(instantiateCard(definition, copy));
    }
  }
  return cards;
}

export function instantiateCard(definition: CardDefinition, copy: number): Card {
  const base = {
    id: `${definition.id}#${copy}`,
    definitionId: definition.id,
    name: definition.name,
    deck: definition.deck,
  };
  switch (definition.type) {
    case "equipment":
      return { ...base, type: definition.type, effect: definition.effect };
    case "instant":
      return { ...base, type: definition.type, effect: definition.effect };
    case "vision":
      return { ...base, type: definition.type, effect: definition.effect };
  }
}
