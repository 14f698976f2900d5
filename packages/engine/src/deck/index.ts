export { Deck } from "./deck.js";
export {
  loadCharacters,
  loadCards,
  loadBoard,
  readBundledData,
  createCharacterLookup,
  createDeckLookup,
  instantiateDeck,
  instantiateCard,
  type CharacterLookup,
  type DeckLookup,
} from "./catalog.js";
