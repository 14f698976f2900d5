export {
  CharacterCatalogSchema,
  CardCatalogSchema,
  BoardSchema,
  parseAction,
  parseCharacterCatalog,
  safeParseCharacterCatalog,
  parseCardCatalog,
  safeParseCardCatalog,
  parseBoard,
  safeParseBoard,
  formatIssues,
  type ActionParseResult,
} from "./validation.js";
