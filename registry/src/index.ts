export * from "./types.js";
export * from "./errors.js";
export { KeywordRegistry, getKeywordRegistry, normalizeKeyword, parseKeywordCatalog } from "./keywords.js";
