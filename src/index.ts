// src/index.ts
export { standardizeFormula, standardizeName, standardizeOneName } from "./matching/standardize.js";
export { levenshtein, nameSimilarity } from "./matching/similarity.js";
export { matchCompound, statusLabel, DEFAULT_SIMILARITY_THRESHOLD } from "./matching/match_compound.js";
export {
  matchBatch,
  formatProgress,
  requireColumns,
  NAME_COLUMN,
  FORMULA_COLUMN,
  RESULT_COLUMNS,
  type MatchBatchOptions,
} from "./matching/match_batch.js";
export type * from "./matching/types.js";
export { KeggRestClient, parseCompoundEntry, parseFindResponse, type KeggClientOptions } from "./clients/kegg_client.js";
export { parseCompoundCsv, formatCompoundCsv } from "./table/csv.js";
export { addStandardizedColumns } from "./table/prepare.js";
export { loadConfig, type AppConfig } from "./config.js";
export * from "./errors.js";
