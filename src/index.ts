export * from "./pipeline";
export * from "./adapters";
export * from "./store";
export * from "./errors";
export { ingest, consoleLog } from "./ingest";
export type { IngestContext, IngestLog, IngestReport, StoreFailure } from "./ingest";
export { loadStoredRecipe, renderRecipe, renderRecipeList } from "./render";
export type { StoredRecipe } from "./render";
export { resolveConfig, parsePositiveInt, DEFAULT_STORE_DIR } from "./config";
export type { IngestConfig } from "./config";
