export { MemoryRecordStore } from "./memory";
export { JsonFileRecordStore } from "./jsonFile";
export { persistRecipe } from "./persist";
export { parseStoredRecipe, formatAjvError } from "./validate";
export * from "./types";
