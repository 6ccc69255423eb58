import path from "path";
import { InvalidArgumentError } from "commander";
import { DEFAULT_FETCH_TIMEOUT_MS } from "./adapters";

export const DEFAULT_STORE_DIR = "recipe-store";

export type IngestConfig = {
  storeDir: string;
  fetchTimeoutMs: number;
};

export type ConfigOptions = {
  store?: string;
  timeout?: number;
};

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError(`Expected a positive integer, got "${value}".`);
  }
  return parsed;
}

export function resolveConfig(options: ConfigOptions, cwd: string = process.cwd()): IngestConfig {
  return {
    storeDir: path.resolve(cwd, options.store ?? DEFAULT_STORE_DIR),
    fetchTimeoutMs: options.timeout ?? DEFAULT_FETCH_TIMEOUT_MS,
  };
}
