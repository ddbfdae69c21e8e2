import path from "node:path";
import { ConfigurationError } from "../core/errors/errors";
import type { ConfigKeySpec } from "./config.types";

export const EMBEDDING_DIMENSION = 768;
export const BEAUTY_STANDARD_EMBEDDING_KEY = "beauty_standard_embedding";

const DEFAULT_DATA_DIR = "data";

export const BEAUTY_STANDARD_EMBEDDING: ConfigKeySpec = Object.freeze({
  key: BEAUTY_STANDARD_EMBEDDING_KEY,
  dimension: EMBEDDING_DIMENSION,
  envVar: "BEAUTY_STANDARD_EMBEDDING",
  pathEnvVar: "BEAUTY_STANDARD_EMBEDDING_PATH",
  defaultPath: path.join(DEFAULT_DATA_DIR, "beauty_standard_embedding.npy"),
});

const KNOWN_KEYS: ReadonlyMap<string, ConfigKeySpec> = new Map([
  [BEAUTY_STANDARD_EMBEDDING.key, BEAUTY_STANDARD_EMBEDDING],
]);

export function normalizeConfigKey(raw: string): string {
  const trimmed = typeof raw === "string" ? raw.trim() : "";
  if (trimmed === "") {
    throw new ConfigurationError("CONFIGURATION_ERROR config key must be non-empty");
  }
  return trimmed;
}

function toEnvName(key: string): string {
  return key.toUpperCase().replace(/[^A-Z0-9]+/g, "_");
}

// Keys outside the registry follow the same naming scheme as the built-in one.
export function specForKey(rawKey: string): ConfigKeySpec {
  const key = normalizeConfigKey(rawKey);
  const known = KNOWN_KEYS.get(key);
  if (known) {
    return known;
  }
  const envVar = toEnvName(key);
  return {
    key,
    dimension: EMBEDDING_DIMENSION,
    envVar,
    pathEnvVar: `${envVar}_PATH`,
    defaultPath: path.join(DEFAULT_DATA_DIR, `${key}.npy`),
  };
}
