import { ConfigError } from "../core/errors";
import { DEFAULT_LOCK_TIMEOUT_MS } from "../sources/locker";

/** Default number of cascade branches persisted at once. */
export const DEFAULT_CASCADE_CONCURRENCY = 8;

/**
 * Settings read from the environment.
 * Next: pass to `tessera.engine(store, { config })` or `tessera.stores.mongo(...)`.
 */
export type TesseraConfig = {
  mongoUri: string | undefined;
  database: string | undefined;
  cascadeConcurrency: number;
  lockTimeoutMs: number;
  atomicCascade: boolean;
  debug: boolean;
};

type Env = Record<string, string | undefined>;

function readPositiveInt(env: Env, key: string, fallback: number): number {
  const raw = env[key]?.trim();
  if (raw === undefined || raw === "") return fallback;
  if (!/^\d+$/.test(raw)) {
    throw new ConfigError(`${key} must be a positive integer, got "${raw}"`);
  }
  const value = Number.parseInt(raw, 10);
  if (value <= 0) {
    throw new ConfigError(`${key} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function readFlag(env: Env, key: string): boolean {
  const raw = env[key]?.trim().toLowerCase();
  if (raw === undefined || raw === "") return false;
  if (raw === "true" || raw === "1") return true;
  if (raw === "false" || raw === "0") return false;
  throw new ConfigError(`${key} must be "true" or "false", got "${raw}"`);
}

function readString(env: Env, key: string): string | undefined {
  const raw = env[key]?.trim();
  return raw ? raw : undefined;
}

/** Read `TESSERA_*` settings; throws ConfigError on malformed values. */
export function readConfig(env: Env = process.env): TesseraConfig {
  return {
    mongoUri: readString(env, "TESSERA_MONGO_URI"),
    database: readString(env, "TESSERA_DATABASE"),
    cascadeConcurrency: readPositiveInt(
      env,
      "TESSERA_CASCADE_CONCURRENCY",
      DEFAULT_CASCADE_CONCURRENCY,
    ),
    lockTimeoutMs: readPositiveInt(env, "TESSERA_LOCK_TIMEOUT_MS", DEFAULT_LOCK_TIMEOUT_MS),
    atomicCascade: readFlag(env, "TESSERA_ATOMIC_CASCADE"),
    debug: readFlag(env, "TESSERA_DEBUG"),
  };
}
