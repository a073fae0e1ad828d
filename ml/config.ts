import fs from "node:fs";
import path from "node:path";

import { configurationError, errorMessage } from "./matcher/errors";
import { assertValid, validateMatcherConfig } from "./schemas/validators";
import type { LogLevel } from "./logging/logger";

export type EmbeddingMode = "openai" | "hashed";
export type IndexBackend = "sqlite" | "supabase";

export type EmbeddingConfig = {
  mode: EmbeddingMode;
  model: string;
  dimensions: number;
};

export type IndexConfig = {
  backend: IndexBackend;
  sqlite_path: string;
  table: string;
  supabase_url?: string;
  supabase_key?: string;
};

export type CtcaeMatcherConfig = {
  collection_name: string;
  model: string;
  temperature: number;
  timeout_ms: number;
  term_k: number;
  grade_k: number;
  batch_size: number;
  openai_api_key?: string;
  log_level: LogLevel;
  prompt_path: string;
  terms_path: string;
  embedding: EmbeddingConfig;
  index: IndexConfig;
};

export type PartialMatcherConfig = Partial<Omit<CtcaeMatcherConfig, "embedding" | "index">> & {
  embedding?: Partial<EmbeddingConfig>;
  index?: Partial<IndexConfig>;
};

export const DEFAULT_CONFIG_PATH = path.join("config", "ctcae_matcher.json");

export function defaultConfig(cwd: string = process.cwd()): CtcaeMatcherConfig {
  return {
    collection_name: "ctcae_terms",
    model: "gpt-4o-mini",
    temperature: 0,
    timeout_ms: 60_000,
    term_k: 3,
    grade_k: 5,
    batch_size: 100,
    log_level: "info",
    prompt_path: path.resolve(cwd, "ml", "matcher", "prompts", "match_symptom.md"),
    terms_path: path.resolve(cwd, "data", "ctcae_processed.json"),
    embedding: {
      mode: "openai",
      model: "text-embedding-3-small",
      dimensions: 1536,
    },
    index: {
      backend: "sqlite",
      sqlite_path: path.resolve(cwd, "data", "ctcae_index.db"),
      table: "ctcae_documents",
    },
  };
}

type ConfigLayer = Record<string, unknown>;

function isPlainObject(value: unknown): value is ConfigLayer {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function withoutUndefined(layer: ConfigLayer): ConfigLayer {
  return Object.fromEntries(Object.entries(layer).filter(([, value]) => value !== undefined));
}

function mergeLayer(base: ConfigLayer, override: ConfigLayer): ConfigLayer {
  const merged: ConfigLayer = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const current = merged[key];
    merged[key] = isPlainObject(current) && isPlainObject(value) ? { ...current, ...value } : value;
  }
  return merged;
}

function parseInteger(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const parsed = Number(value);
  return Number.isInteger(parsed) ? parsed : undefined;
}

function envOverrides(env: NodeJS.ProcessEnv): ConfigLayer {
  return withoutUndefined({
    collection_name: env.CTCAE_COLLECTION || undefined,
    model: env.SYMPTOM_MATCHER_MODEL || undefined,
    timeout_ms: parseInteger(env.CTCAE_TIMEOUT_MS),
    openai_api_key: env.OPENAI_API_KEY || undefined,
    log_level: env.CTCAE_LOG_LEVEL || undefined,
    prompt_path: env.CTCAE_PROMPT_PATH || undefined,
    terms_path: env.CTCAE_TERMS_PATH || undefined,
    embedding: withoutUndefined({
      mode: env.CTCAE_EMBED_MODE || undefined,
      model: env.OPENAI_EMBED_MODEL || undefined,
      dimensions: parseInteger(env.CTCAE_EMBED_DIMENSIONS),
    }),
    index: withoutUndefined({
      backend: env.CTCAE_INDEX_BACKEND || undefined,
      sqlite_path: env.CTCAE_INDEX_DB_PATH || undefined,
      supabase_url: env.SUPABASE_URL || undefined,
      supabase_key: env.SUPABASE_SERVICE_ROLE_KEY || undefined,
    }),
  });
}

function readConfigFile(configPath: string): ConfigLayer {
  if (!fs.existsSync(configPath)) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(configPath, "utf8"));
  } catch (error) {
    throw configurationError(`Config file ${configPath} is not valid JSON: ${errorMessage(error)}`);
  }
  if (!isPlainObject(parsed)) {
    throw configurationError(`Config file ${configPath} must contain a JSON object`);
  }
  return parsed;
}

/**
 * Layers defaults, the optional JSON config file and environment variables,
 * then validates the result. Throws CONFIGURATION_INVALID on a bad result.
 */
export function loadConfig(
  params: {
    env?: NodeJS.ProcessEnv;
    configPath?: string;
    overrides?: PartialMatcherConfig;
    cwd?: string;
  } = {}
): CtcaeMatcherConfig {
  const env = params.env ?? process.env;
  const cwd = params.cwd ?? process.cwd();
  const configPath = path.resolve(cwd, params.configPath ?? env.CTCAE_CONFIG_PATH ?? DEFAULT_CONFIG_PATH);

  let config: ConfigLayer = defaultConfig(cwd);
  config = mergeLayer(config, readConfigFile(configPath));
  config = mergeLayer(config, envOverrides(env));
  if (params.overrides) {
    config = mergeLayer(config, params.overrides);
  }

  // invalid enum values from the environment surface here with their path
  assertValid(validateMatcherConfig, config, "CtcaeMatcherConfig");
  return config;
}

/**
 * Fails fast when the selected backends need credentials that are absent.
 */
export function assertRuntimeCredentials(config: CtcaeMatcherConfig): void {
  const missing: string[] = [];
  if (!config.openai_api_key) {
    missing.push("OPENAI_API_KEY");
  }
  if (config.index.backend === "supabase") {
    if (!config.index.supabase_url) missing.push("SUPABASE_URL");
    if (!config.index.supabase_key) missing.push("SUPABASE_SERVICE_ROLE_KEY");
  }
  if (missing.length > 0) {
    throw configurationError(`Missing required configuration: ${missing.join(", ")}`, missing);
  }
}
