import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import TOML, { type JsonMap } from "@iarna/toml";
import type { ApiConfig, AppConfig, FeedConfig, LogLevel, ServerConfig, StoreConfig } from "@tidetable/contracts";
import { DEFAULT_CONFIG } from "./defaults.js";
import { MAX_CAPACITY } from "./store.js";

export const DEFAULT_CONFIG_PATH = path.join(os.homedir(), ".tidetable", "config.toml");

export interface PartialAppConfigInput {
  api?: Partial<ApiConfig>;
  store?: Partial<StoreConfig>;
  feed?: Partial<FeedConfig>;
  server?: Partial<ServerConfig>;
}

type ConfigSectionInput = Record<string, unknown>;

const LOG_LEVELS: LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function toFiniteNumber(value: unknown): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

function positiveIntOrDefault(value: unknown, fallback: number): number {
  const numeric = toFiniteNumber(value);
  if (numeric === null || numeric <= 0) return fallback;
  return Math.round(numeric);
}

function positiveMsOrDefault(value: unknown, fallback: number): number {
  const numeric = toFiniteNumber(value);
  if (numeric === null || numeric <= 0) return fallback;
  return Math.max(1, Math.round(numeric));
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function sectionOf(value: unknown): ConfigSectionInput {
  return isPlainObject(value) ? value : {};
}

function trimmedOrDefault(value: unknown, fallback: string): string {
  return typeof value === "string" && value.trim() ? value.trim() : fallback;
}

function mergeApi(input: ConfigSectionInput): ApiConfig {
  const defaults = DEFAULT_CONFIG.api;
  return {
    baseUrl: trimmedOrDefault(input.baseUrl, defaults.baseUrl),
    // TOML station ids such as 0113 may arrive as numbers
    stationId:
      typeof input.stationId === "number" ? String(input.stationId) : trimmedOrDefault(input.stationId, defaults.stationId),
    durationDays: positiveIntOrDefault(input.durationDays, defaults.durationDays),
    subscriptionKey: typeof input.subscriptionKey === "string" ? input.subscriptionKey.trim() : defaults.subscriptionKey,
    timeoutMs: positiveMsOrDefault(input.timeoutMs, defaults.timeoutMs),
  };
}

function mergeStore(input: ConfigSectionInput): StoreConfig {
  const defaults = DEFAULT_CONFIG.store;
  return {
    capacity: Math.min(MAX_CAPACITY, positiveIntOrDefault(input.capacity, defaults.capacity)),
    maxDepth: Math.max(2, positiveIntOrDefault(input.maxDepth, defaults.maxDepth)),
  };
}

function mergeFeed(input: ConfigSectionInput): FeedConfig {
  const defaults = DEFAULT_CONFIG.feed;
  return {
    path: typeof input.path === "string" ? input.path.trim() : defaults.path,
    watch: typeof input.watch === "boolean" ? input.watch : defaults.watch,
    debounceMs: positiveMsOrDefault(input.debounceMs, defaults.debounceMs),
  };
}

function mergeServer(input: ConfigSectionInput): ServerConfig {
  const defaults = DEFAULT_CONFIG.server;
  const port = positiveIntOrDefault(input.port, defaults.port);
  const logLevel = String(input.logLevel ?? "").trim().toLowerCase();
  return {
    host: trimmedOrDefault(input.host, defaults.host),
    port: port <= 65_535 ? port : defaults.port,
    logLevel: isLogLevel(logLevel) ? logLevel : defaults.logLevel,
  };
}

/**
 * Normalizes any partial or untrusted config shape into a complete AppConfig.
 * Missing, mistyped and out-of-range values fall back to the defaults.
 */
export function mergeConfig(input: PartialAppConfigInput | Record<string, unknown> = {}): AppConfig {
  return {
    api: mergeApi(sectionOf(input.api)),
    store: mergeStore(sectionOf(input.store)),
    feed: mergeFeed(sectionOf(input.feed)),
    server: mergeServer(sectionOf(input.server)),
  };
}

const CONFIG_SECTIONS: Array<keyof AppConfig> = ["api", "store", "feed", "server"];

function isConfigSection(value: string): value is keyof AppConfig {
  return CONFIG_SECTIONS.some((section) => section === value);
}

/**
 * Sets one `section.field` value and renormalizes. Values that fail
 * normalization fall back to their defaults, like any other config input.
 */
export function setConfigValue(config: AppConfig, dottedKey: string, value: unknown): AppConfig {
  const [section, field, ...rest] = dottedKey.split(".");
  if (!section || !field || rest.length > 0 || !isConfigSection(section)) {
    throw new Error(`unknown config key: ${dottedKey}`);
  }
  const current: Record<string, unknown> = { ...config[section] };
  if (!(field in current)) {
    throw new Error(`unknown config key: ${dottedKey}`);
  }
  current[field] = value;
  return mergeConfig({ ...config, [section]: current });
}

export function applyEnvOverrides(config: AppConfig, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const key = env.TIDETABLE_SUBSCRIPTION_KEY?.trim();
  const host = env.TIDETABLE_HOST?.trim();
  const port = Number(env.TIDETABLE_PORT);
  return mergeConfig({
    ...config,
    api: { ...config.api, subscriptionKey: key || config.api.subscriptionKey },
    server: {
      ...config.server,
      host: host || config.server.host,
      port: Number.isInteger(port) && port > 0 ? port : config.server.port,
    },
  });
}

export async function loadConfig(configPath = DEFAULT_CONFIG_PATH): Promise<AppConfig> {
  try {
    const raw = await readFile(configPath, "utf8");
    return mergeConfig(TOML.parse(raw));
  } catch {
    return mergeConfig();
  }
}

export async function saveConfig(config: AppConfig, configPath = DEFAULT_CONFIG_PATH): Promise<void> {
  const dir = path.dirname(configPath);
  await mkdir(dir, { recursive: true });
  const content = TOML.stringify(config as unknown as JsonMap);
  await writeFile(configPath, content, "utf8");
}
