import type { AppConfig } from "@tidetable/contracts";
import { DEFAULT_CAPACITY } from "./store.js";
import { DEFAULT_MAX_DEPTH } from "./tokenizer.js";

export const DEFAULT_API_BASE_URL = "https://admiraltyapi.azure-api.net/uktidalapi/api/V1";

export const DEFAULT_CONFIG: AppConfig = {
  api: {
    baseUrl: DEFAULT_API_BASE_URL,
    stationId: "",
    durationDays: 7,
    subscriptionKey: "",
    timeoutMs: 15_000,
  },
  store: {
    capacity: DEFAULT_CAPACITY,
    maxDepth: DEFAULT_MAX_DEPTH,
  },
  feed: {
    path: "",
    watch: true,
    debounceMs: 200,
  },
  server: {
    host: "127.0.0.1",
    port: 8788,
    logLevel: "info",
  },
};
