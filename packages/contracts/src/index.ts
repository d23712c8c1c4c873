export type TideKind = "HighWater" | "LowWater";

export type SkipReason = "missing_fields" | "malformed_timestamp" | "out_of_order";

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

export interface TimeElements {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

export interface TidalEvent {
  epochTime: number;
  isHighTide: boolean;
  heightM: number;
  rawTimestamp: string;
  isValid: boolean;
}

export interface TimeSpan {
  hours: number;
  minutes: number;
}

export interface SkippedRecord {
  index: number;
  reason: SkipReason;
  rawTimestamp: string;
  detail: string;
}

export interface TideStatus {
  at: number;
  previous: TidalEvent;
  next: TidalEvent;
  sincePrevious: TimeSpan | null;
  untilNext: TimeSpan | null;
}

export interface ApiConfig {
  baseUrl: string;
  stationId: string;
  durationDays: number;
  subscriptionKey: string;
  timeoutMs: number;
}

export interface StoreConfig {
  capacity: number;
  maxDepth: number;
}

export interface FeedConfig {
  path: string;
  watch: boolean;
  debounceMs: number;
}

export interface ServerConfig {
  host: string;
  port: number;
  logLevel: LogLevel;
}

export interface AppConfig {
  api: ApiConfig;
  store: StoreConfig;
  feed: FeedConfig;
  server: ServerConfig;
}

export interface TideTableSnapshot {
  source: string;
  loadedAtMs: number | null;
  capacity: number;
  count: number;
  dropped: number;
  complete: boolean;
  parseError: string;
  skipped: SkippedRecord[];
  events: TidalEvent[];
}

export type StreamEventType = "snapshot" | "table_loaded" | "load_failed";

export interface StreamEnvelope {
  id: string;
  type: StreamEventType;
  version: number;
  payload: Record<string, unknown>;
}
