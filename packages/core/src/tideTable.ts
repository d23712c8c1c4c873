import { EventEmitter } from "node:events";
import { createReadStream } from "node:fs";
import path from "node:path";
import chokidar, { type FSWatcher } from "chokidar";
import type {
  AppConfig,
  StreamEnvelope,
  TidalEvent,
  TideStatus,
  TideTableSnapshot,
} from "@tidetable/contracts";
import type { ParseOutput } from "./assembler.js";
import { buildTidalEventsUrl, fetchTidalEvents, type FetchLike } from "./client.js";
import { loadConfig } from "./config.js";
import { asErrorMessage } from "./errors.js";
import { silentLogger, type TideLogger } from "./logger.js";
import { nextTidalEvent, previousTidalEvent, tideStatus } from "./query.js";
import { parseTidalEventStream, parseTidalEvents, type SessionOptions } from "./session.js";
import type { JsonChunk } from "./tokenizer.js";
import { expandHome, nowMs } from "./utils.js";

export interface TideTableOptions {
  logger?: TideLogger;
  fetchImpl?: FetchLike;
}

export interface TideTableEvent {
  envelope: StreamEnvelope;
}

export type ChunkSource = Iterable<JsonChunk> | AsyncIterable<JsonChunk>;

function isAsyncSource(source: ChunkSource): source is AsyncIterable<JsonChunk> {
  return typeof source === "object" && Symbol.asyncIterator in source;
}

function emptySnapshot(capacity: number): TideTableSnapshot {
  return {
    source: "",
    loadedAtMs: null,
    capacity,
    count: 0,
    dropped: 0,
    complete: false,
    parseError: "",
    skipped: [],
    events: [],
  };
}

/**
 * Holds the snapshot of the last completed parse session. Loads build a fresh
 * store and replace the snapshot only once the session has finished, so
 * queries never see a half-populated table.
 */
export class TideTable extends EventEmitter {
  private config: AppConfig;
  private logger: TideLogger;
  private readonly fetchImpl: FetchLike | undefined;
  private snapshot: TideTableSnapshot;
  private watcher: FSWatcher | null = null;
  private reloadTimer: NodeJS.Timeout | null = null;
  private streamVersion = 0;
  private started = false;
  private refreshInFlight: Promise<TideTableSnapshot> | null = null;
  private refreshPending = false;
  private watcherRestart: Promise<void> = Promise.resolve();

  constructor(config: AppConfig, options: TideTableOptions = {}) {
    super();
    this.config = config;
    this.logger = options.logger ?? silentLogger;
    this.fetchImpl = options.fetchImpl;
    this.snapshot = emptySnapshot(config.store.capacity);
  }

  static async fromConfigPath(configPath?: string, options: TideTableOptions = {}): Promise<TideTable> {
    const config = await loadConfig(configPath);
    return new TideTable(config, options);
  }

  getConfig(): AppConfig {
    return this.config;
  }

  setLogger(logger: TideLogger): void {
    this.logger = logger;
  }

  setConfig(config: AppConfig): void {
    const feedChanged = config.feed.path !== this.config.feed.path || config.feed.watch !== this.config.feed.watch;
    this.config = config;
    if (this.started && feedChanged) {
      void this.restartWatcher().catch((error: unknown) => {
        this.logger.warn(`feed watcher restart failed: ${asErrorMessage(error)}`);
      });
    }
  }

  /**
   * Performs the initial load and starts watching the feed file. The watcher
   * is started even when the initial load fails; the load error is rethrown.
   */
  async start(): Promise<void> {
    this.started = true;
    try {
      await this.refresh();
    } finally {
      await this.restartWatcher();
    }
  }

  stop(): void {
    this.started = false;
    if (this.reloadTimer) {
      clearTimeout(this.reloadTimer);
      this.reloadTimer = null;
    }
    void this.closeWatcher().catch((error: unknown) => {
      this.logger.warn(`feed watcher close failed: ${asErrorMessage(error)}`);
    });
  }

  isWatching(): boolean {
    return this.watcher !== null;
  }

  getSnapshot(): TideTableSnapshot {
    return {
      ...this.snapshot,
      skipped: this.snapshot.skipped.map((entry) => ({ ...entry })),
      events: this.snapshot.events.map((event) => ({ ...event })),
    };
  }

  previous(time: number): TidalEvent {
    return previousTidalEvent(this.snapshot.events, time);
  }

  next(time: number): TidalEvent {
    return nextTidalEvent(this.snapshot.events, time);
  }

  status(time: number): TideStatus {
    return tideStatus(this.snapshot.events, time);
  }

  async loadChunks(source: ChunkSource, label: string): Promise<TideTableSnapshot> {
    return this.load(label, () =>
      isAsyncSource(source) ? parseTidalEventStream(source, this.sessionOptions()) : parseTidalEvents(source, this.sessionOptions()),
    );
  }

  async loadFile(filePath: string): Promise<TideTableSnapshot> {
    const resolved = path.resolve(expandHome(filePath));
    return this.load(resolved, () => parseTidalEventStream(createReadStream(resolved), this.sessionOptions()));
  }

  /**
   * Reloads from the configured feed file, or from the API when none is set.
   * Calls made while a reload is running share it and queue one more pass.
   */
  async refresh(): Promise<TideTableSnapshot> {
    if (this.refreshInFlight) {
      this.refreshPending = true;
      return this.refreshInFlight;
    }
    this.refreshInFlight = this.runRefreshLoop();
    try {
      return await this.refreshInFlight;
    } finally {
      this.refreshInFlight = null;
    }
  }

  // A pass queued during a failing pass still runs; callers settle with the last pass.
  private async runRefreshLoop(): Promise<TideTableSnapshot> {
    for (;;) {
      this.refreshPending = false;
      try {
        const snapshot = await this.refreshOnce();
        if (!this.refreshPending) return snapshot;
      } catch (error) {
        if (!this.refreshPending) throw error;
      }
    }
  }

  private async refreshOnce(): Promise<TideTableSnapshot> {
    if (this.config.feed.path) {
      return this.loadFile(this.config.feed.path);
    }
    const api = this.config.api;
    return this.load(buildTidalEventsUrl(api), () => {
      const options = this.sessionOptions();
      return fetchTidalEvents(api, this.fetchImpl ? { ...options, fetchImpl: this.fetchImpl } : options);
    });
  }

  private sessionOptions(): SessionOptions {
    return {
      capacity: this.config.store.capacity,
      maxDepth: this.config.store.maxDepth,
      logger: this.logger,
    };
  }

  private async load(label: string, run: () => ParseOutput | Promise<ParseOutput>): Promise<TideTableSnapshot> {
    let output: ParseOutput;
    try {
      output = await run();
    } catch (error) {
      const message = asErrorMessage(error);
      this.logger.error(`load from ${label} failed: ${message}`);
      this.emitStream("load_failed", { source: label, error: message });
      throw error;
    }

    const store = output.store;
    this.snapshot = {
      source: label,
      loadedAtMs: nowMs(),
      capacity: store.capacity,
      count: store.count,
      dropped: store.dropped,
      complete: output.complete,
      parseError: output.parseError,
      skipped: output.skipped,
      events: store.events(),
    };
    this.logger.info(
      `loaded ${store.count} tidal events from ${label}` +
        (store.dropped > 0 ? ` (${store.dropped} dropped at capacity ${store.capacity})` : "") +
        (output.parseError ? ` (incomplete: ${output.parseError})` : ""),
    );
    this.emitStream("table_loaded", { snapshot: this.getSnapshot() });
    return this.getSnapshot();
  }

  // Restarts run one after another so two overlapping calls never leave two watchers.
  private restartWatcher(): Promise<void> {
    const run = this.watcherRestart.then(() => this.replaceWatcher());
    this.watcherRestart = run.catch((error: unknown) => {
      this.logger.debug(`feed watcher restart failed: ${asErrorMessage(error)}`);
    });
    return run;
  }

  private async closeWatcher(): Promise<void> {
    const watcher = this.watcher;
    this.watcher = null;
    if (watcher) await watcher.close();
  }

  private async replaceWatcher(): Promise<void> {
    await this.closeWatcher();
    const feedPath = this.config.feed.path;
    if (!this.started || !feedPath || !this.config.feed.watch) return;

    const debounceMs = Math.max(50, this.config.feed.debounceMs);
    this.watcher = chokidar.watch(path.resolve(expandHome(feedPath)), {
      ignoreInitial: true,
      persistent: true,
      awaitWriteFinish: {
        stabilityThreshold: debounceMs,
        pollInterval: 40,
      },
    });

    const onChange = (): void => {
      this.scheduleReload(debounceMs);
    };
    this.watcher.on("add", onChange);
    this.watcher.on("change", onChange);
    this.watcher.on("error", (error: unknown) => {
      this.logger.warn(`feed watcher error: ${asErrorMessage(error)}`);
    });
  }

  private scheduleReload(delayMs: number): void {
    if (this.reloadTimer) clearTimeout(this.reloadTimer);
    this.reloadTimer = setTimeout(() => {
      this.reloadTimer = null;
      void this.refresh().catch((error: unknown) => {
        this.logger.debug(`feed reload abandoned: ${asErrorMessage(error)}`);
      });
    }, delayMs);
  }

  private emitStream(type: StreamEnvelope["type"], payload: Record<string, unknown>): void {
    this.streamVersion += 1;
    const envelope: StreamEnvelope = {
      id: String(this.streamVersion),
      type,
      version: this.streamVersion,
      payload,
    };
    this.emit("stream", { envelope } satisfies TideTableEvent);
  }
}
