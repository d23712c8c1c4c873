import { mkdtemp, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { AppConfig, TidalEvent, TideStatus, TideTableSnapshot, TimeSpan } from "@tidetable/contracts";
import { describe, expect, it, vi } from "vitest";
import {
  loadConfig,
  mergeConfig,
  TideTable,
  type FetchInit,
  type FetchLike,
  type PartialAppConfigInput,
} from "@tidetable/core";
import { createServer, formatSseEvent } from "./app.js";

const FEED = JSON.stringify([
  { EventType: "LowWater", DateTime: "2024-03-10T06:00:00", Height: "0.9" },
  { EventType: "HighWater", DateTime: "2024-03-10T12:15:00", Height: "4.8" },
  { EventType: "LowWater", DateTime: "2024-03-10T18:30:00", Height: "1.0" },
]);

interface NeighbourPayload {
  at: number;
  event: TidalEvent;
  span: TimeSpan | null;
}

interface ErrorPayload {
  ok: false;
  error: string;
}

interface FrameReader {
  next(): Promise<string>;
  cancel(): Promise<void>;
}

function readFrames(body: NonNullable<Response["body"]>): FrameReader {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffered = "";
  return {
    async next() {
      for (;;) {
        const end = buffered.indexOf("\n\n");
        if (end >= 0) {
          const frame = buffered.slice(0, end);
          buffered = buffered.slice(end + 2);
          return frame;
        }
        const chunk = await reader.read();
        if (chunk.done) throw new Error("event stream ended");
        buffered += decoder.decode(chunk.value, { stream: true });
      }
    },
    cancel: () => reader.cancel(),
  };
}

function frameData(frame: string): unknown {
  const line = frame.split("\n").find((entry) => entry.startsWith("data: "));
  return line ? JSON.parse(line.slice("data: ".length)) : null;
}

async function buildFixture(
  input: PartialAppConfigInput = {},
  fetchImpl?: FetchLike,
): Promise<{ table: TideTable; configPath: string; feedPath: string }> {
  const root = await mkdtemp(path.join(os.tmpdir(), "tidetable-server-"));
  const feedPath = path.join(root, "events.json");
  await writeFile(feedPath, FEED, "utf8");
  const table = new TideTable(mergeConfig(input), fetchImpl ? { fetchImpl } : {});
  return { table, configPath: path.join(root, "config.toml"), feedPath };
}

describe("server api", () => {
  it("reports health and the loaded snapshot", async () => {
    const { table, configPath } = await buildFixture();
    await table.loadChunks([FEED], "inline");
    const server = await createServer({ tideTable: table, configPath });

    const health = await server.inject({ method: "GET", url: "/api/healthz" });
    expect(health.statusCode).toBe(200);
    expect(health.json()).toEqual({ ok: true });

    const events = await server.inject({ method: "GET", url: "/api/events" });
    const { snapshot } = events.json<{ snapshot: TideTableSnapshot }>();
    expect(snapshot.source).toBe("inline");
    expect(snapshot.events.map((event) => event.epochTime)).toEqual([1710050400, 1710072900, 1710095400]);

    await server.close();
  });

  it("answers previous, next and status queries", async () => {
    const { table, configPath } = await buildFixture();
    await table.loadChunks([FEED], "inline");
    const server = await createServer({ tideTable: table, configPath });

    const previous = await server.inject({ method: "GET", url: "/api/tides/previous?at=2024-03-10T09:00:00" });
    expect(previous.statusCode).toBe(200);
    const previousPayload = previous.json<NeighbourPayload>();
    expect(previousPayload.at).toBe(1710061200);
    expect(previousPayload.event.rawTimestamp).toBe("2024-03-10T06:00:00");
    expect(previousPayload.span).toEqual({ hours: 3, minutes: 0 });

    const next = await server.inject({ method: "GET", url: "/api/tides/next?at=1710095400" });
    const nextPayload = next.json<NeighbourPayload>();
    expect(nextPayload.event.isValid).toBe(false);
    expect(nextPayload.span).toBeNull();

    const status = await server.inject({ method: "GET", url: "/api/tides/status?at=2024-03-10T09:00:00" });
    const statusPayload = status.json<{ status: TideStatus }>().status;
    expect(statusPayload.previous.epochTime).toBe(1710050400);
    expect(statusPayload.next.epochTime).toBe(1710072900);
    expect(statusPayload.untilNext).toEqual({ hours: 3, minutes: 15 });

    await server.close();
  });

  it("rejects unparseable query times", async () => {
    const { table, configPath } = await buildFixture();
    const server = await createServer({ tideTable: table, configPath });

    const previous = await server.inject({ method: "GET", url: "/api/tides/previous?at=tomorrow" });
    expect(previous.statusCode).toBe(400);
    expect(previous.json<ErrorPayload>().error).toBe('malformed timestamp "tomorrow": expected at least 19 characters');

    const status = await server.inject({ method: "GET", url: "/api/tides/status?at=2024-13-01T00:00:00" });
    expect(status.statusCode).toBe(400);
    expect(status.json<ErrorPayload>().error).toBe('malformed timestamp "2024-13-01T00:00:00": month 13 out of range');

    await server.close();
  });

  it("refreshes from the configured feed file", async () => {
    const { feedPath } = await buildFixture();
    const { table, configPath } = await buildFixture({ feed: { path: feedPath, watch: false } });
    const server = await createServer({ tideTable: table, configPath });

    const res = await server.inject({ method: "POST", url: "/api/refresh" });
    expect(res.statusCode).toBe(200);
    expect(res.json<{ snapshot: TideTableSnapshot }>().snapshot.count).toBe(3);
    expect(table.getSnapshot().source).toBe(feedPath);

    await server.close();
  });

  it("maps tidal api failures to bad gateway", async () => {
    const fetchImpl = vi.fn(
      async (_url: string, _init: FetchInit) => new Response("denied", { status: 401, statusText: "Unauthorized" }),
    );
    const { table, configPath } = await buildFixture({ api: { stationId: "0113" } }, fetchImpl);
    const server = await createServer({ tideTable: table, configPath });

    const res = await server.inject({ method: "POST", url: "/api/refresh" });
    expect(res.statusCode).toBe(502);
    expect(res.json<ErrorPayload>()).toEqual({
      ok: false,
      error:
        "request to https://admiraltyapi.azure-api.net/uktidalapi/api/V1/Stations/0113/TidalEvents?duration=7 returned 401 Unauthorized",
    });
    expect(table.getSnapshot().loadedAtMs).toBeNull();

    await server.close();
  });

  it("reports a missing station without calling out", async () => {
    const fetchImpl = vi.fn(async (_url: string, _init: FetchInit) => new Response(FEED));
    const { table, configPath } = await buildFixture({}, fetchImpl);
    const server = await createServer({ tideTable: table, configPath });

    const res = await server.inject({ method: "POST", url: "/api/refresh" });
    expect(res.statusCode).toBe(502);
    expect(res.json<ErrorPayload>().error).toBe("api.stationId is not configured");
    expect(fetchImpl).not.toHaveBeenCalled();

    await server.close();
  });

  it("merges, normalizes and persists config updates", async () => {
    const { table, configPath } = await buildFixture();
    const server = await createServer({ tideTable: table, configPath });

    const res = await server.inject({
      method: "POST",
      url: "/api/config",
      payload: { store: { capacity: 64 }, feed: { watch: false }, server: { port: "not-a-port" } },
    });
    expect(res.statusCode).toBe(200);
    const { config } = res.json<{ config: AppConfig }>();
    expect(config.store).toEqual({ capacity: 64, maxDepth: 16 });
    expect(config.feed.watch).toBe(false);
    expect(config.server.port).toBe(8788);

    expect(table.getConfig()).toEqual(config);
    expect(await loadConfig(configPath)).toEqual(config);

    const readBack = await server.inject({ method: "GET", url: "/api/config" });
    expect(readBack.json<{ config: AppConfig }>().config).toEqual(config);

    await server.close();
  });

  it("frames stream envelopes as server-sent events", () => {
    expect(formatSseEvent({ id: "3", type: "load_failed", version: 3, payload: { source: "x", error: "boom" } })).toBe(
      'event: load_failed\ndata: {"id":"3","type":"load_failed","version":3,"payload":{"source":"x","error":"boom"}}\n\n',
    );
  });

  it("streams the snapshot and later table updates until the client disconnects", async () => {
    const { table, configPath } = await buildFixture();
    await table.loadChunks([FEED], "inline");
    const server = await createServer({ tideTable: table, configPath, heartbeatMs: 60_000 });
    const address = await server.listen({ host: "127.0.0.1", port: 0 });

    try {
      const res = await fetch(`${address}/api/stream`);
      expect(res.headers.get("content-type")).toBe("text/event-stream; charset=utf-8");
      if (!res.body) throw new Error("missing stream body");
      const frames = readFrames(res.body);

      const first = await frames.next();
      expect(first.startsWith("event: snapshot\n")).toBe(true);
      expect(frameData(first)).toMatchObject({ id: "0", type: "snapshot", version: 0, payload: { snapshot: { count: 3 } } });
      expect(table.listenerCount("stream")).toBe(1);

      await table.loadChunks([FEED.replace("4.8", "5.1")], "second");
      const update = await frames.next();
      expect(update.startsWith("event: table_loaded\n")).toBe(true);
      expect(frameData(update)).toMatchObject({
        id: "2",
        type: "table_loaded",
        version: 2,
        payload: { snapshot: { source: "second", count: 3 } },
      });

      await frames.cancel();
      await vi.waitFor(() => {
        expect(table.listenerCount("stream")).toBe(0);
      });
    } finally {
      await server.close();
    }
  });
});
