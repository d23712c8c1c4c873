import Fastify, { type FastifyInstance } from "fastify";
import type { LogLevel, StreamEnvelope } from "@tidetable/contracts";
import {
  applyEnvOverrides,
  asErrorMessage,
  DEFAULT_CONFIG_PATH,
  isPlainObject,
  loadConfig,
  MalformedTimestampError,
  mergeConfig,
  resolveQueryTime,
  saveConfig,
  TidalApiError,
  TideTable,
  timeFrom,
  type TideTableEvent,
} from "@tidetable/core";

const DEFAULT_HEARTBEAT_MS = 15_000;

export interface CreateServerOptions {
  tideTable: TideTable;
  configPath?: string;
  logger?: boolean | { level: LogLevel };
  heartbeatMs?: number;
}

interface TideQuery {
  Querystring: { at?: string };
}

function deepMergeConfig(base: Record<string, unknown>, patch: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(patch)) {
    const baseValue = out[key];
    if (isPlainObject(baseValue) && isPlainObject(value)) {
      out[key] = deepMergeConfig(baseValue, value);
      continue;
    }
    out[key] = value;
  }
  return out;
}

export function formatSseEvent(envelope: StreamEnvelope): string {
  return `event: ${envelope.type}\ndata: ${JSON.stringify(envelope)}\n\n`;
}

export async function createServer(options: CreateServerOptions): Promise<FastifyInstance> {
  const server = Fastify({ logger: options.logger ?? false });
  const tideTable = options.tideTable;
  const configPath = options.configPath ?? DEFAULT_CONFIG_PATH;
  const heartbeatMs = options.heartbeatMs ?? DEFAULT_HEARTBEAT_MS;

  tideTable.setLogger(server.log);

  server.get("/api/healthz", async () => ({ ok: true }));

  server.get("/api/events", async () => ({ snapshot: tideTable.getSnapshot() }));

  for (const direction of ["previous", "next"] as const) {
    server.get<TideQuery>(`/api/tides/${direction}`, async (request, reply) => {
      let at: number;
      try {
        at = resolveQueryTime(request.query.at);
      } catch (error) {
        if (!(error instanceof MalformedTimestampError)) throw error;
        reply.code(400);
        return { ok: false, error: error.message };
      }
      const event = direction === "previous" ? tideTable.previous(at) : tideTable.next(at);
      return { at, event, span: event.isValid ? timeFrom(event, at) : null };
    });
  }

  server.get<TideQuery>("/api/tides/status", async (request, reply) => {
    try {
      return { status: tideTable.status(resolveQueryTime(request.query.at)) };
    } catch (error) {
      if (!(error instanceof MalformedTimestampError)) throw error;
      reply.code(400);
      return { ok: false, error: error.message };
    }
  });

  server.post("/api/refresh", async (_request, reply) => {
    try {
      return { snapshot: await tideTable.refresh() };
    } catch (error) {
      reply.code(error instanceof TidalApiError ? 502 : 500);
      return { ok: false, error: asErrorMessage(error) };
    }
  });

  server.get("/api/config", async () => ({ config: tideTable.getConfig() }));

  server.post("/api/config", async (request) => {
    const patch = isPlainObject(request.body) ? request.body : {};
    const merged = mergeConfig(deepMergeConfig({ ...tideTable.getConfig() }, patch));
    await saveConfig(merged, configPath);
    tideTable.setConfig(merged);
    return { config: merged };
  });

  server.get("/api/stream", async (_request, reply) => {
    reply.hijack();
    reply.raw.setHeader("Content-Type", "text/event-stream; charset=utf-8");
    reply.raw.setHeader("Cache-Control", "no-cache, no-transform");
    reply.raw.setHeader("Connection", "keep-alive");
    reply.raw.setHeader("X-Accel-Buffering", "no");

    reply.raw.write(
      formatSseEvent({
        id: "0",
        type: "snapshot",
        version: 0,
        payload: { snapshot: tideTable.getSnapshot() },
      }),
    );

    const onStream = ({ envelope }: TideTableEvent): void => {
      reply.raw.write(formatSseEvent(envelope));
    };

    const heartbeat = setInterval(() => {
      reply.raw.write(`event: heartbeat\ndata: ${JSON.stringify({ ts: Date.now() })}\n\n`);
    }, heartbeatMs);

    tideTable.on("stream", onStream);

    reply.raw.on("close", () => {
      clearInterval(heartbeat);
      tideTable.off("stream", onStream);
    });
  });

  return server;
}

export interface RunServerOptions {
  host?: string;
  port?: number;
  configPath?: string;
}

export async function runServer(options: RunServerOptions = {}): Promise<void> {
  const configPath = options.configPath ?? process.env.TIDETABLE_CONFIG ?? DEFAULT_CONFIG_PATH;
  const config = applyEnvOverrides(await loadConfig(configPath));
  const host = options.host ?? config.server.host;
  const port = options.port ?? config.server.port;

  const tideTable = new TideTable(config);
  const server = await createServer({
    tideTable,
    configPath,
    logger: { level: config.server.logLevel },
  });

  // A failed initial load is already logged; serve the empty table until a reload succeeds.
  await tideTable.start().catch((error: unknown) => {
    server.log.warn(`starting without tide data: ${asErrorMessage(error)}`);
  });

  await server.listen({ host, port });

  process.on("SIGINT", async () => {
    tideTable.stop();
    await server.close();
    process.exit(0);
  });

  // eslint-disable-next-line no-console
  console.log(`tidetable server: http://${host}:${port}`);
}
