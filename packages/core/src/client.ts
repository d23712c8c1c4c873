import { Readable } from "node:stream";
import type { ApiConfig } from "@tidetable/contracts";
import type { ParseOutput } from "./assembler.js";
import { asErrorMessage, TidalApiError } from "./errors.js";
import { silentLogger } from "./logger.js";
import { parseTidalEventStream, type SessionOptions } from "./session.js";

export interface FetchInit {
  headers: Record<string, string>;
  signal: AbortSignal;
}

export type FetchLike = (url: string, init: FetchInit) => Promise<Response>;

export interface FetchTidalEventsOptions extends SessionOptions {
  fetchImpl?: FetchLike;
}

export const SUBSCRIPTION_KEY_HEADER = "Ocp-Apim-Subscription-Key";

export function buildTidalEventsUrl(api: ApiConfig): string {
  const base = api.baseUrl.replace(/\/+$/g, "");
  const url = new URL(`${base}/Stations/${encodeURIComponent(api.stationId.trim())}/TidalEvents`);
  url.searchParams.set("duration", String(api.durationDays));
  return url.toString();
}

/**
 * Requests the station's tidal events and streams the body straight into a
 * parse session. One attempt, no retries.
 */
export async function fetchTidalEvents(api: ApiConfig, options: FetchTidalEventsOptions = {}): Promise<ParseOutput> {
  if (!api.stationId.trim()) {
    throw new TidalApiError("missing_station", "api.stationId is not configured");
  }
  const { fetchImpl = fetch, ...sessionOptions } = options;
  const logger = options.logger ?? silentLogger;
  const url = buildTidalEventsUrl(api);

  const headers: Record<string, string> = { Accept: "application/json" };
  if (api.subscriptionKey) {
    headers[SUBSCRIPTION_KEY_HEADER] = api.subscriptionKey;
  }

  logger.info(`GET ${url}`);
  let response: Response;
  try {
    response = await fetchImpl(url, { headers, signal: AbortSignal.timeout(api.timeoutMs) });
  } catch (error) {
    throw new TidalApiError("connect_failed", `request to ${url} failed: ${asErrorMessage(error)}`);
  }

  if (!response.ok) {
    throw new TidalApiError(
      "http_status",
      `request to ${url} returned ${response.status} ${response.statusText}`.trim(),
      response.status,
    );
  }
  if (!response.body) {
    throw new TidalApiError("empty_body", `request to ${url} returned no body`, response.status);
  }

  return parseTidalEventStream(Readable.fromWeb(response.body), sessionOptions);
}
