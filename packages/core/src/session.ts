import { applyToken, createSession, finishSession, type ParseOutput, type SessionState } from "./assembler.js";
import { JsonParseError } from "./errors.js";
import type { TideLogger } from "./logger.js";
import { DEFAULT_CAPACITY, TidalEventStore } from "./store.js";
import { JsonTokenizer, type JsonChunk } from "./tokenizer.js";

export interface SessionOptions {
  capacity?: number;
  maxDepth?: number;
  logger?: TideLogger;
}

function openSession(options: SessionOptions): { tokenizer: JsonTokenizer; session: SessionState } {
  const tokenizer = options.maxDepth !== undefined ? new JsonTokenizer({ maxDepth: options.maxDepth }) : new JsonTokenizer();
  const session = createSession(new TidalEventStore(options.capacity ?? DEFAULT_CAPACITY), options.logger);
  return { tokenizer, session };
}

function parseErrorMessage(error: unknown): string {
  if (error instanceof JsonParseError) return error.message;
  throw error;
}

/**
 * Runs one complete parse session over in-memory chunks.
 */
export function parseTidalEvents(chunks: Iterable<JsonChunk>, options: SessionOptions = {}): ParseOutput {
  const { tokenizer, session } = openSession(options);
  try {
    for (const chunk of chunks) {
      for (const token of tokenizer.write(chunk)) applyToken(session, token);
    }
    for (const token of tokenizer.end()) applyToken(session, token);
  } catch (error) {
    return finishSession(session, parseErrorMessage(error));
  }
  return finishSession(session);
}

export async function parseTidalEventStream(
  source: AsyncIterable<JsonChunk>,
  options: SessionOptions = {},
): Promise<ParseOutput> {
  const { tokenizer, session } = openSession(options);
  try {
    for await (const chunk of source) {
      for (const token of tokenizer.write(chunk)) applyToken(session, token);
    }
    for (const token of tokenizer.end()) applyToken(session, token);
  } catch (error) {
    return finishSession(session, parseErrorMessage(error));
  }
  return finishSession(session);
}
