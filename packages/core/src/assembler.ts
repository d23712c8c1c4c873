import type { SkippedRecord, SkipReason, TidalEvent, TideKind, TimeElements } from "@tidetable/contracts";
import { MalformedTimestampError } from "./errors.js";
import { silentLogger, type TideLogger } from "./logger.js";
import type { TidalEventStore } from "./store.js";
import { convertFromIso8601, formatEpoch, makeTime } from "./time.js";
import type { JsonToken } from "./tokenizer.js";

const HIGH_WATER: TideKind = "HighWater";

// Records are the objects held directly by the root array.
const RECORD_DEPTH = 2;

interface RecordDraft {
  isHighTide: boolean;
  heightM: number;
  rawTimestamp: string;
  time: TimeElements | null;
  timestampError: string;
  sawEventType: boolean;
  sawDateTime: boolean;
  sawHeight: boolean;
}

export interface SessionState {
  readonly store: TidalEventStore;
  readonly logger: TideLogger;
  currentKey: string;
  depth: number;
  rootIsArray: boolean;
  recordIndex: number;
  draft: RecordDraft | null;
  skipped: SkippedRecord[];
  sawDocumentStart: boolean;
  sawDocumentEnd: boolean;
}

export interface ParseOutput {
  store: TidalEventStore;
  complete: boolean;
  parseError: string;
  skipped: SkippedRecord[];
}

function newDraft(): RecordDraft {
  return {
    isHighTide: false,
    heightM: 0,
    rawTimestamp: "",
    time: null,
    timestampError: "",
    sawEventType: false,
    sawDateTime: false,
    sawHeight: false,
  };
}

/**
 * Leading-number parse: "4.2" and "4.2m" both read as 4.2, anything without a
 * numeric prefix reads as 0.
 */
export function parseHeight(value: string): number {
  const parsed = Number.parseFloat(value);
  return Number.isFinite(parsed) ? parsed : 0;
}

function resetSession(session: SessionState): void {
  session.store.reset();
  session.currentKey = "";
  session.depth = 0;
  session.rootIsArray = false;
  session.recordIndex = 0;
  session.draft = null;
  session.skipped = [];
  session.sawDocumentStart = false;
  session.sawDocumentEnd = false;
}

export function createSession(store: TidalEventStore, logger: TideLogger = silentLogger): SessionState {
  const session: SessionState = {
    store,
    logger,
    currentKey: "",
    depth: 0,
    rootIsArray: false,
    recordIndex: 0,
    draft: null,
    skipped: [],
    sawDocumentStart: false,
    sawDocumentEnd: false,
  };
  resetSession(session);
  return session;
}

function skip(session: SessionState, reason: SkipReason, rawTimestamp: string, detail: string): void {
  const index = session.recordIndex;
  session.logger.warn(`skipped record ${index} (${reason}): ${detail}`);
  // The skip list shares the store's bound.
  if (session.skipped.length < session.store.capacity) {
    session.skipped.push({ index, reason, rawTimestamp, detail });
  }
}

function applyValue(draft: RecordDraft, key: string, value: string): void {
  if (key === "EventType") {
    draft.isHighTide = value === HIGH_WATER;
    draft.sawEventType = true;
    return;
  }
  if (key === "DateTime") {
    draft.rawTimestamp = value;
    draft.sawDateTime = true;
    try {
      draft.time = convertFromIso8601(value);
      draft.timestampError = "";
    } catch (error) {
      if (!(error instanceof MalformedTimestampError)) throw error;
      draft.time = null;
      draft.timestampError = error.message;
    }
    return;
  }
  if (key === "Height") {
    draft.heightM = parseHeight(value);
    draft.sawHeight = true;
  }
}

function finalizeDraft(session: SessionState, draft: RecordDraft): void {
  const missing: string[] = [];
  if (!draft.sawEventType) missing.push("EventType");
  if (!draft.sawDateTime) missing.push("DateTime");
  if (!draft.sawHeight) missing.push("Height");

  if (missing.length > 0) {
    skip(session, "missing_fields", draft.rawTimestamp, `missing ${missing.join(", ")}`);
  } else if (!draft.time) {
    skip(session, "malformed_timestamp", draft.rawTimestamp, draft.timestampError);
  } else {
    const event: TidalEvent = {
      epochTime: makeTime(draft.time),
      isHighTide: draft.isHighTide,
      heightM: draft.heightM,
      rawTimestamp: draft.rawTimestamp,
      isValid: true,
    };
    const result = session.store.append(event);
    if (result === "stored") {
      session.logger.debug(
        `stored record ${session.recordIndex}: ${event.isHighTide ? "high" : "low"} ${formatEpoch(event.epochTime)} ${event.heightM}m`,
      );
    } else if (result === "out_of_order") {
      skip(session, "out_of_order", draft.rawTimestamp, "earlier than the previous stored event");
    } else if (session.store.dropped === 1) {
      session.logger.warn(`store capacity ${session.store.capacity} reached, discarding further records`);
    }
  }
  session.recordIndex += 1;
}

/**
 * One fold step over the token stream.
 */
export function applyToken(session: SessionState, token: JsonToken): SessionState {
  switch (token.type) {
    case "document_start":
      resetSession(session);
      session.sawDocumentStart = true;
      return session;
    case "array_start":
      session.depth += 1;
      if (session.depth === 1) session.rootIsArray = true;
      return session;
    case "object_start":
      session.depth += 1;
      if (session.rootIsArray && session.depth === RECORD_DEPTH) {
        session.draft = newDraft();
        session.currentKey = "";
      }
      return session;
    case "key":
      if (session.draft && session.depth === RECORD_DEPTH) {
        session.currentKey = token.name;
      }
      return session;
    case "value":
      if (session.draft && session.depth === RECORD_DEPTH) {
        applyValue(session.draft, session.currentKey, token.value);
      }
      return session;
    case "object_end":
      if (session.draft && session.depth === RECORD_DEPTH) {
        const draft = session.draft;
        session.draft = null;
        finalizeDraft(session, draft);
      }
      session.depth -= 1;
      return session;
    case "array_end":
      session.depth -= 1;
      return session;
    case "document_end":
      session.sawDocumentEnd = true;
      return session;
  }
}

export function finishSession(session: SessionState, parseError = ""): ParseOutput {
  if (session.draft) {
    session.logger.debug(`discarding partial record ${session.recordIndex}`);
    session.draft = null;
  }
  if (parseError) {
    session.logger.warn(`parse stopped: ${parseError}`);
  }
  return {
    store: session.store,
    complete: session.sawDocumentEnd && !parseError,
    parseError,
    skipped: session.skipped,
  };
}
