export class MalformedTimestampError extends Error {
  readonly timestamp: string;

  constructor(timestamp: string, reason: string) {
    super(`malformed timestamp "${timestamp}": ${reason}`);
    this.name = "MalformedTimestampError";
    this.timestamp = timestamp;
  }
}

export class JsonParseError extends Error {
  readonly offset: number;

  constructor(message: string, offset: number) {
    super(`${message} at offset ${offset}`);
    this.name = "JsonParseError";
    this.offset = offset;
  }
}

export type TidalApiErrorKind = "missing_station" | "connect_failed" | "http_status" | "empty_body";

export class TidalApiError extends Error {
  readonly kind: TidalApiErrorKind;
  readonly status: number | null;

  constructor(kind: TidalApiErrorKind, message: string, status: number | null = null) {
    super(message);
    this.name = "TidalApiError";
    this.kind = kind;
    this.status = status;
  }
}

export function asErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
