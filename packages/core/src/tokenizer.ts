import { TextDecoder } from "node:util";
import { JsonParseError } from "./errors.js";

export type JsonToken =
  | { type: "document_start" }
  | { type: "array_start" }
  | { type: "object_start" }
  | { type: "key"; name: string }
  | { type: "value"; value: string }
  | { type: "object_end" }
  | { type: "array_end" }
  | { type: "document_end" };

export type JsonChunk = Uint8Array | string;

export interface TokenizerOptions {
  maxDepth?: number;
}

export const DEFAULT_MAX_DEPTH = 16;

type Container = "array" | "object";

type TokenizerState =
  | "start_document"
  | "expect_value"
  | "array_value_or_end"
  | "object_key_or_end"
  | "object_key"
  | "object_colon"
  | "after_value"
  | "in_string"
  | "in_number"
  | "in_literal"
  | "done"
  | "failed";

const LITERALS = ["true", "false", "null"];
const NUMBER_PATTERN = /^-?(0|[1-9]\d*)(\.\d+)?([eE][+-]?\d+)?$/;
const ESCAPES: Record<string, string> = {
  '"': '"',
  "\\": "\\",
  "/": "/",
  b: "\b",
  f: "\f",
  n: "\n",
  r: "\r",
  t: "\t",
};

function isWhitespace(ch: string): boolean {
  return ch === " " || ch === "\n" || ch === "\r" || ch === "\t";
}

function isNumberChar(ch: string): boolean {
  return (ch >= "0" && ch <= "9") || ch === "-" || ch === "+" || ch === "." || ch === "e" || ch === "E";
}

/**
 * Forward-only JSON tokenizer. Holds the container stack and the token being
 * assembled, never the document.
 */
export class JsonTokenizer {
  private readonly maxDepth: number;
  private readonly decoder = new TextDecoder("utf-8");
  private readonly stack: Container[] = [];
  private state: TokenizerState = "start_document";
  private stringRole: "key" | "value" = "value";
  private escape: "none" | "backslash" | "unicode" = "none";
  private unicodeDigits = "";
  private buffer = "";
  private offset = 0;
  private pending: JsonToken[] = [];

  constructor(options: TokenizerOptions = {}) {
    this.maxDepth = Math.max(1, options.maxDepth ?? DEFAULT_MAX_DEPTH);
  }

  *write(chunk: JsonChunk): Generator<JsonToken> {
    const text = typeof chunk === "string" ? chunk : this.decoder.decode(chunk, { stream: true });
    yield* this.consumeText(text);
  }

  *end(): Generator<JsonToken> {
    yield* this.consumeText(this.decoder.decode());
    if (this.state === "done") return;
    if (this.state === "start_document") {
      this.fail("empty document");
    }
    this.fail("unexpected end of input");
  }

  private *consumeText(text: string): Generator<JsonToken> {
    for (const ch of text) {
      this.consume(ch);
      this.offset += 1;
      if (this.pending.length > 0) {
        const ready = this.pending;
        this.pending = [];
        yield* ready;
      }
    }
  }

  private fail(message: string): never {
    this.state = "failed";
    throw new JsonParseError(message, this.offset);
  }

  private emit(token: JsonToken): void {
    this.pending.push(token);
  }

  private consume(ch: string): void {
    switch (this.state) {
      case "in_string":
        this.consumeString(ch);
        return;
      case "in_number":
        if (isNumberChar(ch)) {
          this.buffer += ch;
          return;
        }
        this.finishNumber();
        this.consume(ch);
        return;
      case "in_literal":
        this.consumeLiteral(ch);
        return;
      case "failed":
        this.fail("tokenizer already failed");
    }

    if (isWhitespace(ch)) return;

    switch (this.state) {
      case "start_document":
        if (ch !== "{" && ch !== "[") {
          this.fail(`expected '{' or '[' but found '${ch}'`);
        }
        this.emit({ type: "document_start" });
        this.open(ch === "{" ? "object" : "array");
        return;
      case "object_key_or_end":
        if (ch === "}") {
          this.close("object");
          return;
        }
        this.beginKey(ch);
        return;
      case "object_key":
        this.beginKey(ch);
        return;
      case "object_colon":
        if (ch !== ":") this.fail(`expected ':' but found '${ch}'`);
        this.state = "expect_value";
        return;
      case "array_value_or_end":
        if (ch === "]") {
          this.close("array");
          return;
        }
        this.beginValue(ch);
        return;
      case "expect_value":
        this.beginValue(ch);
        return;
      case "after_value":
        this.consumeSeparator(ch);
        return;
      case "done":
        this.fail(`unexpected '${ch}' after document end`);
    }
  }

  private open(container: Container): void {
    if (this.stack.length >= this.maxDepth) {
      this.fail(`nesting deeper than ${this.maxDepth}`);
    }
    this.stack.push(container);
    if (container === "object") {
      this.emit({ type: "object_start" });
      this.state = "object_key_or_end";
    } else {
      this.emit({ type: "array_start" });
      this.state = "array_value_or_end";
    }
  }

  private close(container: Container): void {
    const top = this.stack[this.stack.length - 1];
    if (top !== container) {
      this.fail(`unbalanced '${container === "object" ? "}" : "]"}'`);
    }
    this.stack.pop();
    this.emit({ type: container === "object" ? "object_end" : "array_end" });
    if (this.stack.length === 0) {
      this.emit({ type: "document_end" });
      this.state = "done";
      return;
    }
    this.state = "after_value";
  }

  private beginKey(ch: string): void {
    if (ch !== '"') this.fail(`expected object key but found '${ch}'`);
    this.stringRole = "key";
    this.buffer = "";
    this.state = "in_string";
  }

  private beginValue(ch: string): void {
    if (ch === "{") {
      this.open("object");
      return;
    }
    if (ch === "[") {
      this.open("array");
      return;
    }
    if (ch === '"') {
      this.stringRole = "value";
      this.buffer = "";
      this.state = "in_string";
      return;
    }
    if (ch === "-" || (ch >= "0" && ch <= "9")) {
      this.buffer = ch;
      this.state = "in_number";
      return;
    }
    if (ch === "t" || ch === "f" || ch === "n") {
      this.buffer = ch;
      this.state = "in_literal";
      return;
    }
    this.fail(`unexpected '${ch}' where a value was expected`);
  }

  private consumeSeparator(ch: string): void {
    const top = this.stack[this.stack.length - 1];
    if (ch === ",") {
      this.state = top === "object" ? "object_key" : "expect_value";
      return;
    }
    if (ch === "}" || ch === "]") {
      this.close(ch === "}" ? "object" : "array");
      return;
    }
    this.fail(`expected ',' or a closing bracket but found '${ch}'`);
  }

  private consumeString(ch: string): void {
    if (this.escape === "backslash") {
      if (ch === "u") {
        this.escape = "unicode";
        this.unicodeDigits = "";
        return;
      }
      const decoded = ESCAPES[ch];
      if (decoded === undefined) this.fail(`invalid escape '\\${ch}'`);
      this.buffer += decoded;
      this.escape = "none";
      return;
    }
    if (this.escape === "unicode") {
      if (!/^[0-9a-fA-F]$/.test(ch)) this.fail(`invalid unicode escape digit '${ch}'`);
      this.unicodeDigits += ch;
      if (this.unicodeDigits.length === 4) {
        this.buffer += String.fromCharCode(Number.parseInt(this.unicodeDigits, 16));
        this.escape = "none";
      }
      return;
    }
    if (ch === "\\") {
      this.escape = "backslash";
      return;
    }
    if (ch === '"') {
      if (this.stringRole === "key") {
        this.emit({ type: "key", name: this.buffer });
        this.state = "object_colon";
      } else {
        this.emit({ type: "value", value: this.buffer });
        this.state = "after_value";
      }
      this.buffer = "";
      return;
    }
    if (ch < " ") this.fail("unescaped control character in string");
    this.buffer += ch;
  }

  private finishNumber(): void {
    if (!NUMBER_PATTERN.test(this.buffer)) this.fail(`invalid number '${this.buffer}'`);
    this.emit({ type: "value", value: this.buffer });
    this.buffer = "";
    this.state = "after_value";
  }

  private consumeLiteral(ch: string): void {
    const candidate = this.buffer + ch;
    if (!LITERALS.some((literal) => literal.startsWith(candidate))) {
      this.fail(`invalid literal '${candidate}'`);
    }
    this.buffer = candidate;
    if (LITERALS.includes(candidate)) {
      this.emit({ type: "value", value: candidate });
      this.buffer = "";
      this.state = "after_value";
    }
  }
}

/**
 * Lazily tokenizes a sequence of chunks with a fresh tokenizer per call.
 */
export function* tokenize(chunks: Iterable<JsonChunk>, options: TokenizerOptions = {}): Generator<JsonToken> {
  const tokenizer = new JsonTokenizer(options);
  for (const chunk of chunks) {
    yield* tokenizer.write(chunk);
  }
  yield* tokenizer.end();
}
