import { describe, expect, it } from "vitest";
import { JsonParseError } from "../errors.js";
import { JsonTokenizer, tokenize, type JsonToken } from "../tokenizer.js";

function collect(chunks: Array<Uint8Array | string>): JsonToken[] {
  return Array.from(tokenize(chunks));
}

describe("JsonTokenizer", () => {
  it("emits structural and scalar tokens in document order", () => {
    const tokens = collect(['[{"a":"x","b":1.5,"c":true,"d":null}]']);
    expect(tokens).toEqual([
      { type: "document_start" },
      { type: "array_start" },
      { type: "object_start" },
      { type: "key", name: "a" },
      { type: "value", value: "x" },
      { type: "key", name: "b" },
      { type: "value", value: "1.5" },
      { type: "key", name: "c" },
      { type: "value", value: "true" },
      { type: "key", name: "d" },
      { type: "value", value: "null" },
      { type: "object_end" },
      { type: "array_end" },
      { type: "document_end" },
    ]);
  });

  it("keeps nested containers balanced", () => {
    const types = collect(['{"outer":[1,{"inner":[]}],"n":-2e3}']).map((token) => token.type);
    expect(types).toEqual([
      "document_start",
      "object_start",
      "key",
      "array_start",
      "value",
      "object_start",
      "key",
      "array_start",
      "array_end",
      "object_end",
      "array_end",
      "key",
      "value",
      "object_end",
      "document_end",
    ]);
  });

  it("unescapes string values", () => {
    const tokens = collect([String.raw`["a\"b\\cé\n"]`]);
    expect(tokens[2]).toEqual({ type: "value", value: 'a"b\\cé\n' });
  });

  it("decodes utf-8 sequences split across chunks", () => {
    const bytes = Buffer.from('[{"k":"é"}]', "utf8");
    const tokens = collect([bytes.subarray(0, 8), bytes.subarray(8)]);
    expect(tokens[4]).toEqual({ type: "value", value: "é" });
  });

  it("produces the same tokens for any chunking", () => {
    const text = '[{"EventType":"HighWater","Height":4.2}]';
    const whole = collect([text]);
    const byteWise = collect(Array.from(Buffer.from(text, "utf8"), (byte) => Uint8Array.of(byte)));
    expect(byteWise).toEqual(whole);
  });

  it("yields tokens lazily as chunks arrive", () => {
    const tokenizer = new JsonTokenizer();
    expect(Array.from(tokenizer.write('[{"Height"'))).toEqual([
      { type: "document_start" },
      { type: "array_start" },
      { type: "object_start" },
      { type: "key", name: "Height" },
    ]);
    expect(Array.from(tokenizer.write(':"1.0"}'))).toEqual([{ type: "value", value: "1.0" }, { type: "object_end" }]);
    expect(Array.from(tokenizer.write("]"))).toEqual([{ type: "array_end" }, { type: "document_end" }]);
    expect(Array.from(tokenizer.end())).toEqual([]);
  });

  it("rejects a trailing comma inside an object", () => {
    expect(() => collect(['[{"a":1,}]'])).toThrow("expected object key but found '}' at offset 8");
  });

  it("rejects content after the root closes", () => {
    expect(() => collect(["[1]]"])).toThrow(JsonParseError);
    expect(() => collect(["[1]]"])).toThrow("unexpected ']' after document end at offset 3");
  });

  it("rejects mismatched closing brackets", () => {
    expect(() => collect(["[1}"])).toThrow("unbalanced '}' at offset 2");
  });

  it("rejects invalid literals and numbers", () => {
    expect(() => collect(["[tru]"])).toThrow("invalid literal 'tru]' at offset 4");
    expect(() => collect(["[01]"])).toThrow("invalid number '01' at offset 3");
  });

  it("reports truncated and empty input at end of stream", () => {
    expect(() => collect(['[{"a":'])).toThrow("unexpected end of input at offset 6");
    expect(() => collect(["  "])).toThrow("empty document at offset 2");
  });

  it("enforces the nesting limit", () => {
    const tokenizer = new JsonTokenizer({ maxDepth: 2 });
    expect(() => Array.from(tokenizer.write("[[[1]]]"))).toThrow("nesting deeper than 2 at offset 2");
  });

  it("stops producing tokens after a failure", () => {
    const tokenizer = new JsonTokenizer();
    expect(() => Array.from(tokenizer.write("[x"))).toThrow(JsonParseError);
    expect(() => Array.from(tokenizer.write("]"))).toThrow("tokenizer already failed");
  });
});
