import fs from "node:fs";
import path from "node:path";
import { Readable } from "node:stream";
import { describe, expect, test } from "vitest";
import { MalformedMessageError, TruncatedStreamError } from "../src/lib/errors.js";
import { decodeMessages, FindingCollector, handleMessages, MessageDecoder, toMessage } from "../src/protocol/decoder.js";
import type { Message } from "../src/protocol/messages.js";
import { FIXTURES_DIR } from "./helpers.js";

async function collect(chunks: (string | Uint8Array)[]): Promise<Message[]> {
  const out: Message[] = [];
  for await (const m of decodeMessages(Readable.from(chunks))) out.push(m);
  return out;
}

describe("message decoder", () => {
  test("decodes an indented multi-message stream in order", async () => {
    const stream = fs.readFileSync(path.join(FIXTURES_DIR, "scanner-stream.json"), "utf8");
    const messages = await collect([stream]);
    expect(messages.map((m) => m.kind)).toEqual(["config", "progress", "osv", "finding", "finding"]);

    const config = messages[0];
    expect(config.kind === "config" && config.config.go_version).toBe("go1.21.0");
    const osv = messages[2];
    expect(osv.kind === "osv" && osv.osv.summary).toBe('Example flaw with a "quoted" {brace} and [bracket] in text');
  });

  test("produces the same messages however the stream is chunked", async () => {
    const stream = fs.readFileSync(path.join(FIXTURES_DIR, "scanner-stream.json"), "utf8");
    const whole = await collect([stream]);
    const chunks: string[] = [];
    for (let i = 0; i < stream.length; i += 3) chunks.push(stream.slice(i, i + 3));
    expect(await collect(chunks)).toEqual(whole);
  });

  test("decodes newline-delimited messages", async () => {
    const lines = ['{"progress":{"message":"a"}}', '{"progress":{"message":"b"}}', '{"finding":{"osv":"GO-1","trace":[{"module":"m"}]}}'];
    const messages = await collect([lines.join("\n") + "\n"]);
    expect(messages).toHaveLength(3);
    expect(messages[0]).toEqual({ kind: "progress", progress: { message: "a" } });
    expect(messages[1]).toEqual({ kind: "progress", progress: { message: "b" } });
    expect(messages[2].kind).toBe("finding");
  });

  test("makes each message available as soon as it is complete", () => {
    const decoder = new MessageDecoder();
    expect(decoder.push('{"progress":{"message":"first"}}\n{"progress":')).toEqual([
      { kind: "progress", progress: { message: "first" } }
    ]);
    expect(decoder.push('{"message":"second"}}')).toEqual([{ kind: "progress", progress: { message: "second" } }]);
    expect(decoder.end()).toEqual([]);
    expect(decoder.count).toBe(2);
  });

  test("handles multi-byte characters split across chunks", async () => {
    const bytes = Buffer.from('{"progress":{"message":"café ✓"}}', "utf8");
    const split = bytes.indexOf(0xc3) + 1;
    const messages = await collect([bytes.subarray(0, split), bytes.subarray(split)]);
    expect(messages).toEqual([{ kind: "progress", progress: { message: "café ✓" } }]);
  });

  test("rejects a message with no populated field", async () => {
    await expect(collect(['{"progress":{"message":"ok"}}\n{}\n'])).rejects.toBeInstanceOf(MalformedMessageError);
  });

  test("rejects a message with more than one populated field", () => {
    expect(() => toMessage({ progress: { message: "x" }, finding: { osv: "GO-1", trace: [] } })).toThrow(
      "must carry exactly one of config, progress, osv, finding; found progress, finding"
    );
  });

  test("treats null fields as absent", () => {
    expect(toMessage({ config: null, progress: { message: "x" } })).toEqual({ kind: "progress", progress: { message: "x" } });
  });

  test("rejects a message with only unknown fields", () => {
    expect(() => toMessage({ sbom: { modules: [] } })).toThrow(MalformedMessageError);
  });

  test("rejects invalid JSON", async () => {
    await expect(collect(['{"progress": {"message": oops}}'])).rejects.toBeInstanceOf(MalformedMessageError);
  });

  test("rejects data outside an object", async () => {
    await expect(collect(['[{"progress":{}}]'])).rejects.toBeInstanceOf(MalformedMessageError);
  });

  test("reports a stream cut off inside a message", async () => {
    await expect(collect(['{"progress":{"message":"a"}}\n{"finding":{"osv":"GO-1",'])).rejects.toBeInstanceOf(TruncatedStreamError);
  });

  test("accepts an empty stream", async () => {
    expect(await collect([])).toEqual([]);
    expect(await collect(["\n  \n"])).toEqual([]);
  });

  test("handleMessages dispatches by kind and FindingCollector keeps findings and config", async () => {
    const stream = fs.readFileSync(path.join(FIXTURES_DIR, "scanner-stream.json"), "utf8");
    const collector = new FindingCollector();
    const count = await handleMessages(Readable.from([stream]), collector);
    expect(count).toBe(5);
    expect(collector.findings.map((f) => f.osv)).toEqual(["GO-2023-0001", "GO-2023-0002"]);
    expect(collector.scannerConfig?.db_last_modified).toBe("2023-08-01T12:00:00.123456789Z");
  });
});
