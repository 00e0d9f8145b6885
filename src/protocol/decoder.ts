import { StringDecoder } from "node:string_decoder";
import { MalformedMessageError, TruncatedStreamError } from "../lib/errors.js";
import {
  EnvelopeSchema,
  MESSAGE_KINDS,
  type Finding,
  type Message,
  type OsvEntry,
  type Progress,
  type ScannerConfig
} from "./messages.js";

/**
 * Incremental decoder for the scanner's output stream.
 *
 * The stream is a sequence of top-level JSON objects, either one per line or indented and
 * concatenated. Values are split on brace depth (string literals and escapes are tracked), so
 * each message is available as soon as its closing brace arrives.
 */
export class MessageDecoder {
  private readonly text = new StringDecoder("utf8");
  private buffer = "";
  private depth = 0;
  private inString = false;
  private escaped = false;
  private start = -1;
  private scanned = 0;
  private offset = 0;
  private decoded = 0;

  push(chunk: string | Uint8Array): Message[] {
    this.buffer += typeof chunk === "string" ? chunk : this.text.write(Buffer.from(chunk));
    return this.drain();
  }

  /** Signals end of stream. Throws if a message was cut off. */
  end(): Message[] {
    this.buffer += this.text.end();
    const out = this.drain();
    if (this.start >= 0) {
      throw new TruncatedStreamError(`stream ended inside message ${this.decoded + 1} (offset ${this.offset})`);
    }
    return out;
  }

  get count(): number {
    return this.decoded;
  }

  private drain(): Message[] {
    const out: Message[] = [];
    for (let i = this.scanned; i < this.buffer.length; i += 1) {
      const ch = this.buffer[i];
      if (this.start < 0) {
        if (ch === "{") {
          this.start = i;
          this.depth = 1;
        } else if (!isWhitespace(ch)) {
          throw new MalformedMessageError(`unexpected character ${JSON.stringify(ch)} at offset ${this.offset + i}`);
        }
        continue;
      }

      if (this.inString) {
        if (this.escaped) this.escaped = false;
        else if (ch === "\\") this.escaped = true;
        else if (ch === '"') this.inString = false;
        continue;
      }

      if (ch === '"') this.inString = true;
      else if (ch === "{" || ch === "[") this.depth += 1;
      else if (ch === "}" || ch === "]") {
        this.depth -= 1;
        if (this.depth === 0) {
          out.push(this.decodeValue(this.buffer.slice(this.start, i + 1)));
          this.start = -1;
        }
      }
    }

    // Drop everything already consumed so the buffer only holds the pending message.
    const keepFrom = this.start >= 0 ? this.start : this.buffer.length;
    this.offset += keepFrom;
    this.buffer = this.buffer.slice(keepFrom);
    this.scanned = this.buffer.length;
    if (this.start >= 0) this.start = 0;
    return out;
  }

  private decodeValue(raw: string): Message {
    const index = this.decoded + 1;
    let value: unknown;
    try {
      value = JSON.parse(raw);
    } catch (e) {
      throw new MalformedMessageError(`message ${index} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
    }
    const message = toMessage(value, index);
    this.decoded = index;
    return message;
  }
}

export function toMessage(value: unknown, index = 1): Message {
  const parsed = EnvelopeSchema.safeParse(value);
  if (!parsed.success) {
    throw new MalformedMessageError(`message ${index} has an invalid shape: ${parsed.error.message}`);
  }
  const envelope = parsed.data;
  const populated = MESSAGE_KINDS.filter((kind) => envelope[kind] !== undefined && envelope[kind] !== null);
  if (populated.length !== 1) {
    throw new MalformedMessageError(
      `message ${index} must carry exactly one of ${MESSAGE_KINDS.join(", ")}; found ${populated.length === 0 ? "none" : populated.join(", ")}`
    );
  }

  if (envelope.config) return { kind: "config", config: envelope.config };
  if (envelope.progress) return { kind: "progress", progress: envelope.progress };
  if (envelope.osv) return { kind: "osv", osv: envelope.osv };
  if (envelope.finding) return { kind: "finding", finding: envelope.finding };
  throw new MalformedMessageError(`message ${index} carries no payload`);
}

export async function* decodeMessages(source: AsyncIterable<string | Uint8Array>): AsyncGenerator<Message> {
  const decoder = new MessageDecoder();
  for await (const chunk of source) {
    yield* decoder.push(chunk);
  }
  yield* decoder.end();
}

export type MessageHandler = {
  config?: (config: ScannerConfig) => void;
  progress?: (progress: Progress) => void;
  osv?: (entry: OsvEntry) => void;
  finding?: (finding: Finding) => void;
};

/** Decodes the whole source, passing each message to the matching handler callback. */
export async function handleMessages(source: AsyncIterable<string | Uint8Array>, handler: MessageHandler): Promise<number> {
  let count = 0;
  for await (const message of decodeMessages(source)) {
    count += 1;
    switch (message.kind) {
      case "config":
        handler.config?.(message.config);
        break;
      case "progress":
        handler.progress?.(message.progress);
        break;
      case "osv":
        handler.osv?.(message.osv);
        break;
      case "finding":
        handler.finding?.(message.finding);
        break;
    }
  }
  return count;
}

/** Collects findings and the scanner config header; progress and OSV entries are dropped. */
export class FindingCollector implements MessageHandler {
  readonly findings: Finding[] = [];
  scannerConfig: ScannerConfig | null = null;

  config = (config: ScannerConfig): void => {
    this.scannerConfig = config;
  };

  finding = (finding: Finding): void => {
    this.findings.push(finding);
  };
}

function isWhitespace(ch: string): boolean {
  return ch === " " || ch === "\n" || ch === "\r" || ch === "\t";
}
