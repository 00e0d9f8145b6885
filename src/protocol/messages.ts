import { z } from "zod";

const PositionSchema = z.object({
  filename: z.string().optional(),
  offset: z.number().int().default(0),
  line: z.number().int().default(0),
  column: z.number().int().default(0)
});

export const FrameSchema = z.object({
  module: z.string().default(""),
  version: z.string().optional(),
  package: z.string().optional(),
  function: z.string().optional(),
  receiver: z.string().optional(),
  position: PositionSchema.optional()
});

export const FindingSchema = z.object({
  osv: z.string().default(""),
  fixed_version: z.string().optional(),
  // Ordered from the vulnerable symbol outward to the entry point.
  trace: z.array(FrameSchema).default([])
});

export const ConfigSchema = z.object({
  protocol_version: z.string().optional(),
  scanner_name: z.string().optional(),
  scanner_version: z.string().optional(),
  db: z.string().optional(),
  db_last_modified: z.string().optional(),
  go_version: z.string().optional(),
  goos: z.string().optional(),
  goarch: z.string().optional(),
  imports_only: z.boolean().optional()
});

export const ProgressSchema = z.object({
  time: z.string().optional(),
  message: z.string().optional()
});

// OSV entries are carried through as-is; only the id is needed here.
export const OsvEntrySchema = z
  .object({
    id: z.string(),
    modified: z.string().optional(),
    published: z.string().optional(),
    aliases: z.array(z.string()).optional(),
    summary: z.string().optional(),
    details: z.string().optional()
  })
  .passthrough();

export type Position = z.infer<typeof PositionSchema>;
export type Frame = z.infer<typeof FrameSchema>;
export type Finding = z.infer<typeof FindingSchema>;
export type ScannerConfig = z.infer<typeof ConfigSchema>;
export type Progress = z.infer<typeof ProgressSchema>;
export type OsvEntry = z.infer<typeof OsvEntrySchema>;

export type Message =
  | { kind: "config"; config: ScannerConfig }
  | { kind: "progress"; progress: Progress }
  | { kind: "osv"; osv: OsvEntry }
  | { kind: "finding"; finding: Finding };

export type MessageKind = Message["kind"];

export const MESSAGE_KINDS: readonly MessageKind[] = ["config", "progress", "osv", "finding"];

export const EnvelopeSchema = z.object({
  config: ConfigSchema.nullish(),
  progress: ProgressSchema.nullish(),
  osv: OsvEntrySchema.nullish(),
  finding: FindingSchema.nullish()
});
