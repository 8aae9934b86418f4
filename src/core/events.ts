import * as z from "zod/v4";

export const zStartMessage = z.object({
  event: z.literal("start"),
  run_id: z.string(),
  command: z.string().default(""),
  machine: z.string().default(""),
  tmux: z.string().nullish().transform((v) => v ?? null),
  cwd: z.string().default(""),
  timestamp: z.string().optional()
});

export const zTriggerMessage = z.object({
  event: z.literal("trigger"),
  run_id: z.string(),
  trigger: z.string().min(1),
  context: z.string().default(""),
  command: z.string().optional(),
  machine: z.string().optional(),
  tmux: z.string().nullish(),
  cwd: z.string().optional(),
  timestamp: z.string().optional()
});

export const zUrlMessage = z.object({
  event: z.literal("url"),
  run_id: z.string(),
  url: z.string().min(1),
  timestamp: z.string().optional()
});

export const zCompleteMessage = z.object({
  event: z.literal("complete"),
  run_id: z.string(),
  exit_code: z.number().int().nullable().default(0),
  timestamp: z.string().optional()
});

export const zRunMessage = z.discriminatedUnion("event", [zStartMessage, zTriggerMessage, zUrlMessage, zCompleteMessage]);

export type StartMessage = z.infer<typeof zStartMessage>;
export type TriggerMessage = z.infer<typeof zTriggerMessage>;
export type UrlMessage = z.infer<typeof zUrlMessage>;
export type CompleteMessage = z.infer<typeof zCompleteMessage>;
export type RunMessage = z.infer<typeof zRunMessage>;
export type RunMessageKind = RunMessage["event"];

/** Input shapes for the launcher side, before defaults are applied. */
export type StartMessageInput = z.input<typeof zStartMessage>;
export type TriggerMessageInput = z.input<typeof zTriggerMessage>;
export type UrlMessageInput = z.input<typeof zUrlMessage>;
export type CompleteMessageInput = z.input<typeof zCompleteMessage>;
export type RunMessageInput = StartMessageInput | TriggerMessageInput | UrlMessageInput | CompleteMessageInput;

export const zEnvelope = z.looseObject({
  event: z.string(),
  message: z.string().optional()
});


const SKIPPED_ENVELOPES = new Set(["keepalive", "open", "poll_request"]);

export type DecodeResult =
  | { kind: "message"; message: RunMessage }
  | { kind: "skipped" }
  | { kind: "malformed"; reason: string };

/** Decodes one feed line: the outer envelope, then the JSON message it carries. */
export function decodeFeedLine(line: string): DecodeResult {
  const trimmed = line.trim();
  if (!trimmed) return { kind: "skipped" };

  const outer = parseJson(trimmed);
  if (!outer.ok) return { kind: "malformed", reason: "envelope is not JSON" };

  const envelope = zEnvelope.safeParse(outer.value);
  if (!envelope.success) return { kind: "malformed", reason: "envelope has no event" };
  if (SKIPPED_ENVELOPES.has(envelope.data.event)) return { kind: "skipped" };

  const body = envelope.data.message;
  if (body === undefined || body.length === 0) return { kind: "skipped" };

  const inner = parseJson(body);
  if (!inner.ok) return { kind: "malformed", reason: "message is not JSON" };

  const message = zRunMessage.safeParse(inner.value);
  if (!message.success) return { kind: "malformed", reason: "message does not match a run event" };
  return { kind: "message", message: message.data };
}

function parseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch {
    return { ok: false };
  }
}
