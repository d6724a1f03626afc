import { z } from 'zod';
import type { RawEvent } from './framing.js';

/**
 * Events the backend agent can report during one edit. Closed set: the
 * adapter's dispatch switch must handle every `kind`.
 */
export type StreamEvent =
  | { kind: 'progress'; message: string; stepIndex?: number }
  | { kind: 'tool_use'; toolName: string; args: Record<string, unknown> }
  | { kind: 'answer'; text: string }
  | { kind: 'error'; message: string; code?: string }
  | { kind: 'conversation'; conversationId: string }
  | { kind: 'done'; turnCount: number; partial: boolean };

export type DecodeResult =
  | { ok: true; events: StreamEvent[] }
  | { ok: false; error: string };

// Backends send `null` for unset fields as often as they leave them out.
const stepSchema = z.number().int().nonnegative().nullish();
const turnCountSchema = z.number().int().nonnegative().nullish();
const argsSchema = z.record(z.unknown()).nullish();
const flagSchema = z.boolean().nullish();
const textSchema = z.string().nullish();

const progressSchema = z.object({
  type: z.literal('progress'),
  message: textSchema,
  step_index: stepSchema,
  step: stepSchema,
});

const toolUseSchema = z.object({
  type: z.literal('tool_use'),
  tool_name: textSchema,
  name: textSchema,
  args: argsSchema,
  input: argsSchema,
});

// Older backends report tool activity as a preformatted message.
const toolCallSchema = toolUseSchema.extend({
  type: z.literal('tool_call'),
  message: textSchema,
});

const answerSchema = z.object({
  type: z.literal('answer'),
  text: textSchema,
  message: textSchema,
});

const errorSchema = z.object({
  type: z.literal('error'),
  message: textSchema,
  code: z.union([z.string(), z.number()]).nullish(),
});

const conversationSchema = z.object({
  type: z.literal('conversation'),
  conversation_id: z.string().min(1),
});

const conversationUpdateSchema = conversationSchema.extend({
  type: z.literal('conversation_update'),
});

const doneSchema = z.object({
  type: z.literal('done'),
  turn_count: turnCountSchema,
  partial: flagSchema,
});

// Single final event: conversation id, answer and turn count in one payload.
const responseSchema = z.object({
  type: z.literal('response'),
  message: textSchema,
  conversation_id: textSchema,
  turn_count: turnCountSchema,
  partial: flagSchema,
});

const wireEventSchema = z.discriminatedUnion('type', [
  progressSchema,
  toolUseSchema,
  toolCallSchema,
  answerSchema,
  errorSchema,
  conversationSchema,
  conversationUpdateSchema,
  doneSchema,
  responseSchema,
]);

type WireEvent = z.infer<typeof wireEventSchema>;

function toStreamEvents(wire: WireEvent): StreamEvent[] {
  switch (wire.type) {
    case 'progress': {
      const message = wire.message ?? '';
      const stepIndex = wire.step_index ?? wire.step;
      return [
        stepIndex === undefined || stepIndex === null
          ? { kind: 'progress', message }
          : { kind: 'progress', message, stepIndex },
      ];
    }
    case 'tool_use':
    case 'tool_call': {
      const message = wire.type === 'tool_call' ? wire.message : undefined;
      const toolName = wire.tool_name ?? wire.name ?? message ?? 'tool';
      return [{ kind: 'tool_use', toolName, args: wire.args ?? wire.input ?? {} }];
    }
    case 'answer':
      return [{ kind: 'answer', text: wire.text ?? wire.message ?? '' }];
    case 'error': {
      const message = wire.message ?? '';
      return [
        wire.code === undefined || wire.code === null
          ? { kind: 'error', message }
          : { kind: 'error', message, code: String(wire.code) },
      ];
    }
    case 'conversation':
    case 'conversation_update':
      return [{ kind: 'conversation', conversationId: wire.conversation_id }];
    case 'done':
      return [{ kind: 'done', turnCount: wire.turn_count ?? 0, partial: wire.partial ?? false }];
    case 'response': {
      const events: StreamEvent[] = [];
      if (wire.conversation_id) {
        events.push({ kind: 'conversation', conversationId: wire.conversation_id });
      }
      events.push({ kind: 'answer', text: wire.message ?? '' });
      events.push({ kind: 'done', turnCount: wire.turn_count ?? 0, partial: wire.partial ?? false });
      return events;
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Decodes one framed payload. A payload that is not JSON, has no known
 * `type`, or has fields of the wrong shape yields `ok: false`; callers skip
 * it and keep reading.
 */
export function decodeEvent(raw: RawEvent): DecodeResult {
  const data = raw.data.trim();
  // OpenAI-style end-of-stream sentinel; not the same as a `done` event
  if (data === '[DONE]') return { ok: true, events: [] };

  let parsed: unknown;
  try {
    parsed = JSON.parse(data);
  } catch (error: unknown) {
    return { ok: false, error: `invalid JSON (${error instanceof Error ? error.message : String(error)})` };
  }

  if (!isRecord(parsed)) {
    return { ok: false, error: 'event payload is not an object' };
  }

  const candidate =
    parsed.type === undefined && raw.event && raw.event !== 'message'
      ? { ...parsed, type: raw.event }
      : parsed;

  const result = wireEventSchema.safeParse(candidate);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    return { ok: false, error: `${issue?.message ?? 'invalid event'}${where}` };
  }

  return { ok: true, events: toStreamEvents(result.data) };
}
