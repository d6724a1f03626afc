import type { Config } from './config.js';
import { decodeEvent, type StreamEvent } from './events.js';
import { EventFramer, type RawEvent } from './framing.js';
import { HttpError, postEventStream, type FetchLike } from './http.js';
import type { ToolInvocation } from './invocation.js';
import { silentLogger, type Logger } from './logger.js';
import { ResultBuilder, type InvocationError, type InvocationResult } from './result.js';

const EDIT_SHEET_PATH = '/mcp/edit_google_sheet';

const GENERIC_BACKEND_ERROR = 'Unknown error from backend';
const TRUNCATED_MESSAGE =
  'Backend stream ended before the edit finished (no done or error event). Changes may be partially applied.';

export interface ProgressUpdate {
  message: string;
  /** Zero-based step index, when the backend reports one. */
  step?: number;
}

export type ProgressSink = (update: ProgressUpdate) => Promise<void>;

export interface EditSheetOptions {
  signal?: AbortSignal;
  onProgress?: ProgressSink;
}

export interface ClientDeps {
  fetch?: FetchLike;
  logger?: Logger;
}

type AbortCause = 'cancelled' | 'timeout';

type ChunkResult =
  | { ok: true; done: true }
  | { ok: true; done: false; value: Uint8Array }
  | { ok: false; error: unknown };

/**
 * Links the caller's signal and the optional overall deadline to one
 * controller for the request, remembering which of the two fired first.
 */
class AbortScope {
  private readonly controller = new AbortController();
  private cause: AbortCause | undefined;
  private readonly timer: ReturnType<typeof setTimeout> | undefined;
  private readonly onParentAbort = () => this.abort('cancelled');

  constructor(private readonly parent: AbortSignal | undefined, timeoutMs: number | undefined) {
    if (parent?.aborted) {
      this.abort('cancelled');
    } else {
      parent?.addEventListener('abort', this.onParentAbort, { once: true });
    }
    this.timer = timeoutMs ? setTimeout(() => this.abort('timeout'), timeoutMs) : undefined;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  reason(): AbortCause | undefined {
    return this.cause;
  }

  abort(cause: AbortCause): void {
    if (this.cause) return;
    this.cause = cause;
    this.controller.abort();
  }

  dispose(): void {
    clearTimeout(this.timer);
    this.parent?.removeEventListener('abort', this.onParentAbort);
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function assertNever(value: never): never {
  throw new Error(`Unhandled stream event: ${JSON.stringify(value)}`);
}

function describeProgress(event: Extract<StreamEvent, { kind: 'progress' }>): string {
  const step = event.stepIndex === undefined ? '' : `[step ${event.stepIndex + 1}] `;
  return `🔄 ${step}${event.message}`;
}

function describeToolUse(event: Extract<StreamEvent, { kind: 'tool_use' }>): string {
  const args = Object.keys(event.args).length > 0 ? ` ${JSON.stringify(event.args)}` : '';
  return `🔧 ${event.toolName}${args}`;
}

function buildRequestBody(invocation: ToolInvocation): Record<string, string> {
  const body: Record<string, string> = {
    prompt: invocation.prompt,
    spreadsheet_id: invocation.spreadsheetId,
    model: invocation.model,
  };
  if (invocation.conversationId) body.conversation_id = invocation.conversationId;
  return body;
}

async function readChunk(reader: ReadableStreamDefaultReader<Uint8Array>): Promise<ChunkResult> {
  try {
    const chunk = await reader.read();
    if (chunk.done) return { ok: true, done: true };
    return { ok: true, done: false, value: chunk.value };
  } catch (error: unknown) {
    return { ok: false, error };
  }
}

/**
 * Client for the sheet-editing agent backend.
 *
 * `editSheet` owns one backend call end to end: it opens the streaming POST,
 * forwards progress as it arrives, and always resolves with exactly one
 * `InvocationResult` (it never rejects). A stream that ends without a `done`
 * or `error` event resolves as `StreamTruncated`, even when an answer has
 * already been received.
 */
export class SheetsAgentClient {
  private readonly logger: Logger;
  private readonly fetchImpl: FetchLike | undefined;

  constructor(private readonly config: Config, deps: ClientDeps = {}) {
    this.logger = deps.logger ?? silentLogger;
    this.fetchImpl = deps.fetch;
  }

  async editSheet(invocation: ToolInvocation, options: EditSheetOptions = {}): Promise<InvocationResult> {
    const builder = new ResultBuilder();
    const scope = new AbortScope(options.signal, this.config.timeoutMs);
    const started = Date.now();

    this.logger.info(
      `edit_google_sheet: spreadsheet ${invocation.spreadsheetId}, model ${invocation.model}` +
        (invocation.conversationId ? `, conversation ${invocation.conversationId}` : '')
    );

    try {
      const result = await this.run(invocation, builder, scope, options.onProgress);
      const outcome = result.error ? `${result.error.kind}: ${result.error.message}` : 'success';
      this.logger.info(`edit_google_sheet finished in ${Date.now() - started}ms (${outcome})`);
      return result;
    } finally {
      scope.dispose();
    }
  }

  private async run(
    invocation: ToolInvocation,
    builder: ResultBuilder,
    scope: AbortScope,
    onProgress: ProgressSink | undefined
  ): Promise<InvocationResult> {
    const early = scope.reason();
    if (early) return builder.fail(this.abortError(early));

    let response: Response;
    try {
      response = await postEventStream(this.config, EDIT_SHEET_PATH, {
        body: buildRequestBody(invocation),
        bearerToken: invocation.googleAccessToken,
        signal: scope.signal,
        fetch: this.fetchImpl,
      });
    } catch (error: unknown) {
      const cause = scope.reason();
      return builder.fail(cause ? this.abortError(cause) : this.requestError(error));
    }

    return this.consume(response, builder, scope, onProgress);
  }

  private async consume(
    response: Response,
    builder: ResultBuilder,
    scope: AbortScope,
    onProgress: ProgressSink | undefined
  ): Promise<InvocationResult> {
    if (!response.body) {
      return builder.fail({ kind: 'StreamTruncated', message: 'Backend returned an empty response body' });
    }

    const reader = response.body.getReader();
    const framer = new EventFramer();
    const cancelRead = () => {
      reader.cancel().catch((error: unknown) => {
        this.logger.debug('Cancelling backend stream failed:', errorMessage(error));
      });
    };
    scope.signal.addEventListener('abort', cancelRead, { once: true });
    if (scope.signal.aborted) cancelRead();

    try {
      for (;;) {
        const next = await readChunk(reader);
        const cause = scope.reason();
        if (cause) return builder.fail(this.abortError(cause));
        if (!next.ok) {
          return builder.fail({
            kind: 'StreamTruncated',
            message: `Connection to backend lost before the edit finished: ${errorMessage(next.error)}`,
          });
        }

        const raws = next.done ? framer.flush() : framer.push(next.value);
        for (const raw of raws) {
          const terminal = await this.dispatch(raw, builder, onProgress);
          if (terminal) return terminal;
          const interrupted = scope.reason();
          if (interrupted) return builder.fail(this.abortError(interrupted));
        }

        if (next.done) {
          return builder.fail({ kind: 'StreamTruncated', message: TRUNCATED_MESSAGE });
        }
      }
    } finally {
      scope.signal.removeEventListener('abort', cancelRead);
      await this.release(reader);
    }
  }

  private async dispatch(
    raw: RawEvent,
    builder: ResultBuilder,
    onProgress: ProgressSink | undefined
  ): Promise<InvocationResult | undefined> {
    const decoded = decodeEvent(raw);
    if (!decoded.ok) {
      this.logger.warn(`Skipping malformed backend event: ${decoded.error}`);
      this.logger.debug('Malformed payload:', raw.data.slice(0, 500));
      return undefined;
    }

    for (const event of decoded.events) {
      const terminal = await this.apply(event, builder, onProgress);
      if (terminal) return terminal;
    }
    return undefined;
  }

  private async apply(
    event: StreamEvent,
    builder: ResultBuilder,
    onProgress: ProgressSink | undefined
  ): Promise<InvocationResult | undefined> {
    switch (event.kind) {
      case 'progress': {
        const message = describeProgress(event);
        builder.addProgress(message);
        await this.notify(onProgress, event.stepIndex === undefined ? { message } : { message, step: event.stepIndex });
        return undefined;
      }
      case 'tool_use': {
        const message = describeToolUse(event);
        builder.addToolCall(message);
        await this.notify(onProgress, { message });
        return undefined;
      }
      case 'conversation':
        builder.setConversationId(event.conversationId);
        return undefined;
      case 'answer':
        builder.setAnswer(event.text);
        return undefined;
      case 'error':
        return builder.fail({
          kind: 'BackendError',
          message: event.message.trim() || GENERIC_BACKEND_ERROR,
          ...(event.code ? { code: event.code } : {}),
        });
      case 'done':
        return builder.succeed(event.turnCount, event.partial);
      default:
        return assertNever(event);
    }
  }

  private async notify(onProgress: ProgressSink | undefined, update: ProgressUpdate): Promise<void> {
    if (!onProgress) return;
    try {
      await onProgress(update);
    } catch (error: unknown) {
      this.logger.warn('Progress notification failed:', errorMessage(error));
    }
  }

  private async release(reader: ReadableStreamDefaultReader<Uint8Array>): Promise<void> {
    try {
      await reader.cancel();
      reader.releaseLock();
    } catch (error: unknown) {
      this.logger.debug('Releasing backend stream failed:', errorMessage(error));
    }
  }

  private abortError(cause: AbortCause): InvocationError {
    if (cause === 'timeout') {
      const seconds = Math.ceil((this.config.timeoutMs ?? 0) / 1000);
      return {
        kind: 'Timeout',
        message: `Edit did not finish within ${seconds} seconds. The backend may still be processing it.`,
      };
    }
    return { kind: 'Cancelled', message: 'Edit cancelled by the client' };
  }

  private requestError(error: unknown): InvocationError {
    if (error instanceof HttpError && error.status > 0) {
      return { kind: 'HttpError', status: error.status, code: error.code, message: error.message };
    }
    return {
      kind: 'ConnectionFailure',
      message: `Could not reach backend at ${this.config.apiUrl}: ${errorMessage(error)}`,
      ...(error instanceof HttpError ? { code: error.code } : {}),
    };
  }
}
