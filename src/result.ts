export type ErrorKind =
  | 'InvalidArgument'
  | 'ConnectionFailure'
  | 'HttpError'
  | 'StreamTruncated'
  | 'BackendError'
  | 'Cancelled'
  | 'Timeout';

export interface InvocationError {
  kind: ErrorKind;
  message: string;
  /** HTTP status, for `HttpError` only. */
  status?: number;
  /**
   * `BackendError`: the code the backend sent. `HttpError` and
   * `ConnectionFailure`: derived from the HTTP status (`RATE_LIMITED`, `NETWORK_ERROR`).
   */
  code?: string;
}

export interface InvocationResult {
  status: 'success' | 'error';
  answer?: string;
  conversationId?: string;
  turnCount: number;
  /** The agent stopped at its turn limit. */
  partial: boolean;
  progressLog: readonly string[];
  toolCalls: readonly string[];
  error?: InvocationError;
}

/**
 * Accumulates state over one adapter run and finalizes it exactly once.
 * Anything recorded after finalization is ignored; a second `succeed`/`fail`
 * returns the result already produced.
 */
export class ResultBuilder {
  private readonly progressLog: string[] = [];
  private readonly toolCalls: string[] = [];
  private answer: string | undefined;
  private conversationId: string | undefined;
  private final: InvocationResult | undefined;

  addProgress(line: string): void {
    if (!this.final) this.progressLog.push(line);
  }

  addToolCall(line: string): void {
    if (!this.final) this.toolCalls.push(line);
  }

  setAnswer(text: string): void {
    if (!this.final) this.answer = text;
  }

  setConversationId(id: string): void {
    if (!this.final) this.conversationId = id;
  }

  succeed(turnCount = 0, partial = false): InvocationResult {
    return this.finish({ status: 'success', turnCount, partial });
  }

  fail(error: InvocationError): InvocationResult {
    return this.finish({ status: 'error', turnCount: 0, partial: false, error: Object.freeze({ ...error }) });
  }

  private finish(
    outcome: Pick<InvocationResult, 'status' | 'turnCount' | 'partial' | 'error'>
  ): InvocationResult {
    if (this.final) return this.final;
    const result: InvocationResult = {
      ...outcome,
      progressLog: Object.freeze([...this.progressLog]),
      toolCalls: Object.freeze([...this.toolCalls]),
    };
    if (this.answer !== undefined) result.answer = this.answer;
    if (this.conversationId !== undefined) result.conversationId = this.conversationId;
    this.final = Object.freeze(result);
    return this.final;
  }
}
