import type { Config } from "./config.js";

/** Backend request failure. `status` is 0 when no response arrived. */
export class HttpError extends Error {
  readonly status: number;
  /** Stable code derived from the status, reported to the MCP client. */
  readonly code: string;

  constructor(status: number, message: string) {
    super(message);
    this.name = "HttpError";
    this.status = status;
    this.code = statusToCode(status);
  }
}

function statusToCode(status: number): string {
  switch (status) {
    case 0:
      return "NETWORK_ERROR";
    case 400:
      return "BAD_REQUEST";
    case 401:
      return "UNAUTHORIZED";
    case 403:
      return "FORBIDDEN";
    case 404:
      return "NOT_FOUND";
    case 413:
      return "PAYLOAD_TOO_LARGE";
    case 422:
      return "VALIDATION_ERROR";
    case 429:
      return "RATE_LIMITED";
    case 500:
      return "INTERNAL_ERROR";
    case 502:
      return "BAD_GATEWAY";
    case 503:
      return "SERVICE_UNAVAILABLE";
    case 504:
      return "GATEWAY_TIMEOUT";
    default:
      return "UNKNOWN_ERROR";
  }
}

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface StreamRequestOptions {
  body: unknown;
  /** Sent as `Authorization: Bearer <token>`. */
  bearerToken: string;
  signal: AbortSignal;
  fetch?: FetchLike;
}

/**
 * POSTs JSON to the backend and returns the still-unread streaming response.
 *
 * Never retries: the agent call edits a sheet and is not safe to repeat.
 * Connection failures reject with status 0; non-2xx responses are drained
 * and reject with their status and body, without being parsed as a stream.
 */
export async function postEventStream(
  config: Config,
  path: string,
  options: StreamRequestOptions
): Promise<Response> {
  const url = `${config.apiUrl.replace(/\/$/, "")}${path}`;
  const fetchImpl = options.fetch ?? fetch;

  const headers: Record<string, string> = {
    "Content-Type": "application/json",
    Accept: "text/event-stream, application/x-ndjson",
    "User-Agent": config.userAgent,
    "X-API-Key": config.apiKey,
    Authorization: `Bearer ${options.bearerToken}`,
  };

  let response: Response;
  try {
    response = await fetchImpl(url, {
      method: "POST",
      headers,
      body: JSON.stringify(options.body),
      signal: options.signal,
    });
  } catch (error: unknown) {
    if (options.signal.aborted) {
      throw new HttpError(0, "Request aborted before the backend responded");
    }
    throw new HttpError(0, describeNetworkError(error));
  }

  if (!response.ok) {
    const text = await response.text().catch(() => "");
    const payload = parseJson(text);
    const detail = extractErrorMessage(payload, text || response.statusText || "Request failed");
    throw new HttpError(response.status, `HTTP ${response.status} - ${detail}`);
  }

  return response;
}

function describeNetworkError(error: unknown): string {
  if (!(error instanceof Error)) return String(error) || "Network error";
  // undici reports the useful part (ECONNREFUSED, cert errors) on `cause`
  const cause = error.cause;
  if (cause instanceof Error && cause.message && cause.message !== error.message) {
    return `${error.message}: ${cause.message}`;
  }
  return error.message || "Network error";
}

function parseJson(text: string): unknown {
  if (!text) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function extractErrorMessage(payload: unknown, fallback: string): string {
  if (!isRecord(payload)) return fallback;

  // { error: { code, message } }
  const nested = payload.error;
  if (isRecord(nested) && typeof nested.message === "string") {
    return nested.message;
  }

  if (typeof payload.message === "string") return payload.message;
  if (typeof payload.error === "string") return payload.error;
  if (typeof payload.detail === "string") return payload.detail;

  return fallback;
}
