import { describe, expect, it, vi } from "vitest";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ServerNotification } from "@modelcontextprotocol/sdk/types.js";
import { SheetsAgentClient } from "./client.js";
import type { Config } from "./config.js";
import type { FetchLike } from "./http.js";
import { silentLogger } from "./logger.js";
import { EDIT_SHEET_TOOL, createEditSheetHandler, registerTools, type ToolCallContext } from "./tools.js";

const config: Config = {
  apiUrl: "http://backend.test",
  apiKey: "test-api-key",
  defaultModel: "test-model",
  userAgent: "sheets-agent-mcp/test",
  debug: false,
};

const args = {
  prompt: "Add a row with Name: Ada",
  google_access_token: "test-google-token",
  spreadsheet_id: "sheet-123",
};

function backend(body: string) {
  return vi.fn<FetchLike>(async () => new Response(body, { status: 200 }));
}

function sse(...events: object[]): string {
  return events.map((event) => `data: ${JSON.stringify(event)}\n\n`).join("");
}

function context(progressToken?: string) {
  const sendNotification = vi.fn(async (_notification: ServerNotification) => {});
  const ctx: ToolCallContext = {
    signal: new AbortController().signal,
    sendNotification,
    ...(progressToken === undefined ? {} : { _meta: { progressToken } }),
  };
  return { ctx, sendNotification };
}

function setup(fetch: FetchLike) {
  const client = new SheetsAgentClient(config, { fetch });
  return createEditSheetHandler(client, config, silentLogger);
}

describe("edit_google_sheet handler", () => {
  it("rejects an empty prompt before opening a connection", async () => {
    const fetch = backend(sse({ type: "done" }));
    const handler = setup(fetch);

    const result = await handler({ ...args, prompt: "" }, context("tok-1").ctx);

    expect(fetch).not.toHaveBeenCalled();
    expect(result.isError).toBe(true);
    expect(result.content).toEqual([{ type: "text", text: "❌ Error [InvalidArgument]: 'prompt' is required" }]);
    expect(result.structuredContent).toMatchObject({
      status: "error",
      error: { kind: "InvalidArgument", message: "'prompt' is required" },
    });
  });

  it("rejects a missing spreadsheet id", async () => {
    const fetch = backend(sse({ type: "done" }));
    const handler = setup(fetch);

    const result = await handler({ prompt: "x", google_access_token: "test-google-token" }, context().ctx);

    expect(fetch).not.toHaveBeenCalled();
    expect(result.content).toEqual([
      { type: "text", text: "❌ Error [InvalidArgument]: 'spreadsheet_id' is required" },
    ]);
  });

  it("forwards progress in order with increasing progress values", async () => {
    const fetch = backend(
      sse(
        { type: "progress", message: "Reading" },
        { type: "progress", message: "Writing", step_index: 4 },
        { type: "tool_use", tool_name: "append_rows" },
        { type: "answer", text: "Added 1 row" },
        { type: "conversation", conversation_id: "conv-9" },
        { type: "done", turn_count: 2 }
      )
    );
    const handler = setup(fetch);
    const { ctx, sendNotification } = context("tok-1");

    const result = await handler(args, ctx);

    expect(sendNotification.mock.calls.map((call) => call[0])).toEqual([
      { method: "notifications/progress", params: { progressToken: "tok-1", progress: 1, message: "🔄 Reading" } },
      {
        method: "notifications/progress",
        params: { progressToken: "tok-1", progress: 5, message: "🔄 [step 5] Writing" },
      },
      { method: "notifications/progress", params: { progressToken: "tok-1", progress: 6, message: "🔧 append_rows" } },
    ]);
    expect(result.isError).toBeUndefined();
    expect(result.content).toEqual([
      {
        type: "text",
        text: [
          "Tool Calls:",
          "🔧 append_rows",
          "",
          "Progress:",
          "🔄 Reading",
          "🔄 [step 5] Writing",
          "",
          "✅ Success!",
          "Message: Added 1 row",
          "Conversation ID: conv-9",
          "(Use this conversation_id in follow-up requests to continue the conversation)",
          "Completed in 2 turns",
        ].join("\n"),
      },
    ]);
    expect(result.structuredContent).toMatchObject({
      status: "success",
      answer: "Added 1 row",
      conversation_id: "conv-9",
      turn_count: 2,
    });
  });

  it("sends no notifications without a progress token", async () => {
    const fetch = backend(sse({ type: "progress", message: "Reading" }, { type: "done" }));
    const handler = setup(fetch);
    const { ctx, sendNotification } = context();

    const result = await handler(args, ctx);

    expect(sendNotification).not.toHaveBeenCalled();
    expect(result.structuredContent).toMatchObject({ status: "success", progress: ["🔄 Reading"] });
  });

  it("uses the configured model unless the call names one", async () => {
    const fetch = vi.fn<FetchLike>(async () => new Response(sse({ type: "done" }), { status: 200 }));
    const handler = setup(fetch);

    await handler(args, context().ctx);
    await handler({ ...args, model: "other-model" }, context().ctx);

    const models = fetch.mock.calls.map((call) => JSON.parse(String(call[1].body)).model);
    expect(models).toEqual(["test-model", "other-model"]);
  });

  it("still returns the result when the client stops accepting notifications", async () => {
    const fetch = backend(sse({ type: "progress", message: "Reading" }, { type: "answer", text: "ok" }, { type: "done" }));
    const handler = setup(fetch);
    const { ctx, sendNotification } = context("tok-2");
    sendNotification.mockRejectedValue(new Error("Not connected"));

    const result = await handler(args, ctx);

    expect(result.structuredContent).toMatchObject({ status: "success", answer: "ok" });
  });

  it("reports a rate-limited backend with a stable error code", async () => {
    const fetch = vi.fn<FetchLike>(async () => new Response('{"detail":"slow down"}', { status: 429 }));
    const handler = setup(fetch);

    const result = await handler(args, context().ctx);

    expect(result.isError).toBe(true);
    expect(result.content).toEqual([{ type: "text", text: "❌ Error [HttpError]: HTTP 429 - slow down" }]);
    expect(result.structuredContent).toMatchObject({
      status: "error",
      error: { kind: "HttpError", status: 429, code: "RATE_LIMITED", message: "HTTP 429 - slow down" },
    });
  });

  it("surfaces a truncated stream as an error result", async () => {
    const fetch = backend(sse({ type: "answer", text: "X" }));
    const handler = setup(fetch);

    const result = await handler(args, context().ctx);

    expect(result.isError).toBe(true);
    expect(result.structuredContent).toMatchObject({
      status: "error",
      answer: "X",
      error: { kind: "StreamTruncated" },
    });
  });
});

describe("registerTools", () => {
  it("registers edit_google_sheet as the only tool", () => {
    const server = new McpServer({ name: "sheets-agent-mcp-test", version: "0.0.0" });
    const registerTool = vi.spyOn(server, "registerTool");
    const client = new SheetsAgentClient(config, { fetch: backend("") });

    registerTools(server, client, config, silentLogger);

    expect(registerTool).toHaveBeenCalledTimes(1);
    expect(registerTool.mock.calls[0]?.[0]).toBe(EDIT_SHEET_TOOL);
    expect(registerTool.mock.calls[0]?.[1]).toMatchObject({
      title: "Edit Google Sheet",
      annotations: { destructiveHint: true, idempotentHint: false },
    });
  });
});
