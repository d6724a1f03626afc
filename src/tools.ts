import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { RequestHandlerExtra } from '@modelcontextprotocol/sdk/shared/protocol.js';
import type { CallToolResult, ServerNotification, ServerRequest } from '@modelcontextprotocol/sdk/types.js';
import type { ProgressSink, SheetsAgentClient } from './client.js';
import type { Config } from './config.js';
import { formatResult } from './format.js';
import { InvalidArgumentError, validateInvocation, type EditSheetArgs, type ToolInvocation } from './invocation.js';
import type { Logger } from './logger.js';
import { ResultBuilder } from './result.js';

export const EDIT_SHEET_TOOL = 'edit_google_sheet';

/** The parts of the SDK's per-request context a tool handler uses. */
export type ToolCallContext = Pick<
  RequestHandlerExtra<ServerRequest, ServerNotification>,
  'signal' | 'sendNotification' | '_meta'
>;

// Required fields stay plain strings so that blank values reach the handler
// and come back as InvalidArgument results.
const editSheetInput = {
  prompt: z
    .string()
    .describe(
      "The instruction for editing the sheet (e.g., 'Add a new row with Name: John, Email: john@example.com')"
    ),
  google_access_token: z.string().describe('Google OAuth 2.0 access token with Google Sheets API access'),
  spreadsheet_id: z
    .string()
    .describe('The Google Sheets spreadsheet ID (from the URL: docs.google.com/spreadsheets/d/{spreadsheet_id}/edit)'),
  conversation_id: z
    .string()
    .optional()
    .describe('Conversation ID returned by an earlier call, to continue that conversation with its context'),
  model: z.string().optional().describe('Model the backend agent should use (defaults to the server setting)'),
};

const EDIT_SHEET_DESCRIPTION = [
  'Edit a Google Sheet using an AI agent. The agent can read, write, search, and manipulate Google Sheets data.',
  'Supports conversation history for follow-up edits: pass back the returned conversation_id.',
  'Streams progress notifications while the agent works and returns the final result.',
].join(' ');

function createProgressSink(context: ToolCallContext): ProgressSink | undefined {
  const progressToken = context._meta?.progressToken;
  if (progressToken === undefined) return undefined;

  // MCP requires `progress` to increase on every notification
  let last = 0;
  return async (update) => {
    const progress = Math.max(last + 1, update.step === undefined ? 0 : update.step + 1);
    last = progress;
    await context.sendNotification({
      method: 'notifications/progress',
      params: { progressToken, progress, message: update.message },
    });
  };
}

export function createEditSheetHandler(client: SheetsAgentClient, config: Config, logger: Logger) {
  return async (args: EditSheetArgs, context: ToolCallContext): Promise<CallToolResult> => {
    let invocation: ToolInvocation;
    try {
      invocation = validateInvocation(args, config.defaultModel);
    } catch (error: unknown) {
      if (!(error instanceof InvalidArgumentError)) throw error;
      logger.warn(`${EDIT_SHEET_TOOL} rejected: ${error.message}`);
      return formatResult(new ResultBuilder().fail({ kind: 'InvalidArgument', message: error.message }));
    }

    const result = await client.editSheet(invocation, {
      signal: context.signal,
      onProgress: createProgressSink(context),
    });
    return formatResult(result);
  };
}

export function registerTools(server: McpServer, client: SheetsAgentClient, config: Config, logger: Logger) {
  const handler = createEditSheetHandler(client, config, logger);

  // Unexpected failures become error results instead of protocol errors
  const safeHandler = async (args: EditSheetArgs, context: ToolCallContext): Promise<CallToolResult> => {
    try {
      return await handler(args, context);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`${EDIT_SHEET_TOOL} failed unexpectedly:`, error);
      return {
        content: [{ type: 'text' as const, text: `[UNKNOWN_ERROR] ${message}` }],
        structuredContent: { success: false, error: { code: 'UNKNOWN_ERROR', message } },
        isError: true,
      };
    }
  };

  server.registerTool(
    EDIT_SHEET_TOOL,
    {
      title: 'Edit Google Sheet',
      description: EDIT_SHEET_DESCRIPTION,
      inputSchema: editSheetInput,
      annotations: {
        readOnlyHint: false,
        destructiveHint: true,
        idempotentHint: false,
        openWorldHint: true,
      },
    },
    safeHandler
  );
}
