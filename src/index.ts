#!/usr/bin/env node
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { SheetsAgentClient } from './client.js';
import { isMissingApiKeyError, loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { registerTools } from './tools.js';
import { PACKAGE_NAME, VERSION } from './version.js';

function printHelp() {
  // Keep help output on stdout so it is visible when run via npx
  console.log(`Sheets Agent MCP Server (${PACKAGE_NAME}) v${VERSION}

Usage:
  sheets-agent-mcp

Exposes one MCP tool, edit_google_sheet, which forwards the request to the
sheet-editing agent backend and streams its progress back to the client.

Environment variables:
  SHEETS_AGENT_API_KEY     Backend API key (required)
  SHEETS_AGENT_API_URL     Backend base URL (default: http://localhost:8000)
  SHEETS_AGENT_MODEL       Default model identifier for the agent
  SHEETS_AGENT_TIMEOUT_MS  Optional overall deadline per edit, in milliseconds
  SHEETS_AGENT_USER_AGENT  Optional User-Agent sent to the backend
  SHEETS_AGENT_DEBUG       Set to true for debug logging

Example MCP client configuration:
  {
    "mcpServers": {
      "google-sheets": {
        "command": "npx",
        "args": ["-y", "sheets-agent-mcp"],
        "env": { "SHEETS_AGENT_API_KEY": "your_api_key" }
      }
    }
  }

Notes:
  - The server communicates over stdio; logs are written to stderr.`);
}

async function main() {
  const args = process.argv.slice(2);

  if (args.includes('--help') || args.includes('-h')) {
    printHelp();
    return;
  }

  if (args.includes('--version') || args.includes('-v')) {
    console.log(`${PACKAGE_NAME} v${VERSION}`);
    return;
  }

  const config = loadConfig();
  const logger = createLogger({ debug: config.debug });
  const client = new SheetsAgentClient(config, { logger });

  const server = new McpServer({
    name: PACKAGE_NAME,
    version: VERSION,
  });

  registerTools(server, client, config, logger);

  // stderr only: stdout belongs to the protocol
  logger.info(`${PACKAGE_NAME} v${VERSION} starting...`);
  logger.info(`API URL: ${config.apiUrl}`);
  logger.info(`Default model: ${config.defaultModel}`);
  logger.info(`Timeout: ${config.timeoutMs ? `${config.timeoutMs}ms` : 'none'}`);

  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info('MCP server connected and ready');
}

main().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`[SheetsAgent] ${PACKAGE_NAME} failed to start: ${message}`);
  if (isMissingApiKeyError(err)) {
    console.error('[SheetsAgent] Add the key to the "env" block of your MCP client configuration.');
  }
  process.exit(1);
});
