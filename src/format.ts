import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { InvocationResult } from './result.js';

// Only the most recent progress lines go into the final text; all of them
// were already streamed as notifications.
const PROGRESS_TAIL = 10;

function progressSection(progress: readonly string[]): string[] {
  if (progress.length === 0) return [];
  const lines = ['Progress:', ...progress.slice(-PROGRESS_TAIL)];
  if (progress.length > PROGRESS_TAIL) {
    lines.push(`... (${progress.length - PROGRESS_TAIL} earlier progress updates)`);
  }
  lines.push('');
  return lines;
}

function conversationLines(conversationId: string | undefined): string[] {
  if (!conversationId) return [];
  return [
    `Conversation ID: ${conversationId}`,
    '(Use this conversation_id in follow-up requests to continue the conversation)',
  ];
}

export function formatResultText(result: InvocationResult): string {
  const lines: string[] = [];

  if (result.toolCalls.length > 0) {
    lines.push('Tool Calls:', ...result.toolCalls, '');
  }
  lines.push(...progressSection(result.progressLog));

  if (result.status === 'success') {
    lines.push('✅ Success!', `Message: ${result.answer ?? ''}`);
    lines.push(...conversationLines(result.conversationId));
    if (result.turnCount > 0) lines.push(`Completed in ${result.turnCount} turns`);
    if (result.partial) lines.push('⚠️ Response is partial (reached turn limit)');
  } else {
    const kind = result.error?.kind ?? 'BackendError';
    const message = result.error?.message ?? 'Unknown error';
    lines.push(`❌ Error [${kind}]: ${message}`);
    lines.push(...conversationLines(result.conversationId));
  }

  return lines.join('\n');
}

function toStructuredResult(result: InvocationResult): { [x: string]: unknown } {
  return {
    status: result.status,
    answer: result.answer ?? null,
    conversation_id: result.conversationId ?? null,
    turn_count: result.turnCount,
    partial: result.partial,
    progress: [...result.progressLog],
    tool_calls: [...result.toolCalls],
    error: result.error ? { ...result.error } : null,
  };
}

export function formatResult(result: InvocationResult): CallToolResult {
  return {
    content: [{ type: 'text' as const, text: formatResultText(result) }],
    structuredContent: toStructuredResult(result),
    ...(result.status === 'error' ? { isError: true } : {}),
  };
}
