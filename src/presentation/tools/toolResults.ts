import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { ExportPayload } from '../../core/entities/Operation.js';
import { errorMessage } from '../../core/errors.js';

export function textResult(text: string): CallToolResult {
  return { content: [{ type: 'text', text }] };
}

export function errorResult(prefix: string, error: unknown): CallToolResult {
  return {
    isError: true,
    content: [{ type: 'text', text: `${prefix}: ${errorMessage(error)}` }],
  };
}

export function jsonBlock(value: unknown): string {
  return `\`\`\`json\n${JSON.stringify(value, null, 2)}\n\`\`\``;
}

export function exportResult(payload: ExportPayload): CallToolResult {
  const language = payload.mimeType === 'application/json' ? 'json' : 'csv';
  const body = payload.content.toString('utf-8');
  return textResult(
    `# Export: ${payload.filename}\n\n` +
      `- **Type**: ${payload.mimeType}\n` +
      `- **Size**: ${payload.content.length} bytes\n\n` +
      `\`\`\`${language}\n${body}${body.endsWith('\n') ? '' : '\n'}\`\`\``
  );
}
