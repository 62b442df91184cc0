import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { EXPORT_FORMATS, FormField, OperationInput } from '../../core/entities/Operation.js';
import { Principal } from '../../core/entities/Principal.js';
import { OperationService } from '../../application/services/OperationService.js';
import { errorResult, exportResult, jsonBlock, textResult } from './toolResults.js';

export interface OperationToolContext {
  operationService: OperationService;
  principal: Principal;
}

const InputValue = z.union([z.string(), z.number(), z.boolean(), z.array(z.string())]);

function describeField(field: FormField): string {
  const flags = field.required ? ' (required)' : '';
  const lines = [`- **${field.name}** [${field.type}]${flags}: ${field.label}`];
  if (field.helpText) lines.push(`  ${field.helpText}`);
  for (const option of field.options ?? []) {
    lines.push(`  - \`${option.value}\`: ${option.label}`);
  }
  return lines.join('\n');
}

export function listOperations(ctx: OperationToolContext): CallToolResult {
  const operations = ctx.operationService.listOperations();
  if (operations.length === 0) {
    return textResult('No operations registered');
  }

  const lines = operations.map(
    (op) =>
      `- **${op.slug}** (${op.category})${op.requiresAdmin ? ' [admin]' : ''}: ${op.description}` +
      ` | background: ${op.supportsAsync ? 'yes' : 'no'} | export: ${op.exportFormats.join(', ')}`
  );
  return textResult(`# Available Operations\n\n${lines.join('\n')}`);
}

export async function describeOperation(ctx: OperationToolContext, slug: string): Promise<CallToolResult> {
  try {
    const details = await ctx.operationService.describeOperation(slug);
    const { descriptor } = details;
    const limits =
      details.asyncItemCeiling === null
        ? 'Runs inline only'
        : `Up to ${details.syncItemCeiling} items inline, up to ${details.asyncItemCeiling} as a background job`;

    return textResult(
      `# ${descriptor.name}\n\n${descriptor.description}\n\n` +
        `- **Slug**: ${descriptor.slug}\n` +
        `- **Category**: ${descriptor.category}\n` +
        `- **Admin only**: ${descriptor.requiresAdmin ? 'yes' : 'no'}\n` +
        `- **Limits**: ${limits}\n\n` +
        `## Fields\n${details.fields.map(describeField).join('\n')}`
    );
  } catch (error) {
    return errorResult('Error describing operation', error);
  }
}

export async function runOperation(
  ctx: OperationToolContext,
  slug: string,
  input: OperationInput
): Promise<CallToolResult> {
  try {
    const outcome = await ctx.operationService.run(slug, input, ctx.principal);

    switch (outcome.status) {
      case 'rejected':
        return { isError: true, content: [{ type: 'text', text: `Cannot run ${slug}: ${outcome.error}` }] };
      case 'queued':
        return textResult(
          `# ⏳ Job Queued\n\n${outcome.message}\n\n` +
            `- **Job ID**: ${outcome.job.id}\n` +
            `- **Task ID**: ${outcome.jobId}\n` +
            `- **Items**: ${outcome.job.totalItems}\n\n` +
            `Use \`get-job-status\` with job_id ${outcome.job.id} to follow progress.`
        );
      case 'completed':
      case 'failed': {
        const { result } = outcome;
        const heading = result.success ? '✅' : '❌';
        const details = result.data ? `\n\n${jsonBlock(result.data)}` : '';
        return {
          isError: !result.success,
          content: [{ type: 'text', text: `# ${heading} ${result.message}${details}` }],
        };
      }
    }
  } catch (error) {
    return errorResult('Error running operation', error);
  }
}

export function exportOperationResult(ctx: OperationToolContext, slug: string, format: string): CallToolResult {
  try {
    return exportResult(ctx.operationService.exportLastResult(slug, format, ctx.principal));
  } catch (error) {
    return errorResult('Error exporting results', error);
  }
}

/**
 * Register operation catalogue and execution tools
 */
export function registerOperationTools(server: McpServer, ctx: OperationToolContext) {
  server.tool('list-operations', 'List the bulk operations this server can run', {}, async () =>
    listOperations(ctx)
  );

  server.tool(
    'describe-operation',
    'Show the input fields and limits of an operation, including view and macro choices',
    {
      slug: z.string().describe('Operation slug, e.g. tag-add'),
    },
    async ({ slug }) => describeOperation(ctx, slug)
  );

  server.tool(
    'run-operation',
    'Run a bulk operation. Small runs and dry runs return results directly; large runs start a background job',
    {
      slug: z.string().describe('Operation slug'),
      input: z
        .record(InputValue)
        .default({})
        .describe('Field values keyed by field name, e.g. {"view_id": "123", "tags": "urgent", "ticket_limit": 50}'),
    },
    async ({ slug, input }) => runOperation(ctx, slug, input)
  );

  server.tool(
    'export-operation-result',
    'Export the latest inline result of an operation',
    {
      slug: z.string().describe('Operation slug'),
      format: z.enum(['csv', 'json']).default('csv').describe(`One of: ${EXPORT_FORMATS.join(', ')}`),
    },
    async ({ slug, format }) => exportOperationResult(ctx, slug, format)
  );
}
