import { z } from 'zod';
import { Ticket } from '../../core/entities/Ticket.js';
import { BatchResult } from '../batch/BatchExecutor.js';

/**
 * Counts and id lists merged into every non-preview result
 */
export function summarizeBatch(totalTickets: number, result: BatchResult): Record<string, unknown> {
  return {
    totalTickets,
    successful: result.successful.length,
    failed: result.failed.length,
    successfulTickets: result.successful,
    failedTickets: result.failed,
    errors: result.errors,
  };
}

export const PreviewTicketSchema = z.object({
  id: z.number(),
  subject: z.string(),
  status: z.string(),
  priority: z.string().nullable(),
  currentTags: z.array(z.string()),
});

export type PreviewTicket = z.infer<typeof PreviewTicketSchema>;

export function toPreviewTicket(ticket: Ticket): PreviewTicket {
  return {
    id: ticket.id,
    subject: ticket.subject,
    status: ticket.status,
    priority: ticket.priority,
    currentTags: ticket.tags,
  };
}

/*
 * Readers for result payloads, which may have round-tripped through JSON
 */

export function readText(data: Record<string, unknown>, key: string): string | undefined {
  const value = data[key];
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return undefined;
}

export function readCount(data: Record<string, unknown>, key: string): number {
  const value = data[key];
  return typeof value === 'number' ? value : 0;
}

export function readStringList(data: Record<string, unknown>, key: string): string[] {
  const parsed = z.array(z.string()).safeParse(data[key]);
  return parsed.success ? parsed.data : [];
}

export function readPreviewTickets(data: Record<string, unknown>): PreviewTicket[] {
  const parsed = z.array(PreviewTicketSchema).safeParse(data.tickets);
  return parsed.success ? parsed.data : [];
}
