import { ITicketClient } from '../../core/interfaces/ITicketClient.js';
import { TicketMutation } from '../../core/interfaces/ITaskQueue.js';
import { ItemMutation } from './BatchExecutor.js';

/**
 * Build the per-ticket closure the batch executor applies for a mutation kind
 */
export function createTicketMutation(client: ITicketClient, mutation: TicketMutation): ItemMutation {
  switch (mutation.kind) {
    case 'add-tags': {
      const toAdd = mutation.tags;
      return async (ticketId) => {
        const ticket = await client.getTicket(ticketId);
        const tags = new Set(ticket.tags);
        toAdd.forEach((tag) => tags.add(tag));
        await client.updateTicket(ticketId, { tags: [...tags] });
      };
    }
    case 'remove-tags': {
      const toRemove = new Set(mutation.tags);
      return async (ticketId) => {
        const ticket = await client.getTicket(ticketId);
        const tags = ticket.tags.filter((tag) => !toRemove.has(tag));
        await client.updateTicket(ticketId, { tags });
      };
    }
    case 'apply-macro': {
      const { macroId } = mutation;
      return async (ticketId) => {
        await client.getTicket(ticketId);
        await client.updateTicket(ticketId, { macroIds: [macroId] });
      };
    }
  }
}

/**
 * Short label for log lines and result messages
 */
export function describeMutation(mutation: TicketMutation): string {
  switch (mutation.kind) {
    case 'add-tags':
      return `add tags [${mutation.tags.join(', ')}]`;
    case 'remove-tags':
      return `remove tags [${mutation.tags.join(', ')}]`;
    case 'apply-macro':
      return `apply macro ${mutation.macroId}`;
  }
}
