import { AgentIdentity, Macro, Ticket, TicketChanges, View } from '../entities/Ticket.js';

/**
 * Interface for the remote ticket store
 */
export interface ITicketClient {
  /** Subdomain the client talks to, used to build admin links */
  readonly subdomain: string;

  getViews(): Promise<View[]>;

  getMacros(): Promise<Macro[]>;

  getViewTickets(viewId: number, limit?: number): Promise<Ticket[]>;

  getTicket(ticketId: number): Promise<Ticket>;

  updateTicket(ticketId: number, changes: TicketChanges): Promise<Ticket>;

  /** Identity of the configured agent; doubles as a connection test */
  getCurrentUser(): Promise<AgentIdentity>;
}

/**
 * Resolves the client for the active credentials.
 * Throws ConfigurationError when no credentials are configured.
 */
export interface ITicketClientProvider {
  getClient(): ITicketClient;

  isConfigured(): boolean;
}
