import fetch, { RequestInit, Response } from 'node-fetch';
import { z } from 'zod';
import { AgentIdentity, Macro, Ticket, TicketChanges, View } from '../../core/entities/Ticket.js';
import { ITicketClient } from '../../core/interfaces/ITicketClient.js';
import { RemoteApiError } from '../../core/errors.js';
import { createLogger } from '../../utils/logger.js';
import { DEFAULT_RETRY_CONFIG, RetryConfig, isRetryableError, withRetry } from '../../utils/retry.js';

const log = createLogger('ZendeskApiClient');

const PAGE_SIZE = 100;

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface ZendeskCredentials {
  subdomain: string;
  email: string;
  apiToken: string;
}

export interface ZendeskClientOptions {
  fetchImpl?: FetchLike;
  retryConfig?: RetryConfig;
  sleep?: (ms: number) => Promise<void>;
  /** Override for tests; defaults to https://<subdomain>.zendesk.com/api/v2 */
  baseUrl?: string;
}

const ViewSchema = z.object({
  id: z.number(),
  title: z.string(),
  active: z.boolean().default(true),
});

const MacroSchema = z.object({
  id: z.number(),
  title: z.string(),
  active: z.boolean().default(true),
  actions: z.array(z.object({ field: z.string(), value: z.unknown() })).default([]),
});

const TicketSchema = z.object({
  id: z.number(),
  subject: z.string().nullable().default(''),
  status: z.string().default('unknown'),
  tags: z.array(z.string()).default([]),
  priority: z.string().nullable().default(null),
});

const UserSchema = z.object({
  id: z.number(),
  name: z.string(),
  email: z.string(),
});

const NextPage = z.string().nullable().optional();

const ViewsPageSchema = z.object({ views: z.array(ViewSchema), next_page: NextPage });
const MacrosPageSchema = z.object({ macros: z.array(MacroSchema), next_page: NextPage });
const TicketsPageSchema = z.object({ tickets: z.array(TicketSchema), next_page: NextPage });
const TicketEnvelopeSchema = z.object({ ticket: TicketSchema });
const UserEnvelopeSchema = z.object({ user: UserSchema });

function toTicket(raw: z.infer<typeof TicketSchema>): Ticket {
  return { ...raw, subject: raw.subject ?? '' };
}

function toMacro(raw: z.infer<typeof MacroSchema>): Macro {
  return { ...raw, actions: raw.actions.map((action) => ({ field: action.field, value: action.value })) };
}

/**
 * Zendesk REST v2 client over node-fetch
 */
export class ZendeskApiClient implements ITicketClient {
  readonly subdomain: string;
  private baseUrl: string;
  private authHeader: string;
  private fetchImpl: FetchLike;
  private retryConfig: RetryConfig;
  private sleep?: (ms: number) => Promise<void>;

  constructor(credentials: ZendeskCredentials, options: ZendeskClientOptions = {}) {
    this.subdomain = credentials.subdomain;
    this.baseUrl = options.baseUrl ?? `https://${credentials.subdomain}.zendesk.com/api/v2`;
    this.authHeader =
      'Basic ' + Buffer.from(`${credentials.email}/token:${credentials.apiToken}`).toString('base64');
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.retryConfig = options.retryConfig ?? DEFAULT_RETRY_CONFIG;
    this.sleep = options.sleep;
  }

  async getViews(): Promise<View[]> {
    const views: View[] = [];
    let url: string | null = `${this.baseUrl}/views.json?per_page=${PAGE_SIZE}`;
    while (url) {
      const page: z.infer<typeof ViewsPageSchema> = await this.read(url, ViewsPageSchema, 'fetch views');
      views.push(...page.views);
      url = page.next_page ?? null;
    }
    return views;
  }

  async getMacros(): Promise<Macro[]> {
    const macros: Macro[] = [];
    let url: string | null = `${this.baseUrl}/macros.json?per_page=${PAGE_SIZE}`;
    while (url) {
      const page: z.infer<typeof MacrosPageSchema> = await this.read(url, MacrosPageSchema, 'fetch macros');
      macros.push(...page.macros.map(toMacro));
      url = page.next_page ?? null;
    }
    return macros;
  }

  /**
   * Tickets of a view in view order, stopping once `limit` are collected
   */
  async getViewTickets(viewId: number, limit?: number): Promise<Ticket[]> {
    const tickets: Ticket[] = [];
    const perPage = limit !== undefined ? Math.max(1, Math.min(PAGE_SIZE, limit)) : PAGE_SIZE;
    let url: string | null = `${this.baseUrl}/views/${viewId}/tickets.json?per_page=${perPage}`;

    while (url && (limit === undefined || tickets.length < limit)) {
      const page: z.infer<typeof TicketsPageSchema> = await this.read(
        url,
        TicketsPageSchema,
        'fetch tickets from view'
      );
      tickets.push(...page.tickets.map(toTicket));
      url = page.next_page ?? null;
    }

    return limit !== undefined ? tickets.slice(0, limit) : tickets;
  }

  async getTicket(ticketId: number): Promise<Ticket> {
    const body = await this.read(`${this.baseUrl}/tickets/${ticketId}.json`, TicketEnvelopeSchema, 'fetch ticket');
    return toTicket(body.ticket);
  }

  /**
   * Single attempt: throttling and other failures surface to the batch
   * executor, which owns the retry policy for mutations.
   */
  async updateTicket(ticketId: number, changes: TicketChanges): Promise<Ticket> {
    const ticket: Record<string, unknown> = {};
    if (changes.tags !== undefined) ticket.tags = changes.tags;
    if (changes.macroIds !== undefined) ticket.macro_ids = changes.macroIds;

    const response = await this.request(`${this.baseUrl}/tickets/${ticketId}.json`, {
      method: 'PUT',
      body: JSON.stringify({ ticket }),
    });
    const body = await this.parse(response, TicketEnvelopeSchema, 'update ticket');
    return toTicket(body.ticket);
  }

  async getCurrentUser(): Promise<AgentIdentity> {
    const body = await this.read(`${this.baseUrl}/users/me.json`, UserEnvelopeSchema, 'fetch current user');
    return body.user;
  }

  private async read<S extends z.ZodTypeAny>(url: string, schema: S, action: string): Promise<z.infer<S>> {
    return withRetry(
      async () => this.parse(await this.request(url, { method: 'GET' }), schema, action),
      this.retryConfig,
      {
        shouldRetry: isRetryableError,
        sleep: this.sleep,
        onLog: (entry) => {
          if (!entry.success && entry.nextRetryInMs !== undefined) {
            log.warn(`${action} attempt ${entry.attempt} failed: ${entry.error}; retrying in ${entry.nextRetryInMs}ms`);
          }
        },
      }
    );
  }

  private async request(url: string, init: RequestInit): Promise<Response> {
    const response = await this.fetchImpl(url, {
      ...init,
      headers: {
        Authorization: this.authHeader,
        'Content-Type': 'application/json',
        Accept: 'application/json',
      },
    });

    if (!response.ok) {
      const detail = await response.text().catch((error: unknown) => {
        log.debug(`Could not read error body from ${url}: ${String(error)}`);
        return '';
      });
      const suffix = detail ? `: ${detail.slice(0, 200)}` : '';
      throw new RemoteApiError(`HTTP ${response.status} ${response.statusText}${suffix}`, response.status);
    }

    return response;
  }

  private async parse<S extends z.ZodTypeAny>(response: Response, schema: S, action: string): Promise<z.infer<S>> {
    const json: unknown = await response.json();
    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new RemoteApiError(`Failed to ${action}: unexpected response shape (${parsed.error.issues[0]?.message})`);
    }
    return parsed.data;
  }
}
