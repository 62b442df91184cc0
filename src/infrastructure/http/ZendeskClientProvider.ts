import { ITicketClient, ITicketClientProvider } from '../../core/interfaces/ITicketClient.js';
import { ConfigurationError, errorMessage } from '../../core/errors.js';
import { createLogger } from '../../utils/logger.js';
import { ZendeskApiClient, ZendeskClientOptions, ZendeskCredentials } from './ZendeskApiClient.js';

const log = createLogger('ZendeskClientProvider');

export interface PartialZendeskCredentials {
  subdomain?: string;
  email?: string;
  apiToken?: string;
}

export interface ConnectionTestResult {
  ok: boolean;
  message: string;
}

export type ClientFactory = (credentials: ZendeskCredentials) => ITicketClient;

function complete(credentials: PartialZendeskCredentials): ZendeskCredentials | null {
  const { subdomain, email, apiToken } = credentials;
  return subdomain && email && apiToken ? { subdomain, email, apiToken } : null;
}

/**
 * Hands out one client per credential set, rebuilding it when the
 * credentials change.
 */
export class ZendeskClientProvider implements ITicketClientProvider {
  private client: ITicketClient | null = null;
  private credentialsKey: string | null = null;
  private factory: ClientFactory;

  constructor(
    private credentials: PartialZendeskCredentials,
    options: ZendeskClientOptions & { factory?: ClientFactory } = {}
  ) {
    const { factory, ...clientOptions } = options;
    this.factory = factory ?? ((creds) => new ZendeskApiClient(creds, clientOptions));
  }

  isConfigured(): boolean {
    return complete(this.credentials) !== null;
  }

  updateCredentials(credentials: PartialZendeskCredentials): void {
    this.credentials = credentials;
  }

  getClient(): ITicketClient {
    const credentials = complete(this.credentials);
    if (!credentials) {
      throw new ConfigurationError('Zendesk client not configured');
    }

    const key = `${credentials.subdomain}|${credentials.email}|${credentials.apiToken}`;
    if (!this.client || this.credentialsKey !== key) {
      this.client = this.factory(credentials);
      this.credentialsKey = key;
      log.info(`Zendesk client created for subdomain: ${credentials.subdomain}`);
    }
    return this.client;
  }

  async testConnection(): Promise<ConnectionTestResult> {
    try {
      const user = await this.getClient().getCurrentUser();
      return { ok: true, message: `Connected as ${user.name} (${user.email})` };
    } catch (error) {
      return { ok: false, message: `Connection failed: ${errorMessage(error)}` };
    }
  }
}
