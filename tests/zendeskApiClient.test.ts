import { RequestInit, Response } from 'node-fetch';
import { ZendeskApiClient } from '../src/infrastructure/http/ZendeskApiClient.js';
import { RemoteApiError } from '../src/core/errors.js';
import { recordingSleep } from './helpers/FakeTicketClient.js';

interface RecordedRequest {
  url: string;
  init?: RequestInit;
}

/**
 * fetch stand-in that answers from a script of responses, in order
 */
function scriptedFetch(...responses: Array<() => Response>) {
  const requests: RecordedRequest[] = [];
  const fetchImpl = async (url: string, init?: RequestInit): Promise<Response> => {
    requests.push({ url, init });
    const next = responses.shift();
    if (!next) throw new Error(`Unexpected request to ${url}`);
    return next();
  };
  return { requests, fetchImpl };
}

function json(body: unknown, status = 200, statusText = 'OK') {
  return () => new Response(JSON.stringify(body), { status, statusText });
}

function text(body: string, status: number, statusText: string) {
  return () => new Response(body, { status, statusText });
}

const BASE = 'https://example.zendesk.com/api/v2';

describe('ZendeskApiClient', () => {
  const credentials = { subdomain: 'example', email: 'agent@example.com', apiToken: 'test-token' };
  let sleeper: ReturnType<typeof recordingSleep>;

  beforeEach(() => {
    sleeper = recordingSleep();
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  function clientFor(fetchImpl: ReturnType<typeof scriptedFetch>['fetchImpl']) {
    return new ZendeskApiClient(credentials, { fetchImpl, sleep: sleeper.sleep });
  }

  test('should send token authentication headers', async () => {
    const { requests, fetchImpl } = scriptedFetch(json({ user: { id: 7, name: 'Agent', email: 'agent@example.com' } }));

    const user = await clientFor(fetchImpl).getCurrentUser();

    expect(user).toEqual({ id: 7, name: 'Agent', email: 'agent@example.com' });
    expect(requests[0].url).toBe(`${BASE}/users/me.json`);
    expect(requests[0].init?.headers).toEqual({
      Authorization: 'Basic ' + Buffer.from('agent@example.com/token:test-token').toString('base64'),
      'Content-Type': 'application/json',
      Accept: 'application/json',
    });
  });

  test('should follow next_page links for views', async () => {
    const { requests, fetchImpl } = scriptedFetch(
      json({ views: [{ id: 1, title: 'Open' }], next_page: `${BASE}/views.json?page=2` }),
      json({ views: [{ id: 2, title: 'Closed', active: false }], next_page: null })
    );

    const views = await clientFor(fetchImpl).getViews();

    expect(views).toEqual([
      { id: 1, title: 'Open', active: true },
      { id: 2, title: 'Closed', active: false },
    ]);
    expect(requests.map((request) => request.url)).toEqual([`${BASE}/views.json?per_page=100`, `${BASE}/views.json?page=2`]);
  });

  test('should stop paging view tickets at the limit', async () => {
    const { requests, fetchImpl } = scriptedFetch(
      json({
        tickets: [
          { id: 1, subject: 'First', status: 'open', tags: ['a'], priority: 'high' },
          { id: 2, subject: null, status: 'new' },
        ],
        next_page: `${BASE}/views/100/tickets.json?page=2`,
      }),
      json({
        tickets: [
          { id: 3, subject: 'Third', status: 'open' },
          { id: 4, subject: 'Fourth', status: 'open' },
        ],
        next_page: `${BASE}/views/100/tickets.json?page=3`,
      })
    );

    const tickets = await clientFor(fetchImpl).getViewTickets(100, 3);

    expect(tickets).toEqual([
      { id: 1, subject: 'First', status: 'open', tags: ['a'], priority: 'high' },
      { id: 2, subject: '', status: 'new', tags: [], priority: null },
      { id: 3, subject: 'Third', status: 'open', tags: [], priority: null },
    ]);
    expect(requests.map((request) => request.url)).toEqual([
      `${BASE}/views/100/tickets.json?per_page=3`,
      `${BASE}/views/100/tickets.json?page=2`,
    ]);
  });

  test('should retry reads on server errors', async () => {
    const { requests, fetchImpl } = scriptedFetch(
      text('', 503, 'Service Unavailable'),
      json({ ticket: { id: 9, subject: 'Hello', status: 'open', tags: [] } })
    );

    const ticket = await clientFor(fetchImpl).getTicket(9);

    expect(ticket.subject).toBe('Hello');
    expect(requests).toHaveLength(2);
    expect(sleeper.calls).toEqual([500]);
  });

  test('should give up after the configured attempts', async () => {
    const { fetchImpl } = scriptedFetch(
      text('down', 503, 'Service Unavailable'),
      text('down', 503, 'Service Unavailable'),
      text('down', 503, 'Service Unavailable')
    );

    await expect(clientFor(fetchImpl).getTicket(9)).rejects.toThrow(
      'Failed after 3 attempts. Last error: HTTP 503 Service Unavailable: down'
    );
    expect(sleeper.calls).toEqual([500, 1000]);
  });

  test('should surface throttling without retrying', async () => {
    const { requests, fetchImpl } = scriptedFetch(text('slow down', 429, 'Too Many Requests'));

    const error = await clientFor(fetchImpl)
      .getViews()
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(RemoteApiError);
    expect(error).toMatchObject({ message: 'HTTP 429 Too Many Requests: slow down', httpStatus: 429 });
    expect(requests).toHaveLength(1);
    expect(sleeper.calls).toEqual([]);
  });

  test('should update tags and macros in a single PUT', async () => {
    const { requests, fetchImpl } = scriptedFetch(
      json({ ticket: { id: 5, subject: 'S', status: 'open', tags: ['vip'] } }),
      json({ ticket: { id: 5, subject: 'S', status: 'solved', tags: ['vip'] } })
    );
    const client = clientFor(fetchImpl);

    const updated = await client.updateTicket(5, { tags: ['vip'] });
    await client.updateTicket(5, { macroIds: [77] });

    expect(updated.tags).toEqual(['vip']);
    expect(requests.map((request) => [request.url, request.init?.method, String(request.init?.body)])).toEqual([
      [`${BASE}/tickets/5.json`, 'PUT', JSON.stringify({ ticket: { tags: ['vip'] } })],
      [`${BASE}/tickets/5.json`, 'PUT', JSON.stringify({ ticket: { macro_ids: [77] } })],
    ]);
  });

  test('should not retry failed updates', async () => {
    const { requests, fetchImpl } = scriptedFetch(text('', 503, 'Service Unavailable'));

    await expect(clientFor(fetchImpl).updateTicket(5, { tags: [] })).rejects.toThrow('HTTP 503 Service Unavailable');
    expect(requests).toHaveLength(1);
  });

  test('should reject responses of the wrong shape', async () => {
    const { fetchImpl } = scriptedFetch(json({ unexpected: true }));

    await expect(clientFor(fetchImpl).getTicket(1)).rejects.toThrow(
      'Failed to fetch ticket: unexpected response shape (Required)'
    );
  });
});
