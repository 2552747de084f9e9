/**
 * Unit tests for resource definition and the generated operations.
 */

import { defineResource } from '../defineResource';
import { Client, clearDefaultClient, setDefaultClient } from '../../client';
import { EventSubscriptions } from '../../resources/eventSubscriptions';
import { Events } from '../../resources/events';
import { ResponseHash } from '../../response/ResponseHash';
import { AxiosTransport } from '../../transport/axios/AxiosTransport';
import { ConfigurationError, DefinitionError, InvalidParamsError } from '../../errors';
import { createMockTransport, page, sentParams, MockTransport } from '../../__tests__/mockTransport';

const BASE_URL = 'https://api.example.com';

function clientWith(transport: MockTransport): Client {
  return new Client({ config: { baseUrl: BASE_URL }, transport });
}

const Accounts = defineResource('Accounts', (r) => ({
  list: r.list(),
  retrieve: r.retrieve(),
  close: r.endpoint('close', 'POST', { id: true, pagination: false }),
  cardDetails: r.endpoint('cardDetails', 'GET', {
    to: ['cards', 'details'],
    id: true,
    pagination: false,
  }),
  transactions: r.endpoint('transactions', 'GET', { id: true, pagination: true }),
}));

describe('defineResource', () => {
  afterEach(() => {
    clearDefaultClient();
  });

  describe('resource type', () => {
    it('should derive the name and root from the type name', () => {
      expect(EventSubscriptions.resourceName).toBe('Event Subscriptions');
      expect(EventSubscriptions.resourceUrl).toBe('/event_subscriptions');
    });

    it('should expose the endpoint table', () => {
      expect(Object.keys(EventSubscriptions.endpoints)).toEqual([
        'create',
        'list',
        'update',
        'retrieve',
      ]);
      expect(EventSubscriptions.endpoints.list).toEqual({
        operationName: 'list',
        httpMethod: 'GET',
        urlSegments: [],
        requiresId: false,
        paginated: true,
      });
    });

    it('should attach the spec to each operation', () => {
      expect(Accounts.close.spec).toBe(Accounts.endpoints.close);
    });
  });

  describe('conventional operations', () => {
    it('should list with GET on the root', async () => {
      const transport = createMockTransport(page([{ id: 'sub_1' }], null));

      const items = await EventSubscriptions.withConfig(clientWith(transport)).list();

      expect(items).toEqual([{ id: 'sub_1' }]);
      expect(transport.send.mock.calls[0][0]).toMatchObject({
        method: 'GET',
        path: '/event_subscriptions',
      });
    });

    it('should follow cursors for list with a limit', async () => {
      const transport = createMockTransport(page(['a', 'b'], 'c1'), page(['d', 'e'], null));

      const items = await Events.withConfig(clientWith(transport)).list({ limit: 3 });

      expect(items).toEqual(['a', 'b', 'd']);
      expect(transport.send).toHaveBeenCalledTimes(2);
    });

    it('should retrieve with GET on root/{id}', async () => {
      const transport = createMockTransport({ id: 'event_1', category: 'account.created' });

      const res = await Events.withConfig(clientWith(transport)).retrieve('event_1');

      expect(res).toBeInstanceOf(ResponseHash);
      expect(res.get('category')).toBe('account.created');
      expect(transport.send.mock.calls[0][0]).toMatchObject({
        method: 'GET',
        path: '/events/event_1',
      });
    });

    it('should update with PATCH on root/{id}', async () => {
      const transport = createMockTransport({ id: 'sub_1', status: 'disabled' });

      await EventSubscriptions.withConfig(clientWith(transport)).update('sub_1', {
        status: 'disabled',
      });

      expect(transport.send.mock.calls[0][0]).toMatchObject({
        method: 'PATCH',
        path: '/event_subscriptions/sub_1',
        params: { status: 'disabled' },
      });
    });

    it('should create with a JSON POST to the root', async () => {
      const transport = createMockTransport({ id: 'sub_1' });

      await EventSubscriptions.withConfig(clientWith(transport)).create({
        url: 'https://example.com/hook',
      });

      expect(transport.send.mock.calls[0][0]).toEqual({
        method: 'POST',
        path: '/event_subscriptions',
        params: { url: 'https://example.com/hook' },
        headers: { 'Content-Type': 'application/json' },
      });
    });

    it('should pass per-call headers through', async () => {
      const transport = createMockTransport({ id: 'sub_1' });

      await EventSubscriptions.withConfig(clientWith(transport)).create(
        { url: 'https://example.com/hook' },
        { 'Idempotency-Key': 'key-1' }
      );

      expect(transport.send.mock.calls[0][0].headers).toEqual({
        'Idempotency-Key': 'key-1',
        'Content-Type': 'application/json',
      });
    });

    it('should reject a missing id without sending', async () => {
      const transport = createMockTransport({ id: 'event_1' });

      await expect(Events.withConfig(clientWith(transport)).retrieve('')).rejects.toBeInstanceOf(
        InvalidParamsError
      );
      expect(transport.send).not.toHaveBeenCalled();
    });
  });

  describe('custom endpoints', () => {
    it('should place the id before a single segment', async () => {
      const transport = createMockTransport({ id: 'account_1', status: 'closed' });

      await Accounts.withConfig(clientWith(transport)).close('account_1');

      expect(transport.send.mock.calls[0][0]).toMatchObject({
        method: 'POST',
        path: '/accounts/account_1/close',
      });
    });

    it('should place the id between two segments', async () => {
      const transport = createMockTransport({ card_id: 'card_1' });

      await Accounts.withConfig(clientWith(transport)).cardDetails('card_1');

      expect(transport.send.mock.calls[0][0].path).toBe('/accounts/cards/card_1/details');
    });

    it('should paginate an id endpoint', async () => {
      const transport = createMockTransport(page(['t1'], 'c1'), page(['t2'], null));

      const items = await Accounts.withConfig(clientWith(transport)).transactions('account_1', {
        limit: 'all',
      });

      expect(items).toEqual(['t1', 't2']);
      expect(transport.send.mock.calls[1][0].path).toBe('/accounts/account_1/transactions');
      expect(sentParams(transport, 1)).toEqual({ cursor: 'c1' });
    });
  });

  describe('page handlers', () => {
    it('should stream the pages of a paginated endpoint', async () => {
      const transport = createMockTransport(page(['a', 'b'], 'c1'), page(['d', 'e'], null));
      const handler = jest.fn();

      const result = await Events.withConfig(clientWith(transport)).list.eachPage(handler, {
        limit: 'all',
      });

      expect(handler).toHaveBeenNthCalledWith(1, ['a', 'b']);
      expect(handler).toHaveBeenNthCalledWith(2, ['d', 'e']);
      expect(result).toBeUndefined();
    });

    it('should stream the pages of an id endpoint', async () => {
      const transport = createMockTransport(page(['t1'], null));
      const handler = jest.fn();

      await Accounts.withConfig(clientWith(transport)).transactions.eachPage('account_1', handler);

      expect(handler).toHaveBeenCalledWith(['t1']);
      expect(transport.send.mock.calls[0][0].path).toBe('/accounts/account_1/transactions');
    });

    // Compatibility quirk: a handler given to a non-paginated operation gets
    // the whole response once, and the same response is returned.
    it('should hand the raw response of create to the handler and return it', async () => {
      const transport = createMockTransport({ id: 'sub_1' });
      const handler = jest.fn();

      const result = await EventSubscriptions.withConfig(clientWith(transport)).create.eachPage(
        handler,
        { url: 'https://example.com/hook' }
      );

      expect(handler).toHaveBeenCalledTimes(1);
      expect(handler).toHaveBeenCalledWith(result);
      expect(result?.body).toEqual({ id: 'sub_1' });
    });

    it('should iterate pages lazily', async () => {
      const transport = createMockTransport(page(['a'], 'c1'), page(['b'], null));
      const seen: unknown[][] = [];

      for await (const items of Events.withConfig(clientWith(transport)).list.pages({ limit: 'all' })) {
        seen.push(items);
      }

      expect(seen).toEqual([['a'], ['b']]);
    });
  });

  describe('default client', () => {
    it('should reject type-level calls when no default client is set', async () => {
      await expect(Events.list()).rejects.toBeInstanceOf(ConfigurationError);
    });

    it('should use the default client for type-level calls', async () => {
      const transport = createMockTransport(page(['a'], null));
      setDefaultClient(clientWith(transport));

      const items = await Events.list();

      expect(items).toEqual(['a']);
      expect(transport.send).toHaveBeenCalledTimes(1);
    });

    it('should resolve the default client at call time', async () => {
      const first = createMockTransport({ id: 'event_1' });
      const second = createMockTransport({ id: 'event_1' });

      setDefaultClient(clientWith(first));
      await Events.retrieve('event_1');
      clearDefaultClient();
      setDefaultClient(clientWith(second));
      await Events.retrieve('event_1');

      expect(first.send).toHaveBeenCalledTimes(1);
      expect(second.send).toHaveBeenCalledTimes(1);
    });
  });

  describe('withConfig', () => {
    it('should bind to the given client', () => {
      const client = clientWith(createMockTransport());
      expect(Events.withConfig(client).client).toBe(client);
    });

    it('should build an Axios-backed client from a config', () => {
      const instance = Events.withConfig({ baseUrl: BASE_URL, apiKey: 'test-secret' });

      expect(instance.client.config.baseUrl).toBe(BASE_URL);
      expect(instance.client.config.apiKey).toBe('test-secret');
      expect(instance.client.transport).toBeInstanceOf(AxiosTransport);
    });
  });

  describe('definition errors', () => {
    it('should reject more than two segments', () => {
      expect(() =>
        defineResource('Widgets', (r) => ({
          deep: r.endpoint('deep', 'GET', { to: ['a', 'b', 'c'], id: true, pagination: false }),
        }))
      ).toThrow(DefinitionError);
    });

    it('should reject two segments without an id', () => {
      expect(() =>
        defineResource('Widgets', (r) => ({
          pair: r.endpoint('pair', 'GET', { to: ['a', 'b'], id: false, pagination: false }),
        }))
      ).toThrow(DefinitionError);
    });

    it('should reject a name registered twice', () => {
      expect(() =>
        defineResource('Widgets', (r) => ({
          list: r.list(),
          again: r.list(),
        }))
      ).toThrow('Endpoint "list" is already registered on /widgets');
    });

    it('should reject a key that differs from the endpoint name', () => {
      expect(() =>
        defineResource('Widgets', (r) => ({
          all: r.list(),
        }))
      ).toThrow('Widgets.all is bound to endpoint "list"; keys must match endpoint names');
    });

    it('should reject reserved names', () => {
      expect(() =>
        defineResource('Widgets', (r) => ({
          client: r.endpoint('client', 'GET', { id: false, pagination: false }),
        }))
      ).toThrow('"client" is reserved and cannot name an endpoint');
    });

    it('should reject endpoints that are registered but not exposed', () => {
      expect(() =>
        defineResource('Widgets', (r) => {
          r.retrieve();
          return { list: r.list() };
        })
      ).toThrow('Widgets registers endpoints it does not expose: retrieve');
    });
  });
});
