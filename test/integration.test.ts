/**
 * graphql-param-client
 *
 * Integration Tests
 *
 * End-to-end flows through the public API: parameter trees and result types
 * render into documents graphql-js accepts, requests go out through an
 * injected fetch, and responses come back decoded or as typed errors.
 */

import { Kind, parse } from 'graphql';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import * as z from 'zod';
import {
  buildDocument,
  buildRequest,
  CalendarDate,
  createSilentLogger,
  DateTime,
  forwardPageArgs,
  GraphqlError,
  GraphQLClient,
  group,
  nestedWith,
  objectType,
  pageOf,
  param,
  resetConfig,
  Scalars,
} from '../src/index.js';
import { Account, accountParams, Bill, Viewer, viewerParams } from './fixtures/billing.js';

const ENDPOINT = 'https://billing.example.com/graphql';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function declaredVariables(document: string): string[] {
  const [definition] = parse(document).definitions;
  if (definition?.kind !== Kind.OPERATION_DEFINITION) {
    return [];
  }
  return (definition.variableDefinitions ?? []).map((variable) => variable.variable.name.value);
}

describe('Integration Tests', () => {
  beforeEach(() => {
    resetConfig();
  });

  afterEach(() => {
    resetConfig();
  });

  describe('Document generation', () => {
    it('should render an account with a page of bills', () => {
      const params = accountParams('A1', { first: 2 });
      const document = buildDocument('GetAccount', 'account', params, Account);

      expect(document).toBe(
        'query GetAccount($id: ID!, $bills_first: Int, $bills_after: String) { ' +
          'account(id: $id) { id name bills(first: $bills_first, after: $bills_after) { ' +
          'pageInfo { startCursor hasNextPage } edges { node { id amount dueDate } } } } }',
      );
      expect(declaredVariables(document)).toEqual(['id', 'bills_first', 'bills_after']);
    });

    it('should derive account_bills_first two levels down', () => {
      const params = viewerParams(3);
      const document = buildDocument('ViewerBills', 'viewer', params, Viewer);

      expect(document).toBe(
        'query ViewerBills($account_bills_first: Int) { ' +
          'viewer { account { bills(first: $account_bills_first) { id amount dueDate } } } }',
      );
      expect(params.renderVariableMap()).toEqual({ account_bills_first: 3 });
      expect(declaredVariables(document)).toEqual(['account_bills_first']);
    });

    it('should keep the same argument block apart at sibling positions', () => {
      const params = group({
        id: param(Scalars.ID, 'A1').required(),
        bills: forwardPageArgs({ first: 2 }),
        payments: forwardPageArgs({ first: 5, after: 'c7' }),
      });
      type Params = typeof params;

      const schema = z.object({
        bills: pageOf(Bill).schema,
        payments: pageOf(Bill).schema,
      });
      const Ledger = objectType<typeof schema, Params>(schema, {
        bills: nestedWith(pageOf(Bill), (p: Params) => p.fields.bills),
        payments: nestedWith(pageOf(Bill), (p: Params) => p.fields.payments),
      });

      const request = buildRequest('GetLedger', 'ledger', params, Ledger);

      expect(request.variables).toEqual({
        id: 'A1',
        bills_first: 2,
        bills_after: null,
        payments_first: 5,
        payments_after: 'c7',
      });
      expect(declaredVariables(request.query)).toEqual(Object.keys(request.variables));
    });

    it('should render identical requests from the same tree', () => {
      const params = accountParams('A1', { first: 2 });

      expect(buildRequest('GetAccount', 'account', params, Account)).toEqual(
        buildRequest('GetAccount', 'account', params, Account),
      );
    });

    it('should encode date and date-time arguments in their wire format', () => {
      const params = group({
        dueBefore: param(Scalars.Date, CalendarDate.of(1944, 6, 6)),
        paidAfter: param(Scalars.DateTime, DateTime.fromUnixTimestamp(-806975640)),
      });

      expect(params.renderVariableMap()).toEqual({
        dueBefore: '1944-06-06',
        paidAfter: '1944-06-06T00:06:00Z',
      });
    });
  });

  describe('Request round trip', () => {
    it('should decode a page of bills with custom scalars', async () => {
      const fetchMock = vi.fn<typeof fetch>(async () =>
        jsonResponse({
          data: {
            account: {
              id: 'A1',
              name: 'Acme',
              bills: {
                pageInfo: { startCursor: 'c0', hasNextPage: false },
                edges: [{ node: { id: 'B1', amount: 66000, dueDate: '1944-06-06' } }],
              },
            },
          },
        }),
      );
      const client = new GraphQLClient({
        endpoint: ENDPOINT,
        fetch: fetchMock,
        logger: createSilentLogger(),
        validateDocuments: true,
      });

      const account = await client.execute(
        'GetAccount',
        'account',
        accountParams('A1', { first: 1 }),
        Account,
      );

      const bill = account.bills.edges[0]?.node;
      expect(account.name).toBe('Acme');
      expect(bill?.amount).toBe(66000);
      expect(bill?.dueDate.equals(CalendarDate.of(1944, 6, 6))).toBe(true);
    });

    it('should decode {"data":{"account":{"id":"A1"}}}', async () => {
      const IdOnly = objectType(z.object({ id: Scalars.ID.schema }));
      const fetchMock = vi.fn<typeof fetch>(
        async () => new Response('{"data":{"account":{"id":"A1"}}}', { status: 200 }),
      );
      const client = new GraphQLClient({
        endpoint: ENDPOINT,
        fetch: fetchMock,
        logger: createSilentLogger(),
      });

      const account = await client.execute(
        'GetAccount',
        'account',
        group({ id: param(Scalars.ID, 'A1') }),
        IdOnly,
      );

      expect(account.id).toBe('A1');
    });

    it('should reject an amount wider than 32 bits', async () => {
      const fetchMock = vi.fn<typeof fetch>(async () =>
        jsonResponse({
          data: {
            account: {
              id: 'A1',
              name: 'Acme',
              bills: {
                pageInfo: { startCursor: 'c0', hasNextPage: false },
                edges: [{ node: { id: 'B1', amount: 2 ** 31, dueDate: '1944-06-06' } }],
              },
            },
          },
        }),
      );
      const client = new GraphQLClient({
        endpoint: ENDPOINT,
        fetch: fetchMock,
        logger: createSilentLogger(),
      });

      await expect(
        client.execute('GetAccount', 'account', accountParams('A1'), Account),
      ).rejects.toMatchObject({
        name: 'DecodeError',
        issues: [expect.stringMatching(/^bills\.edges\.0\.node\.amount: /)],
      });
    });

    it('should surface server errors over partial data', async () => {
      const fetchMock = vi.fn<typeof fetch>(async () =>
        jsonResponse({
          errors: [{ message: 'boom', locations: [], path: [], extensions: {} }],
          data: {},
        }),
      );
      const client = new GraphQLClient({
        endpoint: ENDPOINT,
        fetch: fetchMock,
        logger: createSilentLogger(),
      });

      const result = client.execute('GetAccount', 'account', accountParams('A1'), Account);

      await expect(result).rejects.toBeInstanceOf(GraphqlError);
      await expect(result).rejects.toMatchObject({ errors: [{ message: 'boom' }] });
    });

    it('should report a 500 as TransportError', async () => {
      const response = new Response('upstream failure', { status: 500 });
      const jsonSpy = vi.spyOn(response, 'json');
      const fetchMock = vi.fn<typeof fetch>(async () => response);
      const client = new GraphQLClient({
        endpoint: ENDPOINT,
        fetch: fetchMock,
        logger: createSilentLogger(),
      });

      await expect(
        client.execute('GetAccount', 'account', accountParams('A1'), Account),
      ).rejects.toMatchObject({ name: 'TransportError', status: 500, message: 'HTTP 500' });
      expect(jsonSpy).not.toHaveBeenCalled();
    });
  });
});
