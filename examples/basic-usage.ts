/**
 * graphql-param-client Examples
 *
 * Basic Usage Examples
 *
 * Composing arguments and result types, inspecting the generated document,
 * and running the query against an endpoint.
 */

import * as z from 'zod';
import {
  buildRequest,
  CalendarDate,
  configure,
  DecodeError,
  forwardPageArgs,
  forwardPageSchema,
  GraphqlError,
  GraphQLClient,
  group,
  nestedWith,
  objectType,
  pageOf,
  param,
  Scalars,
  TransportError,
} from '../src/index.js';

const InvoiceSchema = z.object({
  id: Scalars.ID.schema,
  total: Scalars.Float.schema,
  issuedOn: Scalars.Date.schema,
});

const Invoice = objectType(InvoiceSchema);

function customerParams(id: string, first: number, after?: string) {
  return group({
    id: param(Scalars.ID, id).required(),
    invoices: group({
      ...forwardPageArgs({ first, after }).fields,
      issuedAfter: param(Scalars.Date, CalendarDate.of(2024, 1, 1)),
    }),
  });
}

type CustomerParams = ReturnType<typeof customerParams>;

const CustomerSchema = z.object({
  id: Scalars.ID.schema,
  name: Scalars.String.schema,
  invoices: forwardPageSchema(InvoiceSchema),
});

const Customer = objectType<typeof CustomerSchema, CustomerParams>(CustomerSchema, {
  invoices: nestedWith(pageOf(Invoice), (params: CustomerParams) => params.fields.invoices),
});

/**
 * Example 1: Inspecting the generated request
 *
 * The invoices arguments are declared as $invoices_first, $invoices_after
 * and $invoices_issuedAfter.
 */
export function inspectRequest() {
  const { query, variables } = buildRequest(
    'GetCustomer',
    'customer',
    customerParams('C-1', 10),
    Customer,
  );

  console.log('Query:', query);
  console.log('Variables:', JSON.stringify(variables, null, 2));

  return { query, variables };
}

/**
 * Example 2: Walking every page
 */
export async function listInvoices(endpoint: string, customerId: string) {
  configure({ timeout: 10000, headers: { 'X-Client': 'invoices-example' } });

  const client = GraphQLClient.builder().withUrl(endpoint).withDocumentValidation().build();

  const invoices: Array<z.output<typeof InvoiceSchema>> = [];
  let after: string | undefined;
  for (;;) {
    const customer = await client.execute(
      'GetCustomer',
      'customer',
      customerParams(customerId, 50, after),
      Customer,
    );
    invoices.push(...customer.invoices.edges.map((edge) => edge.node));

    const { hasNextPage, startCursor } = customer.invoices.pageInfo;
    if (!hasNextPage) {
      break;
    }
    after = startCursor;
  }

  return invoices;
}

/**
 * Example 3: Handling failures
 */
export async function fetchCustomerName(endpoint: string, token: string, customerId: string) {
  const client = GraphQLClient.builder().withUrl(endpoint).withBearerToken(token).build();

  try {
    const customer = await client.execute(
      'GetCustomer',
      'customer',
      customerParams(customerId, 1),
      Customer,
    );
    return customer.name;
  } catch (error) {
    if (error instanceof GraphqlError) {
      console.error('Server rejected the query:', error.errors.map((e) => e.message));
    } else if (error instanceof TransportError) {
      console.error('HTTP status', error.status);
    } else if (error instanceof DecodeError) {
      console.error('Unexpected response shape:', error.issues);
    }
    throw error;
  }
}
