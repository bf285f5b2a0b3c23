/**
 * Chainable stand-in for the supabase-js query builder.
 * Every filter method returns the builder; awaiting it yields the canned response.
 */

export interface QueryResponse {
  data: unknown;
  error: unknown;
  count: number | null;
}

export interface QueryBuilderMock {
  select: jest.Mock;
  insert: jest.Mock;
  gte: jest.Mock;
  lt: jest.Mock;
  lte: jest.Mock;
  order: jest.Mock;
  limit: jest.Mock;
  single: jest.Mock;
  then: (onFulfilled: (value: QueryResponse) => unknown, onRejected?: (reason: unknown) => unknown) => Promise<unknown>;
}

export function createQueryBuilder(response: Partial<QueryResponse>): QueryBuilderMock {
  const resolved: QueryResponse = {
    data: response.data ?? null,
    error: response.error ?? null,
    count: response.count ?? null,
  };

  const builder: QueryBuilderMock = {
    select: jest.fn(),
    insert: jest.fn(),
    gte: jest.fn(),
    lt: jest.fn(),
    lte: jest.fn(),
    order: jest.fn(),
    limit: jest.fn(),
    single: jest.fn(),
    then: (onFulfilled, onRejected) => Promise.resolve(resolved).then(onFulfilled, onRejected),
  };

  for (const method of [
    builder.select,
    builder.insert,
    builder.gte,
    builder.lt,
    builder.lte,
    builder.order,
    builder.limit,
    builder.single,
  ]) {
    method.mockReturnValue(builder);
  }

  return builder;
}

export function createSupabaseMock(response: Partial<QueryResponse>) {
  const builder = createQueryBuilder(response);
  const client = { from: jest.fn().mockReturnValue(builder) };
  return { client, builder };
}
