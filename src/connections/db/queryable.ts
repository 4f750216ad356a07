import type { QueryResult, QueryResultRow } from 'pg';

/**
 * Anything that can run a parameterized query: the pool itself, or a client
 * checked out of it for a transaction.
 */
export interface Queryable {
  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
}
