import type { QueryResult, QueryResultRow } from 'pg';

import type { DatabaseClient, DatabasePool } from '../../src/db/client.js';

export interface RecordedQuery {
  text: string;
  values: unknown[] | undefined;
}

/** Returns the rows for a statement, or throws to simulate a server error. */
export type QueryResponder = (text: string, values: unknown[] | undefined) => QueryResultRow[];

const noRows: QueryResponder = () => [];

function toResult(rows: QueryResultRow[]): QueryResult<QueryResultRow> {
  return { rows, rowCount: rows.length, command: '', oid: 0, fields: [] };
}

export class FakeClient implements DatabaseClient {
  readonly queries: RecordedQuery[] = [];
  releaseCount = 0;
  releasedWith: Error | boolean | undefined;

  constructor(private readonly responder: QueryResponder = noRows) {}

  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
  async query(text: string, values?: unknown[]): Promise<QueryResult<QueryResultRow>> {
    this.queries.push({ text, values });
    return toResult(this.responder(text, values));
  }

  release(err?: Error | boolean): void {
    this.releaseCount += 1;
    this.releasedWith = err;
  }

  /** Statements with whitespace collapsed. */
  statements(): string[] {
    return this.queries.map((query) => query.text.replace(/\s+/g, ' ').trim());
  }
}

/** In-process stand-in for a `pg.Pool` that hands out one recording client. */
export class FakePool implements DatabasePool {
  readonly client: FakeClient;
  readonly queries: RecordedQuery[] = [];
  ended = false;

  constructor(private readonly responder: QueryResponder = noRows) {
    this.client = new FakeClient(responder);
  }

  async connect(): Promise<DatabaseClient> {
    return this.client;
  }

  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
  async query(text: string, values?: unknown[]): Promise<QueryResult<QueryResultRow>> {
    this.queries.push({ text, values });
    return toResult(this.responder(text, values));
  }

  async end(): Promise<void> {
    this.ended = true;
  }
}
