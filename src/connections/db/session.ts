import type { QueryResult, QueryResultRow } from 'pg';

/**
 * The slice of a pg Pool/PoolClient the repositories use.
 */
export interface Queryable {
  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
}

export interface SessionClient extends Queryable {
  release(err?: Error | boolean): void;
}

export interface SessionPool {
  connect(): Promise<SessionClient>;
}

/**
 * Borrow one client for the duration of `work` and always hand it back.
 */
export const withSession = async <T>(
  pool: SessionPool,
  work: (client: SessionClient) => Promise<T>
): Promise<T> => {
  const client = await pool.connect();
  try {
    return await work(client);
  } finally {
    client.release();
  }
};

const statementVerb = (text: string): string => text.trimStart().split(/\s+/, 1)[0].toUpperCase();

/**
 * One client held for a whole HTTP request.
 *
 * `end()` marks the request as over, but the client only goes back to the
 * pool once no query is running and no transaction is open. A query issued
 * after that point is refused instead of touching a client another request
 * may already hold.
 */
export class RequestSession implements Queryable {
  private inFlight = 0;
  private inTransaction = false;
  private ended = false;
  private released = false;
  private broken = false;

  constructor(private readonly client: SessionClient) {}

  get isReleased(): boolean {
    return this.released;
  }

  async query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>> {
    if (this.released) {
      throw new Error('Database session was already returned to the pool');
    }

    const verb = statementVerb(text);
    this.inFlight += 1;
    try {
      const result = await this.client.query<R>(text, values);
      if (verb === 'BEGIN') {
        this.inTransaction = true;
      }
      return result;
    } catch (error: unknown) {
      if (verb === 'COMMIT' || verb === 'ROLLBACK') {
        this.broken = true;
      }
      throw error;
    } finally {
      if (verb === 'COMMIT' || verb === 'ROLLBACK') {
        this.inTransaction = false;
      }
      this.inFlight -= 1;
      this.settle();
    }
  }

  end(): void {
    this.ended = true;
    this.settle();
  }

  private settle(): void {
    if (this.released || !this.ended || this.inFlight > 0 || this.inTransaction) {
      return;
    }
    this.released = true;
    // a failed COMMIT/ROLLBACK leaves the connection in an unknown state; pg discards it
    this.client.release(this.broken);
  }
}
