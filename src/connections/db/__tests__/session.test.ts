import { describe, it, expect } from 'vitest';
import type { QueryResult, QueryResultRow } from 'pg';
import { RequestSession } from '../session';
import type { SessionClient } from '../session';
import { runWrite } from '../integrity';
import { StubQueryable } from '../../../__tests__/helpers/fakes';

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 0));

class BrokenTransactionClient implements SessionClient {
  readonly releasedWith: Array<Error | boolean | undefined> = [];

  async query<R extends QueryResultRow = QueryResultRow>(text: string): Promise<QueryResult<R>> {
    if (text === 'BEGIN') {
      return { command: 'BEGIN', rowCount: 0, oid: 0, fields: [], rows: [] };
    }
    throw new Error(`${text} failed`);
  }

  release(err?: Error | boolean): void {
    this.releasedWith.push(err);
  }
}

describe('RequestSession', () => {
  it('releases once when the request ends idle', () => {
    const client = new StubQueryable();
    const session = new RequestSession(client);

    session.end();
    session.end();

    expect(client.released).toBe(1);
    expect(client.releaseArgs).toEqual([false]);
    expect(session.isReleased).toBe(true);
  });

  it('waits for a running query before releasing', async () => {
    const client = new StubQueryable(() => [{ id: 1 }], 30);
    const session = new RequestSession(client);

    const running = session.query('SELECT 1');
    session.end();
    expect(client.released).toBe(0);

    await running;
    expect(client.released).toBe(1);
    expect(client.pendingAtRelease).toEqual([0]);
  });

  it('keeps the client through an open transaction', async () => {
    const client = new StubQueryable();
    const session = new RequestSession(client);
    let openGate = () => {};
    const gate = new Promise<void>((resolve) => {
      openGate = resolve;
    });

    const write = runWrite(session, async () => {
      await gate;
      return session.query('UPDATE contacts SET first_name = $1', ['Ann']);
    });
    await tick();
    session.end();
    expect(client.released).toBe(0);

    openGate();
    await write;
    expect(client.statements).toEqual(['BEGIN', 'UPDATE contacts SET first_name = $1', 'COMMIT']);
    expect(client.released).toBe(1);
  });

  it('refuses queries once the client is back in the pool', async () => {
    const client = new StubQueryable();
    const session = new RequestSession(client);
    session.end();

    await expect(session.query('SELECT 1')).rejects.toThrow('Database session was already returned to the pool');
    expect(client.queries).toHaveLength(0);
  });

  it('discards a client whose rollback failed', async () => {
    const client = new BrokenTransactionClient();
    const session = new RequestSession(client);

    await expect(runWrite(session, () => session.query('UPDATE users SET confirmed = true'))).rejects.toThrow(
      'UPDATE users SET confirmed = true failed'
    );
    session.end();

    expect(client.releasedWith).toEqual([true]);
  });
});
