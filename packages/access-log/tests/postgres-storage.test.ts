// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import { describe, it, expect, beforeEach } from 'vitest';
import { InvalidConfigError, LogIdCollisionError } from '../src/errors.js';
import { PostgresStorage } from '../src/storage/postgres.js';
import type { PostgresClientLike } from '../src/storage/postgres.js';
import { idBytes } from './helpers.js';

interface RecordedQuery {
  text: string;
  values: unknown[] | undefined;
}

type QueryResult = { rows: unknown[]; rowCount: number | null };

/**
 * In-process stand-in for a pg pool: records every statement and answers
 * with whatever the test queued.
 */
class FakePostgresClient implements PostgresClientLike {
  readonly queries: RecordedQuery[] = [];
  readonly #responses: Array<QueryResult | Error> = [];
  ended = false;

  respondWith(...responses: Array<QueryResult | Error>): void {
    this.#responses.push(...responses);
  }

  async query(text: string, values?: unknown[]): Promise<QueryResult> {
    this.queries.push({ text: text.trim(), values });
    const response = this.#responses.shift() ?? { rows: [], rowCount: 0 };
    if (response instanceof Error) throw response;
    return response;
  }

  async end(): Promise<void> {
    this.ended = true;
  }
}

const SELECT_COLUMNS = 'id, creation_time, scope, remote_origin, subject_id, object_id';

describe('PostgresStorage', () => {
  let client: FakePostgresClient;
  let storage: PostgresStorage;

  beforeEach(() => {
    client = new FakePostgresClient();
    storage = new PostgresStorage({ client, tablePrefix: 'audit_' });
  });

  it('creates the prefixed table and its index', async () => {
    await storage.install();
    expect(client.queries).toHaveLength(2);
    expect(client.queries[0]?.text).toMatch(/^CREATE TABLE IF NOT EXISTS audit_access_logs \(/);
    expect(client.queries[0]?.text).toContain('scope VARCHAR(16),');
    expect(client.queries[1]?.text).toMatch(
      /^CREATE INDEX IF NOT EXISTS idx_audit_access_logs_creation_time/,
    );
  });

  it('drops the table on uninstall', async () => {
    await storage.uninstall();
    expect(client.queries).toEqual([{ text: 'DROP TABLE IF EXISTS audit_access_logs', values: undefined }]);
  });

  it('rejects a table prefix that is not an identifier', () => {
    expect(() => new PostgresStorage({ client, tablePrefix: 'x; DROP TABLE y' })).toThrow(
      InvalidConfigError,
    );
  });

  it('binds every column on insert', async () => {
    const row = {
      id: idBytes(1),
      creationTime: 42,
      scope: 'login',
      remoteOrigin: Buffer.alloc(16, 9),
      subjectId: idBytes(2),
      objectId: idBytes(3),
    };
    await storage.insert(row);
    expect(client.queries).toEqual([
      {
        text: `INSERT INTO audit_access_logs (${SELECT_COLUMNS}) VALUES ($1, $2, $3, $4, $5, $6)`,
        values: [row.id, 42, 'login', row.remoteOrigin, row.subjectId, row.objectId],
      },
    ]);
  });

  it('maps a unique violation to LogIdCollisionError', async () => {
    client.respondWith(Object.assign(new Error('duplicate key value'), { code: '23505' }));
    const row = {
      id: idBytes(1),
      creationTime: 1,
      scope: '',
      remoteOrigin: Buffer.alloc(16),
      subjectId: Buffer.alloc(16),
      objectId: Buffer.alloc(16),
    };
    await expect(storage.insert(row)).rejects.toThrow(LogIdCollisionError);
  });

  it('rethrows other driver errors unchanged', async () => {
    const failure = Object.assign(new Error('connection reset'), { code: '08006' });
    client.respondWith(failure);
    const row = {
      id: idBytes(1),
      creationTime: 1,
      scope: '',
      remoteOrigin: Buffer.alloc(16),
      subjectId: Buffer.alloc(16),
      objectId: Buffer.alloc(16),
    };
    await expect(storage.insert(row)).rejects.toBe(failure);
  });

  it('numbers limit placeholders after the where parameters', async () => {
    await storage.select(
      { scopes: ['login'] },
      { field: 'creationTime', order: 'asc' },
      { offset: 20, limit: 10 },
    );
    expect(client.queries).toEqual([
      {
        text:
          `SELECT ${SELECT_COLUMNS} FROM audit_access_logs WHERE scope IN ($1) ` +
          'ORDER BY creation_time ASC, id ASC LIMIT $2 OFFSET $3',
        values: ['login', 10, 20],
      },
    ]);
  });

  it('coerces BIGINT strings and NULL scopes in selected rows', async () => {
    client.respondWith({
      rows: [
        {
          id: idBytes(1),
          creation_time: '1700000000',
          scope: null,
          remote_origin: Buffer.alloc(16, 9),
          subject_id: Buffer.alloc(16),
          object_id: idBytes(3),
        },
      ],
      rowCount: 1,
    });
    const rows = await storage.select({}, { field: 'id', order: 'desc' });
    expect(rows).toEqual([
      {
        id: idBytes(1),
        creationTime: 1_700_000_000,
        scope: '',
        remoteOrigin: Buffer.alloc(16, 9),
        subjectId: Buffer.alloc(16),
        objectId: idBytes(3),
      },
    ]);
  });

  it('reads a COUNT returned as a string', async () => {
    client.respondWith({ rows: [{ count: '3' }], rowCount: 1 });
    expect(await storage.count({ createdAfter: 5 })).toBe(3);
    expect(client.queries[0]).toEqual({
      text: 'SELECT COUNT(*) AS count FROM audit_access_logs WHERE creation_time > $1',
      values: [5],
    });
  });

  it('returns affected row counts for delete and prune', async () => {
    client.respondWith({ rows: [], rowCount: 1 }, { rows: [], rowCount: 4 });
    expect(await storage.delete(idBytes(1))).toBe(1);
    expect(await storage.prune(100)).toBe(4);
    expect(client.queries[1]).toEqual({
      text: 'DELETE FROM audit_access_logs WHERE creation_time != 0 AND creation_time < $1',
      values: [100],
    });
  });

  it('treats a missing rowCount as zero', async () => {
    client.respondWith({ rows: [], rowCount: null });
    expect(await storage.delete(idBytes(1))).toBe(0);
  });

  it('lists distinct scopes with NULL read as the empty scope', async () => {
    client.respondWith({ rows: [{ scope: 'login' }, { scope: null }], rowCount: 2 });
    expect(await storage.distinctScopes()).toEqual(['login', '']);
  });

  it('rewrites a single identifier column', async () => {
    client.respondWith({ rows: [], rowCount: 2 });
    expect(await storage.replaceIdentifier('objectId', idBytes(1), idBytes(2))).toBe(2);
    expect(client.queries[0]).toEqual({
      text: 'UPDATE audit_access_logs SET object_id = $1 WHERE object_id = $2',
      values: [idBytes(2), idBytes(1)],
    });
  });

  it('updates one origin by id', async () => {
    client.respondWith({ rows: [], rowCount: 1 });
    const origin = Buffer.alloc(16, 7);
    expect(await storage.updateRemoteOrigin(idBytes(1), origin)).toBe(1);
    expect(client.queries[0]).toEqual({
      text: 'UPDATE audit_access_logs SET remote_origin = $1 WHERE id = $2',
      values: [origin, idBytes(1)],
    });
  });

  it('ends the client on close', async () => {
    await storage.close();
    expect(client.ended).toBe(true);
  });
});
