// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import { describe, it, expect } from 'vitest';
import {
  POSTGRES_DIALECT,
  SQLITE_DIALECT,
  buildLimitClause,
  buildOrderClause,
  buildPruneClause,
  buildWhereClause,
} from '../src/query/sql.js';
import { idBytes } from './helpers.js';

describe('buildWhereClause', () => {
  it('is empty when no criteria are given', () => {
    expect(buildWhereClause({}, SQLITE_DIALECT)).toEqual({ sql: '', params: [] });
  });

  it('ANDs criteria and ORs values through IN lists', () => {
    const where = buildWhereClause(
      { scopes: ['login', 'logout'], createdAfter: 10, createdBefore: 20 },
      SQLITE_DIALECT,
    );
    expect(where.sql).toBe(
      'WHERE creation_time > ? AND creation_time < ? AND scope IN (?, ?)',
    );
    expect(where.params).toEqual([10, 20, 'login', 'logout']);
  });

  it('numbers Postgres placeholders from the given start index', () => {
    const where = buildWhereClause(
      { ids: [idBytes(1)], subjectIds: [idBytes(2), idBytes(3)] },
      POSTGRES_DIALECT,
      2,
    );
    expect(where.sql).toBe('WHERE id IN ($3) AND subject_id IN ($4, $5)');
    expect(where.params).toEqual([idBytes(1), idBytes(2), idBytes(3)]);
  });

  it('turns an empty value set into a condition that matches nothing', () => {
    const where = buildWhereClause({ objectIds: [] }, SQLITE_DIALECT);
    expect(where.sql).toBe('WHERE 1 = 0');
    expect(where.params).toEqual([]);
  });

  it('covers remote origins', () => {
    const origin = Buffer.alloc(16, 9);
    expect(buildWhereClause({ remoteOrigins: [origin] }, SQLITE_DIALECT)).toEqual({
      sql: 'WHERE remote_origin IN (?)',
      params: [origin],
    });
  });
});

describe('buildOrderClause', () => {
  it('breaks creation_time ties by id in the same direction', () => {
    expect(buildOrderClause({ field: 'creationTime', order: 'asc' })).toBe(
      'ORDER BY creation_time ASC, id ASC',
    );
    expect(buildOrderClause({ field: 'creationTime', order: 'desc' })).toBe(
      'ORDER BY creation_time DESC, id DESC',
    );
  });

  it('orders by id alone when id is the sort field', () => {
    expect(buildOrderClause({ field: 'id', order: 'desc' })).toBe('ORDER BY id DESC');
  });
});

describe('buildLimitClause', () => {
  it('is empty without a page', () => {
    expect(buildLimitClause(undefined, SQLITE_DIALECT, 0)).toEqual({ sql: '', params: [] });
  });

  it('binds limit then offset after the where parameters', () => {
    expect(buildLimitClause({ offset: 20, limit: 10 }, POSTGRES_DIALECT, 3)).toEqual({
      sql: 'LIMIT $4 OFFSET $5',
      params: [10, 20],
    });
  });
});

describe('buildPruneClause', () => {
  it('never touches undated rows', () => {
    expect(buildPruneClause(undefined, SQLITE_DIALECT)).toEqual({
      sql: 'WHERE creation_time != 0',
      params: [],
    });
  });

  it('adds a strict upper bound when a cutoff is given', () => {
    expect(buildPruneClause(3, POSTGRES_DIALECT)).toEqual({
      sql: 'WHERE creation_time != 0 AND creation_time < $1',
      params: [3],
    });
  });
});
