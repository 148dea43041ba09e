// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import type { LogCriteria, LogOrdering, LogPage, SortField } from '../types.js';

/**
 * Statement fragments shared by the SQL storage backends.
 *
 * Values are never interpolated: every fragment carries its own parameter
 * list, and the dialect decides how placeholders are spelled (`?` for
 * SQLite, `$1`, `$2`, ... for Postgres).
 */
export interface SqlDialect {
  /** Placeholder for the parameter at zero-based position `index`. */
  placeholder(index: number): string;
}

export const SQLITE_DIALECT: SqlDialect = {
  placeholder: () => '?',
};

export const POSTGRES_DIALECT: SqlDialect = {
  placeholder: (index) => `$${index + 1}`,
};

export interface SqlFragment {
  readonly sql: string;
  readonly params: readonly unknown[];
}

export const COLUMNS = {
  id: 'id',
  creationTime: 'creation_time',
  scope: 'scope',
  remoteOrigin: 'remote_origin',
  subjectId: 'subject_id',
  objectId: 'object_id',
} as const;

const SORT_COLUMNS: Record<SortField, string> = {
  creationTime: COLUMNS.creationTime,
  id: COLUMNS.id,
};

/**
 * Build a `WHERE` clause from parsed criteria.
 *
 * `firstIndex` is the position of the first placeholder, for callers that
 * bind parameters ahead of the clause (e.g. `UPDATE ... SET col = $1`).
 */
export function buildWhereClause(
  criteria: LogCriteria,
  dialect: SqlDialect,
  firstIndex = 0,
): SqlFragment {
  const conditions: string[] = [];
  const params: unknown[] = [];
  const next = (value: unknown): string => {
    const placeholder = dialect.placeholder(firstIndex + params.length);
    params.push(value);
    return placeholder;
  };

  const membership = (column: string, values: readonly unknown[] | undefined): void => {
    if (values === undefined) return;
    if (values.length === 0) {
      conditions.push('1 = 0');
      return;
    }
    conditions.push(`${column} IN (${values.map(next).join(', ')})`);
  };

  membership(COLUMNS.id, criteria.ids);
  if (criteria.createdAfter !== undefined) {
    conditions.push(`${COLUMNS.creationTime} > ${next(criteria.createdAfter)}`);
  }
  if (criteria.createdBefore !== undefined) {
    conditions.push(`${COLUMNS.creationTime} < ${next(criteria.createdBefore)}`);
  }
  membership(COLUMNS.scope, criteria.scopes);
  membership(COLUMNS.remoteOrigin, criteria.remoteOrigins);
  membership(COLUMNS.subjectId, criteria.subjectIds);
  membership(COLUMNS.objectId, criteria.objectIds);

  return {
    sql: conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '',
    params,
  };
}

/** `ORDER BY` with `id` as the tie-breaker, in the same direction. */
export function buildOrderClause(ordering: LogOrdering): string {
  const direction = ordering.order === 'desc' ? 'DESC' : 'ASC';
  const column = SORT_COLUMNS[ordering.field];
  if (column === COLUMNS.id) {
    return `ORDER BY ${COLUMNS.id} ${direction}`;
  }
  return `ORDER BY ${column} ${direction}, ${COLUMNS.id} ${direction}`;
}

export function buildLimitClause(
  page: LogPage | undefined,
  dialect: SqlDialect,
  firstIndex: number,
): SqlFragment {
  if (page === undefined) return { sql: '', params: [] };
  return {
    sql: `LIMIT ${dialect.placeholder(firstIndex)} OFFSET ${dialect.placeholder(firstIndex + 1)}`,
    params: [page.limit, page.offset],
  };
}

/** Condition shared by every prune: undated rows are never removed. */
export function buildPruneClause(
  createdBefore: number | undefined,
  dialect: SqlDialect,
): SqlFragment {
  if (createdBefore === undefined) {
    return { sql: `WHERE ${COLUMNS.creationTime} != 0`, params: [] };
  }
  return {
    sql: `WHERE ${COLUMNS.creationTime} != 0 AND ${COLUMNS.creationTime} < ${dialect.placeholder(0)}`,
    params: [createdBefore],
  };
}
