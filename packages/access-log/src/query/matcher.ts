// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import type { LogCriteria, LogOrdering, LogPage, LogRow } from '../types.js';

/**
 * In-process counterparts of the SQL fragments in `sql.ts`, used by the
 * memory backend. Both must agree row for row.
 */

function includesBytes(values: readonly Buffer[], candidate: Buffer): boolean {
  return values.some((value) => value.equals(candidate));
}

export function matchesCriteria(row: LogRow, criteria: LogCriteria): boolean {
  if (criteria.ids !== undefined && !includesBytes(criteria.ids, row.id)) {
    return false;
  }
  if (criteria.createdAfter !== undefined && !(row.creationTime > criteria.createdAfter)) {
    return false;
  }
  if (criteria.createdBefore !== undefined && !(row.creationTime < criteria.createdBefore)) {
    return false;
  }
  if (criteria.scopes !== undefined && !criteria.scopes.includes(row.scope)) {
    return false;
  }
  if (
    criteria.remoteOrigins !== undefined &&
    !includesBytes(criteria.remoteOrigins, row.remoteOrigin)
  ) {
    return false;
  }
  if (criteria.subjectIds !== undefined && !includesBytes(criteria.subjectIds, row.subjectId)) {
    return false;
  }
  if (criteria.objectIds !== undefined && !includesBytes(criteria.objectIds, row.objectId)) {
    return false;
  }
  return true;
}

export function compareRows(ordering: LogOrdering): (a: LogRow, b: LogRow) => number {
  const sign = ordering.order === 'desc' ? -1 : 1;
  return (a, b) => {
    if (ordering.field === 'creationTime' && a.creationTime !== b.creationTime) {
      return sign * (a.creationTime - b.creationTime);
    }
    return sign * Buffer.compare(a.id, b.id);
  };
}

export function applyPage<T>(rows: readonly T[], page: LogPage | undefined): T[] {
  if (page === undefined) return rows.slice();
  return rows.slice(page.offset, page.offset + page.limit);
}
