// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import { LogIdCollisionError } from '../errors.js';
import { applyPage, compareRows, matchesCriteria } from '../query/matcher.js';
import type {
  IdentifierColumn,
  LogCriteria,
  LogOrdering,
  LogPage,
  LogRow,
} from '../types.js';
import type { AccessLogStorage } from './interface.js';

/**
 * Volatile in-memory storage backend.
 *
 * Rows live in a Map keyed by the hex form of their id, which plays the
 * part of the primary-key constraint. Suitable for testing and
 * short-lived processes; data is lost when the process exits.
 */
export class MemoryStorage implements AccessLogStorage {
  readonly #rows = new Map<string, LogRow>();

  async install(): Promise<void> {
    // Nothing to create.
  }

  async uninstall(): Promise<void> {
    this.#rows.clear();
  }

  async insert(row: LogRow): Promise<void> {
    const key = row.id.toString('hex');
    if (this.#rows.has(key)) {
      throw new LogIdCollisionError(row.id.toString('base64url'));
    }
    this.#rows.set(key, copyRow(row));
  }

  async select(criteria: LogCriteria, ordering: LogOrdering, page?: LogPage): Promise<LogRow[]> {
    const matching = this.#matching(criteria).sort(compareRows(ordering));
    return applyPage(matching, page).map(copyRow);
  }

  async count(criteria: LogCriteria): Promise<number> {
    return this.#matching(criteria).length;
  }

  async delete(id: Buffer): Promise<number> {
    return this.#rows.delete(id.toString('hex')) ? 1 : 0;
  }

  async prune(createdBefore?: number): Promise<number> {
    let removed = 0;
    for (const [key, row] of this.#rows) {
      if (row.creationTime === 0) continue;
      if (createdBefore !== undefined && !(row.creationTime < createdBefore)) continue;
      this.#rows.delete(key);
      removed++;
    }
    return removed;
  }

  async distinctScopes(): Promise<string[]> {
    return Array.from(new Set(Array.from(this.#rows.values(), (row) => row.scope)));
  }

  async replaceIdentifier(column: IdentifierColumn, from: Buffer, to: Buffer): Promise<number> {
    let updated = 0;
    for (const [key, row] of this.#rows) {
      if (!row[column].equals(from)) continue;
      this.#rows.set(key, { ...row, [column]: Buffer.from(to) });
      updated++;
    }
    return updated;
  }

  async updateRemoteOrigin(id: Buffer, remoteOrigin: Buffer): Promise<number> {
    const key = id.toString('hex');
    const row = this.#rows.get(key);
    if (row === undefined) return 0;
    this.#rows.set(key, { ...row, remoteOrigin: Buffer.from(remoteOrigin) });
    return 1;
  }

  #matching(criteria: LogCriteria): LogRow[] {
    return Array.from(this.#rows.values()).filter((row) => matchesCriteria(row, criteria));
  }
}

// Rows are copied in and out so callers never share buffers with the store.
function copyRow(row: LogRow): LogRow {
  return {
    id: Buffer.from(row.id),
    creationTime: row.creationTime,
    scope: row.scope,
    remoteOrigin: Buffer.from(row.remoteOrigin),
    subjectId: Buffer.from(row.subjectId),
    objectId: Buffer.from(row.objectId),
  };
}
