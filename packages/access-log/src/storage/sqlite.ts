// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import { SCOPE_COLUMN_LENGTH, parseTablePrefix } from '../config.js';
import { LogIdCollisionError } from '../errors.js';
import {
  COLUMNS,
  SQLITE_DIALECT,
  buildLimitClause,
  buildOrderClause,
  buildPruneClause,
  buildWhereClause,
} from '../query/sql.js';
import type {
  IdentifierColumn,
  LogCriteria,
  LogOrdering,
  LogPage,
  LogRow,
} from '../types.js';
import type { AccessLogStorage } from './interface.js';
import { CountRowSchema, ScopeRowSchema, SqlLogRowSchema, hasErrorCode } from './rows.js';

/**
 * Minimal SQLite database interface.
 *
 * This avoids a hard dependency on any specific SQLite library. Callers
 * provide a database instance that satisfies this contract; better-sqlite3
 * matches it directly and sql.js does through `SqlJsDatabase`. A duplicate
 * id must surface as an error whose `code` is `SQLITE_CONSTRAINT_PRIMARYKEY`.
 */
export interface SQLiteDatabaseLike {
  exec(sql: string): unknown;
  prepare(sql: string): SQLiteStatementLike;
  close(): unknown;
}

export interface SQLiteStatementLike {
  run(...params: unknown[]): { changes: number };
  get(...params: unknown[]): unknown;
  all(...params: unknown[]): unknown[];
}

/** Configuration for the SQLite storage backend. */
export interface SQLiteStorageConfig {
  database: SQLiteDatabaseLike;
  /** Table name prefix; letters, digits and underscores only. Defaults to "". */
  tablePrefix?: string;
}

const SELECT_COLUMNS = Object.values(COLUMNS).join(', ');

/**
 * SQLite-backed implementation of AccessLogStorage.
 *
 * Binary columns are BLOBs, which SQLite compares bytewise, so ordering by
 * `id` matches the memory backend.
 */
export class SQLiteStorage implements AccessLogStorage {
  readonly #db: SQLiteDatabaseLike;
  readonly #table: string;

  constructor(config: SQLiteStorageConfig) {
    this.#db = config.database;
    this.#table = `${parseTablePrefix(config.tablePrefix)}access_logs`;
  }

  async install(): Promise<void> {
    this.#db.exec(`
      CREATE TABLE IF NOT EXISTS ${this.#table} (
        id BLOB NOT NULL PRIMARY KEY,
        creation_time INTEGER NOT NULL DEFAULT 0,
        scope VARCHAR(${SCOPE_COLUMN_LENGTH}),
        remote_origin BLOB NOT NULL DEFAULT (zeroblob(16)),
        subject_id BLOB NOT NULL DEFAULT (zeroblob(16)),
        object_id BLOB NOT NULL DEFAULT (zeroblob(16))
      );
      CREATE INDEX IF NOT EXISTS idx_${this.#table}_creation_time ON ${this.#table}(creation_time);
      CREATE INDEX IF NOT EXISTS idx_${this.#table}_scope ON ${this.#table}(scope);
    `);
  }

  async uninstall(): Promise<void> {
    this.#db.exec(`DROP TABLE IF EXISTS ${this.#table}`);
  }

  async insert(row: LogRow): Promise<void> {
    try {
      this.#db.prepare(
        `INSERT INTO ${this.#table} (${SELECT_COLUMNS}) VALUES (?, ?, ?, ?, ?, ?)`,
      ).run(row.id, row.creationTime, row.scope, row.remoteOrigin, row.subjectId, row.objectId);
    } catch (error) {
      if (hasErrorCode(error, 'SQLITE_CONSTRAINT_PRIMARYKEY')) {
        throw new LogIdCollisionError(row.id.toString('base64url'));
      }
      throw error;
    }
  }

  async select(criteria: LogCriteria, ordering: LogOrdering, page?: LogPage): Promise<LogRow[]> {
    const where = buildWhereClause(criteria, SQLITE_DIALECT);
    const limit = buildLimitClause(page, SQLITE_DIALECT, where.params.length);
    const rows = this.#db.prepare(
      `SELECT ${SELECT_COLUMNS} FROM ${this.#table} ${where.sql} ${buildOrderClause(ordering)} ${limit.sql}`,
    ).all(...where.params, ...limit.params);
    return rows.map((row) => SqlLogRowSchema.parse(row));
  }

  async count(criteria: LogCriteria): Promise<number> {
    const where = buildWhereClause(criteria, SQLITE_DIALECT);
    const row = this.#db.prepare(
      `SELECT COUNT(*) AS count FROM ${this.#table} ${where.sql}`,
    ).get(...where.params);
    return CountRowSchema.parse(row).count;
  }

  async delete(id: Buffer): Promise<number> {
    return this.#db.prepare(`DELETE FROM ${this.#table} WHERE id = ?`).run(id).changes;
  }

  async prune(createdBefore?: number): Promise<number> {
    const where = buildPruneClause(createdBefore, SQLITE_DIALECT);
    return this.#db.prepare(`DELETE FROM ${this.#table} ${where.sql}`).run(...where.params).changes;
  }

  async distinctScopes(): Promise<string[]> {
    const rows = this.#db.prepare(
      `SELECT DISTINCT scope FROM ${this.#table}`,
    ).all();
    return rows.map((row) => ScopeRowSchema.parse(row).scope ?? '');
  }

  async replaceIdentifier(column: IdentifierColumn, from: Buffer, to: Buffer): Promise<number> {
    const name = COLUMNS[column];
    return this.#db.prepare(
      `UPDATE ${this.#table} SET ${name} = ? WHERE ${name} = ?`,
    ).run(to, from).changes;
  }

  async updateRemoteOrigin(id: Buffer, remoteOrigin: Buffer): Promise<number> {
    return this.#db.prepare(
      `UPDATE ${this.#table} SET remote_origin = ? WHERE id = ?`,
    ).run(remoteOrigin, id).changes;
  }

  async close(): Promise<void> {
    this.#db.close();
  }
}
