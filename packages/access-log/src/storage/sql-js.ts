// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import type { SQLiteDatabaseLike, SQLiteStatementLike } from './sqlite.js';

/** A value sql.js can bind or return. */
export type SqlJsValue = number | string | Uint8Array | null;

/**
 * Minimal sql.js interfaces.
 *
 * A `Database` from `initSqlJs()` satisfies `SqlJsDatabaseLike` directly; the
 * library stays an optional peer of the caller.
 */
export interface SqlJsStatementLike {
  bind(values?: SqlJsValue[]): boolean;
  step(): boolean;
  getAsObject(): Record<string, unknown>;
  free(): boolean;
}

export interface SqlJsDatabaseLike {
  exec(sql: string): unknown;
  run(sql: string, params?: SqlJsValue[]): unknown;
  prepare(sql: string): SqlJsStatementLike;
  getRowsModified(): number;
  close(): void;
}

// sql.js reports constraint failures by message only.
const PRIMARY_KEY_FAILURE = /^UNIQUE constraint failed: \w+\.id$/;

/**
 * Adapts an in-process sql.js (WebAssembly SQLite) database to the
 * statement-style `SQLiteDatabaseLike` contract used by `SQLiteStorage`.
 *
 * Primary-key violations are re-raised with the extended result code
 * `SQLITE_CONSTRAINT_PRIMARYKEY`, as native drivers report them.
 */
export class SqlJsDatabase implements SQLiteDatabaseLike {
  readonly #db: SqlJsDatabaseLike;

  constructor(db: SqlJsDatabaseLike) {
    this.#db = db;
  }

  exec(sql: string): void {
    this.#db.exec(sql);
  }

  prepare(sql: string): SQLiteStatementLike {
    return new SqlJsStatement(this.#db, sql);
  }

  close(): void {
    this.#db.close();
  }
}

class SqlJsStatement implements SQLiteStatementLike {
  readonly #db: SqlJsDatabaseLike;
  readonly #sql: string;

  constructor(db: SqlJsDatabaseLike, sql: string) {
    this.#db = db;
    this.#sql = sql;
  }

  run(...params: unknown[]): { changes: number } {
    try {
      this.#db.run(this.#sql, toSqlValues(params));
    } catch (error) {
      throw withResultCode(error);
    }
    return { changes: this.#db.getRowsModified() };
  }

  get(...params: unknown[]): unknown {
    return this.all(...params)[0];
  }

  all(...params: unknown[]): unknown[] {
    const statement = this.#db.prepare(this.#sql);
    try {
      statement.bind(toSqlValues(params));
      const rows: unknown[] = [];
      while (statement.step()) {
        rows.push(statement.getAsObject());
      }
      return rows;
    } finally {
      statement.free();
    }
  }
}

function toSqlValues(params: readonly unknown[]): SqlJsValue[] {
  return params.map((value) => {
    if (
      value === null ||
      typeof value === 'number' ||
      typeof value === 'string' ||
      value instanceof Uint8Array
    ) {
      return value;
    }
    throw new TypeError(`Cannot bind a ${typeof value} parameter.`);
  });
}

function withResultCode(error: unknown): unknown {
  if (error instanceof Error && PRIMARY_KEY_FAILURE.test(error.message)) {
    return Object.assign(error, { code: 'SQLITE_CONSTRAINT_PRIMARYKEY' });
  }
  return error;
}
