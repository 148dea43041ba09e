// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import { SCOPE_COLUMN_LENGTH, parseTablePrefix } from '../config.js';
import { LogIdCollisionError } from '../errors.js';
import {
  COLUMNS,
  POSTGRES_DIALECT,
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
 * Minimal Postgres client interface.
 *
 * This avoids a hard dependency on any specific Postgres library. Callers
 * provide a pool or client instance that satisfies this contract; pg
 * (node-postgres) pools and clients both do.
 */
export interface PostgresClientLike {
  query(
    text: string,
    values?: unknown[],
  ): Promise<{ rows: unknown[]; rowCount: number | null }>;
  end?(): Promise<void>;
}

/** Configuration for the Postgres storage backend. */
export interface PostgresStorageConfig {
  client: PostgresClientLike;
  /** Table name prefix; letters, digits and underscores only. Defaults to "". */
  tablePrefix?: string;
}

const SELECT_COLUMNS = Object.values(COLUMNS).join(', ');

/** SQLSTATE raised for a unique or primary-key violation. */
const UNIQUE_VIOLATION = '23505';

/**
 * Postgres-backed implementation of AccessLogStorage.
 *
 * All queries use parameterised placeholders ($1, $2, ...). Binary columns
 * are BYTEA; `creation_time` is BIGINT and read back through coercion.
 */
export class PostgresStorage implements AccessLogStorage {
  readonly #client: PostgresClientLike;
  readonly #table: string;

  constructor(config: PostgresStorageConfig) {
    this.#client = config.client;
    this.#table = `${parseTablePrefix(config.tablePrefix)}access_logs`;
  }

  async install(): Promise<void> {
    await this.#client.query(`
      CREATE TABLE IF NOT EXISTS ${this.#table} (
        id BYTEA PRIMARY KEY,
        creation_time BIGINT NOT NULL DEFAULT 0,
        scope VARCHAR(${SCOPE_COLUMN_LENGTH}),
        remote_origin BYTEA NOT NULL DEFAULT '\\x00000000000000000000000000000000',
        subject_id BYTEA NOT NULL DEFAULT '\\x00000000000000000000000000000000',
        object_id BYTEA NOT NULL DEFAULT '\\x00000000000000000000000000000000'
      )
    `);

    await this.#client.query(`
      CREATE INDEX IF NOT EXISTS idx_${this.#table}_creation_time
        ON ${this.#table}(creation_time)
    `);
  }

  async uninstall(): Promise<void> {
    await this.#client.query(`DROP TABLE IF EXISTS ${this.#table}`);
  }

  async insert(row: LogRow): Promise<void> {
    try {
      await this.#client.query(
        `INSERT INTO ${this.#table} (${SELECT_COLUMNS}) VALUES ($1, $2, $3, $4, $5, $6)`,
        [row.id, row.creationTime, row.scope, row.remoteOrigin, row.subjectId, row.objectId],
      );
    } catch (error) {
      if (hasErrorCode(error, UNIQUE_VIOLATION)) {
        throw new LogIdCollisionError(row.id.toString('base64url'));
      }
      throw error;
    }
  }

  async select(criteria: LogCriteria, ordering: LogOrdering, page?: LogPage): Promise<LogRow[]> {
    const where = buildWhereClause(criteria, POSTGRES_DIALECT);
    const limit = buildLimitClause(page, POSTGRES_DIALECT, where.params.length);
    const result = await this.#client.query(
      `SELECT ${SELECT_COLUMNS} FROM ${this.#table} ${where.sql} ${buildOrderClause(ordering)} ${limit.sql}`,
      [...where.params, ...limit.params],
    );
    return result.rows.map((row) => SqlLogRowSchema.parse(row));
  }

  async count(criteria: LogCriteria): Promise<number> {
    const where = buildWhereClause(criteria, POSTGRES_DIALECT);
    const result = await this.#client.query(
      `SELECT COUNT(*) AS count FROM ${this.#table} ${where.sql}`,
      [...where.params],
    );
    return CountRowSchema.parse(result.rows[0]).count;
  }

  async delete(id: Buffer): Promise<number> {
    const result = await this.#client.query(`DELETE FROM ${this.#table} WHERE id = $1`, [id]);
    return result.rowCount ?? 0;
  }

  async prune(createdBefore?: number): Promise<number> {
    const where = buildPruneClause(createdBefore, POSTGRES_DIALECT);
    const result = await this.#client.query(`DELETE FROM ${this.#table} ${where.sql}`, [
      ...where.params,
    ]);
    return result.rowCount ?? 0;
  }

  async distinctScopes(): Promise<string[]> {
    const result = await this.#client.query(`SELECT DISTINCT scope FROM ${this.#table}`);
    return result.rows.map((row) => ScopeRowSchema.parse(row).scope ?? '');
  }

  async replaceIdentifier(column: IdentifierColumn, from: Buffer, to: Buffer): Promise<number> {
    const name = COLUMNS[column];
    const result = await this.#client.query(
      `UPDATE ${this.#table} SET ${name} = $1 WHERE ${name} = $2`,
      [to, from],
    );
    return result.rowCount ?? 0;
  }

  async updateRemoteOrigin(id: Buffer, remoteOrigin: Buffer): Promise<number> {
    const result = await this.#client.query(
      `UPDATE ${this.#table} SET remote_origin = $1 WHERE id = $2`,
      [remoteOrigin, id],
    );
    return result.rowCount ?? 0;
  }

  async close(): Promise<void> {
    if (this.#client.end !== undefined) {
      await this.#client.end();
    }
  }
}
