// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import type {
  IdentifierColumn,
  LogCriteria,
  LogOrdering,
  LogPage,
  LogRow,
} from '../types.js';

/**
 * Persistence contract for the `access_logs` table.
 *
 * Design principles:
 *   1. All methods are async to support network-backed stores.
 *   2. Every method is a single statement against the backend; atomicity
 *      is the backend's responsibility, not this layer's.
 *   3. `insert` must reject a duplicate id through the backend's own
 *      primary-key constraint and report it as `LogIdCollisionError`.
 *   4. Nothing here treats "not found" as an error.
 */
export interface AccessLogStorage {
  /** Create the table if it does not exist. Safe to call repeatedly. */
  install(): Promise<void>;

  /** Drop the table. */
  uninstall(): Promise<void>;

  insert(row: LogRow): Promise<void>;

  /** Return rows matching `criteria`, ordered, optionally paged. */
  select(criteria: LogCriteria, ordering: LogOrdering, page?: LogPage): Promise<LogRow[]>;

  count(criteria: LogCriteria): Promise<number>;

  /** Delete the row with this id. Returns the number of rows removed (0 or 1). */
  delete(id: Buffer): Promise<number>;

  /**
   * Delete every row with a nonzero creation time, restricted to rows
   * created strictly before `createdBefore` when it is given.
   */
  prune(createdBefore?: number): Promise<number>;

  distinctScopes(): Promise<string[]>;

  /** Set `column = to` on every row where `column = from`. */
  replaceIdentifier(column: IdentifierColumn, from: Buffer, to: Buffer): Promise<number>;

  updateRemoteOrigin(id: Buffer, remoteOrigin: Buffer): Promise<number>;

  /** Release the underlying connection. */
  close?(): Promise<void>;
}
