// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import initSqlJs from 'sql.js';
import { MemoryStorage } from '../src/storage/memory.js';
import { SqlJsDatabase } from '../src/storage/sql-js.js';
import { SQLiteStorage } from '../src/storage/sqlite.js';
import type { AccessLogStorage } from '../src/storage/interface.js';

/** Fixed "now" used by every test clock, in Unix seconds. */
export const NOW = 1_700_000_000;

// sql.js is CommonJS; its init function is also exposed as `default`.
let sqlJs: ReturnType<typeof initSqlJs.default> | undefined;

/** A fresh in-memory SQLite database, run in-process on WebAssembly. */
export async function openSqlite(): Promise<SqlJsDatabase> {
  sqlJs ??= initSqlJs.default();
  const SQL = await sqlJs;
  return new SqlJsDatabase(new SQL.Database());
}

export interface Backend {
  readonly name: string;
  create(): Promise<AccessLogStorage>;
}

export const BACKENDS: readonly Backend[] = [
  {
    name: 'memory',
    create: async () => new MemoryStorage(),
  },
  {
    name: 'sqlite',
    create: async () => {
      const storage = new SQLiteStorage({ database: await openSqlite(), tablePrefix: 'test_' });
      await storage.install();
      return storage;
    },
  },
];

/** A clock that can be moved by hand. */
export function manualClock(start = NOW): { now: () => number; advance: (seconds: number) => void } {
  let current = start;
  return {
    now: () => current,
    advance: (seconds) => {
      current += seconds;
    },
  };
}

/** Deterministic 16-byte id whose bytes are all `fill`. */
export function idBytes(fill: number): Buffer {
  return Buffer.alloc(16, fill);
}

export function idString(fill: number): string {
  return idBytes(fill).toString('base64url');
}
