// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

export type { AccessLogStorage } from './interface.js';
export { MemoryStorage } from './memory.js';
export { SQLiteStorage } from './sqlite.js';
export type { SQLiteDatabaseLike, SQLiteStatementLike, SQLiteStorageConfig } from './sqlite.js';
export { SqlJsDatabase } from './sql-js.js';
export type { SqlJsDatabaseLike, SqlJsStatementLike, SqlJsValue } from './sql-js.js';
export { PostgresStorage } from './postgres.js';
export type { PostgresClientLike, PostgresStorageConfig } from './postgres.js';
