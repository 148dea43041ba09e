// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import { parseAccessLogConfig, parseSearchOptions } from './config.js';
import type { AccessLogConfig, AccessLogConfigInput } from './config.js';
import { LogCollection } from './collection.js';
import { LogIdCollisionError } from './errors.js';
import { EVENT_CREATED, EVENT_DELETED, EVENT_PRUNED } from './events.js';
import type { AccessLogEventEmitter } from './events.js';
import { parseId } from './identifier.js';
import type { IdentifierInput } from './identifier.js';
import { buildRecord, recordFromRow } from './record.js';
import { parseRemoteOrigin } from './remote-origin.js';
import type { AccessLogStorage } from './storage/interface.js';
import type {
  CreateLogInput,
  LogCriteria,
  LogFilter,
  LogRecord,
  OneOrMany,
  SearchOptions,
} from './types.js';

/** Returns the current Unix time in seconds. */
export type Clock = () => number;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

export interface AccessLogStoreOptions extends AccessLogConfigInput {
  storage: AccessLogStorage;
  /** Receives created/deleted/pruned events. */
  events?: AccessLogEventEmitter;
  /** Wall-clock source in seconds. Defaults to the system clock. */
  clock?: Clock;
}

/**
 * Durable CRUD and query execution over log records.
 *
 * Every public method issues at most two statements against the storage
 * backend and never treats a missing row as an error.
 */
export class AccessLogStore {
  readonly #storage: AccessLogStorage;
  readonly #config: AccessLogConfig;
  readonly #events: AccessLogEventEmitter | undefined;
  readonly #clock: Clock;

  constructor(options: AccessLogStoreOptions) {
    const { storage, events, clock, ...config } = options;
    this.#storage = storage;
    this.#config = parseAccessLogConfig(config);
    this.#events = events;
    this.#clock = clock ?? systemClock;
  }

  /** The origin recorded when `create` receives none. */
  get defaultRemoteOrigin(): string | undefined {
    return this.#config.defaultRemoteOrigin;
  }

  get scopeLength(): number {
    return this.#config.scopeLength;
  }

  /** Current time from the configured clock, in whole seconds. */
  now(): number {
    return Math.floor(this.#clock());
  }

  /** Create the backing table if it does not exist yet. */
  async install(): Promise<void> {
    await this.#storage.install();
  }

  async uninstall(): Promise<void> {
    await this.#storage.uninstall();
  }

  /**
   * Record an event.
   *
   * Defaults: the current time, the configured default origin (else
   * loopback) and a freshly generated id. A preflight count rejects an id
   * that is already taken; the backend's primary key rejects one that is
   * taken between the preflight and the insert. Either way the caller gets
   * `LogIdCollisionError` and nothing is written.
   */
  async create(input: CreateLogInput = {}): Promise<LogRecord> {
    const { record, row } = buildRecord(input, {
      now: this.now(),
      scopeLength: this.#config.scopeLength,
      remoteOrigin: this.#config.defaultRemoteOrigin,
    });

    if ((await this.#storage.count({ ids: [row.id] })) > 0) {
      throw new LogIdCollisionError(record.id);
    }
    await this.#storage.insert(row);

    this.#events?.emit(EVENT_CREATED, {
      id: record.id,
      scope: record.scope,
      creationTime: record.creationTime,
    });
    return record;
  }

  async get(id: IdentifierInput): Promise<LogRecord | undefined> {
    const logs = await this.search({ ids: id });
    return logs.get(id);
  }

  async count(filter: LogFilter = {}): Promise<number> {
    return this.#storage.count(toCriteria(filter));
  }

  /**
   * Return matching records in a fresh collection.
   *
   * Sorted by `creationTime` ascending unless told otherwise, with `id` as
   * the tie-breaker so pages never overlap. `page` is zero-based and only
   * applies when `pageSize` is given.
   */
  async search(filter: LogFilter = {}, options: SearchOptions = {}): Promise<LogCollection> {
    const { sort, order, page, pageSize } = parseSearchOptions(options);
    const rows = await this.#storage.select(
      toCriteria(filter),
      { field: sort, order },
      pageSize === undefined ? undefined : { offset: page * pageSize, limit: pageSize },
    );
    return new LogCollection(rows.map(recordFromRow));
  }

  async delete(id: IdentifierInput): Promise<void> {
    const parsed = parseId(id);
    const removed = await this.#storage.delete(parsed.bytes);
    this.#events?.emit(EVENT_DELETED, { id: parsed.id, removed });
  }

  /**
   * Delete dated rows: those created strictly before `createdBefore`, or all
   * of them when it is omitted. Rows with a creation time of 0 are kept.
   *
   * @returns The number of rows removed.
   */
  async prune(createdBefore?: number): Promise<number> {
    const removed = await this.#storage.prune(createdBefore);
    this.#events?.emit(EVENT_PRUNED, { createdBefore, removed });
    return removed;
  }

  async uniqueScopes(): Promise<Set<string>> {
    return new Set(await this.#storage.distinctScopes());
  }
}

function isMany<T>(value: OneOrMany<T>): value is readonly T[] {
  return Array.isArray(value);
}

function asArray<T>(value: OneOrMany<T>): readonly T[] {
  return isMany(value) ? value : [value];
}

/** Parse every identifier and origin in a filter into its byte form. */
export function toCriteria(filter: LogFilter): LogCriteria {
  const ids = (value: LogFilter['ids']) =>
    value === undefined ? undefined : asArray(value).map((id) => parseId(id).bytes);

  return {
    ids: ids(filter.ids),
    createdAfter: filter.createdAfter,
    createdBefore: filter.createdBefore,
    scopes: filter.scopes === undefined ? undefined : asArray(filter.scopes),
    remoteOrigins:
      filter.remoteOrigins === undefined
        ? undefined
        : asArray(filter.remoteOrigins).map((origin) => parseRemoteOrigin(origin).bytes),
    subjectIds: ids(filter.subjectIds),
    objectIds: ids(filter.objectIds),
  };
}
