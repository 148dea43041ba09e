// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import { Anonymizer } from './anonymizer.js';
import type { LogCollection } from './collection.js';
import { CooldownEvaluator } from './cooldown.js';
import type { IdentifierInput } from './identifier.js';
import { MemoryStorage } from './storage/memory.js';
import { AccessLogStore } from './store.js';
import type { AccessLogStoreOptions } from './store.js';
import type {
  CooldownOptions,
  CreateLogInput,
  LogFilter,
  LogRecord,
  SearchOptions,
} from './types.js';

export type AccessLogOptions = Partial<AccessLogStoreOptions>;

/**
 * Primary entry point: one object for recording, querying, rate limiting
 * and anonymizing access logs.
 *
 * AccessLog coordinates three components over a single storage backend:
 * 1. AccessLogStore — create, get, count, search, delete, prune.
 * 2. CooldownEvaluator — per-origin and per-subject rate limits.
 * 3. Anonymizer — identifier pseudonyms and origin masking.
 *
 * Usage:
 * ```typescript
 * const log = new AccessLog({ storage: new SQLiteStorage({ database }) });
 * await log.install();
 * if (await log.cooldown({ scope: 'login', amount: 5, period: 300, remoteOrigin: ip })) {
 *   throw new TooManyRequests();
 * }
 * await log.create({ scope: 'login', remoteOrigin: ip, subjectId: userId });
 * ```
 */
export class AccessLog {
  readonly store: AccessLogStore;
  readonly #cooldown: CooldownEvaluator;
  readonly #anonymizer: Anonymizer;

  constructor(options: AccessLogOptions = {}) {
    const storage = options.storage ?? new MemoryStorage();
    this.store = new AccessLogStore({ ...options, storage });
    this.#cooldown = new CooldownEvaluator(this.store, options.events);
    this.#anonymizer = new Anonymizer(storage, options.events);
  }

  install(): Promise<void> {
    return this.store.install();
  }

  uninstall(): Promise<void> {
    return this.store.uninstall();
  }

  create(input?: CreateLogInput): Promise<LogRecord> {
    return this.store.create(input);
  }

  get(id: IdentifierInput): Promise<LogRecord | undefined> {
    return this.store.get(id);
  }

  count(filter?: LogFilter): Promise<number> {
    return this.store.count(filter);
  }

  search(filter?: LogFilter, options?: SearchOptions): Promise<LogCollection> {
    return this.store.search(filter, options);
  }

  delete(id: IdentifierInput): Promise<void> {
    return this.store.delete(id);
  }

  prune(createdBefore?: number): Promise<number> {
    return this.store.prune(createdBefore);
  }

  uniqueScopes(): Promise<Set<string>> {
    return this.store.uniqueScopes();
  }

  /** True when the origin or the subject has reached `amount` events in the window. */
  cooldown(options: CooldownOptions): Promise<boolean> {
    return this.#cooldown.isCoolingDown(options);
  }

  anonymizeId(oldId: IdentifierInput, newId?: IdentifierInput): Promise<string> {
    return this.#anonymizer.anonymizeId(oldId, newId);
  }

  anonymizeOrigins(records: Iterable<LogRecord>): Promise<void> {
    return this.#anonymizer.anonymizeOrigins(records);
  }
}
