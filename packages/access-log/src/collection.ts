// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import { parseId } from './identifier.js';
import type { IdentifierInput } from './identifier.js';
import type { LogRecord } from './types.js';

/**
 * Insertion-ordered collection of log records keyed by id.
 *
 * Every search produces a fresh collection; it is never persisted.
 */
export class LogCollection implements Iterable<LogRecord> {
  readonly #records = new Map<string, LogRecord>();

  constructor(records: Iterable<LogRecord> = []) {
    for (const record of records) {
      this.add(record);
    }
  }

  /** Add a record. A record with an id already present replaces it in place. */
  add(record: LogRecord): this {
    this.#records.set(record.id, record);
    return this;
  }

  get(id: IdentifierInput): LogRecord | undefined {
    return this.#records.get(keyOf(id));
  }

  has(id: IdentifierInput): boolean {
    return this.#records.has(keyOf(id));
  }

  get size(): number {
    return this.#records.size;
  }

  ids(): string[] {
    return Array.from(this.#records.keys());
  }

  values(): IterableIterator<LogRecord> {
    return this.#records.values();
  }

  toArray(): LogRecord[] {
    return Array.from(this.#records.values());
  }

  [Symbol.iterator](): IterableIterator<LogRecord> {
    return this.#records.values();
  }
}

function keyOf(id: IdentifierInput): string {
  return typeof id === 'string' ? id : parseId(id).id;
}
