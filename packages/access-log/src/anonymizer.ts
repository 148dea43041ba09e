// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import { IdentifierFormatError, UnsupportedAddressFamilyError } from './errors.js';
import { EVENT_ANONYMIZED } from './events.js';
import type { AccessLogEventEmitter } from './events.js';
import { generateOrParseId, isNoneId, parseId } from './identifier.js';
import type { IdentifierInput } from './identifier.js';
import { fromBytes } from './remote-origin.js';
import type { RemoteOrigin } from './remote-origin.js';
import type { AccessLogStorage } from './storage/interface.js';
import type { LogRecord } from './types.js';

/**
 * Number of leading bytes of the 16-byte stored form kept by masking.
 *
 * IPv4 sits in the last four bytes of the mapped layout; keeping 14 clears
 * its low 16 bits. IPv6 keeps its first 48 bits and loses the low 80.
 */
const KEPT_BYTES = {
  4: 14,
  6: 6,
} as const;

/**
 * Coarsen an origin: IPv4 `a.b.c.d` becomes `a.b.0.0`, IPv6 keeps its first
 * three 16-bit groups.
 */
export function maskRemoteOrigin(origin: RemoteOrigin): RemoteOrigin {
  const family: number = origin.family;
  if (family !== 4 && family !== 6) {
    throw new UnsupportedAddressFamilyError(String(family));
  }
  const masked = Buffer.from(origin.bytes);
  masked.fill(0, KEPT_BYTES[family]);
  return fromBytes(masked);
}

/**
 * Scrubs identifying fields without deleting audit rows.
 */
export class Anonymizer {
  readonly #storage: AccessLogStorage;
  readonly #events: AccessLogEventEmitter | undefined;

  constructor(storage: AccessLogStorage, events?: AccessLogEventEmitter) {
    this.#storage = storage;
    this.#events = events;
  }

  /**
   * Replace `oldId` wherever it appears as a subject or object.
   *
   * Without `newId` a fresh random id is used, so repeated calls produce
   * uncorrelated pseudonyms. A row holding `oldId` in both columns is
   * rewritten in both. The all-zero id stands for "no subject/object" and is
   * refused on either side.
   *
   * @returns The replacement id.
   */
  async anonymizeId(oldId: IdentifierInput, newId?: IdentifierInput): Promise<string> {
    const from = parseId(oldId);
    const to = generateOrParseId(newId);
    for (const side of [from, to]) {
      if (isNoneId(side.bytes)) {
        throw new IdentifierFormatError(side.id, 'the all-zero id marks an absent identifier');
      }
    }

    const subjects = await this.#storage.replaceIdentifier('subjectId', from.bytes, to.bytes);
    const objects = await this.#storage.replaceIdentifier('objectId', from.bytes, to.bytes);

    this.#events?.emit(EVENT_ANONYMIZED, { kind: 'identifier', updated: subjects + objects });
    return to.id;
  }

  /**
   * Mask the stored origin of each given record, one update per record.
   *
   * Every origin is masked before anything is written, so an unsupported
   * family fails the call without touching storage.
   */
  async anonymizeOrigins(records: Iterable<LogRecord>): Promise<void> {
    const updates = Array.from(records, (record) => ({
      id: parseId(record.id).bytes,
      origin: maskRemoteOrigin(record.remoteOrigin),
    }));

    let updated = 0;
    for (const { id, origin } of updates) {
      updated += await this.#storage.updateRemoteOrigin(id, origin.bytes);
    }
    this.#events?.emit(EVENT_ANONYMIZED, { kind: 'origin', updated });
  }
}
