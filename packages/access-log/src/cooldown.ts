// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import { EVENT_COOLDOWN } from './events.js';
import type { AccessLogEventEmitter, CooldownEventPayload } from './events.js';
import type { AccessLogStore } from './store.js';
import type { CooldownOptions } from './types.js';

/**
 * Rate-limit check layered on the store's count query.
 *
 * The remote origin and the subject are checked independently; reaching the
 * limit on either one puts the caller in cooldown ("per IP or per account").
 * Only rows created strictly after `now - period` count.
 */
export class CooldownEvaluator {
  readonly #store: AccessLogStore;
  readonly #events: AccessLogEventEmitter | undefined;

  constructor(store: AccessLogStore, events?: AccessLogEventEmitter) {
    this.#store = store;
    this.#events = events;
  }

  async isCoolingDown(options: CooldownOptions): Promise<boolean> {
    const { scope, amount, period, subjectId } = options;
    const windowStart = this.#store.now() - period;
    // The store's default origin is a fallback, never an override.
    const remoteOrigin = options.remoteOrigin ?? this.#store.defaultRemoteOrigin;

    let matchedOn: CooldownEventPayload['matchedOn'];
    if (remoteOrigin !== undefined) {
      const count = await this.#store.count({
        scopes: scope,
        createdAfter: windowStart,
        remoteOrigins: remoteOrigin,
      });
      if (count >= amount) matchedOn = 'remoteOrigin';
    }

    if (matchedOn === undefined && subjectId !== undefined) {
      const count = await this.#store.count({
        scopes: scope,
        createdAfter: windowStart,
        subjectIds: subjectId,
      });
      if (count >= amount) matchedOn = 'subjectId';
    }

    const limited = matchedOn !== undefined;
    this.#events?.emit(EVENT_COOLDOWN, { scope, amount, period, matchedOn, limited });
    return limited;
  }
}
