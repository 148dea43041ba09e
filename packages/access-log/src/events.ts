// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * Access Log Event Emitter
 *
 * The store performs no logging of its own. Callers that want to observe
 * it pass an `AccessLogEventEmitter` and subscribe to the events below:
 *
 *   - access-log:created    — after a record is inserted
 *   - access-log:deleted    — after `delete` (whether or not a row existed)
 *   - access-log:pruned     — after `prune`
 *   - access-log:anonymized — after `anonymizeId` or `anonymizeOrigins`
 *   - access-log:cooldown   — after every cooldown evaluation
 *
 * Usage:
 * ```ts
 * const events = new AccessLogEventEmitter();
 * events.on(EVENT_COOLDOWN, (payload) => {
 *   if (payload.limited) metrics.increment(`cooldown.${payload.scope}`);
 * });
 * const store = new AccessLogStore({ storage, events });
 * ```
 */

export const EVENT_CREATED = 'access-log:created' as const;
export const EVENT_DELETED = 'access-log:deleted' as const;
export const EVENT_PRUNED = 'access-log:pruned' as const;
export const EVENT_ANONYMIZED = 'access-log:anonymized' as const;
export const EVENT_COOLDOWN = 'access-log:cooldown' as const;

export type AccessLogEventName =
  | typeof EVENT_CREATED
  | typeof EVENT_DELETED
  | typeof EVENT_PRUNED
  | typeof EVENT_ANONYMIZED
  | typeof EVENT_COOLDOWN;

// ---------------------------------------------------------------------------
// Event payload interfaces
// ---------------------------------------------------------------------------

export interface LogCreatedEventPayload {
  readonly id: string;
  readonly scope: string;
  readonly creationTime: number;
}

export interface LogDeletedEventPayload {
  readonly id: string;
  /** Rows actually removed: 0 when the id was absent. */
  readonly removed: number;
}

export interface LogsPrunedEventPayload {
  /** The cutoff used, or undefined when every dated row was pruned. */
  readonly createdBefore: number | undefined;
  readonly removed: number;
}

export interface LogsAnonymizedEventPayload {
  readonly kind: 'identifier' | 'origin';
  /** Rows rewritten across all update statements. */
  readonly updated: number;
}

export interface CooldownEventPayload {
  readonly scope: string;
  readonly amount: number;
  readonly period: number;
  /** Which dimension tripped the limit, if any. */
  readonly matchedOn: 'remoteOrigin' | 'subjectId' | undefined;
  readonly limited: boolean;
}

/**
 * Maps each event name to its payload interface. Drives the generic
 * signatures of `on()`, `off()` and `emit()`.
 */
export interface AccessLogEventPayloadMap {
  [EVENT_CREATED]: LogCreatedEventPayload;
  [EVENT_DELETED]: LogDeletedEventPayload;
  [EVENT_PRUNED]: LogsPrunedEventPayload;
  [EVENT_ANONYMIZED]: LogsAnonymizedEventPayload;
  [EVENT_COOLDOWN]: CooldownEventPayload;
}

export type AccessLogEventListener<E extends AccessLogEventName> = (
  payload: AccessLogEventPayloadMap[E],
) => void;

type ListenerEntry = { listener: (payload: never) => void; once: boolean };

/**
 * Typed publish-subscribe emitter for access log events.
 *
 * All operations are synchronous; listeners run in registration order.
 */
export class AccessLogEventEmitter {
  readonly #listeners: Map<AccessLogEventName, ListenerEntry[]> = new Map();

  /**
   * Registers a persistent listener for the specified event.
   *
   * @param event - One of the `EVENT_*` constants.
   * @param listener - Called with the event's payload on every emit.
   * @returns `this` for fluent chaining.
   */
  on<E extends AccessLogEventName>(event: E, listener: AccessLogEventListener<E>): this {
    this.#addListener(event, listener, false);
    return this;
  }

  /**
   * Registers a listener that is removed after its first invocation.
   *
   * @param event - One of the `EVENT_*` constants.
   * @param listener - Called with the payload of the next emit only.
   */
  once<E extends AccessLogEventName>(event: E, listener: AccessLogEventListener<E>): this {
    this.#addListener(event, listener, true);
    return this;
  }

  /**
   * Removes a previously registered listener. If it was registered several
   * times, only the first matching entry is removed.
   *
   * @param listener - The same function reference passed to `on` or `once`.
   */
  off<E extends AccessLogEventName>(event: E, listener: AccessLogEventListener<E>): this {
    const entries = this.#listeners.get(event);
    if (entries === undefined) return this;

    const index = entries.findIndex((entry) => entry.listener === listener);
    if (index !== -1) {
      entries.splice(index, 1);
    }
    if (entries.length === 0) {
      this.#listeners.delete(event);
    }
    return this;
  }

  /**
   * Invokes every listener registered for `event`.
   *
   * One-shot listeners are removed before invocation so a listener that
   * re-emits the same event does not fire twice.
   *
   * @param payload - Delivered unchanged to each listener.
   * @returns `true` if at least one listener was invoked.
   */
  emit<E extends AccessLogEventName>(event: E, payload: AccessLogEventPayloadMap[E]): boolean {
    const entries = this.#listeners.get(event);
    if (entries === undefined || entries.length === 0) return false;

    const snapshot = [...entries];

    const remaining = entries.filter((entry) => !entry.once);
    if (remaining.length !== entries.length) {
      if (remaining.length === 0) {
        this.#listeners.delete(event);
      } else {
        this.#listeners.set(event, remaining);
      }
    }

    for (const { listener } of snapshot) {
      (listener as AccessLogEventListener<E>)(payload);
    }

    return true;
  }

  /**
   * Removes every listener for `event`, or for all events when omitted.
   */
  removeAllListeners(event?: AccessLogEventName): this {
    if (event !== undefined) {
      this.#listeners.delete(event);
    } else {
      this.#listeners.clear();
    }
    return this;
  }

  listenerCount(event: AccessLogEventName): number {
    return this.#listeners.get(event)?.length ?? 0;
  }

  #addListener<E extends AccessLogEventName>(
    event: E,
    listener: AccessLogEventListener<E>,
    once: boolean,
  ): void {
    const existing = this.#listeners.get(event);
    if (existing !== undefined) {
      existing.push({ listener, once });
    } else {
      this.#listeners.set(event, [{ listener, once }]);
    }
  }
}
