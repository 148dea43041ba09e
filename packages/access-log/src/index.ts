// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * Access log store: record who did what, from where and when, then search
 * the log, check cooldowns and anonymize it.
 *
 * Public API surface:
 *
 *   Classes:
 *     AccessLog             — Facade over the three components below
 *     AccessLogStore        — create(), get(), count(), search(), delete(), prune(), uniqueScopes()
 *     CooldownEvaluator     — isCoolingDown()
 *     Anonymizer            — anonymizeId(), anonymizeOrigins()
 *     LogCollection         — Insertion-ordered id → record container
 *     AccessLogEventEmitter — Typed events for observing the store
 *     MemoryStorage, SQLiteStorage, PostgresStorage — storage backends
 *     SqlJsDatabase         — sql.js adapter for SQLiteStorage
 *
 *   Functions:
 *     parseId, generateId          — Identifier codec
 *     parseRemoteOrigin            — Address parsing into the 16-byte form
 *     maskRemoteOrigin             — Pure origin coarsening
 *     parseAccessLogConfig         — Config validation
 */

// Core classes
export { AccessLog } from './access-log.js';
export type { AccessLogOptions } from './access-log.js';
export { AccessLogStore, systemClock, toCriteria } from './store.js';
export type { AccessLogStoreOptions, Clock } from './store.js';
export { CooldownEvaluator } from './cooldown.js';
export { Anonymizer, maskRemoteOrigin } from './anonymizer.js';
export { LogCollection } from './collection.js';

// Storage
export * from './storage/index.js';

// Codecs
export {
  ID_BYTE_LENGTH,
  NONE_ID_BYTES,
  generateId,
  generateOrParseId,
  isNoneId,
  parseId,
  parseOptionalId,
} from './identifier.js';
export type { Identifier, IdentifierInput } from './identifier.js';
export {
  LOOPBACK_ORIGIN,
  ORIGIN_BYTE_LENGTH,
  fromBytes,
  parseRemoteOrigin,
} from './remote-origin.js';
export type { AddressFamily, RemoteOrigin, RemoteOriginInput } from './remote-origin.js';
export { buildRecord, recordFromRow } from './record.js';
export type { RecordDefaults } from './record.js';

// Config
export {
  AccessLogConfigSchema,
  SCOPE_COLUMN_LENGTH,
  SearchOptionsSchema,
  TablePrefixSchema,
  parseAccessLogConfig,
  parseSearchOptions,
  parseTablePrefix,
} from './config.js';
export type { AccessLogConfig, AccessLogConfigInput, ParsedSearchOptions } from './config.js';

// Errors
export {
  AccessLogError,
  IdentifierFormatError,
  InvalidAddressError,
  InvalidConfigError,
  InvalidQueryError,
  InvalidRecordError,
  LogIdCollisionError,
  UnsupportedAddressFamilyError,
} from './errors.js';

// Events
export {
  AccessLogEventEmitter,
  EVENT_ANONYMIZED,
  EVENT_COOLDOWN,
  EVENT_CREATED,
  EVENT_DELETED,
  EVENT_PRUNED,
} from './events.js';
export type {
  AccessLogEventListener,
  AccessLogEventName,
  AccessLogEventPayloadMap,
  CooldownEventPayload,
  LogCreatedEventPayload,
  LogDeletedEventPayload,
  LogsAnonymizedEventPayload,
  LogsPrunedEventPayload,
} from './events.js';

// Types
export type {
  CooldownOptions,
  CreateLogInput,
  IdentifierColumn,
  LogCriteria,
  LogFilter,
  LogOrdering,
  LogPage,
  LogRecord,
  LogRow,
  OneOrMany,
  SearchOptions,
  SortField,
  SortOrder,
} from './types.js';
