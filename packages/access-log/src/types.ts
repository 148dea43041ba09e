// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import type { IdentifierInput } from './identifier.js';
import type { RemoteOrigin, RemoteOriginInput } from './remote-origin.js';

/**
 * One recorded event. Values are frozen once built; only the store's
 * anonymization routines rewrite the persisted row behind a record.
 */
export interface LogRecord {
  /** Canonical base64url form of the 128-bit id. */
  readonly id: string;
  /** Unix timestamp in whole seconds. */
  readonly creationTime: number;
  /** `creationTime` as a UTC Date. */
  readonly creationDate: Date;
  readonly scope: string;
  readonly remoteOrigin: RemoteOrigin;
  /** The acting entity, or undefined when none was recorded. */
  readonly subjectId: string | undefined;
  /** The acted-upon entity, or undefined when none was recorded. */
  readonly objectId: string | undefined;
}

/**
 * Fields accepted by `create`. Every field is optional; omitted fields take
 * their documented defaults.
 */
export interface CreateLogInput {
  readonly id?: IdentifierInput;
  readonly creationTime?: number;
  readonly scope?: string;
  readonly remoteOrigin?: RemoteOriginInput;
  readonly subjectId?: IdentifierInput;
  readonly objectId?: IdentifierInput;
}

/** A single value or a set of values; a set matches when any member does. */
export type OneOrMany<T> = T | readonly T[];

/**
 * Filter criteria for search and count.
 *
 * Fields combine with AND semantics; values within one field combine with
 * OR. Omitting a field means no restriction on that dimension.
 */
export interface LogFilter {
  readonly ids?: OneOrMany<IdentifierInput>;
  /** Matches rows with `creationTime` strictly greater than this value. */
  readonly createdAfter?: number;
  /** Matches rows with `creationTime` strictly less than this value. */
  readonly createdBefore?: number;
  readonly scopes?: OneOrMany<string>;
  readonly remoteOrigins?: OneOrMany<RemoteOriginInput>;
  readonly subjectIds?: OneOrMany<IdentifierInput>;
  readonly objectIds?: OneOrMany<IdentifierInput>;
}

export type SortField = 'creationTime' | 'id';
export type SortOrder = 'asc' | 'desc';

export interface SearchOptions {
  /** Defaults to `creationTime`. Ties are always broken by `id`. */
  readonly sort?: SortField;
  /** Defaults to `asc`. */
  readonly order?: SortOrder;
  /** Zero-based page index. Ignored unless `pageSize` is given. */
  readonly page?: number;
  /** Rows per page. Omit to return every matching row. */
  readonly pageSize?: number;
}

export interface CooldownOptions {
  readonly scope: string;
  /** Number of events within the window that puts the caller in cooldown. */
  readonly amount: number;
  /** Window length in seconds, ending now. */
  readonly period: number;
  readonly remoteOrigin?: RemoteOriginInput;
  readonly subjectId?: IdentifierInput;
}

// ---------------------------------------------------------------------------
// Storage-level shapes
// ---------------------------------------------------------------------------

/** A persisted row in its storage representation. */
export interface LogRow {
  readonly id: Buffer;
  readonly creationTime: number;
  readonly scope: string;
  readonly remoteOrigin: Buffer;
  readonly subjectId: Buffer;
  readonly objectId: Buffer;
}

/** A parsed `LogFilter`, with every identifier and origin in byte form. */
export interface LogCriteria {
  readonly ids?: readonly Buffer[];
  readonly createdAfter?: number;
  readonly createdBefore?: number;
  readonly scopes?: readonly string[];
  readonly remoteOrigins?: readonly Buffer[];
  readonly subjectIds?: readonly Buffer[];
  readonly objectIds?: readonly Buffer[];
}

export interface LogOrdering {
  readonly field: SortField;
  readonly order: SortOrder;
}

export interface LogPage {
  readonly offset: number;
  readonly limit: number;
}

/** Identifier columns rewritten by `anonymizeId`. */
export type IdentifierColumn = 'subjectId' | 'objectId';
