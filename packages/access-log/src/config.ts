// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import { isIP } from 'node:net';
import { z } from 'zod';
import { InvalidConfigError, InvalidQueryError } from './errors.js';

/** Width of the stored `scope` column, in characters. */
export const SCOPE_COLUMN_LENGTH = 16;

/**
 * Zod schema for the options an `AccessLogStore` is constructed with.
 */
export const AccessLogConfigSchema = z.object({
  /**
   * Maximum scope length in characters. Defaults to, and may not exceed, the
   * width of the stored column.
   */
  scopeLength: z.number().int().positive().max(SCOPE_COLUMN_LENGTH).default(SCOPE_COLUMN_LENGTH),
  /**
   * Origin recorded when `create` receives none, and used by `cooldown` as a
   * fallback. Read-only for the lifetime of the store.
   */
  defaultRemoteOrigin: z
    .string()
    .refine((value) => isIP(value) !== 0, 'must be an IPv4 or IPv6 address')
    .optional(),
});

export type AccessLogConfig = z.infer<typeof AccessLogConfigSchema>;
export type AccessLogConfigInput = z.input<typeof AccessLogConfigSchema>;

/**
 * Prefix prepended to the `access_logs` table name so several logs can share
 * one database. It is spliced into SQL, so only identifier characters pass.
 */
export const TablePrefixSchema = z
  .string()
  .regex(/^[A-Za-z0-9_]*$/, 'must contain only letters, digits and underscores')
  .default('');

/**
 * Zod schema for search options. Sort fields other than `creationTime` and
 * `id` are rejected.
 */
export const SearchOptionsSchema = z.object({
  sort: z.enum(['creationTime', 'id']).default('creationTime'),
  order: z.enum(['asc', 'desc']).default('asc'),
  page: z.number().int().nonnegative().default(0),
  pageSize: z.number().int().positive().optional(),
});

export type ParsedSearchOptions = z.infer<typeof SearchOptionsSchema>;

function issuesOf(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
}

/**
 * Parse and validate a raw config object, throwing InvalidConfigError on
 * failure.
 */
export function parseAccessLogConfig(raw: unknown): AccessLogConfig {
  const result = AccessLogConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new InvalidConfigError(issuesOf(result.error));
  }
  return result.data;
}

export function parseTablePrefix(raw: unknown): string {
  const result = TablePrefixSchema.safeParse(raw);
  if (!result.success) {
    throw new InvalidConfigError(issuesOf(result.error).map((issue) => `tablePrefix${issue}`));
  }
  return result.data;
}

/**
 * Parse search options, throwing InvalidQueryError on failure.
 */
export function parseSearchOptions(raw: unknown): ParsedSearchOptions {
  const result = SearchOptionsSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new InvalidQueryError(issuesOf(result.error));
  }
  return result.data;
}
