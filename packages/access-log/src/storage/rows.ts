// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import { z } from 'zod';
import type { LogRow } from '../types.js';

/**
 * Zod schemas for values read back from SQL drivers.
 *
 * Drivers differ in how they surface integers (`number` from SQLite drivers,
 * `string` for BIGINT from pg), so numeric columns are coerced.
 */
const bytes = z.instanceof(Uint8Array).transform((value) => Buffer.from(value));

export const SqlLogRowSchema = z
  .object({
    id: bytes,
    creation_time: z.coerce.number().int(),
    scope: z.string().nullable(),
    remote_origin: bytes,
    subject_id: bytes,
    object_id: bytes,
  })
  .transform(
    (row): LogRow => ({
      id: row.id,
      creationTime: row.creation_time,
      scope: row.scope ?? '',
      remoteOrigin: row.remote_origin,
      subjectId: row.subject_id,
      objectId: row.object_id,
    }),
  );

export const CountRowSchema = z.object({ count: z.coerce.number().int() });

export const ScopeRowSchema = z.object({ scope: z.string().nullable() });

/** True when `error` is a driver error carrying the given `code`. */
export function hasErrorCode(error: unknown, code: string): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === code
  );
}
