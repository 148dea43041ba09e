// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import { InvalidRecordError } from './errors.js';
import { generateOrParseId, parseId, parseOptionalId } from './identifier.js';
import { LOOPBACK_ORIGIN, fromBytes, parseRemoteOrigin } from './remote-origin.js';
import type { RemoteOriginInput } from './remote-origin.js';
import type { CreateLogInput, LogRecord, LogRow } from './types.js';

/** Store-level values that fill in fields a caller left out. */
export interface RecordDefaults {
  /** Current Unix time in seconds. */
  readonly now: number;
  readonly scopeLength: number;
  readonly remoteOrigin?: RemoteOriginInput;
}

/**
 * Build a candidate record and its row from caller input.
 *
 * Fractional creation times are truncated to whole seconds.
 */
export function buildRecord(
  input: CreateLogInput,
  defaults: RecordDefaults,
): { record: LogRecord; row: LogRow } {
  const { id, bytes: idBytes } = generateOrParseId(input.id);

  const creationTime = Math.trunc(input.creationTime ?? defaults.now);
  if (!Number.isFinite(creationTime) || creationTime < 0) {
    throw new InvalidRecordError(
      'creationTime',
      `creationTime must be a non-negative number of seconds, got ${String(input.creationTime)}.`,
    );
  }

  const scope = input.scope ?? '';
  // Code points, as the VARCHAR column counts them.
  if ([...scope].length > defaults.scopeLength) {
    throw new InvalidRecordError(
      'scope',
      `scope "${scope}" exceeds the maximum length of ${defaults.scopeLength} characters.`,
    );
  }

  const remoteOrigin = parseRemoteOrigin(
    input.remoteOrigin ?? defaults.remoteOrigin ?? LOOPBACK_ORIGIN,
  );
  const subject = parseOptionalId(input.subjectId);
  const object = parseOptionalId(input.objectId);

  const record: LogRecord = Object.freeze({
    id,
    creationTime,
    creationDate: new Date(creationTime * 1000),
    scope,
    remoteOrigin,
    subjectId: subject.id,
    objectId: object.id,
  });

  const row: LogRow = {
    id: idBytes,
    creationTime,
    scope,
    remoteOrigin: remoteOrigin.bytes,
    subjectId: subject.bytes,
    objectId: object.bytes,
  };

  return { record, row };
}

/** Materialize a stored row into a LogRecord. */
export function recordFromRow(row: LogRow): LogRecord {
  return Object.freeze({
    id: parseId(row.id).id,
    creationTime: row.creationTime,
    creationDate: new Date(row.creationTime * 1000),
    scope: row.scope,
    remoteOrigin: fromBytes(row.remoteOrigin),
    subjectId: parseOptionalId(row.subjectId).id,
    objectId: parseOptionalId(row.objectId).id,
  });
}
