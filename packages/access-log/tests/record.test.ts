// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import { describe, it, expect } from 'vitest';
import { buildRecord, recordFromRow } from '../src/record.js';
import { InvalidRecordError } from '../src/errors.js';
import { NOW, idBytes, idString } from './helpers.js';

const defaults = { now: NOW, scopeLength: 16 };

describe('buildRecord', () => {
  it('applies defaults for every omitted field', () => {
    const { record, row } = buildRecord({}, defaults);
    expect(record.id).toHaveLength(22);
    expect(record.creationTime).toBe(NOW);
    expect(record.creationDate.toISOString()).toBe('2023-11-14T22:13:20.000Z');
    expect(record.scope).toBe('');
    expect(record.remoteOrigin.address).toBe('127.0.0.1');
    expect(record.subjectId).toBeUndefined();
    expect(record.objectId).toBeUndefined();
    expect(row.subjectId.equals(Buffer.alloc(16))).toBe(true);
    expect(row.objectId.equals(Buffer.alloc(16))).toBe(true);
  });

  it('uses the configured default origin before loopback', () => {
    const { record } = buildRecord({}, { ...defaults, remoteOrigin: '1.1.1.1' });
    expect(record.remoteOrigin.address).toBe('1.1.1.1');
  });

  it('prefers an explicit origin over the configured default', () => {
    const { record } = buildRecord({ remoteOrigin: '8.8.8.8' }, { ...defaults, remoteOrigin: '1.1.1.1' });
    expect(record.remoteOrigin.address).toBe('8.8.8.8');
  });

  it('truncates fractional creation times to whole seconds', () => {
    expect(buildRecord({ creationTime: 12.9 }, defaults).record.creationTime).toBe(12);
  });

  it('rejects a negative creation time', () => {
    expect(() => buildRecord({ creationTime: -1 }, defaults)).toThrow(InvalidRecordError);
  });

  it('rejects a scope longer than the configured bound', () => {
    expect(() => buildRecord({ scope: 'x'.repeat(17) }, defaults)).toThrow(InvalidRecordError);
    expect(buildRecord({ scope: 'x'.repeat(16) }, defaults).record.scope).toBe('x'.repeat(16));
  });

  it('measures the scope in code points', () => {
    const sixteen = '\u{1F511}'.repeat(16);
    expect(buildRecord({ scope: sixteen }, defaults).record.scope).toBe(sixteen);
    expect(() => buildRecord({ scope: '\u{1F511}'.repeat(17) }, defaults)).toThrow(
      InvalidRecordError,
    );
  });

  it('returns a frozen record', () => {
    expect(Object.isFrozen(buildRecord({}, defaults).record)).toBe(true);
  });
});

describe('recordFromRow', () => {
  it('materializes every field of a stored row', () => {
    const { row } = buildRecord(
      {
        id: idBytes(1),
        creationTime: 42,
        scope: 'login',
        remoteOrigin: '10.1.2.3',
        subjectId: idBytes(2),
        objectId: idBytes(3),
      },
      defaults,
    );
    const record = recordFromRow(row);
    expect(record.id).toBe(idString(1));
    expect(record.creationTime).toBe(42);
    expect(record.scope).toBe('login');
    expect(record.remoteOrigin.address).toBe('10.1.2.3');
    expect(record.subjectId).toBe(idString(2));
    expect(record.objectId).toBe(idString(3));
  });
});
