// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import { describe, it, expect } from 'vitest';
import {
  NONE_ID_BYTES,
  generateId,
  generateOrParseId,
  isNoneId,
  parseId,
  parseOptionalId,
} from '../src/identifier.js';
import { IdentifierFormatError } from '../src/errors.js';

describe('identifier codec', () => {
  describe('parseId', () => {
    it('encodes 16 bytes as 22 unpadded base64url characters', () => {
      const bytes = Buffer.alloc(16, 0xff);
      const parsed = parseId(bytes);
      expect(parsed.id).toBe('_____________________w');
      expect(parsed.bytes.equals(bytes)).toBe(true);
    });

    it('decodes a canonical string back to the same bytes', () => {
      const parsed = parseId('AAECAwQFBgcICQoLDA0ODw');
      expect(Array.from(parsed.bytes)).toEqual([
        0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13, 14, 15,
      ]);
      expect(parsed.id).toBe('AAECAwQFBgcICQoLDA0ODw');
    });

    it('rejects strings with characters outside the base64url alphabet', () => {
      expect(() => parseId('contains $%^~ chars!!!')).toThrow(IdentifierFormatError);
    });

    it('rejects strings of the wrong length', () => {
      expect(() => parseId('AAAA')).toThrow(IdentifierFormatError);
    });

    it('rejects a non-canonical final character', () => {
      // "x" sets bits beyond the 128th, which decoding would silently drop.
      expect(() => parseId('AAAAAAAAAAAAAAAAAAAAAx')).toThrow(IdentifierFormatError);
    });

    it('rejects byte arrays that are not 16 long', () => {
      expect(() => parseId(new Uint8Array(15))).toThrow(IdentifierFormatError);
      expect(() => parseId(new Uint8Array(17))).toThrow(IdentifierFormatError);
    });

    it('carries the IDENTIFIER_FORMAT code', () => {
      try {
        parseId('nope');
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(IdentifierFormatError);
        expect(error).toMatchObject({ code: 'IDENTIFIER_FORMAT' });
      }
    });
  });

  describe('generateId', () => {
    it('produces distinct 16-byte identifiers', () => {
      const a = generateId();
      const b = generateId();
      expect(a.bytes.length).toBe(16);
      expect(a.id).toHaveLength(22);
      expect(a.id).not.toBe(b.id);
    });

    it('round-trips through parseId', () => {
      const generated = generateId();
      expect(parseId(generated.id).bytes.equals(generated.bytes)).toBe(true);
    });
  });

  describe('generateOrParseId', () => {
    it('parses when input is given', () => {
      const id = Buffer.alloc(16, 7).toString('base64url');
      expect(generateOrParseId(id).id).toBe(id);
    });

    it('generates when input is omitted', () => {
      expect(generateOrParseId().bytes.length).toBe(16);
    });
  });

  describe('parseOptionalId', () => {
    it('maps undefined, empty string and empty bytes to the zero sentinel', () => {
      for (const input of [undefined, '', new Uint8Array(0)]) {
        const parsed = parseOptionalId(input);
        expect(parsed.id).toBeUndefined();
        expect(parsed.bytes.equals(NONE_ID_BYTES)).toBe(true);
      }
    });

    it('maps an explicit all-zero id to undefined', () => {
      expect(parseOptionalId(new Uint8Array(16)).id).toBeUndefined();
    });

    it('keeps a real identifier', () => {
      const id = Buffer.alloc(16, 1).toString('base64url');
      expect(parseOptionalId(id).id).toBe(id);
    });
  });

  it('isNoneId detects the zero sentinel only', () => {
    expect(isNoneId(Buffer.alloc(16))).toBe(true);
    expect(isNoneId(Buffer.alloc(16, 1))).toBe(false);
  });
});
