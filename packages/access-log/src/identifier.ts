// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import { randomBytes } from 'node:crypto';
import { IdentifierFormatError } from './errors.js';

/** Width of every identifier in bytes. */
export const ID_BYTE_LENGTH = 16;

const ID_STRING_PATTERN = /^[A-Za-z0-9_-]{22}$/;

/**
 * A 128-bit identifier in both of its forms.
 *
 * `id` is the canonical unpadded base64url string (22 characters); `bytes`
 * is the 16-byte binary form used in storage.
 */
export interface Identifier {
  readonly id: string;
  readonly bytes: Buffer;
}

/** Anything the codec accepts as an identifier. */
export type IdentifierInput = string | Uint8Array;

/** The all-zero identifier stored when a subject or object is absent. */
export const NONE_ID_BYTES: Buffer = Buffer.alloc(ID_BYTE_LENGTH);

export function parseId(input: IdentifierInput): Identifier {
  if (typeof input === 'string') {
    if (!ID_STRING_PATTERN.test(input)) {
      throw new IdentifierFormatError(
        JSON.stringify(input),
        'expected 22 base64url characters',
      );
    }
    const bytes = Buffer.from(input, 'base64url');
    // 22 characters carry 132 bits; the trailing 4 must be zero to round-trip.
    if (bytes.toString('base64url') !== input) {
      throw new IdentifierFormatError(JSON.stringify(input), 'non-canonical encoding');
    }
    return { id: input, bytes };
  }

  if (input.length !== ID_BYTE_LENGTH) {
    throw new IdentifierFormatError(
      `<${input.length} bytes>`,
      `expected exactly ${ID_BYTE_LENGTH} bytes`,
    );
  }
  const bytes = Buffer.from(input);
  return { id: bytes.toString('base64url'), bytes };
}

/**
 * Parse an optional subject or object id.
 *
 * `undefined`, the empty string and empty byte arrays all map to the zero
 * sentinel, which is returned as `undefined` in `id`.
 */
export function parseOptionalId(
  input: IdentifierInput | undefined,
): { readonly id: string | undefined; readonly bytes: Buffer } {
  if (input === undefined || input.length === 0) {
    return { id: undefined, bytes: NONE_ID_BYTES };
  }
  const parsed = parseId(input);
  if (isNoneId(parsed.bytes)) {
    return { id: undefined, bytes: NONE_ID_BYTES };
  }
  return parsed;
}

/** Generate a fresh random identifier. */
export function generateId(): Identifier {
  const bytes = randomBytes(ID_BYTE_LENGTH);
  return { id: bytes.toString('base64url'), bytes };
}

/** Parse `input` when given, otherwise generate a new identifier. */
export function generateOrParseId(input?: IdentifierInput): Identifier {
  return input === undefined ? generateId() : parseId(input);
}

export function isNoneId(bytes: Uint8Array): boolean {
  return bytes.every((byte) => byte === 0);
}
