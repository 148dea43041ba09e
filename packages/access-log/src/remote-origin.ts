// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import { isIPv4, isIPv6 } from 'node:net';
import { InvalidAddressError } from './errors.js';

/** Width of a stored remote origin in bytes, for both address families. */
export const ORIGIN_BYTE_LENGTH = 16;

export type AddressFamily = 4 | 6;

/**
 * A parsed network address.
 *
 * `bytes` is always the 16-byte storage form. IPv4 addresses use the
 * IPv4-mapped IPv6 layout (`::ffff:a.b.c.d`).
 */
export interface RemoteOrigin {
  readonly family: AddressFamily;
  readonly bytes: Buffer;
  /** Exploded text form: dotted quad, or eight 4-digit hex groups. */
  readonly address: string;
}

export type RemoteOriginInput = string | Uint8Array | RemoteOrigin;

export const LOOPBACK_ORIGIN = '127.0.0.1';

const MAPPED_PREFIX = Buffer.from([0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0xff, 0xff]);

export function parseRemoteOrigin(input: RemoteOriginInput): RemoteOrigin {
  if (typeof input === 'string') {
    return fromString(input);
  }
  if (input instanceof Uint8Array) {
    return fromBytes(input);
  }
  return fromBytes(input.bytes);
}

/**
 * Build an origin from 4 packed IPv4 bytes or 16 stored bytes. Sixteen bytes
 * carrying the mapped prefix decode as IPv4.
 */
export function fromBytes(bytes: Uint8Array): RemoteOrigin {
  if (bytes.length === 4) {
    return ipv4(Buffer.from(bytes));
  }
  if (bytes.length !== ORIGIN_BYTE_LENGTH) {
    throw new InvalidAddressError(`<${bytes.length} bytes>`);
  }
  const stored = Buffer.from(bytes);
  if (stored.subarray(0, 12).equals(MAPPED_PREFIX)) {
    return ipv4(stored.subarray(12));
  }
  return ipv6(stored);
}

function fromString(text: string): RemoteOrigin {
  if (isIPv4(text)) {
    return ipv4(Buffer.from(text.split('.').map((octet) => Number.parseInt(octet, 10))));
  }
  if (isIPv6(text)) {
    return fromBytes(packIPv6(text));
  }
  throw new InvalidAddressError(text);
}

function ipv4(octets: Buffer): RemoteOrigin {
  return {
    family: 4,
    bytes: Buffer.concat([MAPPED_PREFIX, octets]),
    address: Array.from(octets).join('.'),
  };
}

function ipv6(bytes: Buffer): RemoteOrigin {
  const groups: string[] = [];
  for (let offset = 0; offset < ORIGIN_BYTE_LENGTH; offset += 2) {
    groups.push(bytes.readUInt16BE(offset).toString(16).padStart(4, '0'));
  }
  return { family: 6, bytes, address: groups.join(':') };
}

/**
 * Pack an IPv6 address already validated by `isIPv6` into 16 bytes.
 * Handles `::` compression and a trailing embedded dotted quad.
 */
function packIPv6(text: string): Buffer {
  const zoneless = text.split('%')[0] ?? text;
  const [head = '', tail] = zoneless.split('::');

  const toGroups = (part: string): number[] => {
    if (part === '') return [];
    const groups: number[] = [];
    for (const piece of part.split(':')) {
      if (piece.includes('.')) {
        const [a = 0, b = 0, c = 0, d = 0] = piece.split('.').map((octet) => Number.parseInt(octet, 10));
        groups.push((a << 8) | b, (c << 8) | d);
      } else {
        groups.push(Number.parseInt(piece, 16));
      }
    }
    return groups;
  };

  const headGroups = toGroups(head);
  const tailGroups = tail === undefined ? [] : toGroups(tail);
  const fill = new Array<number>(8 - headGroups.length - tailGroups.length).fill(0);
  const groups = [...headGroups, ...fill, ...tailGroups];

  const bytes = Buffer.alloc(ORIGIN_BYTE_LENGTH);
  groups.forEach((group, index) => bytes.writeUInt16BE(group, index * 2));
  return bytes;
}
