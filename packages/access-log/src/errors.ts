// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * Base class for all access log errors.
 *
 * Every error carries a machine-readable `code` that calling code can switch
 * on without parsing human-readable messages.
 */
export class AccessLogError extends Error {
  /** Machine-readable error code. Always a SCREAMING_SNAKE_CASE string. */
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'AccessLogError';
    this.code = code;
    // Maintain proper prototype chain for instanceof checks.
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Thrown when a value cannot be parsed into a canonical 128-bit identifier.
 */
export class IdentifierFormatError extends AccessLogError {
  /** A printable description of the rejected input. */
  readonly input: string;

  constructor(input: string, reason: string) {
    super('IDENTIFIER_FORMAT', `Invalid identifier ${input}: ${reason}.`);
    this.name = 'IdentifierFormatError';
    this.input = input;
  }
}

/**
 * Thrown when a remote origin is neither a textual IPv4/IPv6 address nor a
 * 4- or 16-byte packed address.
 */
export class InvalidAddressError extends AccessLogError {
  readonly input: string;

  constructor(input: string) {
    super('INVALID_ADDRESS', `"${input}" is not a valid IPv4 or IPv6 address.`);
    this.name = 'InvalidAddressError';
    this.input = input;
  }
}

/**
 * Thrown by `create` when the candidate id is already present in the store.
 *
 * Nothing is written when this error is raised; callers that want a fresh
 * id should retry without supplying one.
 */
export class LogIdCollisionError extends AccessLogError {
  /** Canonical string form of the colliding id. */
  readonly logId: string;

  constructor(logId: string) {
    super('LOG_ID_COLLISION', `Log id "${logId}" already exists.`);
    this.name = 'LogIdCollisionError';
    this.logId = logId;
  }
}

/**
 * Thrown when origin anonymization meets an address family other than
 * IPv4 or IPv6.
 */
export class UnsupportedAddressFamilyError extends AccessLogError {
  readonly family: string;

  constructor(family: string) {
    super('UNSUPPORTED_ADDRESS_FAMILY', `Cannot anonymize address family "${family}".`);
    this.name = 'UnsupportedAddressFamilyError';
    this.family = family;
  }
}

/**
 * Thrown when a log record field violates its constraints (scope longer than
 * the configured bound, negative or fractional creation time).
 */
export class InvalidRecordError extends AccessLogError {
  readonly field: string;

  constructor(field: string, message: string) {
    super('INVALID_RECORD', message);
    this.name = 'InvalidRecordError';
    this.field = field;
  }
}

/**
 * Thrown when search options name an unsupported sort field or order, or
 * carry an invalid page or page size.
 */
export class InvalidQueryError extends AccessLogError {
  readonly details: readonly string[];

  constructor(details: readonly string[]) {
    super('INVALID_QUERY', `Search options are invalid: ${details.join('; ')}`);
    this.name = 'InvalidQueryError';
    this.details = details;
  }
}

/**
 * Thrown when store configuration is structurally or semantically invalid.
 *
 * The `details` array carries one entry per validation error, matching the
 * format produced by Zod's `ZodError.issues`.
 */
export class InvalidConfigError extends AccessLogError {
  /** Structured list of individual validation failures. */
  readonly details: readonly string[];

  constructor(details: readonly string[]) {
    super('INVALID_CONFIG', `Access log configuration is invalid: ${details.join('; ')}`);
    this.name = 'InvalidConfigError';
    this.details = details;
  }
}
