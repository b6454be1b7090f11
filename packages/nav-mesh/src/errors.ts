/**
 * Typed error classes for nav mesh decoding and lookup.
 */

export type NavMeshErrorCode =
  | 'InvalidMagic'
  | 'UnsupportedVersion'
  | 'UnexpectedEof'
  | 'CorruptCount'
  | 'NonFiniteValue'
  | 'DanglingReference'
  | 'DuplicateId'
  | 'AreaNotFound';

/** Base class for all nav mesh errors. */
export abstract class NavMeshError extends Error {
  abstract readonly code: NavMeshErrorCode;

  constructor(message: string) {
    super(message);
    this.name = 'NavMeshError';
  }
}

/**
 * Raised while turning bytes into a mesh. `offset` is the byte position the
 * problem was detected at, or -1 when it is not tied to one.
 */
export abstract class NavDecodeError extends NavMeshError {
  constructor(
    message: string,
    public readonly offset: number,
  ) {
    super(offset >= 0 ? `${message} (at byte ${offset})` : message);
    this.name = 'NavDecodeError';
  }
}

/** The buffer does not start with the nav file magic number. */
export class InvalidMagicError extends NavDecodeError {
  readonly code = 'InvalidMagic';

  constructor(public readonly magic: number) {
    super(`Invalid magic number 0x${magic.toString(16).toUpperCase().padStart(8, '0')}, not a nav file or corrupted`, 0);
    this.name = 'InvalidMagicError';
  }
}

/** The file declares a format version this decoder has no layout for. */
export class UnsupportedVersionError extends NavDecodeError {
  readonly code = 'UnsupportedVersion';

  constructor(
    public readonly version: number,
    offset: number,
  ) {
    super(`Nav file version ${version} is not supported`, offset);
    this.name = 'UnsupportedVersionError';
  }
}

/** Fewer bytes remain than a field or a declared table needs. */
export class UnexpectedEofError extends NavDecodeError {
  readonly code = 'UnexpectedEof';

  constructor(
    public readonly needed: number,
    public readonly available: number,
    offset: number,
    what = 'data',
  ) {
    super(`Unexpected end of buffer reading ${what}: needed ${needed} bytes, ${available} left`, offset);
    this.name = 'UnexpectedEofError';
  }
}

/** A count prefix exceeds the bound for its table. */
export class CorruptCountError extends NavDecodeError {
  readonly code = 'CorruptCount';

  constructor(
    public readonly what: string,
    public readonly count: number,
    public readonly limit: string,
    offset: number,
  ) {
    super(`Corrupt ${what} count ${count} (expected ${limit})`, offset);
    this.name = 'CorruptCountError';
  }
}

/** A coordinate or height decoded as NaN or an infinity. */
export class NonFiniteValueError extends NavDecodeError {
  readonly code = 'NonFiniteValue';

  constructor(
    public readonly what: string,
    public readonly value: number,
    offset = -1,
  ) {
    super(`${what} is not finite (${value})`, offset);
    this.name = 'NonFiniteValueError';
  }
}

/** A stored id points at an area, ladder or place that does not exist. */
export class DanglingReferenceError extends NavDecodeError {
  readonly code = 'DanglingReference';

  constructor(
    public readonly owner: string,
    public readonly field: string,
    public readonly targetId: number,
    offset = -1,
  ) {
    super(`${owner} ${field} references missing id ${targetId}`, offset);
    this.name = 'DanglingReferenceError';
  }
}

/** Two areas (or two ladders) share an id. */
export class DuplicateIdError extends NavDecodeError {
  readonly code = 'DuplicateId';

  constructor(
    public readonly kind: 'area' | 'ladder',
    public readonly id: number,
    offset = -1,
  ) {
    super(`Duplicate ${kind} id ${id}`, offset);
    this.name = 'DuplicateIdError';
  }
}

/** Lookup of an area id the mesh does not contain. */
export class AreaNotFoundError extends NavMeshError {
  readonly code = 'AreaNotFound';

  constructor(public readonly id: number) {
    super(`Area ${id} not found in nav mesh`);
    this.name = 'AreaNotFoundError';
  }
}
