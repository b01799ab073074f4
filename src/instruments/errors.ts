/**
 * Instrument error taxonomy
 *
 * Every fallible operation resolves to Result<T, E> where E is one of the
 * classes below. Validation errors (unit, argument) are raised before any
 * network I/O. Transport errors close the session; everything else leaves
 * it connected.
 */

export type InstrumentErrorKind =
  | 'connection'
  | 'timeout'
  | 'transport'
  | 'unit'
  | 'argument'
  | 'parse'
  | 'protocol'
  | 'device';

export abstract class InstrumentError extends Error {
  abstract readonly kind: InstrumentErrorKind;
}

/** The endpoint could not be reached before the connect timeout. */
export class ConnectionError extends InstrumentError {
  readonly kind = 'connection' as const;

  constructor(message: string, cause?: Error) {
    super(message, { cause });
    this.name = 'ConnectionError';
  }
}

/** No terminated reply line arrived within the I/O timeout. */
export class TimeoutError extends InstrumentError {
  readonly kind = 'timeout' as const;

  constructor(message: string, readonly timeoutMs: number) {
    super(message);
    this.name = 'TimeoutError';
  }
}

/** The connection dropped, was closed, or refused a write. */
export class TransportError extends InstrumentError {
  readonly kind = 'transport' as const;

  constructor(message: string, cause?: Error) {
    super(message, { cause });
    this.name = 'TransportError';
  }
}

export class UnitError extends InstrumentError {
  readonly kind = 'unit' as const;

  constructor(message: string) {
    super(message);
    this.name = 'UnitError';
  }
}

/** Value outside the allowed set or range, or an unsupported operation. */
export class ArgumentError extends InstrumentError {
  readonly kind = 'argument' as const;

  constructor(message: string) {
    super(message);
    this.name = 'ArgumentError';
  }
}

/** Reply text did not match the expected grammar. */
export class ParseError extends InstrumentError {
  readonly kind = 'parse' as const;

  constructor(message: string, readonly reply: string) {
    super(message);
    this.name = 'ParseError';
  }
}

/** Request/response ordering violated (command while a reply is pending). */
export class ProtocolError extends InstrumentError {
  readonly kind = 'protocol' as const;

  constructor(message: string) {
    super(message);
    this.name = 'ProtocolError';
  }
}

/** Nonzero entry read from the instrument's error queue. */
export class DeviceError extends InstrumentError {
  readonly kind = 'device' as const;

  constructor(readonly code: number, readonly description: string) {
    super(`Device error ${code}: ${description}`);
    this.name = 'DeviceError';
  }
}

export type AnyInstrumentError =
  | ConnectionError
  | TimeoutError
  | TransportError
  | UnitError
  | ArgumentError
  | ParseError
  | ProtocolError
  | DeviceError;
