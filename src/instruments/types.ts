// Re-export shared types
export * from '../../shared/types.js';

import type {
  Result,
  Address,
  Identity,
  NumericSuffixes,
} from '../../shared/types.js';
import type { CapabilityTable } from './capabilities.js';
import type {
  AnyInstrumentError,
  ArgumentError,
  ConnectionError,
  DeviceError,
  ProtocolError,
  TimeoutError,
  TransportError,
} from './errors.js';
import type { ScpiCommand } from './scpi-formatter.js';

export type { ScpiCommand } from './scpi-formatter.js';
export type { CapabilityTable, Operation } from './capabilities.js';

/**
 * Line-oriented byte stream to one instrument.
 *
 * Strictly request/response: the session never writes a query before the
 * previous reply was received, so the transport does not multiplex.
 */
export interface Transport {
  open(): Promise<Result<void, ConnectionError>>;
  /** Idempotent. A pending receive() resolves with a TransportError. */
  close(): Promise<void>;
  /** Write the line plus the write terminator */
  send(line: string): Promise<Result<void, TransportError>>;
  /** Next complete line without its terminator */
  receive(timeoutMs?: number): Promise<Result<string, TimeoutError | TransportError>>;
  /** Drop lines nobody asked for (late replies after a timeout); returns them */
  discardPending(): string[];
  isOpen(): boolean;
}

export interface TransportConfig {
  host: string;
  port: number;
  connectTimeoutMs: number;
  ioTimeoutMs: number;
  writeTerminator: string;
  readTerminator: string;
}

export type TransportFactory = (config: TransportConfig) => Transport;

export type SessionState = 'disconnected' | 'connecting' | 'connected' | 'busy' | 'closed';

export type SessionResult<T> = Promise<Result<T, AnyInstrumentError>>;

/**
 * Stateful handle on one instrument, driven by its capability table.
 *
 * disconnected → connected ⇄ busy (query awaiting its reply) → closed
 */
export interface InstrumentSession {
  readonly address: Address;
  readonly table: CapabilityTable;

  getState(): SessionState;
  supports(operation: string): boolean;

  // Lifecycle
  connect(): Promise<Result<void, ConnectionError | ProtocolError>>;
  close(): Promise<void>;

  // Raw exchange
  send(command: ScpiCommand): Promise<Result<void, TransportError | ProtocolError>>;
  receive(timeoutMs?: number): Promise<Result<string, TimeoutError | TransportError | ProtocolError>>;
  query(command: ScpiCommand): Promise<Result<string, TimeoutError | TransportError | ProtocolError | ArgumentError>>;

  // Table-driven operations
  setQuantity(operation: string, magnitude: number, unit: string, suffixes?: NumericSuffixes): SessionResult<void>;
  getQuantity(operation: string, unit: string, suffixes?: NumericSuffixes): SessionResult<number>;
  setNumber(operation: string, value: number, suffixes?: NumericSuffixes): SessionResult<void>;
  getNumber(operation: string, suffixes?: NumericSuffixes): SessionResult<number>;
  setOnOff(operation: string, on: boolean, suffixes?: NumericSuffixes): SessionResult<void>;
  isOn(operation: string, suffixes?: NumericSuffixes): SessionResult<boolean>;
  setEnum(operation: string, token: string, suffixes?: NumericSuffixes): SessionResult<void>;
  getEnum(operation: string, suffixes?: NumericSuffixes): SessionResult<string>;
  execute(operation: string, suffixes?: NumericSuffixes): SessionResult<void>;
  getText(operation: string, suffixes?: NumericSuffixes): SessionResult<string>;

  // Common commands
  reset(): SessionResult<void>;
  clearStatus(): SessionResult<void>;
  getId(): SessionResult<string>;
  identify(): SessionResult<Identity>;
  waitForCompletion(timeoutMs?: number): SessionResult<void>;
  /** Read one error queue entry; a nonzero code comes back as a DeviceError */
  readError(): SessionResult<void>;
  /** Read the error queue until "0,No error"; returns the entries that were queued */
  drainErrors(): SessionResult<DeviceError[]>;
}

/** Members every family facade shares */
export interface InstrumentDriver {
  readonly session: InstrumentSession;
  reset(): SessionResult<void>;
  getId(): SessionResult<string>;
  close(): Promise<void>;
}
