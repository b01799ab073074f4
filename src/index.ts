/**
 * LAN SCPI instrument control
 *
 *   const result = await connect('192.168.0.10', 'HMC-T2240');
 *   if (!result.ok) throw result.error;
 *   const generator = createSignalGenerator(result.value);
 *   await generator.setFrequency(5, 'GHz');   // FREQ 5000000000
 *   await result.value.close();
 */

import type { Identity } from '../shared/types.js';
import { Ok, Err, Result, tryResult } from '../shared/types.js';
import type { CapabilityTable } from './instruments/capabilities.js';
import type { InstrumentSession } from './instruments/types.js';
import type { AnyInstrumentError, ArgumentError, ConnectionError, ProtocolError } from './instruments/errors.js';
import { createInstrumentSession, type SessionOptions } from './instruments/session.js';
import { getBuiltinRegistry, type ModelRegistry } from './instruments/registry.js';

export interface ConnectOptions extends SessionOptions {
  /** Overrides the port from the model's capability table */
  port?: number;
  /** Registry to resolve model names in (default: the bundled tables) */
  registry?: ModelRegistry;
}

/**
 * Open a session to the instrument at `host`.
 *
 * `model` is a model name from the registry ("HMC-T2240", case-insensitive)
 * or a capability table. Resolves once the connection is open; the caller
 * owns the session and must close() it.
 */
export async function connect(
  host: string,
  model: string | CapabilityTable,
  options: ConnectOptions = {}
): Promise<Result<InstrumentSession, ConnectionError | ProtocolError | ArgumentError>> {
  let table: CapabilityTable;
  if (typeof model === 'string') {
    const registry = options.registry ? Ok(options.registry) : getBuiltinRegistry();
    if (!registry.ok) return registry;
    const found = registry.value.get(model);
    if (!found.ok) return found;
    table = found.value;
  } else {
    table = model;
  }

  const session = createInstrumentSession(
    { host, port: options.port ?? table.framing.port },
    table,
    options
  );

  const opened = await session.connect();
  if (!opened.ok) return opened;
  return Ok(session);
}

export interface IdentifiedModel {
  identity: Identity;
  /** Matching capability table, undefined when no registered model matches */
  table: CapabilityTable | undefined;
}

/**
 * Ask a connected session's instrument for *IDN? and find the capability
 * table registered for it.
 */
export async function identifyModel(
  session: InstrumentSession,
  registry?: ModelRegistry
): Promise<Result<IdentifiedModel, AnyInstrumentError>> {
  const resolved = registry ? Ok(registry) : getBuiltinRegistry();
  if (!resolved.ok) return resolved;

  const identity = await session.identify();
  if (!identity.ok) return identity;

  const { manufacturer, model } = identity.value;
  return Ok({ identity: identity.value, table: resolved.value.matchIdn(manufacturer, model) });
}

export { Ok, Err, Result, tryResult };
export * from './config.js';
export * from './instruments/errors.js';
export * from './instruments/units.js';
export * from './instruments/scpi-formatter.js';
export { ScpiParser } from './instruments/scpi-parser.js';
export * from './instruments/capabilities.js';
export * from './instruments/registry.js';
export { createInstrumentSession } from './instruments/session.js';
export type { SessionOptions } from './instruments/session.js';
export { createTcpTransport } from './instruments/transports/tcp.js';
export type {
  Address,
  CurrentUnit,
  FrequencyUnit,
  Identity,
  InstrumentDriver,
  InstrumentFamily,
  InstrumentSession,
  NumericSuffixes,
  PowerUnit,
  Quantity,
  QuantityKind,
  SessionResult,
  SessionState,
  Transport,
  TransportConfig,
  TransportFactory,
  UnitOf,
  VoltageUnit,
} from './instruments/types.js';
export * from './instruments/drivers/index.js';
