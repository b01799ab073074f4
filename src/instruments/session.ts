/**
 * InstrumentSession - Table-driven control of one LAN instrument
 *
 * - Looks up each named operation in the model's capability table
 * - Normalizes units, formats and validates the command before any I/O
 * - Enforces strict request/response alternation (Busy while a reply is owed)
 * - Rejects a second operation while one is still running instead of queueing
 * - Closes itself on transport failure; timeouts leave it usable
 */

import type { Address, Identity, NumericSuffixes, Result } from '../../shared/types.js';
import { Ok, Err } from '../../shared/types.js';
import type {
  InstrumentSession,
  SessionState,
  Transport,
  TransportFactory,
} from './types.js';
import type { CapabilityTable, Operation, OperationOf, OperationType } from './capabilities.js';
import {
  ArgumentError,
  ConnectionError,
  DeviceError,
  ParseError,
  ProtocolError,
  TimeoutError,
  TransportError,
  type AnyInstrumentError,
} from './errors.js';
import {
  checkRange,
  formatCommand,
  formatEnum,
  formatQuery,
  formatSet,
  resolveVerb,
  type FormatResult,
  type ScpiCommand,
} from './scpi-formatter.js';
import { ScpiParser } from './scpi-parser.js';
import { BASE_UNITS, checkUnit, fromBase, toBase } from './units.js';
import { createTcpTransport } from './transports/tcp.js';
import { resolveConfig, type SessionConfig } from '../config.js';

export interface SessionOptions extends SessionConfig {
  /** Replaces the TCP transport (tests, alternative links) */
  transportFactory?: TransportFactory;
}

// Upper bound on SYST:ERR? reads per drainErrors() call
const MAX_ERROR_READS = 32;

type Step<T> = Result<T, AnyInstrumentError>;

const delay = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

function isOperationOf<T extends OperationType>(operation: Operation, type: T): operation is OperationOf<T> {
  return operation.type === type;
}

export function createInstrumentSession(
  address: Address,
  table: CapabilityTable,
  options: SessionOptions = {}
): InstrumentSession {
  const cfg = resolveConfig(options);
  const logger = cfg.logger;
  const transportFactory = options.transportFactory ?? createTcpTransport;
  const prefix = `[${table.model}]`;
  const { framing } = table;

  let state: SessionState = 'disconnected';
  let transport: Transport | null = null;
  // Text of the query whose reply is still owed
  let awaiting: string | null = null;
  // Name of the high-level operation currently running
  let activeOperation: string | null = null;

  // ============ Lifecycle helpers ============

  async function failTransport(error: TransportError): Promise<Result<never, TransportError>> {
    logger.error(`${prefix} ${error.message}; session closed`);
    state = 'closed';
    awaiting = null;
    await transport?.close();
    return Err(error);
  }

  // close() (and a later connect()) may run while connect() awaits the transport
  function closedWhileConnecting(opening: Transport): boolean {
    return state === 'closed' || transport !== opening;
  }

  async function abandon(opening: Transport): Promise<Result<never, ConnectionError>> {
    await opening.close();
    return Err(new ConnectionError(
      `Session to ${address.host}:${address.port} was closed while connecting`
    ));
  }

  function notConnected(): TransportError {
    return new TransportError(
      state === 'closed'
        ? `Session to ${address.host}:${address.port} is closed`
        : `Session to ${address.host}:${address.port} is not connected`
    );
  }

  function stripPrompt(reply: string): string {
    const promptPrefix = framing.promptPrefix;
    if (promptPrefix && reply.startsWith(promptPrefix)) {
      return reply.slice(promptPrefix.length).trimStart();
    }
    return reply;
  }

  // ============ Raw exchange ============

  async function send(command: ScpiCommand): Promise<Result<void, TransportError | ProtocolError>> {
    if (state === 'busy') {
      return Err(new ProtocolError(
        `Cannot send "${command.text}" while the reply to "${awaiting}" is unread`
      ));
    }
    if (state !== 'connected' || !transport) {
      return Err(notConnected());
    }

    const stale = transport.discardPending();
    if (stale.length > 0) {
      logger.warn(`${prefix} Discarded ${stale.length} stale line(s): ${stale.join(' | ')}`);
    }

    // Busy before the write so nothing else can slip in while it is in flight
    if (command.kind === 'query') {
      state = 'busy';
      awaiting = command.text;
    }

    if (cfg.verbose) {
      logger.log(`${prefix} -> ${command.text}`);
    }

    const written = await transport.send(command.text);
    if (!written.ok) {
      return failTransport(written.error);
    }
    return Ok(undefined);
  }

  async function receive(
    timeoutMs?: number
  ): Promise<Result<string, TimeoutError | TransportError | ProtocolError>> {
    if (state !== 'busy' || !transport) {
      return Err(state === 'connected'
        ? new ProtocolError('No query is awaiting a reply')
        : notConnected());
    }

    const result = await transport.receive(timeoutMs ?? cfg.ioTimeoutMs);

    if (result.ok) {
      // close() may have run while we waited
      if (state === 'busy') {
        state = 'connected';
        awaiting = null;
      }
      const reply = stripPrompt(result.value);
      if (cfg.verbose) {
        logger.log(`${prefix} <- ${reply}`);
      }
      return Ok(reply);
    }

    if (result.error instanceof TimeoutError) {
      if (state === 'busy') {
        state = 'connected';
        logger.warn(`${prefix} ${result.error.message} (waiting for "${awaiting}")`);
        awaiting = null;
      }
      return result;
    }

    if (state === 'closed') {
      return result;
    }
    return failTransport(result.error);
  }

  async function query(
    command: ScpiCommand
  ): Promise<Result<string, TimeoutError | TransportError | ProtocolError | ArgumentError>> {
    if (command.kind !== 'query') {
      return Err(new ArgumentError(`"${command.text}" is not a query`));
    }
    const sent = await send(command);
    if (!sent.ok) return sent;
    return receive();
  }

  // ============ Operation plumbing ============

  async function exclusive<T>(name: string, run: () => Promise<Step<T>>): Promise<Step<T>> {
    if (activeOperation !== null) {
      return Err(new ProtocolError(`Cannot start ${name} while ${activeOperation} is still running`));
    }
    activeOperation = name;
    try {
      return await run();
    } finally {
      activeOperation = null;
    }
  }

  function lookup<T extends OperationType>(name: string, type: T): Result<OperationOf<T>, ArgumentError> {
    const operations = table.operations;
    if (!Object.prototype.hasOwnProperty.call(operations, name)) {
      return Err(new ArgumentError(`${table.model} does not support ${name}`));
    }
    const operation = operations[name];
    const actual = operation.type;
    if (!isOperationOf(operation, type)) {
      return Err(new ArgumentError(`${table.model} ${name} is a ${actual} operation, not ${type}`));
    }
    return Ok(operation);
  }

  function prepareSetup(operation: Operation, suffixes?: NumericSuffixes): Result<ScpiCommand[], ArgumentError> {
    const commands: ScpiCommand[] = [];
    for (const template of operation.setup) {
      const verb = resolveVerb(template, suffixes);
      if (!verb.ok) return verb;
      const command = formatCommand(verb.value);
      if (!command.ok) return command;
      commands.push(command.value);
    }
    return Ok(commands);
  }

  function prepareVerb(
    operation: Operation,
    suffixes: NumericSuffixes | undefined,
    build: (verb: string) => FormatResult
  ): Result<ScpiCommand, ArgumentError> {
    const verb = resolveVerb(operation.verb, suffixes);
    if (!verb.ok) return verb;
    return build(verb.value);
  }

  function prepareQuery(
    operation: OperationOf<'get-quantity' | 'get-number' | 'get-state' | 'get-enum' | 'get-text' | 'wait' | 'error-query'>,
    suffixes?: NumericSuffixes
  ): Result<ScpiCommand, ArgumentError> {
    return prepareVerb(operation, suffixes, verb => formatQuery(verb, operation.argument, { bare: operation.bare }));
  }

  async function runSetup(operation: Operation, setup: ScpiCommand[]): Promise<Step<void>> {
    for (const command of setup) {
      const sent = await send(command);
      if (!sent.ok) return sent;
    }
    if (operation.settleMs > 0) {
      await delay(operation.settleMs);
    }
    return Ok(undefined);
  }

  /** Setup commands, settle delay, then the command itself */
  async function perform(operation: Operation, setup: ScpiCommand[], command: ScpiCommand): Promise<Step<void>> {
    const ready = await runSetup(operation, setup);
    if (!ready.ok) return ready;
    return send(command);
  }

  /** Setup commands, settle delay, then one query and its reply */
  async function ask(
    operation: Operation,
    setup: ScpiCommand[],
    command: ScpiCommand,
    timeoutMs?: number
  ): Promise<Step<string>> {
    const ready = await runSetup(operation, setup);
    if (!ready.ok) return ready;
    const sent = await send(command);
    if (!sent.ok) return sent;
    return receive(timeoutMs);
  }

  function replyValue(
    operation: { reply?: { field: number; suffix?: string } },
    reply: string
  ): Result<string, ParseError> {
    if (!operation.reply) return Ok(reply);
    return ScpiParser.extractField(reply, operation.reply.field, operation.reply.suffix);
  }

  // ============ Table-driven operations ============

  async function doSetQuantity(
    name: string,
    magnitude: number,
    unit: string,
    suffixes?: NumericSuffixes
  ): Promise<Step<void>> {
    const operation = lookup(name, 'set-quantity');
    if (!operation.ok) return operation;
    const op = operation.value;

    const base = toBase(magnitude, unit, op.quantity);
    if (!base.ok) return base;

    const inRange = checkRange(base.value, op.range, `${table.model} ${name}`, BASE_UNITS[op.quantity]);
    if (!inRange.ok) return inRange;

    const sendValue = op.instrumentUnit === undefined
      ? base
      : fromBase(base.value, op.quantity, op.instrumentUnit);
    if (!sendValue.ok) return sendValue;

    const setup = prepareSetup(op, suffixes);
    if (!setup.ok) return setup;
    const command = prepareVerb(op, suffixes, verb => formatSet(verb, sendValue.value, {
      decimals: op.decimals,
      separator: op.separator,
      format: table.numberFormat,
    }));
    if (!command.ok) return command;

    return perform(op, setup.value, command.value);
  }

  async function doGetQuantity(name: string, unit: string, suffixes?: NumericSuffixes): Promise<Step<number>> {
    const operation = lookup(name, 'get-quantity');
    if (!operation.ok) return operation;
    const op = operation.value;

    const validUnit = checkUnit(unit, op.quantity);
    if (!validUnit.ok) return validUnit;

    const setup = prepareSetup(op, suffixes);
    if (!setup.ok) return setup;
    const command = prepareQuery(op, suffixes);
    if (!command.ok) return command;

    const reply = await ask(op, setup.value, command.value);
    if (!reply.ok) return reply;

    const field = replyValue(op, reply.value);
    if (!field.ok) return field;
    const value = ScpiParser.parseNumber(field.value);
    if (!value.ok) return value;

    const base = toBase(value.value, op.instrumentUnit ?? BASE_UNITS[op.quantity], op.quantity);
    if (!base.ok) return base;
    return fromBase(base.value, op.quantity, unit);
  }

  async function doSetNumber(name: string, value: number, suffixes?: NumericSuffixes): Promise<Step<void>> {
    const operation = lookup(name, 'set-number');
    if (!operation.ok) return operation;
    const op = operation.value;

    if (op.integer && !Number.isInteger(value)) {
      return Err(new ArgumentError(`${table.model} ${name}: ${value} is not an integer`));
    }
    const inRange = checkRange(value, op.range, `${table.model} ${name}`);
    if (!inRange.ok) return inRange;

    const setup = prepareSetup(op, suffixes);
    if (!setup.ok) return setup;
    const command = prepareVerb(op, suffixes, verb => formatSet(verb, value, {
      decimals: op.decimals,
      separator: op.separator,
      format: table.numberFormat,
    }));
    if (!command.ok) return command;

    return perform(op, setup.value, command.value);
  }

  async function doGetNumber(name: string, suffixes?: NumericSuffixes): Promise<Step<number>> {
    const operation = lookup(name, 'get-number');
    if (!operation.ok) return operation;
    const op = operation.value;

    const setup = prepareSetup(op, suffixes);
    if (!setup.ok) return setup;
    const command = prepareQuery(op, suffixes);
    if (!command.ok) return command;

    const reply = await ask(op, setup.value, command.value);
    if (!reply.ok) return reply;
    const field = replyValue(op, reply.value);
    if (!field.ok) return field;
    return ScpiParser.parseNumber(field.value);
  }

  async function doSetOnOff(name: string, on: boolean, suffixes?: NumericSuffixes): Promise<Step<void>> {
    const operation = lookup(name, 'set-state');
    if (!operation.ok) return operation;
    const op = operation.value;

    const setup = prepareSetup(op, suffixes);
    if (!setup.ok) return setup;
    const command = prepareVerb(op, suffixes, verb => formatSet(verb, on ? op.on : op.off));
    if (!command.ok) return command;

    return perform(op, setup.value, command.value);
  }

  async function doIsOn(name: string, suffixes?: NumericSuffixes): Promise<Step<boolean>> {
    const operation = lookup(name, 'get-state');
    if (!operation.ok) return operation;
    const op = operation.value;

    const setup = prepareSetup(op, suffixes);
    if (!setup.ok) return setup;
    const command = prepareQuery(op, suffixes);
    if (!command.ok) return command;

    const reply = await ask(op, setup.value, command.value);
    if (!reply.ok) return reply;
    return ScpiParser.parseBool(reply.value);
  }

  async function doSetEnum(name: string, token: string, suffixes?: NumericSuffixes): Promise<Step<void>> {
    const operation = lookup(name, 'set-enum');
    if (!operation.ok) return operation;
    const op = operation.value;

    const setup = prepareSetup(op, suffixes);
    if (!setup.ok) return setup;
    const command = prepareVerb(op, suffixes, verb => formatEnum(verb, token, op.tokens));
    if (!command.ok) return command;

    return perform(op, setup.value, command.value);
  }

  async function doGetEnum(name: string, suffixes?: NumericSuffixes): Promise<Step<string>> {
    const operation = lookup(name, 'get-enum');
    if (!operation.ok) return operation;
    const op = operation.value;

    const setup = prepareSetup(op, suffixes);
    if (!setup.ok) return setup;
    const command = prepareQuery(op, suffixes);
    if (!command.ok) return command;

    const reply = await ask(op, setup.value, command.value);
    if (!reply.ok) return reply;
    return ScpiParser.parseEnum(reply.value, op.tokens);
  }

  async function doExecute(name: string, suffixes?: NumericSuffixes): Promise<Step<void>> {
    const operation = lookup(name, 'command');
    if (!operation.ok) return operation;
    const op = operation.value;

    const setup = prepareSetup(op, suffixes);
    if (!setup.ok) return setup;
    const command = prepareVerb(op, suffixes, formatCommand);
    if (!command.ok) return command;

    return perform(op, setup.value, command.value);
  }

  async function doGetText(name: string, suffixes?: NumericSuffixes): Promise<Step<string>> {
    const operation = lookup(name, 'get-text');
    if (!operation.ok) return operation;
    const op = operation.value;

    const setup = prepareSetup(op, suffixes);
    if (!setup.ok) return setup;
    const command = prepareQuery(op, suffixes);
    if (!command.ok) return command;

    const reply = await ask(op, setup.value, command.value);
    if (!reply.ok) return reply;
    return ScpiParser.parseIdentifier(reply.value);
  }

  async function doWait(timeoutMs?: number): Promise<Step<void>> {
    const operation = lookup('waitForCompletion', 'wait');
    if (!operation.ok) return operation;
    const op = operation.value;

    const setup = prepareSetup(op);
    if (!setup.ok) return setup;
    const command = prepareQuery(op);
    if (!command.ok) return command;

    const reply = await ask(op, setup.value, command.value, timeoutMs ?? op.timeoutMs);
    if (!reply.ok) return reply;
    return Ok(undefined);
  }

  async function doReadError(): Promise<Step<void>> {
    const operation = lookup('readError', 'error-query');
    if (!operation.ok) return operation;
    const op = operation.value;

    const setup = prepareSetup(op);
    if (!setup.ok) return setup;
    const command = prepareQuery(op);
    if (!command.ok) return command;

    const reply = await ask(op, setup.value, command.value);
    if (!reply.ok) return reply;
    return ScpiParser.parseErrorQueue(reply.value);
  }

  async function doDrainErrors(): Promise<Step<DeviceError[]>> {
    const errors: DeviceError[] = [];
    for (let i = 0; i < MAX_ERROR_READS; i++) {
      const entry = await doReadError();
      if (entry.ok) {
        return Ok(errors);
      }
      if (!(entry.error instanceof DeviceError)) {
        return entry;
      }
      errors.push(entry.error);
    }
    logger.warn(`${prefix} Error queue still not empty after ${MAX_ERROR_READS} reads`);
    return Ok(errors);
  }

  // ============ Session ============

  return {
    address,
    table,

    getState(): SessionState {
      return state;
    },

    supports(operation: string): boolean {
      return Object.prototype.hasOwnProperty.call(table.operations, operation);
    },

    async connect(): Promise<Result<void, ConnectionError | ProtocolError>> {
      if (state === 'connecting') {
        return Err(new ProtocolError('Cannot connect while a connection is in progress'));
      }
      if (state === 'busy') {
        return Err(new ProtocolError('Cannot reconnect while a reply is pending'));
      }
      if (state === 'connected') {
        return Ok(undefined);
      }

      const opening = transportFactory({
        host: address.host,
        port: address.port,
        connectTimeoutMs: cfg.connectTimeoutMs,
        ioTimeoutMs: cfg.ioTimeoutMs,
        writeTerminator: framing.writeTerminator,
        readTerminator: framing.readTerminator,
      });
      transport = opening;
      state = 'connecting';

      const opened = await opening.open();
      if (closedWhileConnecting(opening)) {
        return abandon(opening);
      }
      if (!opened.ok) {
        state = 'disconnected';
        logger.error(`${prefix} ${opened.error.message}`);
        return opened;
      }

      // Banner lines printed by console-style controllers
      for (let i = 0; i < framing.greetingLines; i++) {
        const line = await opening.receive(cfg.ioTimeoutMs);
        if (closedWhileConnecting(opening)) {
          return abandon(opening);
        }
        if (line.ok) {
          if (cfg.verbose) logger.log(`${prefix} <- ${line.value}`);
          continue;
        }
        if (line.error instanceof TimeoutError) break;
        state = 'closed';
        await opening.close();
        return Err(new ConnectionError(
          `Connection to ${address.host}:${address.port} dropped during greeting`,
          line.error
        ));
      }

      state = 'connected';
      if (cfg.verbose) {
        logger.log(`${prefix} Connected to ${address.host}:${address.port}`);
      }
      return Ok(undefined);
    },

    async close(): Promise<void> {
      const wasOpen = state === 'connecting' || state === 'connected' || state === 'busy';
      state = 'closed';
      awaiting = null;
      await transport?.close();
      if (wasOpen && cfg.verbose) {
        logger.log(`${prefix} Closed`);
      }
    },

    send,
    receive,
    query,

    setQuantity: (name, magnitude, unit, suffixes) =>
      exclusive(name, () => doSetQuantity(name, magnitude, unit, suffixes)),
    getQuantity: (name, unit, suffixes) =>
      exclusive(name, () => doGetQuantity(name, unit, suffixes)),
    setNumber: (name, value, suffixes) =>
      exclusive(name, () => doSetNumber(name, value, suffixes)),
    getNumber: (name, suffixes) =>
      exclusive(name, () => doGetNumber(name, suffixes)),
    setOnOff: (name, on, suffixes) =>
      exclusive(name, () => doSetOnOff(name, on, suffixes)),
    isOn: (name, suffixes) =>
      exclusive(name, () => doIsOn(name, suffixes)),
    setEnum: (name, token, suffixes) =>
      exclusive(name, () => doSetEnum(name, token, suffixes)),
    getEnum: (name, suffixes) =>
      exclusive(name, () => doGetEnum(name, suffixes)),
    execute: (name, suffixes) =>
      exclusive(name, () => doExecute(name, suffixes)),
    getText: (name, suffixes) =>
      exclusive(name, () => doGetText(name, suffixes)),

    reset: () => exclusive('reset', () => doExecute('reset')),
    clearStatus: () => exclusive('clearStatus', () => doExecute('clearStatus')),
    getId: () => exclusive('identify', () => doGetText('identify')),

    identify: () => exclusive('identify', async (): Promise<Step<Identity>> => {
      const id = await doGetText('identify');
      if (!id.ok) return id;
      return ScpiParser.parseIdentity(id.value);
    }),

    waitForCompletion: (timeoutMs) => exclusive('waitForCompletion', () => doWait(timeoutMs)),
    readError: () => exclusive('readError', doReadError),
    drainErrors: () => exclusive('drainErrors', doDrainErrors),
  };
}
