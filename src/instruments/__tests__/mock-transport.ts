import type { InstrumentSession, Transport, TransportConfig } from '../types.js';
import { createInstrumentSession, type SessionOptions } from '../session.js';
import { getBuiltinRegistry } from '../registry.js';
import type { Result } from '../../../shared/types.js';
import { Ok, Err } from '../../../shared/types.js';
import { ConnectionError, TimeoutError, TransportError } from '../errors.js';

export interface MockTransportOptions {
  /** Reply for each exact command text; an array is replied in turn, repeating its last entry */
  responses?: Record<string, string | string[]>;
  /** Lines delivered right after open(), like a console banner */
  greeting?: string[];
  /** Make open() fail */
  refuseConnection?: boolean;
}

export interface MockTransport extends Transport {
  sentCommands: string[];
  responses: Record<string, string | string[]>;
  /** Config the session built the transport with */
  config: TransportConfig | null;
  /** A line arriving that nobody asked for (a late reply) */
  injectLine(line: string): void;
  /** Next send() fails as if the write errored */
  failNextSend(): void;
  /** Peer closes the connection */
  drop(): void;
  reset(): void;
}

export function createMockTransport(options: MockTransportOptions = {}): MockTransport {
  const responses: Record<string, string | string[]> = { ...options.responses };
  const sentCommands: string[] = [];
  const incoming: string[] = [];
  let opened = false;
  let dropped = false;
  let sendFailure = false;

  // Track written values to update query responses
  // "FREQ 5000000000" updates the "FREQ?" response if one is configured
  function handleWrite(cmd: string): void {
    const match = cmd.trim().match(/^(\S+)\s+(\S+)$/);
    if (match) {
      const [, header, value] = match;
      if (typeof responses[`${header}?`] === 'string') {
        responses[`${header}?`] = value;
      }
    }
  }

  const mock: MockTransport = {
    sentCommands,
    responses,
    config: null,

    async open(): Promise<Result<void, ConnectionError>> {
      if (options.refuseConnection) {
        return Err(new ConnectionError('Cannot connect to mock: ECONNREFUSED'));
      }
      opened = true;
      dropped = false;
      incoming.push(...(options.greeting ?? []));
      return Ok(undefined);
    },

    async close(): Promise<void> {
      opened = false;
    },

    async send(line: string): Promise<Result<void, TransportError>> {
      if (!opened) {
        return Err(new TransportError('Not connected to mock'));
      }
      if (sendFailure) {
        sendFailure = false;
        opened = false;
        return Err(new TransportError('Write to mock failed: EPIPE'));
      }
      sentCommands.push(line);
      if (Object.prototype.hasOwnProperty.call(responses, line)) {
        const response = responses[line];
        if (typeof response === 'string') {
          incoming.push(response);
        } else {
          const next = response.length > 1 ? response.shift() : response[0];
          if (next !== undefined) incoming.push(next);
        }
      } else {
        handleWrite(line);
      }
      return Ok(undefined);
    },

    async receive(timeoutMs = 1000): Promise<Result<string, TimeoutError | TransportError>> {
      const line = incoming.shift();
      if (line !== undefined) {
        return Ok(line);
      }
      if (dropped || !opened) {
        return Err(new TransportError('Connection closed by mock'));
      }
      return Err(new TimeoutError(`No reply from mock within ${timeoutMs} ms`, timeoutMs));
    },

    discardPending(): string[] {
      return incoming.splice(0, incoming.length);
    },

    isOpen(): boolean {
      return opened;
    },

    injectLine(line: string): void {
      incoming.push(line);
    },

    failNextSend(): void {
      sendFailure = true;
    },

    drop(): void {
      dropped = true;
      opened = false;
    },

    reset(): void {
      sentCommands.length = 0;
      incoming.length = 0;
    },
  };

  return mock;
}

/** Transport factory for sessions that hands out `transport` and records its config */
export function mockFactory(transport: MockTransport): (config: TransportConfig) => Transport {
  return (config: TransportConfig) => {
    transport.config = config;
    return transport;
  };
}

/**
 * Connected session for a bundled model over `transport`.
 * Throws if the model is unknown or the mock refuses the connection.
 */
export async function openMockSession(
  model: string,
  transport: MockTransport,
  options: SessionOptions = {}
): Promise<InstrumentSession> {
  const registry = getBuiltinRegistry();
  if (!registry.ok) throw registry.error;
  const table = registry.value.get(model);
  if (!table.ok) throw table.error;

  const session = createInstrumentSession({ host: '10.0.0.5', port: table.value.framing.port }, table.value, {
    transportFactory: mockFactory(transport),
    logger: { log: () => undefined, warn: () => undefined, error: () => undefined },
    ...options,
  });
  const connected = await session.connect();
  if (!connected.ok) throw connected.error;
  return session;
}
