/**
 * Simulated Instrument Server
 * Serves a simulator over a real TCP socket on 127.0.0.1
 *
 * Lines are routed to the simulator's handleCommand(); a non-null return is
 * written back as one reply line. Commands are handled in arrival order and
 * only the reply is delayed, so state changes never reorder.
 */

import { createServer, type Server, type Socket } from 'net';
import { ReadlineParser } from '@serialport/parser-readline';
import type { Address } from '../../../shared/types.js';
import type { Logger } from '../../config.js';

export interface CommandHandler {
  handleCommand(cmd: string): string | null;
}

export interface InstrumentServerConfig {
  /** Reply latency in ms (default: 0) */
  latencyMs?: number;
  /** Lines written to each client on connect, e.g. a console banner */
  greeting?: string[];
  /** Terminator appended to replies (default: '\n') */
  replyTerminator?: string;
  /** Accept and record commands but never reply */
  silent?: boolean;
  /** Name for logging */
  name?: string;
  logger?: Logger;
}

export interface InstrumentServer {
  /** Listen on an ephemeral port; resolves with the address to connect to */
  start(): Promise<Address>;
  stop(): Promise<void>;
  /** Every line received so far, without terminators */
  readonly received: string[];
  setSilent(silent: boolean): void;
  /** Drop all client connections (simulates a network failure) */
  dropConnections(): void;
  /** Write an unsolicited line to every client */
  broadcast(line: string): void;
}

export function createInstrumentServer(
  handler: CommandHandler,
  config: InstrumentServerConfig = {}
): InstrumentServer {
  const {
    latencyMs = 0,
    greeting = [],
    replyTerminator = '\n',
    name = 'simulator',
    logger = console,
  } = config;

  let silent = config.silent ?? false;
  let server: Server | null = null;
  const clients = new Set<Socket>();
  const received: string[] = [];

  function reply(socket: Socket, line: string): void {
    const write = () => {
      if (!socket.destroyed) socket.write(line + replyTerminator);
    };
    if (latencyMs > 0) {
      setTimeout(write, latencyMs);
    } else {
      write();
    }
  }

  function onConnection(socket: Socket): void {
    clients.add(socket);
    socket.on('error', (err) => {
      logger.warn(`[${name}] Client error: ${err.message}`);
    });
    socket.on('close', () => clients.delete(socket));

    for (const line of greeting) {
      socket.write(line + replyTerminator);
    }

    const parser = socket.pipe(new ReadlineParser({ delimiter: '\n', encoding: 'ascii' }));
    parser.on('data', (data: string) => {
      const line = data.endsWith('\r') ? data.slice(0, -1) : data;
      received.push(line);
      if (silent) return;
      const response = handler.handleCommand(line);
      if (response !== null) {
        reply(socket, response);
      }
    });
  }

  return {
    received,

    start(): Promise<Address> {
      return new Promise((resolve, reject) => {
        const srv = createServer(onConnection);
        srv.once('error', reject);
        srv.listen(0, '127.0.0.1', () => {
          srv.removeListener('error', reject);
          server = srv;
          const info = srv.address();
          if (info === null || typeof info === 'string') {
            reject(new Error(`[${name}] Server is not listening on a TCP port`));
            return;
          }
          resolve({ host: info.address, port: info.port });
        });
      });
    },

    async stop(): Promise<void> {
      for (const socket of clients) {
        socket.destroy();
      }
      clients.clear();
      const srv = server;
      server = null;
      if (!srv) return;
      await new Promise<void>((resolve) => srv.close(() => resolve()));
    },

    setSilent(value: boolean): void {
      silent = value;
    },

    dropConnections(): void {
      for (const socket of clients) {
        socket.destroy();
      }
      clients.clear();
    },

    broadcast(line: string): void {
      for (const socket of clients) {
        socket.write(line + replyTerminator);
      }
    },
  };
}
