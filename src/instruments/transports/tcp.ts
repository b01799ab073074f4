/**
 * TCP Transport
 * Implements raw-socket SCPI communication (port 5025, or Telnet-style
 * consoles on port 23) for LAN instruments
 */

import { Socket } from 'net';
import { ReadlineParser } from '@serialport/parser-readline';
import type { Transport, TransportConfig } from '../types.js';
import type { Result } from '../../../shared/types.js';
import { Ok, Err } from '../../../shared/types.js';
import { ConnectionError, TimeoutError, TransportError } from '../errors.js';

type ReceiveResult = Result<string, TimeoutError | TransportError>;

export function createTcpTransport(config: TransportConfig): Transport {
  const { host, port, connectTimeoutMs, ioTimeoutMs, writeTerminator, readTerminator } = config;
  const endpoint = `${host}:${port}`;

  let socket: Socket | null = null;
  let parser: ReadlineParser | null = null;
  let opened = false;
  let dropError: TransportError | null = null;

  // Lines that arrived while nobody was waiting
  const pending: string[] = [];
  let waiter: ((result: ReceiveResult) => void) | null = null;

  function settleWaiter(result: ReceiveResult): void {
    const resolve = waiter;
    waiter = null;
    resolve?.(result);
  }

  function onLine(line: string): void {
    // A '\n' reader leaves the '\r' of "\r\n" replies behind
    const text = line.endsWith('\r') ? line.slice(0, -1) : line;
    if (waiter) {
      settleWaiter(Ok(text));
    } else {
      pending.push(text);
    }
  }

  function teardown(error: TransportError): void {
    opened = false;
    dropError = error;
    parser?.removeAllListeners();
    socket?.removeAllListeners();
    // Keep a no-op error listener so a late socket error cannot crash the process
    socket?.on('error', () => undefined);
    socket?.destroy();
    socket = null;
    parser = null;
    settleWaiter(Err(error));
  }

  return {
    async open(): Promise<Result<void, ConnectionError>> {
      if (opened) return Ok(undefined);

      const sock = new Socket();
      sock.setNoDelay(true);

      const connected = await new Promise<Result<void, ConnectionError>>((resolve) => {
        let settled = false;

        const finish = (result: Result<void, ConnectionError>) => {
          if (settled) return;
          settled = true;
          clearTimeout(timer);
          sock.removeListener('connect', onConnect);
          sock.removeListener('error', onError);
          resolve(result);
        };

        const onConnect = () => finish(Ok(undefined));
        const onError = (err: Error) => {
          finish(Err(new ConnectionError(`Cannot connect to ${endpoint}: ${err.message}`, err)));
        };

        const timer = setTimeout(() => {
          finish(Err(new ConnectionError(`Timed out after ${connectTimeoutMs} ms connecting to ${endpoint}`)));
        }, connectTimeoutMs);

        sock.once('connect', onConnect);
        sock.once('error', onError);
        sock.connect(port, host);
      });

      if (!connected.ok) {
        sock.on('error', () => undefined);
        sock.destroy();
        return connected;
      }

      // end: false so a half-received line is not flushed as a reply when the peer hangs up
      const lineParser = new ReadlineParser({ delimiter: readTerminator, encoding: 'ascii' });
      sock.pipe(lineParser, { end: false });
      lineParser.on('data', onLine);

      sock.on('error', (err) => {
        teardown(new TransportError(`Connection to ${endpoint} failed: ${err.message}`, err));
      });
      sock.on('close', () => {
        if (opened) {
          teardown(new TransportError(`Connection closed by ${endpoint}`));
        }
      });

      socket = sock;
      parser = lineParser;
      pending.length = 0;
      dropError = null;
      opened = true;
      return Ok(undefined);
    },

    async close(): Promise<void> {
      if (!socket) return;
      teardown(new TransportError(`Connection to ${endpoint} closed`));
    },

    async send(line: string): Promise<Result<void, TransportError>> {
      const sock = socket;
      if (!opened || !sock) {
        return Err(dropError ?? new TransportError(`Not connected to ${endpoint}`));
      }

      return new Promise((resolve) => {
        sock.write(line + writeTerminator, 'ascii', (err) => {
          if (err) {
            resolve(Err(new TransportError(`Write to ${endpoint} failed: ${err.message}`, err)));
          } else {
            resolve(Ok(undefined));
          }
        });
      });
    },

    async receive(timeoutMs = ioTimeoutMs): Promise<ReceiveResult> {
      const buffered = pending.shift();
      if (buffered !== undefined) {
        return Ok(buffered);
      }
      if (!opened) {
        return Err(dropError ?? new TransportError(`Not connected to ${endpoint}`));
      }
      if (waiter) {
        return Err(new TransportError(`A receive from ${endpoint} is already pending`));
      }

      return new Promise<ReceiveResult>((resolve) => {
        const timer = setTimeout(() => {
          if (waiter === onResult) {
            waiter = null;
            resolve(Err(new TimeoutError(`No reply from ${endpoint} within ${timeoutMs} ms`, timeoutMs)));
          }
        }, timeoutMs);

        const onResult = (result: ReceiveResult) => {
          clearTimeout(timer);
          resolve(result);
        };
        waiter = onResult;
      });
    },

    discardPending(): string[] {
      return pending.splice(0, pending.length);
    },

    isOpen(): boolean {
      return opened;
    },
  };
}
