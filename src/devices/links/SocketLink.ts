/**
 * SCPI over a raw TCP socket.
 *
 * Commands are newline-terminated; a query waits for one newline-terminated
 * response line. One command is on the wire at a time. A query that times
 * out closes the link, and the owner reconnects through discovery.
 */

import { Socket, connect } from 'node:net';
import { LinkError } from '../../core/errors.js';
import type { InstrumentLink } from '../types.js';
import { parseSocketResource } from './resource.js';

export interface SocketLinkOptions {
  /** Connect and per-query timeout (default: 2000) */
  timeoutMs?: number;
}

type PendingRead = {
  resolve: (line: string) => void;
  reject: (err: Error) => void;
  timer: NodeJS.Timeout;
};

export class SocketLink implements InstrumentLink {
  readonly resource: string;
  private readonly socket: Socket;
  private readonly timeoutMs: number;
  private buffer = '';
  private pending: PendingRead | null = null;
  private queue: Promise<unknown> = Promise.resolve();
  private closedReason: string | null = null;

  private constructor(resource: string, socket: Socket, timeoutMs: number) {
    this.resource = resource;
    this.socket = socket;
    this.timeoutMs = timeoutMs;

    socket.setEncoding('utf-8');
    socket.on('data', (chunk: string) => this.onData(chunk));
    socket.on('error', (err) => this.fail(err.message));
    socket.on('close', () => this.fail('connection closed'));
  }

  static async open(resource: string, options: SocketLinkOptions = {}): Promise<SocketLink> {
    const target = parseSocketResource(resource);
    if (!target) {
      throw new LinkError(resource, 'not a TCPIP socket resource');
    }
    const timeoutMs = options.timeoutMs ?? 2_000;

    const socket = await new Promise<Socket>((resolve, reject) => {
      const candidate = connect({ host: target.host, port: target.port });
      const timer = setTimeout(() => {
        candidate.destroy();
        reject(new LinkError(resource, `connect timed out after ${timeoutMs}ms`));
      }, timeoutMs);
      candidate.once('connect', () => {
        clearTimeout(timer);
        candidate.removeAllListeners('error');
        resolve(candidate);
      });
      candidate.once('error', (err) => {
        clearTimeout(timer);
        reject(new LinkError(resource, err.message));
      });
    });

    return new SocketLink(resource, socket, timeoutMs);
  }

  query(command: string): Promise<string> {
    return this.enqueue(async () => {
      this.send(command);
      return this.nextLine(command);
    });
  }

  write(command: string): Promise<void> {
    return this.enqueue(async () => {
      this.send(command);
    });
  }

  async close(): Promise<void> {
    if (this.closedReason !== null) return;
    this.closedReason = 'closed by client';
    await new Promise<void>((resolve) => {
      this.socket.end(() => resolve());
    });
    this.socket.destroy();
  }

  private enqueue<T>(operation: () => Promise<T>): Promise<T> {
    const result = this.queue.then(operation);
    // Keep the chain alive after a failed command.
    this.queue = result.catch(() => undefined);
    return result;
  }

  private send(command: string): void {
    if (this.closedReason !== null) {
      throw new LinkError(this.resource, this.closedReason);
    }
    this.socket.write(`${command}\n`);
  }

  private nextLine(command: string): Promise<string> {
    if (this.closedReason !== null) {
      return Promise.reject(new LinkError(this.resource, this.closedReason));
    }
    return new Promise<string>((resolve, reject) => {
      const timer = setTimeout(() => {
        // Replies can no longer be matched to queries once one is missed.
        this.fail(`no response to '${command}' within ${this.timeoutMs}ms`);
        this.socket.destroy();
      }, this.timeoutMs);
      this.pending = { resolve, reject, timer };
      this.drain();
    });
  }

  private onData(chunk: string): void {
    this.buffer += chunk;
    this.drain();
  }

  private drain(): void {
    if (!this.pending) return;
    const newline = this.buffer.indexOf('\n');
    if (newline < 0) return;
    const line = this.buffer.slice(0, newline).replace(/\r$/, '');
    this.buffer = this.buffer.slice(newline + 1);
    const { resolve, timer } = this.pending;
    clearTimeout(timer);
    this.pending = null;
    resolve(line);
  }

  private fail(reason: string): void {
    if (this.closedReason === null) {
      this.closedReason = reason;
    }
    if (this.pending) {
      const { reject, timer } = this.pending;
      clearTimeout(timer);
      this.pending = null;
      reject(new LinkError(this.resource, reason));
    }
  }
}
