/**
 * CM Transport
 *
 * An established WebSocket split into a reader and a writer. Each half is
 * owned separately: a reader task can drain frames while any number of
 * callers write. Releasing a half makes every further use of it throw; the
 * socket closes once both halves are released.
 *
 * @module transport/transport
 */

import WebSocket, { type RawData } from 'ws';
import { TransportClosedError } from '../errors.js';
import { createLogger } from '../logger/index.js';

const log = createLogger('transport');

/** WebSocket close code for a normal closure */
const NORMAL_CLOSURE = 1000;

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

/**
 * Shared socket and half-release bookkeeping
 */
export class TransportLink {
  private openHalves = 2;

  constructor(
    readonly socket: WebSocket,
    readonly endpoint: string
  ) {}

  get isOpen(): boolean {
    return this.socket.readyState === WebSocket.OPEN;
  }

  releaseHalf(): void {
    this.openHalves--;
    if (this.openHalves === 0 && this.socket.readyState !== WebSocket.CLOSED) {
      log.debug(`Closing connection to ${this.endpoint}`);
      this.socket.close(NORMAL_CLOSURE);
    }
  }
}

interface PendingRead {
  resolve(frame: Buffer | null): void;
  reject(error: Error): void;
}

export class TransportReader implements AsyncIterable<Buffer> {
  private readonly frames: Buffer[] = [];
  private readonly waiting: PendingRead[] = [];
  private ended = false;
  private failure: Error | null = null;
  private released = false;

  constructor(private readonly link: TransportLink) {
    const { socket } = link;

    socket.on('message', (data: RawData) => {
      if (this.released) return;
      const frame = toBuffer(data);
      const waiter = this.waiting.shift();
      if (waiter) {
        waiter.resolve(frame);
      } else {
        this.frames.push(frame);
      }
    });

    socket.on('error', (err: Error) => {
      log.warn(`Connection error from ${link.endpoint}: ${err.message}`);
      this.failure = err;
      for (const waiter of this.waiting.splice(0)) {
        waiter.reject(err);
      }
    });

    socket.on('close', (code: number) => {
      log.debug(`Connection to ${link.endpoint} closed with code ${code}`);
      this.ended = true;
      for (const waiter of this.waiting.splice(0)) {
        waiter.resolve(null);
      }
    });
  }

  /**
   * Next inbound frame, or null once the connection has closed and every
   * buffered frame was read
   */
  next(): Promise<Buffer | null> {
    if (this.released) {
      return Promise.reject(new TransportClosedError('reader'));
    }

    const frame = this.frames.shift();
    if (frame) {
      return Promise.resolve(frame);
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (this.ended) {
      return Promise.resolve(null);
    }

    return new Promise((resolve, reject) => {
      this.waiting.push({ resolve, reject });
    });
  }

  async *[Symbol.asyncIterator](): AsyncIterator<Buffer> {
    for (;;) {
      const frame = await this.next();
      if (frame === null) return;
      yield frame;
    }
  }

  get isReleased(): boolean {
    return this.released;
  }

  /** Frames received but not yet read */
  get bufferedCount(): number {
    return this.frames.length;
  }

  /** Drop the read half. Pending reads resolve with null; later frames are discarded. */
  release(): void {
    if (this.released) return;
    this.released = true;
    this.frames.length = 0;
    for (const waiter of this.waiting.splice(0)) {
      waiter.resolve(null);
    }
    this.link.releaseHalf();
  }
}

export class TransportWriter {
  private released = false;

  constructor(private readonly link: TransportLink) {}

  /**
   * Send one binary frame
   *
   * @throws TransportClosedError when the writer was released or the socket
   *   is no longer open
   */
  send(frame: Uint8Array): Promise<void> {
    if (this.released) {
      return Promise.reject(new TransportClosedError('writer'));
    }
    if (!this.link.isOpen) {
      return Promise.reject(new TransportClosedError('transport'));
    }

    return new Promise((resolve, reject) => {
      this.link.socket.send(frame, { binary: true }, (err) => {
        if (err) {
          reject(err);
        } else {
          resolve();
        }
      });
    });
  }

  get isReleased(): boolean {
    return this.released;
  }

  /** Drop the write half */
  release(): void {
    if (this.released) return;
    this.released = true;
    this.link.releaseHalf();
  }
}

export class CmTransport {
  readonly reader: TransportReader;
  readonly writer: TransportWriter;

  constructor(socket: WebSocket, readonly endpoint: string) {
    const link = new TransportLink(socket, endpoint);
    this.reader = new TransportReader(link);
    this.writer = new TransportWriter(link);
  }

  /** Release both halves, closing the socket */
  close(): void {
    this.reader.release();
    this.writer.release();
  }
}
