/**
 * CM Session
 *
 * Drives one transport: allocates job ids, writes requests on the write half
 * and runs a reader task that routes every inbound frame to the request
 * waiting for it.
 *
 * @module client/session
 */

import { getConfig } from '../config/index.js';
import { errorMessage } from '../errors.js';
import { createLogger } from '../logger/index.js';
import {
  PendingRequests,
  waitForResponse,
  type ApiRequest,
  type JobId,
} from '../transport/response.js';
import type { CmTransport } from '../transport/transport.js';

const log = createLogger('session');

/** One application message as seen by the codec */
export interface Frame {
  /** Null for messages that answer no request */
  jobId: JobId | null;
  kind: string;
  payload: Uint8Array;
}

/**
 * Application message codec. The wire schema lives outside this package.
 */
export interface FrameCodec {
  encode(frame: Frame): Uint8Array;
  /** @throws when the data is not a valid frame */
  decode(data: Buffer): Frame;
}

export interface CmRequest<R> extends ApiRequest<R> {
  /** Request body in wire form */
  encodeBody(): Uint8Array;
}

export interface CmSessionOptions {
  responseTimeoutMs?: number;
  /** Frames that carry no job id. A throwing handler is logged and skipped. */
  onUnsolicited?: (frame: Frame) => void;
}

export class CmSession {
  private readonly pending = new PendingRequests();
  private readonly responseTimeoutMs: number;
  private readonly onUnsolicited: ((frame: Frame) => void) | undefined;
  private readonly reading: Promise<void>;
  private nextJobId: JobId = 1;
  private closing = false;

  constructor(
    private readonly transport: CmTransport,
    private readonly codec: FrameCodec,
    options: CmSessionOptions = {}
  ) {
    this.responseTimeoutMs = options.responseTimeoutMs ?? getConfig().responseTimeoutMs;
    this.onUnsolicited = options.onUnsolicited;
    this.reading = this.readLoop();
  }

  /** Requests still waiting for a reply */
  get pendingCount(): number {
    return this.pending.size;
  }

  /** Resolves once the reader task has stopped */
  closed(): Promise<void> {
    return this.reading;
  }

  /**
   * Send `request` and wait for its reply
   */
  async send<R>(request: CmRequest<R>): Promise<R> {
    const jobId = this.nextJobId++;
    const receiver = this.pending.register(jobId);

    try {
      await this.transport.writer.send(
        this.codec.encode({ jobId, kind: request.name, payload: request.encodeBody() })
      );
    } catch (err) {
      receiver.drop();
      throw err;
    }

    return waitForResponse(receiver, request, this.responseTimeoutMs);
  }

  /** Release both transport halves; pending requests fail as closed */
  close(): void {
    this.closing = true;
    this.transport.close();
  }

  private async readLoop(): Promise<void> {
    let failure: Error | undefined;

    try {
      for await (const data of this.transport.reader) {
        this.dispatch(data);
      }
    } catch (err) {
      if (!this.closing) {
        failure = err instanceof Error ? err : new Error(String(err));
        log.warn(`Reader for ${this.transport.endpoint} stopped: ${failure.message}`);
      }
    } finally {
      this.pending.closeAll(failure);
    }
  }

  private dispatch(data: Buffer): void {
    let frame: Frame;
    try {
      frame = this.codec.decode(data);
    } catch (err) {
      log.warn(`Dropping undecodable frame (${data.length} bytes): ${errorMessage(err)}`);
      return;
    }

    if (frame.jobId !== null) {
      if (!this.pending.complete({ jobId: frame.jobId, kind: frame.kind, payload: frame.payload })) {
        // The request already timed out or was dropped; its slot stays empty
        log.debug(
          frame.jobId < this.nextJobId
            ? `Discarding late ${frame.kind} reply for job ${frame.jobId}`
            : `Discarding ${frame.kind} reply for unknown job ${frame.jobId}`
        );
      }
      return;
    }

    if (!this.onUnsolicited) {
      log.debug(`Ignoring unsolicited ${frame.kind} frame`);
      return;
    }

    try {
      this.onUnsolicited(frame);
    } catch (err) {
      log.warn(`Unsolicited ${frame.kind} handler failed: ${errorMessage(err)}`);
    }
  }
}
