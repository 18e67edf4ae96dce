/**
 * Response Correlation
 *
 * Each outgoing request gets a single-use completion slot keyed by its job
 * id. The reader side fills the slot; the caller waits on it with a deadline.
 * The first settlement wins: a reply that arrives after the caller gave up is
 * discarded.
 *
 * @module transport/response
 */

import { getConfig } from '../config/index.js';
import {
  ChannelClosedError,
  CmClientError,
  ResponseDecodeError,
  ResponseTimeoutError,
  errorMessage,
} from '../errors.js';
import { createLogger } from '../logger/index.js';

const log = createLogger('response');

export type JobId = number;

/**
 * A decoded frame addressed to one pending request. The payload stays in its
 * wire form; the request that asked for it knows how to read it.
 */
export interface ApiResponseBody {
  jobId: JobId;
  /** Message kind as named by the codec */
  kind: string;
  payload: Uint8Array;
}

/**
 * A request kind that can decode its own response
 */
export interface ApiRequest<R> {
  /** Request kind, used in diagnostics */
  readonly name: string;
  /** @throws when the body is not a valid response to this request */
  decodeResponse(body: ApiResponseBody): R;
}

type Settlement<T> = { ok: true; value: T } | { ok: false; error: Error };

// =============================================================================
// One-shot channel
// =============================================================================

interface Slot<T> {
  open: boolean;
  settle(result: Settlement<T>): void;
}

export class OneshotSender<T> {
  constructor(private readonly slot: Slot<T>) {}

  /** @returns false when the slot was already settled or dropped */
  send(value: T): boolean {
    return this.settle({ ok: true, value });
  }

  /** @returns false when the slot was already settled or dropped */
  fail(error: Error): boolean {
    return this.settle({ ok: false, error });
  }

  /** Close without a value; the receiver sees ChannelClosedError */
  close(): boolean {
    return this.settle({ ok: false, error: new ChannelClosedError() });
  }

  get isOpen(): boolean {
    return this.slot.open;
  }

  private settle(result: Settlement<T>): boolean {
    if (!this.slot.open) return false;
    this.slot.open = false;
    this.slot.settle(result);
    return true;
  }
}

export class OneshotReceiver<T> {
  constructor(
    private readonly slot: Slot<T>,
    private readonly outcome: Promise<Settlement<T>>,
    private readonly onDrop: () => void
  ) {}

  /** Settlement without throwing; used to race against a deadline */
  settled(): Promise<Settlement<T>> {
    return this.outcome;
  }

  async recv(): Promise<T> {
    const result = await this.outcome;
    if (!result.ok) throw result.error;
    return result.value;
  }

  /** Stop waiting. A later send on the paired sender returns false. */
  drop(): void {
    if (!this.slot.open) return;
    this.slot.open = false;
    this.slot.settle({ ok: false, error: new ChannelClosedError('Receiver dropped') });
    this.onDrop();
  }
}

/**
 * Create a single-use channel
 *
 * @param onDrop - Called when the receiver is dropped before any settlement
 */
export function createOneshot<T>(onDrop: () => void = () => {}): [OneshotSender<T>, OneshotReceiver<T>] {
  let settle: (result: Settlement<T>) => void = () => {};
  const outcome = new Promise<Settlement<T>>((resolve) => {
    settle = resolve;
  });
  const slot: Slot<T> = { open: true, settle: (result) => settle(result) };

  return [new OneshotSender(slot), new OneshotReceiver(slot, outcome, onDrop)];
}

// =============================================================================
// Pending request table
// =============================================================================

export class PendingRequests {
  private readonly slots = new Map<JobId, OneshotSender<ApiResponseBody>>();

  get size(): number {
    return this.slots.size;
  }

  has(jobId: JobId): boolean {
    return this.slots.has(jobId);
  }

  /**
   * Create the completion slot for `jobId`
   *
   * @throws Error when a request with this job id is still pending
   */
  register(jobId: JobId): OneshotReceiver<ApiResponseBody> {
    if (this.slots.has(jobId)) {
      throw new Error(`Job ${jobId} is already pending`);
    }

    const [sender, receiver] = createOneshot<ApiResponseBody>(() => {
      if (this.slots.get(jobId) === sender) {
        this.slots.delete(jobId);
      }
    });
    this.slots.set(jobId, sender);
    return receiver;
  }

  /**
   * Hand a decoded frame to the request waiting for it
   *
   * @returns false when nobody is waiting for `body.jobId`
   */
  complete(body: ApiResponseBody): boolean {
    const sender = this.take(body.jobId);
    return sender ? sender.send(body) : false;
  }

  fail(jobId: JobId, error: Error): boolean {
    const sender = this.take(jobId);
    return sender ? sender.fail(error) : false;
  }

  /**
   * Settle every pending slot, with `error` or as closed without a value
   */
  closeAll(error?: Error): void {
    const senders = [...this.slots.values()];
    this.slots.clear();
    for (const sender of senders) {
      if (error) {
        sender.fail(error);
      } else {
        sender.close();
      }
    }
  }

  private take(jobId: JobId): OneshotSender<ApiResponseBody> | undefined {
    const sender = this.slots.get(jobId);
    this.slots.delete(jobId);
    return sender;
  }
}

// =============================================================================
// Bounded wait
// =============================================================================

const TIMED_OUT = Symbol('timed-out');

/**
 * Wait for the reply to `request`, decoding it on arrival
 *
 * @param receiver - Slot returned by PendingRequests.register
 * @param request - Request kind that decodes the reply
 * @param timeoutMs - Deadline, 5 seconds unless configured otherwise
 * @throws ResponseTimeoutError when the deadline passes first;
 *   ResponseDecodeError when the reply does not decode; the slot's own error
 *   when it was failed or closed
 */
export async function waitForResponse<R>(
  receiver: OneshotReceiver<ApiResponseBody>,
  request: ApiRequest<R>,
  timeoutMs: number = getConfig().responseTimeoutMs
): Promise<R> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<typeof TIMED_OUT>((resolve) => {
    timer = setTimeout(() => resolve(TIMED_OUT), timeoutMs);
  });

  let outcome: Settlement<ApiResponseBody> | typeof TIMED_OUT;
  try {
    outcome = await Promise.race([receiver.settled(), deadline]);
  } finally {
    clearTimeout(timer);
  }

  if (outcome === TIMED_OUT) {
    receiver.drop();
    log.debug(`Timed out waiting for response from ${request.name}`);
    throw new ResponseTimeoutError(request.name, timeoutMs);
  }

  if (!outcome.ok) {
    throw outcome.error;
  }

  try {
    return request.decodeResponse(outcome.value);
  } catch (err) {
    if (err instanceof CmClientError) throw err;
    throw new ResponseDecodeError(
      `Failed to decode ${outcome.value.kind} as response to ${request.name}: ${errorMessage(err)}`,
      { cause: err }
    );
  }
}
