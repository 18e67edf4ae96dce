/**
 * Error Types
 *
 * Every failure surfaced by the transport layer is a CmClientError with a
 * `kind` discriminant, so callers can switch on the category without
 * instanceof chains.
 *
 * @module errors
 */

export type CmClientErrorKind =
  | 'proxy-config'
  | 'client-build'
  | 'cm-list'
  | 'no-server'
  | 'connection'
  | 'channel-closed'
  | 'decode'
  | 'timeout'
  | 'transport-closed';

/**
 * Base class for all errors thrown by this package
 */
export abstract class CmClientError extends Error {
  abstract readonly kind: CmClientErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// =============================================================================
// Proxy configuration
// =============================================================================

export type ProxyConfigErrorReason =
  | 'url'
  | 'unsupported-scheme'
  | 'missing-host'
  | 'invalid-username'
  | 'invalid-password'
  | 'partial-credentials';

export class ProxyConfigError extends CmClientError {
  readonly kind = 'proxy-config';

  constructor(
    readonly reason: ProxyConfigErrorReason,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * The HTTP client (or its proxy agent) could not be constructed
 */
export class HttpClientBuildError extends CmClientError {
  readonly kind = 'client-build';
}

// =============================================================================
// Server selection
// =============================================================================

export type CmListErrorReason = 'http' | 'directory';

export class CmListError extends CmClientError {
  readonly kind = 'cm-list';

  constructor(
    readonly reason: CmListErrorReason,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class NoCmServerError extends CmClientError {
  readonly kind = 'no-server';

  constructor() {
    super('No CM server available');
  }
}

// =============================================================================
// Connection
// =============================================================================

export type ConnectionErrorReason =
  | 'url'
  | 'no-host'
  | 'request'
  | 'tcp'
  | 'proxy-tunnel'
  | 'tls'
  | 'handshake';

const RETRYABLE_REASONS: ReadonlySet<ConnectionErrorReason> = new Set<ConnectionErrorReason>([
  'tcp',
  'proxy-tunnel',
  'tls',
  'handshake',
]);

export class ConnectionError extends CmClientError {
  readonly kind = 'connection';

  constructor(
    readonly reason: ConnectionErrorReason,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }

  /** Whether picking another endpoint could succeed where this one failed */
  get retryable(): boolean {
    return RETRYABLE_REASONS.has(this.reason);
  }
}

// =============================================================================
// Correlation
// =============================================================================

export class ChannelClosedError extends CmClientError {
  readonly kind = 'channel-closed';

  constructor(message = 'Response channel closed without a value') {
    super(message);
  }
}

export class ResponseDecodeError extends CmClientError {
  readonly kind = 'decode';
}

export class ResponseTimeoutError extends CmClientError {
  readonly kind = 'timeout';

  constructor(
    readonly requestName: string,
    readonly timeoutMs: number
  ) {
    super(`Timed out after ${timeoutMs}ms waiting for response to ${requestName}`);
  }
}

export class TransportClosedError extends CmClientError {
  readonly kind = 'transport-closed';

  constructor(half: 'reader' | 'writer' | 'transport') {
    super(`The ${half} has been closed`);
  }
}

/**
 * Extract a printable message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
