/**
 * WebSocket Upgrade Request
 *
 * Builds the CM URL and the headers of the HTTP upgrade that turns the TLS
 * stream into a WebSocket (RFC 6455 section 4.1).
 *
 * @module transport/handshake
 */

import { randomBytes as cryptoRandomBytes } from 'node:crypto';
import { validateHeaderName, validateHeaderValue } from 'node:http';
import { getConfig, type MarkerHeader } from '../config/index.js';
import { ConnectionError, errorMessage } from '../errors.js';

/** Returns `size` random bytes */
export type RandomBytes = (size: number) => Uint8Array;

export const WEBSOCKET_KEY_LENGTH = 16;
export const WEBSOCKET_VERSION = '13';

export interface UpgradeRequest {
  url: URL;
  /** Hostname to connect to, without IPv6 brackets */
  host: string;
  port: number;
  headers: Record<string, string>;
}

export interface UpgradeRequestOptions {
  path?: string;
  defaultPort?: number;
  markerHeader?: MarkerHeader;
  randomBytes?: RandomBytes;
}

/**
 * Generate a `Sec-WebSocket-Key`: 16 random bytes, base64-encoded
 */
export function generateWebSocketKey(randomBytes: RandomBytes = cryptoRandomBytes): string {
  const nonce = randomBytes(WEBSOCKET_KEY_LENGTH);
  if (nonce.length !== WEBSOCKET_KEY_LENGTH) {
    throw new Error(`WebSocket key source returned ${nonce.length} bytes, expected ${WEBSOCKET_KEY_LENGTH}`);
  }
  return Buffer.from(nonce).toString('base64');
}

/**
 * Build the upgrade request for `wss://{endpoint}{path}`
 *
 * @param endpoint - `host[:port]` of the CM
 * @throws ConnectionError('url' | 'no-host' | 'request')
 */
export function buildUpgradeRequest(endpoint: string, options: UpgradeRequestOptions = {}): UpgradeRequest {
  const config = getConfig();
  const path = options.path ?? config.cmPath;
  const marker = options.markerHeader ?? config.markerHeader;

  if (endpoint.trim() === '') {
    throw new ConnectionError('no-host', 'CM endpoint is empty');
  }

  let url: URL;
  try {
    url = new URL(`wss://${endpoint}${path}`);
  } catch (err) {
    throw new ConnectionError('url', `Invalid CM endpoint "${endpoint}": ${errorMessage(err)}`, { cause: err });
  }

  if (!url.hostname) {
    throw new ConnectionError('no-host', `CM URL ${url.href} has no host`);
  }

  // URL.host is the authority without any user-info prefix
  const headers: Record<string, string> = {
    Host: url.host,
    Connection: 'Upgrade',
    Upgrade: 'websocket',
    'Sec-WebSocket-Version': WEBSOCKET_VERSION,
    'Sec-WebSocket-Key': generateWebSocketKey(options.randomBytes),
    [marker.name]: marker.value,
  };

  try {
    for (const [name, value] of Object.entries(headers)) {
      validateHeaderName(name);
      validateHeaderValue(name, value);
    }
  } catch (err) {
    throw new ConnectionError('request', `Invalid upgrade request header: ${errorMessage(err)}`, { cause: err });
  }

  const hostname = url.hostname.startsWith('[') ? url.hostname.slice(1, -1) : url.hostname;

  return {
    url,
    host: hostname,
    port: url.port ? Number(url.port) : options.defaultPort ?? config.defaultTargetPort,
    headers,
  };
}
