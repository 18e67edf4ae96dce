/**
 * CM Connection Establishment
 *
 * Opens the byte stream for the chosen strategy (direct or SOCKS5), layers
 * TLS over it and completes the WebSocket upgrade. Both strategies share the
 * TLS and WebSocket steps.
 *
 * @module transport/connect
 */

import { Agent } from 'node:https';
import { isIP, type Socket } from 'node:net';
import { connect as tlsConnect, type TLSSocket } from 'node:tls';
import WebSocket from 'ws';
import { getConfig } from '../config/index.js';
import { ConnectionError } from '../errors.js';
import { createLogger } from '../logger/index.js';
import type { Socks5ProxyConfig } from '../proxy/proxy-config.js';
import { openStream, resolveStrategy } from '../proxy/tunnel.js';
import { buildUpgradeRequest, type UpgradeRequest, type UpgradeRequestOptions } from './handshake.js';
import { CmTransport } from './transport.js';

const log = createLogger('connect');

export interface TlsOptions {
  /** Extra trusted CA certificates (PEM) */
  ca?: string | Buffer | Array<string | Buffer>;
  rejectUnauthorized?: boolean;
}

/** ws generates the key itself, so no key source is taken here */
export interface ConnectOptions extends Omit<UpgradeRequestOptions, 'randomBytes'> {
  /** Per-step limit for TCP/SOCKS connect, TLS and the upgrade */
  handshakeTimeoutMs?: number;
  tls?: TlsOptions;
}

/**
 * Establish a transport to one CM endpoint
 *
 * @param endpoint - `host[:port]` of the CM
 * @param proxy - Tunnel the connection through this SOCKS5 proxy
 * @throws ConnectionError for URL, tunnel, TLS and handshake failures;
 *   ProxyConfigError for partial proxy credentials (before any socket opens)
 */
export async function connectToEndpoint(
  endpoint: string,
  proxy?: Socks5ProxyConfig | null,
  options: ConnectOptions = {}
): Promise<CmTransport> {
  const request = buildUpgradeRequest(endpoint, options);
  const strategy = resolveStrategy(proxy);
  const timeoutMs = options.handshakeTimeoutMs ?? getConfig().handshakeTimeoutMs;

  log.debug(
    strategy.kind === 'socks5'
      ? `Connecting to ${request.url.href} via ${strategy.proxy}`
      : `Connecting to ${request.url.href}`
  );

  const stream = await openStream(strategy, { host: request.host, port: request.port }, { timeoutMs });
  const secure = await startTls(stream, request.host, options.tls ?? {}, timeoutMs);
  const transport = await upgrade(secure, request, endpoint, timeoutMs);

  log.info(`🔗 Connected to CM ${endpoint}`);
  return transport;
}

function startTls(stream: Socket, host: string, options: TlsOptions, timeoutMs: number): Promise<TLSSocket> {
  return new Promise((resolve, reject) => {
    const secure = tlsConnect({
      socket: stream,
      host,
      // SNI must be a hostname, never an IP literal
      servername: isIP(host) === 0 ? host : undefined,
      ca: options.ca,
      rejectUnauthorized: options.rejectUnauthorized ?? true,
      ALPNProtocols: ['http/1.1'],
    });

    const fail = (err: Error): void => {
      secure.destroy();
      stream.destroy();
      reject(new ConnectionError('tls', `TLS handshake with ${host} failed: ${err.message}`, { cause: err }));
    };

    secure.setTimeout(timeoutMs, () => fail(new Error(`timed out after ${timeoutMs}ms`)));
    secure.once('error', fail);
    secure.once('secureConnect', () => {
      secure.removeListener('error', fail);
      secure.setTimeout(0);
      resolve(secure);
    });
  });
}

const WS_OWNED_HEADERS: ReadonlySet<string> = new Set([
  'connection',
  'upgrade',
  'sec-websocket-key',
  'sec-websocket-version',
]);

function applicationHeaders(headers: Record<string, string>): Record<string, string> {
  return Object.fromEntries(
    Object.entries(headers).filter(([name]) => !WS_OWNED_HEADERS.has(name.toLowerCase()))
  );
}

/**
 * Agent that hands out one already-secured socket instead of dialling
 */
class PreconnectedAgent extends Agent {
  constructor(private readonly secureSocket: TLSSocket) {
    super({ keepAlive: false });
  }

  createConnection(): TLSSocket {
    return this.secureSocket;
  }
}

function upgrade(
  secure: TLSSocket,
  request: UpgradeRequest,
  endpoint: string,
  timeoutMs: number
): Promise<CmTransport> {
  return new Promise((resolve, reject) => {
    // ws writes Sec-WebSocket-Key/Version, Connection and Upgrade itself and
    // verifies the accept digest against its own key
    const socket = new WebSocket(request.url, {
      headers: applicationHeaders(request.headers),
      handshakeTimeout: timeoutMs,
      agent: new PreconnectedAgent(secure),
    });

    const onError = (err: Error): void => {
      socket.removeListener('open', onOpen);
      secure.destroy();
      reject(new ConnectionError(
        'handshake',
        `WebSocket upgrade with ${request.url.host} failed: ${err.message}`,
        { cause: err }
      ));
    };

    const onOpen = (): void => {
      socket.removeListener('error', onError);
      // Split synchronously so no frame arrives before the reader listens
      resolve(new CmTransport(socket, endpoint));
    };

    socket.once('error', onError);
    socket.once('open', onOpen);
  });
}
