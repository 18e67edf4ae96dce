/**
 * Connection Strategies
 *
 * A CM connection starts as a plain TCP stream, opened either directly or
 * through a SOCKS5 tunnel. TLS and the WebSocket upgrade are layered on top
 * of whichever stream the strategy yields.
 *
 * @module proxy/tunnel
 */

import { connect as netConnect, isIP, type Socket } from 'node:net';
import { lookup } from 'node:dns/promises';
import { SocksClient, type SocksProxy } from 'socks';
import { ConnectionError, ProxyConfigError, errorMessage } from '../errors.js';
import { createLogger } from '../logger/index.js';
import type { Socks5ProxyConfig } from './proxy-config.js';

const log = createLogger('tunnel');

export type ProxyAuth =
  | { method: 'none' }
  | { method: 'password'; username: string; password: string };

export type ConnectionStrategy =
  | { kind: 'direct' }
  | { kind: 'socks5'; proxy: Socks5ProxyConfig; auth: ProxyAuth };

export interface StreamTarget {
  host: string;
  port: number;
}

export interface OpenStreamOptions {
  /** Abort the TCP connect / SOCKS negotiation after this long */
  timeoutMs?: number;
}

/**
 * Decide how to authenticate against the proxy
 *
 * @throws ProxyConfigError('partial-credentials') when only one of
 *   username/password is present
 */
export function resolveProxyAuth(proxy: Socks5ProxyConfig): ProxyAuth {
  const { username, password } = proxy.credentials();

  if (username !== undefined && password !== undefined) {
    return { method: 'password', username, password };
  }
  if (username !== undefined || password !== undefined) {
    throw new ProxyConfigError(
      'partial-credentials',
      'SOCKS5 proxy auth requires both username and password'
    );
  }
  return { method: 'none' };
}

/**
 * Pick the strategy for an optional proxy. Validates credentials up front so
 * a misconfigured proxy is rejected before any socket is opened.
 */
export function resolveStrategy(proxy?: Socks5ProxyConfig | null): ConnectionStrategy {
  if (!proxy) {
    return { kind: 'direct' };
  }
  return { kind: 'socks5', proxy, auth: resolveProxyAuth(proxy) };
}

/**
 * Open a connected TCP stream to `target` using `strategy`
 */
export async function openStream(
  strategy: ConnectionStrategy,
  target: StreamTarget,
  options: OpenStreamOptions = {}
): Promise<Socket> {
  switch (strategy.kind) {
    case 'direct':
      return connectDirect(target, options);
    case 'socks5':
      return connectThroughSocks5(strategy.proxy, strategy.auth, target, options);
  }
}

function connectDirect(target: StreamTarget, options: OpenStreamOptions): Promise<Socket> {
  return new Promise((resolve, reject) => {
    const socket = netConnect({ host: target.host, port: target.port });

    const fail = (err: Error): void => {
      socket.destroy();
      reject(new ConnectionError(
        'tcp',
        `Failed to connect to ${target.host}:${target.port}: ${err.message}`,
        { cause: err }
      ));
    };

    if (options.timeoutMs !== undefined) {
      socket.setTimeout(options.timeoutMs, () => fail(new Error(`timed out after ${options.timeoutMs}ms`)));
    }

    socket.once('error', fail);
    socket.once('connect', () => {
      socket.removeListener('error', fail);
      socket.setTimeout(0);
      resolve(socket);
    });
  });
}

async function resolveTargetHost(host: string, remoteDns: boolean): Promise<string> {
  if (remoteDns || isIP(host) !== 0) {
    return host;
  }

  try {
    const { address } = await lookup(host);
    return address;
  } catch (err) {
    throw new ConnectionError(
      'proxy-tunnel',
      `Failed to resolve ${host} before tunnelling: ${errorMessage(err)}`,
      { cause: err }
    );
  }
}

async function connectThroughSocks5(
  proxy: Socks5ProxyConfig,
  auth: ProxyAuth,
  target: StreamTarget,
  options: OpenStreamOptions
): Promise<Socket> {
  const destinationHost = await resolveTargetHost(target.host, proxy.remoteDns);
  const { host, port } = proxy.proxyAddr();

  const socksProxy: SocksProxy = auth.method === 'password'
    ? { host, port, type: 5, userId: auth.username, password: auth.password }
    : { host, port, type: 5 };

  log.debug(`Opening tunnel to ${destinationHost}:${target.port} via ${proxy}`);

  try {
    const { socket } = await SocksClient.createConnection({
      proxy: socksProxy,
      command: 'connect',
      destination: { host: destinationHost, port: target.port },
      timeout: options.timeoutMs,
    });
    return socket;
  } catch (err) {
    throw new ConnectionError(
      'proxy-tunnel',
      `SOCKS5 tunnel to ${target.host}:${target.port} via ${proxy} failed: ${errorMessage(err)}`,
      { cause: err }
    );
  }
}
