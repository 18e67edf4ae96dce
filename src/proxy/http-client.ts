/**
 * HTTP Request Utilities
 *
 * Minimal GET client used to refresh the CM candidate list. When a proxy is
 * supplied every request is tunnelled through it with a SOCKS agent.
 */

import {
  request as httpRequest,
  type Agent,
  type IncomingHttpHeaders,
  type IncomingMessage,
  type RequestOptions,
} from 'node:http';
import { request as httpsRequest } from 'node:https';
import { SocksProxyAgent } from 'socks-proxy-agent';
import { HttpClientBuildError, errorMessage } from '../errors.js';
import type { Socks5ProxyConfig } from './proxy-config.js';

export interface HttpClientOptions {
  /** Tunnel all requests through this SOCKS5 proxy */
  proxy?: Socks5ProxyConfig | null;
  /** Socket inactivity timeout per request */
  timeoutMs?: number;
}

export interface HttpResponse {
  statusCode: number;
  headers: IncomingHttpHeaders;
  body: Buffer;
}

const DEFAULT_TIMEOUT_MS = 15000;

export class HttpClient {
  readonly proxy: Socks5ProxyConfig | null;
  private readonly agent: Agent | undefined;
  private readonly timeoutMs: number;

  constructor(options: HttpClientOptions = {}) {
    this.proxy = options.proxy ?? null;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.agent = this.proxy ? createProxyAgent(this.proxy) : undefined;
  }

  /**
   * Issue a GET request and buffer the whole body
   */
  get(target: string | URL, headers: Record<string, string> = {}): Promise<HttpResponse> {
    const url = typeof target === 'string' ? new URL(target) : target;
    const options: RequestOptions = { method: 'GET', headers, agent: this.agent };

    return new Promise((resolve, reject) => {
      const onResponse = (res: IncomingMessage): void => {
        const chunks: Buffer[] = [];

        res.on('data', (chunk: Buffer) => chunks.push(chunk));
        res.on('end', () => {
          resolve({
            statusCode: res.statusCode || 0,
            headers: res.headers,
            body: Buffer.concat(chunks),
          });
        });
        res.on('error', reject);
      };

      const req = url.protocol === 'https:'
        ? httpsRequest(url, options, onResponse)
        : httpRequest(url, options, onResponse);

      req.setTimeout(this.timeoutMs, () => {
        req.destroy(new Error(`Request to ${url.host} timed out after ${this.timeoutMs}ms`));
      });
      req.on('error', reject);
      req.end();
    });
  }

  /**
   * GET a URL and parse the body as JSON
   *
   * @returns The parsed value, unvalidated
   */
  async getJson(target: string | URL): Promise<{ statusCode: number; data: unknown }> {
    const response = await this.get(target, { accept: 'application/json' });
    const text = response.body.toString('utf-8');
    return { statusCode: response.statusCode, data: text ? JSON.parse(text) : null };
  }
}

function createProxyAgent(proxy: Socks5ProxyConfig): SocksProxyAgent {
  const url = proxy.proxyUrl();
  try {
    return new SocksProxyAgent(url);
  } catch (err) {
    throw new HttpClientBuildError(
      `Failed to build HTTP client with SOCKS5 proxy ${proxy}: ${errorMessage(err)}`,
      { cause: err }
    );
  }
}

/**
 * Create an HTTP client, tunnelled through `options.proxy` when given
 */
export function createHttpClient(options: HttpClientOptions = {}): HttpClient {
  return new HttpClient(options);
}
