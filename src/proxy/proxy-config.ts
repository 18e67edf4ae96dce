/**
 * SOCKS5 Proxy Configuration
 *
 * Immutable description of an upstream SOCKS5 proxy. Parses and formats
 * `socks5://` / `socks5h://` URLs and never renders the password in its
 * display form.
 *
 * @module proxy/proxy-config
 */

import { ProxyConfigError } from '../errors.js';
import { createHttpClient, type HttpClient } from './http-client.js';

/** Port used when a proxy string carries none */
export const DEFAULT_SOCKS5_PORT = 1080;

export type Socks5Scheme = 'socks5' | 'socks5h';

export interface Socks5ProxyOptions {
  username?: string;
  password?: string;
  /** `true` resolves the target hostname on the proxy (`socks5h`) */
  remoteDns?: boolean;
}

export interface ProxyCredentials {
  username?: string;
  password?: string;
}

export interface ProxyAddress {
  host: string;
  port: number;
}

// C0 controls, DEL, and unpaired UTF-16 surrogates cannot be carried in URL user-info
const ILLEGAL_USERINFO = /[\u0000-\u001f\u007f]|[\ud800-\udbff](?![\udc00-\udfff])|(?<![\ud800-\udbff])[\udc00-\udfff]/;

const EXPLICIT_SCHEME = /^([a-z][a-z0-9+.-]*):\/\//i;

function formatHost(host: string): string {
  return host.includes(':') && !host.startsWith('[') ? `[${host}]` : host;
}

function stripBrackets(host: string): string {
  return host.startsWith('[') && host.endsWith(']') ? host.slice(1, -1) : host;
}

function escapePercent(value: string): string {
  return value.replace(/%/g, '%25');
}

function decodeUserInfo(value: string, reason: 'invalid-username' | 'invalid-password'): string {
  try {
    return decodeURIComponent(value);
  } catch (err) {
    throw new ProxyConfigError(
      reason,
      `Invalid ${reason === 'invalid-username' ? 'username' : 'password'} for SOCKS5 proxy`,
      { cause: err }
    );
  }
}

export class Socks5ProxyConfig {
  readonly host: string;
  readonly port: number;
  readonly username: string | undefined;
  readonly password: string | undefined;
  readonly remoteDns: boolean;

  constructor(host: string, port: number, options: Socks5ProxyOptions = {}) {
    this.host = host;
    this.port = port;
    this.username = options.username;
    this.password = options.password;
    this.remoteDns = options.remoteDns ?? true;
  }

  /**
   * Parse a proxy definition
   *
   * Accepts `socks5://[user[:pass]@]host[:port]`, the same with `socks5h://`,
   * or a bare `host[:port]` which is read as `socks5h` on port 1080.
   */
  static parse(value: string): Socks5ProxyConfig {
    const trimmed = value.trim();
    const explicit = EXPLICIT_SCHEME.exec(trimmed);

    if (explicit) {
      const scheme = explicit[1].toLowerCase();
      if (scheme !== 'socks5' && scheme !== 'socks5h') {
        throw new ProxyConfigError(
          'unsupported-scheme',
          `Scheme ${scheme} is not supported for SOCKS5 proxy URLs`
        );
      }
    }

    let url: URL;
    try {
      url = new URL(explicit ? trimmed : `socks5h://${trimmed}`);
    } catch (err) {
      throw new ProxyConfigError('url', `Invalid SOCKS5 proxy URL: ${value}`, { cause: err });
    }

    const host = stripBrackets(url.hostname);
    if (!host) {
      throw new ProxyConfigError('missing-host', 'SOCKS5 proxy URL does not contain host');
    }

    if ((url.pathname !== '' && url.pathname !== '/') || url.search || url.hash) {
      throw new ProxyConfigError('url', 'SOCKS5 proxy URL must not carry a path, query or fragment');
    }

    const username = url.username ? decodeUserInfo(url.username, 'invalid-username') : undefined;
    // WHATWG URL drops an empty password, so "user:@host" and "user@host" read the same
    const password = url.password ? decodeUserInfo(url.password, 'invalid-password') : undefined;

    return new Socks5ProxyConfig(host, url.port ? Number(url.port) : DEFAULT_SOCKS5_PORT, {
      username,
      password,
      remoteDns: url.protocol === 'socks5h:',
    });
  }

  get scheme(): Socks5Scheme {
    return this.remoteDns ? 'socks5h' : 'socks5';
  }

  withRemoteDns(remoteDns: boolean): Socks5ProxyConfig {
    return new Socks5ProxyConfig(this.host, this.port, { ...this.options(), remoteDns });
  }

  withCredentials(username: string, password: string): Socks5ProxyConfig {
    return new Socks5ProxyConfig(this.host, this.port, { ...this.options(), username, password });
  }

  /**
   * Username/password pair, with an empty username reported as absent
   */
  credentials(): ProxyCredentials {
    return {
      username: this.username ? this.username : undefined,
      password: this.password,
    };
  }

  /**
   * Build the `socks5[h]://user:pass@host:port` URL
   *
   * @throws ProxyConfigError when host/port do not form a URL or a credential
   *   cannot be carried in URL user-info
   */
  proxyUrl(): URL {
    let url: URL;
    try {
      url = new URL(`${this.scheme}://${formatHost(this.host)}:${this.port}`);
    } catch (err) {
      throw new ProxyConfigError(
        'url',
        `Invalid SOCKS5 proxy URL: ${this.scheme}://${formatHost(this.host)}:${this.port}`,
        { cause: err }
      );
    }

    if (this.username) {
      if (ILLEGAL_USERINFO.test(this.username)) {
        throw new ProxyConfigError('invalid-username', 'Invalid username for SOCKS5 proxy');
      }
      // The user-info setters leave '%' as is, so escape it to keep the value literal
      url.username = escapePercent(this.username);
    }

    if (this.password !== undefined) {
      if (ILLEGAL_USERINFO.test(this.password)) {
        throw new ProxyConfigError('invalid-password', 'Invalid password for SOCKS5 proxy');
      }
      url.password = escapePercent(this.password);
    }

    return url;
  }

  /**
   * Create an HTTP client that tunnels every request through this proxy
   */
  buildHttpClient(): HttpClient {
    return createHttpClient({ proxy: this });
  }

  /** Socket-level address of the proxy itself */
  proxyAddr(): ProxyAddress {
    return { host: this.host, port: this.port };
  }

  equals(other: Socks5ProxyConfig): boolean {
    return (
      this.host === other.host &&
      this.port === other.port &&
      this.username === other.username &&
      this.password === other.password &&
      this.remoteDns === other.remoteDns
    );
  }

  toString(): string {
    const { username } = this.credentials();
    const authority = `${formatHost(this.host)}:${this.port}`;

    return username
      ? `${this.scheme}://${username}:***@${authority}`
      : `${this.scheme}://${authority}`;
  }

  toJSON(): string {
    return this.toString();
  }

  private options(): Socks5ProxyOptions {
    return { username: this.username, password: this.password, remoteDns: this.remoteDns };
  }
}
