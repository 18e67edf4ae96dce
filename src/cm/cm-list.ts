/**
 * CM Candidate List
 *
 * The candidate list is refreshed from a directory service and holds the
 * WebSocket-capable Connection Manager endpoints. Selection code only talks
 * to the CmListCache interface, so tests can supply a fixed list.
 *
 * @module cm/cm-list
 */

import { randomInt } from 'node:crypto';
import { getConfig } from '../config/index.js';
import { CmListError, errorMessage } from '../errors.js';
import { createLogger } from '../logger/index.js';
import { createHttpClient, type HttpClient } from '../proxy/http-client.js';

const log = createLogger('cm-list');

export interface CmServer {
  /** `host:port` of the CM */
  endpoint: string;
  /** Transport the CM speaks, e.g. 'websockets' or 'netfilter' */
  type: string;
  dc?: string;
  realm?: string;
  load?: number;
  weightedLoad?: number;
}

export interface CmListCache {
  /** Refresh the list with the cache's own HTTP client */
  refresh(): Promise<void>;
  /** Refresh the list through the given client (e.g. a proxied one) */
  refreshWith(client: HttpClient): Promise<void>;
  /** One WebSocket server chosen uniformly at random, or null when empty */
  pickRandom(): CmServer | null;
}

/** Returns an integer in [0, length) */
export type RandomIndex = (length: number) => number;

export const secureRandomIndex: RandomIndex = (length) => randomInt(length);

function pickFrom(servers: readonly CmServer[], randomIndex: RandomIndex): CmServer | null {
  if (servers.length === 0) {
    return null;
  }
  return servers[randomIndex(servers.length)] ?? null;
}

// =============================================================================
// Directory response parsing
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

/**
 * Extract servers from a directory answer of the form
 * `{ response: { success, message?, serverlist: [{ endpoint, type, ... }] } }`
 *
 * @throws CmListError('directory') when the answer is malformed or unsuccessful
 */
export function parseDirectoryResponse(data: unknown): CmServer[] {
  const response = isRecord(data) ? data.response : undefined;
  if (!isRecord(response)) {
    throw new CmListError('directory', 'Directory answer has no response object');
  }

  if (response.success === false) {
    const message = optionalString(response.message) ?? 'no message';
    throw new CmListError('directory', `Directory reported failure: ${message}`);
  }

  if (!Array.isArray(response.serverlist)) {
    throw new CmListError('directory', 'Directory answer has no serverlist');
  }

  const servers: CmServer[] = [];
  for (const entry of response.serverlist) {
    if (!isRecord(entry) || typeof entry.endpoint !== 'string' || typeof entry.type !== 'string') {
      log.debug('Skipping malformed directory entry', entry);
      continue;
    }
    servers.push({
      endpoint: entry.endpoint,
      type: entry.type,
      dc: optionalString(entry.dc),
      realm: optionalString(entry.realm),
      load: optionalNumber(entry.load),
      weightedLoad: optionalNumber(entry.wtd_load),
    });
  }
  return servers;
}

// =============================================================================
// Implementations
// =============================================================================

export interface DirectoryCmListOptions {
  directoryUrl?: string;
  /** Skip refreshes while the list is younger than this */
  ttlSeconds?: number;
  httpClient?: HttpClient;
  randomIndex?: RandomIndex;
  now?: () => number;
}

/**
 * Candidate list backed by the CM directory web API
 */
export class DirectoryCmList implements CmListCache {
  private servers: CmServer[] = [];
  private fetchedAt: number | null = null;
  private readonly directoryUrl: string;
  private readonly ttlMs: number;
  private readonly httpClient: HttpClient;
  private readonly randomIndex: RandomIndex;
  private readonly now: () => number;

  constructor(options: DirectoryCmListOptions = {}) {
    const config = getConfig();
    this.directoryUrl = options.directoryUrl ?? config.directoryUrl;
    this.ttlMs = (options.ttlSeconds ?? config.cmListTtlSeconds) * 1000;
    this.httpClient = options.httpClient ?? createHttpClient();
    this.randomIndex = options.randomIndex ?? secureRandomIndex;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.servers.length;
  }

  /** Snapshot of the current WebSocket servers */
  list(): readonly CmServer[] {
    return [...this.servers];
  }

  isFresh(): boolean {
    return this.fetchedAt !== null && this.now() - this.fetchedAt < this.ttlMs;
  }

  /** Force the next refresh to hit the directory */
  invalidate(): void {
    this.fetchedAt = null;
  }

  refresh(): Promise<void> {
    return this.refreshWith(this.httpClient);
  }

  async refreshWith(client: HttpClient): Promise<void> {
    if (this.isFresh()) {
      return;
    }

    let result: { statusCode: number; data: unknown };
    try {
      result = await client.getJson(this.directoryUrl);
    } catch (err) {
      throw new CmListError('http', `Failed to fetch CM list: ${errorMessage(err)}`, { cause: err });
    }

    if (result.statusCode >= 400) {
      throw new CmListError('http', `CM directory answered with HTTP ${result.statusCode}`);
    }

    const all = parseDirectoryResponse(result.data);
    this.servers = all.filter((server) => server.type === 'websockets');
    this.fetchedAt = this.now();

    log.debug(`Fetched ${all.length} CM servers, ${this.servers.length} WebSocket`);
  }

  pickRandom(): CmServer | null {
    return pickFrom(this.servers, this.randomIndex);
  }
}

/**
 * Candidate list with a fixed set of endpoints; refreshing is a no-op
 */
export class StaticCmList implements CmListCache {
  private readonly servers: CmServer[];

  constructor(
    endpoints: ReadonlyArray<string | CmServer>,
    private readonly randomIndex: RandomIndex = secureRandomIndex
  ) {
    this.servers = endpoints.map((entry) =>
      typeof entry === 'string' ? { endpoint: entry, type: 'websockets' } : entry
    );
  }

  async refresh(): Promise<void> {}

  async refreshWith(_client: HttpClient): Promise<void> {}

  pickRandom(): CmServer | null {
    return pickFrom(this.servers, this.randomIndex);
  }
}
