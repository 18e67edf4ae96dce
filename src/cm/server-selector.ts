/**
 * Server Selection
 *
 * Refreshes the shared candidate list and picks one CM at random. The lock is
 * held for refresh + pick only; connecting happens after it is released.
 *
 * @module cm/server-selector
 */

import { NoCmServerError } from '../errors.js';
import { createLogger } from '../logger/index.js';
import type { Socks5ProxyConfig } from '../proxy/proxy-config.js';
import type { HttpClient } from '../proxy/http-client.js';
import type { CmListCache, CmServer } from './cm-list.js';
import type { Mutex } from './mutex.js';

const log = createLogger('selector');

export interface SelectServerOptions {
  /** Use this client for the refresh instead of building one from `proxy` */
  httpClient?: HttpClient;
}

/**
 * Refresh the candidate list and pick a random CM
 *
 * @param cmList - Shared candidate list
 * @param proxy - When given, the refresh is tunnelled through this proxy
 * @throws NoCmServerError when the list is empty after refresh
 */
export async function selectServer(
  cmList: Mutex<CmListCache>,
  proxy?: Socks5ProxyConfig | null,
  options: SelectServerOptions = {}
): Promise<CmServer> {
  // Built before taking the lock: a bad proxy config must not hold it
  const client = options.httpClient ?? proxy?.buildHttpClient();

  const server = await cmList.runExclusive(async (list) => {
    if (client) {
      await list.refreshWith(client);
    } else {
      await list.refresh();
    }
    return list.pickRandom();
  });

  if (!server) {
    throw new NoCmServerError();
  }

  log.debug(`Selected CM ${server.endpoint}`);
  return server;
}
