/**
 * Connect to a CM picked from the shared candidate list
 *
 * @module client/connect-to-cm
 */

import type { CmListCache } from '../cm/cm-list.js';
import type { Mutex } from '../cm/mutex.js';
import { selectServer, type SelectServerOptions } from '../cm/server-selector.js';
import type { Socks5ProxyConfig } from '../proxy/proxy-config.js';
import { connectToEndpoint, type ConnectOptions } from '../transport/connect.js';
import type { CmTransport } from '../transport/transport.js';

export interface ConnectToCmOptions extends ConnectOptions, SelectServerOptions {}

export function connectToCm(
  cmList: Mutex<CmListCache>,
  options: ConnectToCmOptions = {}
): Promise<CmTransport> {
  return connectToCmWithSocks5Proxy(cmList, null, options);
}

/**
 * Pick a CM (refreshing the list through `proxy` when given) and connect to
 * it, tunnelled through the same proxy
 */
export async function connectToCmWithSocks5Proxy(
  cmList: Mutex<CmListCache>,
  proxy: Socks5ProxyConfig | null,
  options: ConnectToCmOptions = {}
): Promise<CmTransport> {
  const server = await selectServer(cmList, proxy, options);
  return connectToEndpoint(server.endpoint, proxy, options);
}
