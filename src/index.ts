/**
 * cm-transport
 *
 * Proxy-aware WebSocket transport to Connection Manager servers, with
 * request/response correlation over a single connection.
 */

export {
  getConfig,
  updateConfig,
  resetConfig,
  loadConfigFromEnv,
  getProxyConfig,
  defaultConfig,
  type CmClientConfig,
  type LogLevel,
  type MarkerHeader,
} from './config/index.js';
export * from './errors.js';
export { createLogger, type Logger } from './logger/index.js';

export {
  Socks5ProxyConfig,
  DEFAULT_SOCKS5_PORT,
  type Socks5ProxyOptions,
  type Socks5Scheme,
  type ProxyCredentials,
  type ProxyAddress,
} from './proxy/proxy-config.js';
export { HttpClient, createHttpClient, type HttpClientOptions, type HttpResponse } from './proxy/http-client.js';
export {
  resolveProxyAuth,
  resolveStrategy,
  openStream,
  type ConnectionStrategy,
  type ProxyAuth,
  type StreamTarget,
} from './proxy/tunnel.js';

export {
  DirectoryCmList,
  StaticCmList,
  parseDirectoryResponse,
  secureRandomIndex,
  type CmListCache,
  type CmServer,
  type DirectoryCmListOptions,
  type RandomIndex,
} from './cm/cm-list.js';
export { Mutex } from './cm/mutex.js';
export { selectServer, type SelectServerOptions } from './cm/server-selector.js';

export {
  buildUpgradeRequest,
  generateWebSocketKey,
  type RandomBytes,
  type UpgradeRequest,
  type UpgradeRequestOptions,
} from './transport/handshake.js';
export { connectToEndpoint, type ConnectOptions, type TlsOptions } from './transport/connect.js';
export { CmTransport, TransportReader, TransportWriter } from './transport/transport.js';
export {
  createOneshot,
  OneshotSender,
  OneshotReceiver,
  PendingRequests,
  waitForResponse,
  type ApiRequest,
  type ApiResponseBody,
  type JobId,
} from './transport/response.js';

export { CmSession, type CmRequest, type CmSessionOptions, type Frame, type FrameCodec } from './client/session.js';
export { connectToCm, connectToCmWithSocks5Proxy, type ConnectToCmOptions } from './client/connect-to-cm.js';
