/**
 * In-process SOCKS5 Server
 *
 * CONNECT-only SOCKS5 server for tests. Records every CONNECT request so
 * tests can assert what the client asked the proxy for.
 */

import { createServer, connect, type Server, type Socket } from 'node:net';
import { closeServer, listenOnFreePort } from './listen.js';
import {
  AUTH_NO_ACCEPTABLE,
  AUTH_NO_AUTH,
  AUTH_USERNAME_PASSWORD,
  CMD_CONNECT,
  ConnectionState,
  REPLY_COMMAND_NOT_SUPPORTED,
  REPLY_ADDRESS_TYPE_NOT_SUPPORTED,
  REPLY_CONNECTION_REFUSED,
  REPLY_SUCCESS,
  SOCKS_VERSION,
  createAuthResponse,
  createReply,
  createUserPassResponse,
  parseAddress,
  parseCredentials,
} from './socks5-protocol.js';

export interface Socks5ConnectRecord {
  host: string;
  port: number;
  addressType: number;
  /** Username the client authenticated with, if any */
  username?: string;
}

export interface Socks5TestServerOptions {
  /** Require RFC 1929 authentication with these credentials */
  credentials?: { username: string; password: string };
}

export interface Socks5TestServer {
  readonly port: number;
  /** TCP connections accepted so far */
  readonly connectionCount: number;
  readonly requests: readonly Socks5ConnectRecord[];
  close(): Promise<void>;
}

export async function startSocks5TestServer(
  options: Socks5TestServerOptions = {}
): Promise<Socks5TestServer> {
  const sockets = new Set<Socket>();
  const requests: Socks5ConnectRecord[] = [];
  let connectionCount = 0;

  const track = (socket: Socket): void => {
    sockets.add(socket);
    socket.on('close', () => sockets.delete(socket));
  };

  const server: Server = createServer((client) => {
    connectionCount++;
    track(client);
    handleConnection(client, options, requests, track);
  });

  const port = await listenOnFreePort(server, '127.0.0.1');

  return {
    port,
    get connectionCount() {
      return connectionCount;
    },
    requests,
    close(): Promise<void> {
      for (const socket of sockets) {
        socket.destroy();
      }
      return closeServer(server);
    },
  };
}

function handleConnection(
  client: Socket,
  options: Socks5TestServerOptions,
  requests: Socks5ConnectRecord[],
  track: (socket: Socket) => void
): void {
  let state = ConnectionState.AWAITING_GREETING;
  let buffer = Buffer.alloc(0);
  let username: string | undefined;

  client.on('error', () => client.destroy());

  client.on('data', (data: Buffer) => {
    if (state === ConnectionState.CONNECTED) return;
    buffer = Buffer.concat([buffer, data]);

    switch (state) {
      case ConnectionState.AWAITING_GREETING:
        handleGreeting();
        break;
      case ConnectionState.AWAITING_AUTH:
        handleAuth();
        break;
      case ConnectionState.AWAITING_REQUEST:
        handleRequest();
        break;
    }
  });

  function handleGreeting(): void {
    if (buffer.length < 2) return;
    const methodCount = buffer[1];
    if (buffer.length < 2 + methodCount) return;

    if (buffer[0] !== SOCKS_VERSION) {
      client.destroy();
      return;
    }

    const methods = Array.from(buffer.subarray(2, 2 + methodCount));
    buffer = buffer.subarray(2 + methodCount);

    const wanted = options.credentials ? AUTH_USERNAME_PASSWORD : AUTH_NO_AUTH;
    if (!methods.includes(wanted)) {
      client.end(createAuthResponse(AUTH_NO_ACCEPTABLE));
      return;
    }

    client.write(createAuthResponse(wanted));
    state = wanted === AUTH_USERNAME_PASSWORD
      ? ConnectionState.AWAITING_AUTH
      : ConnectionState.AWAITING_REQUEST;

    if (buffer.length === 0) return;
    if (state === ConnectionState.AWAITING_AUTH) {
      handleAuth();
    } else {
      handleRequest();
    }
  }

  function handleAuth(): void {
    const parsed = parseCredentials(buffer);
    if (!parsed) return;
    buffer = buffer.subarray(parsed.length);

    const expected = options.credentials;
    const accepted = expected !== undefined &&
      parsed.username === expected.username &&
      parsed.password === expected.password;

    if (!accepted) {
      client.end(createUserPassResponse(false));
      return;
    }

    username = parsed.username;
    client.write(createUserPassResponse(true));
    state = ConnectionState.AWAITING_REQUEST;

    if (buffer.length > 0) {
      handleRequest();
    }
  }

  function handleRequest(): void {
    if (buffer.length < 4) return;

    const command = buffer[1];
    const address = parseAddress(buffer, 3);
    if (!address) {
      if (buffer.length >= 5 && ![0x01, 0x03, 0x04].includes(buffer[3])) {
        client.end(createReply(REPLY_ADDRESS_TYPE_NOT_SUPPORTED));
      }
      return;
    }

    const rest = buffer.subarray(3 + address.length);
    buffer = Buffer.alloc(0);

    if (command !== CMD_CONNECT) {
      client.end(createReply(REPLY_COMMAND_NOT_SUPPORTED));
      return;
    }

    requests.push({ host: address.host, port: address.port, addressType: address.addressType, username });
    state = ConnectionState.CONNECTED;

    const target = connect({ host: address.host, port: address.port });
    let targetConnected = false;
    track(target);

    target.once('connect', () => {
      targetConnected = true;
      client.write(createReply(REPLY_SUCCESS));
      if (rest.length > 0) {
        target.write(rest);
      }
      client.pipe(target);
      target.pipe(client);
    });

    target.on('error', () => {
      if (!targetConnected) {
        client.end(createReply(REPLY_CONNECTION_REFUSED));
      } else {
        client.destroy();
      }
    });
    target.on('close', () => client.destroy());
    client.on('close', () => target.destroy());
  }
}
