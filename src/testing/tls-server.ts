/**
 * In-process CM Stand-in
 *
 * HTTPS server with a WebSocket endpoint, served with a self-signed
 * certificate generated on the fly. Records the headers of every upgrade.
 */

import forge from 'node-forge';
import { createServer as createHttpsServer } from 'node:https';
import type { IncomingHttpHeaders } from 'node:http';
import type { Duplex } from 'node:stream';
import WebSocket, { WebSocketServer } from 'ws';
import { closeServer, listenOnFreePort } from './listen.js';

export interface CertificatePair {
  key: string;
  cert: string;
}

/**
 * Generate a self-signed certificate valid for `localhost` and 127.0.0.1
 */
export function generateSelfSignedCert(commonName = 'localhost'): CertificatePair {
  const keys = forge.pki.rsa.generateKeyPair(2048);
  const cert = forge.pki.createCertificate();

  cert.publicKey = keys.publicKey;
  cert.serialNumber = '01';
  cert.validity.notBefore = new Date();
  cert.validity.notAfter = new Date();
  cert.validity.notAfter.setFullYear(cert.validity.notBefore.getFullYear() + 1);

  const attrs = [
    { name: 'commonName', value: commonName },
    { name: 'organizationName', value: 'CM Test' },
  ];
  cert.setSubject(attrs);
  cert.setIssuer(attrs);

  cert.setExtensions([
    { name: 'basicConstraints', cA: true },
    { name: 'keyUsage', keyCertSign: true, digitalSignature: true, keyEncipherment: true },
    { name: 'extKeyUsage', serverAuth: true },
    {
      name: 'subjectAltName',
      altNames: [
        { type: 2, value: commonName }, // DNS
        { type: 7, ip: '127.0.0.1' }, // IP
      ],
    },
  ]);

  cert.sign(keys.privateKey, forge.md.sha256.create());

  return {
    key: forge.pki.privateKeyToPem(keys.privateKey),
    cert: forge.pki.certificateToPem(cert),
  };
}

export interface WssTestServerOptions {
  certificate: CertificatePair;
  /** Path the WebSocket endpoint answers on */
  path?: string;
  /** Called for every accepted WebSocket */
  onConnection?: (socket: WebSocket) => void;
}

export interface WssTestServer {
  readonly port: number;
  /** Headers of every accepted upgrade, lower-cased by Node */
  readonly upgrades: readonly IncomingHttpHeaders[];
  readonly sockets: readonly WebSocket[];
  close(): Promise<void>;
}

export async function startWssTestServer(options: WssTestServerOptions): Promise<WssTestServer> {
  const upgrades: IncomingHttpHeaders[] = [];
  const sockets: WebSocket[] = [];

  const connections = new Set<Duplex>();

  const server = createHttpsServer({ key: options.certificate.key, cert: options.certificate.cert });
  server.on('connection', (socket) => {
    connections.add(socket);
    socket.on('close', () => connections.delete(socket));
  });
  const wss = new WebSocketServer({ server, path: options.path ?? '/cmsocket/' });

  wss.on('connection', (socket, request) => {
    upgrades.push(request.headers);
    sockets.push(socket);
    options.onConnection?.(socket);
  });

  const port = await listenOnFreePort(server);

  return {
    port,
    upgrades,
    sockets,
    async close(): Promise<void> {
      for (const socket of sockets) {
        socket.terminate();
      }
      await new Promise<void>((resolve) => wss.close(() => resolve()));
      for (const socket of connections) {
        socket.destroy();
      }
      await closeServer(server);
    },
  };
}
