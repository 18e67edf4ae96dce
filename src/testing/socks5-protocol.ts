/**
 * SOCKS5 Protocol Helpers
 *
 * Constants and packet parsing for the in-process SOCKS5 server used by the
 * tests. References: RFC 1928 (SOCKS5) and RFC 1929 (username/password).
 */

// =============================================================================
// SOCKS5 Protocol Constants
// =============================================================================

export const SOCKS_VERSION = 0x05;
/** Version of the username/password sub-negotiation */
export const USERPASS_VERSION = 0x01;

// Authentication methods
export const AUTH_NO_AUTH = 0x00;
export const AUTH_USERNAME_PASSWORD = 0x02;
export const AUTH_NO_ACCEPTABLE = 0xff;

// Address types
export const ADDR_IPV4 = 0x01;
export const ADDR_DOMAIN = 0x03;
export const ADDR_IPV6 = 0x04;

export const CMD_CONNECT = 0x01;

// Reply codes
export const REPLY_SUCCESS = 0x00;
export const REPLY_GENERAL_FAILURE = 0x01;
export const REPLY_CONNECTION_REFUSED = 0x05;
export const REPLY_COMMAND_NOT_SUPPORTED = 0x07;
export const REPLY_ADDRESS_TYPE_NOT_SUPPORTED = 0x08;

export enum ConnectionState {
  AWAITING_GREETING,
  AWAITING_AUTH,
  AWAITING_REQUEST,
  CONNECTED,
}

export interface ParsedAddress {
  host: string;
  port: number;
  addressType: number;
  /** Bytes consumed, address type through port */
  length: number;
}

export interface ParsedCredentials {
  username: string;
  password: string;
  length: number;
}

/**
 * Parse ATYP + address + port starting at `offset`
 *
 * @returns null when the buffer is incomplete or the type is unknown
 */
export function parseAddress(buffer: Buffer, offset: number): ParsedAddress | null {
  if (buffer.length <= offset) return null;
  const addressType = buffer[offset];

  switch (addressType) {
    case ADDR_IPV4: {
      if (buffer.length < offset + 7) return null;
      const host = Array.from(buffer.subarray(offset + 1, offset + 5)).join('.');
      return { host, port: buffer.readUInt16BE(offset + 5), addressType, length: 7 };
    }

    case ADDR_DOMAIN: {
      if (buffer.length < offset + 2) return null;
      const domainLength = buffer[offset + 1];
      if (buffer.length < offset + 2 + domainLength + 2) return null;
      const host = buffer.subarray(offset + 2, offset + 2 + domainLength).toString('ascii');
      return {
        host,
        port: buffer.readUInt16BE(offset + 2 + domainLength),
        addressType,
        length: 4 + domainLength,
      };
    }

    case ADDR_IPV6: {
      if (buffer.length < offset + 19) return null;
      const parts: string[] = [];
      for (let i = 0; i < 8; i++) {
        parts.push(buffer.readUInt16BE(offset + 1 + i * 2).toString(16));
      }
      return { host: parts.join(':'), port: buffer.readUInt16BE(offset + 17), addressType, length: 19 };
    }

    default:
      return null;
  }
}

/**
 * Parse an RFC 1929 request: VER | ULEN | UNAME | PLEN | PASSWD
 *
 * @returns null when the buffer is incomplete
 */
export function parseCredentials(buffer: Buffer): ParsedCredentials | null {
  if (buffer.length < 2) return null;
  const usernameLength = buffer[1];
  if (buffer.length < 3 + usernameLength) return null;
  const passwordLength = buffer[2 + usernameLength];
  const length = 3 + usernameLength + passwordLength;
  if (buffer.length < length) return null;

  return {
    username: buffer.subarray(2, 2 + usernameLength).toString('utf-8'),
    password: buffer.subarray(3 + usernameLength, length).toString('utf-8'),
    length,
  };
}

/**
 * Reply packet with an all-zero IPv4 bind address
 */
export function createReply(replyCode: number): Buffer {
  return Buffer.from([SOCKS_VERSION, replyCode, 0x00, ADDR_IPV4, 0, 0, 0, 0, 0, 0]);
}

export function createAuthResponse(method: number): Buffer {
  return Buffer.from([SOCKS_VERSION, method]);
}

export function createUserPassResponse(success: boolean): Buffer {
  return Buffer.from([USERPASS_VERSION, success ? 0x00 : 0x01]);
}
