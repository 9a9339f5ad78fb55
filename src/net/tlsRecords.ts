/**
 * Server handshake reader
 *
 * Follows the bytes a server sends during the handshake and pulls the DER
 * certificate list out of its Certificate message, exactly as served. Records
 * may be split across reads and handshake messages across records.
 *
 * TLS 1.2 sends the Certificate message in plaintext before ChangeCipherSpec.
 * TLS 1.3 encrypts it; the reader holds those records until it is handed the
 * server handshake traffic secret.
 */

import { lookupCipherSuite, RecordDecrypter, type InnerPlaintext } from './tls13Keys.js';

const RECORD_HEADER_LENGTH = 5;
const HANDSHAKE_HEADER_LENGTH = 4;
const UINT24_LENGTH = 3;
// 2^14 plaintext plus the largest expansion a record may carry
const MAX_RECORD_LENGTH = 16384 + 2048;

const CONTENT_TYPE = {
  CHANGE_CIPHER_SPEC: 20,
  ALERT: 21,
  HANDSHAKE: 22,
  APPLICATION_DATA: 23,
} as const;

const HANDSHAKE_TYPE = {
  SERVER_HELLO: 2,
  CERTIFICATE: 11,
} as const;

const TLS13_VERSION = 0x0304;
const EXTENSION_SUPPORTED_VERSIONS = 43;
const SESSION_ID_OFFSET = 34;

// ServerHello.random of a HelloRetryRequest
const HELLO_RETRY_RANDOM = Buffer.from('cf21ad74e59a6111be1d8c021e65b891c2a211167abb8c5e079e09e2c8a8339c', 'hex');

const KNOWN_CONTENT_TYPES: ReadonlySet<number> = new Set<number>(Object.values(CONTENT_TYPE));

export interface ServerHello {
  /** Negotiated version, from supported_versions when the server sent it */
  version: number;
  cipherSuite: number;
  helloRetry: boolean;
}

export function parseServerHello(body: Buffer): ServerHello | undefined {
  if (body.length < SESSION_ID_OFFSET + 1) return undefined;
  let offset = SESSION_ID_OFFSET + 1 + body[SESSION_ID_OFFSET];
  // cipher_suite, then legacy_compression_method
  if (offset + 3 > body.length) return undefined;

  const hello: ServerHello = {
    version: body.readUInt16BE(0),
    cipherSuite: body.readUInt16BE(offset),
    helloRetry: body.subarray(2, SESSION_ID_OFFSET).equals(HELLO_RETRY_RANDOM),
  };
  offset += 3;
  if (offset + 2 > body.length) return hello;

  const end = Math.min(offset + 2 + body.readUInt16BE(offset), body.length);
  offset += 2;
  while (offset + 4 <= end) {
    const type = body.readUInt16BE(offset);
    const length = body.readUInt16BE(offset + 2);
    const data = offset + 4;
    if (type === EXTENSION_SUPPORTED_VERSIONS && length >= 2 && data + 2 <= end) {
      hello.version = body.readUInt16BE(data);
    }
    offset = data + length;
  }
  return hello;
}

/**
 * Split a TLS 1.2 Certificate handshake body into its DER entries. A truncated
 * entry ends the list.
 */
export function parseCertificateList(body: Buffer): Buffer[] {
  if (body.length < UINT24_LENGTH) return [];

  const end = Math.min(UINT24_LENGTH + body.readUIntBE(0, UINT24_LENGTH), body.length);
  const certs: Buffer[] = [];
  let offset = UINT24_LENGTH;

  while (offset + UINT24_LENGTH <= end) {
    const length = body.readUIntBE(offset, UINT24_LENGTH);
    const start = offset + UINT24_LENGTH;
    if (start + length > end) break;
    certs.push(body.subarray(start, start + length));
    offset = start + length;
  }

  return certs;
}

/**
 * TLS 1.3 variant: a request context precedes the list and every entry carries
 * its own extensions.
 */
export function parseTls13CertificateList(body: Buffer): Buffer[] {
  if (body.length < 1) return [];
  const listOffset = 1 + body[0];
  if (listOffset + UINT24_LENGTH > body.length) return [];

  const end = Math.min(listOffset + UINT24_LENGTH + body.readUIntBE(listOffset, UINT24_LENGTH), body.length);
  const certs: Buffer[] = [];
  let offset = listOffset + UINT24_LENGTH;

  while (offset + UINT24_LENGTH <= end) {
    const length = body.readUIntBE(offset, UINT24_LENGTH);
    const start = offset + UINT24_LENGTH;
    if (start + length + 2 > end) break;
    certs.push(body.subarray(start, start + length));
    offset = start + length + 2 + body.readUInt16BE(start + length);
  }

  return certs;
}

type Protocol = 'tls12' | 'tls13';

interface SealedRecord {
  header: Buffer;
  fragment: Buffer;
}

export class HandshakeReader {
  private records: Buffer = Buffer.alloc(0);
  private handshake: Buffer = Buffer.alloc(0);
  private finished = false;
  private protocol: Protocol = 'tls12';
  private cipherSuite?: number;
  private secret?: Buffer;
  private decrypter?: RecordDecrypter;
  private sealed: SealedRecord[] = [];

  constructor(
    private readonly onCertificates: (rawCerts: Buffer[]) => void,
    private readonly onError?: (error: Error) => void,
  ) {}

  /** True once the certificate list was delivered or can no longer be read. */
  get done(): boolean {
    return this.finished;
  }

  push(chunk: Buffer): void {
    if (this.finished) return;
    this.records = this.records.length > 0 ? Buffer.concat([this.records, chunk]) : chunk;

    while (!this.finished && this.records.length >= RECORD_HEADER_LENGTH) {
      const contentType = this.records[0];
      const length = this.records.readUInt16BE(3);

      if (!KNOWN_CONTENT_TYPES.has(contentType) || length > MAX_RECORD_LENGTH) {
        this.finish();
        return;
      }
      if (this.records.length < RECORD_HEADER_LENGTH + length) return;

      const header = this.records.subarray(0, RECORD_HEADER_LENGTH);
      const fragment = this.records.subarray(RECORD_HEADER_LENGTH, RECORD_HEADER_LENGTH + length);
      this.records = this.records.subarray(RECORD_HEADER_LENGTH + length);

      if (this.protocol === 'tls13') {
        // ChangeCipherSpec is only a middlebox courtesy in TLS 1.3
        if (contentType === CONTENT_TYPE.APPLICATION_DATA) {
          this.sealed.push({ header, fragment });
          this.openSealed();
        } else if (contentType === CONTENT_TYPE.HANDSHAKE) {
          this.readHandshake(fragment);
        }
        continue;
      }

      if (contentType === CONTENT_TYPE.CHANGE_CIPHER_SPEC || contentType === CONTENT_TYPE.APPLICATION_DATA) {
        // everything after this point is encrypted
        this.finish();
        return;
      }
      if (contentType === CONTENT_TYPE.HANDSHAKE) {
        this.readHandshake(fragment);
      }
    }
  }

  /** Supply the TLS 1.3 server handshake traffic secret. Ignored for TLS 1.2. */
  setServerHandshakeSecret(secret: Buffer): void {
    if (this.finished) return;
    this.secret = secret;
    this.openSealed();
  }

  private openSealed(): void {
    const decrypter = this.decrypter ?? this.createDecrypter();
    if (decrypter === undefined) return;

    while (!this.finished && this.sealed.length > 0) {
      const [{ header, fragment }] = this.sealed.splice(0, 1);
      let opened: InnerPlaintext;
      try {
        opened = decrypter.open(header, fragment);
      } catch (error) {
        this.fail(error instanceof Error ? error : new Error(String(error)));
        return;
      }
      if (opened.contentType === CONTENT_TYPE.HANDSHAKE) {
        this.readHandshake(opened.content);
      } else if (opened.contentType === CONTENT_TYPE.ALERT) {
        this.finish();
      }
    }
  }

  private createDecrypter(): RecordDecrypter | undefined {
    if (this.secret === undefined || this.cipherSuite === undefined) return undefined;
    const suite = lookupCipherSuite(this.cipherSuite);
    if (suite === undefined) {
      this.fail(new Error(`unsupported TLS 1.3 cipher suite 0x${this.cipherSuite.toString(16).padStart(4, '0')}`));
      return undefined;
    }
    this.decrypter = new RecordDecrypter(suite, this.secret);
    return this.decrypter;
  }

  private readHandshake(fragment: Buffer): void {
    this.handshake = this.handshake.length > 0 ? Buffer.concat([this.handshake, fragment]) : fragment;

    while (!this.finished && this.handshake.length >= HANDSHAKE_HEADER_LENGTH) {
      const messageType = this.handshake[0];
      const length = this.handshake.readUIntBE(1, UINT24_LENGTH);
      if (this.handshake.length < HANDSHAKE_HEADER_LENGTH + length) return;

      const body = this.handshake.subarray(HANDSHAKE_HEADER_LENGTH, HANDSHAKE_HEADER_LENGTH + length);
      this.handshake = this.handshake.subarray(HANDSHAKE_HEADER_LENGTH + length);

      if (messageType === HANDSHAKE_TYPE.SERVER_HELLO) {
        this.readServerHello(body);
      } else if (messageType === HANDSHAKE_TYPE.CERTIFICATE) {
        const certs = this.protocol === 'tls13' ? parseTls13CertificateList(body) : parseCertificateList(body);
        this.finish();
        this.onCertificates(certs);
        return;
      }
    }
  }

  private readServerHello(body: Buffer): void {
    const hello = parseServerHello(body);
    if (hello === undefined || hello.version !== TLS13_VERSION) return;
    this.protocol = 'tls13';
    // a HelloRetryRequest is followed by the real ServerHello
    if (!hello.helloRetry) {
      this.cipherSuite = hello.cipherSuite;
    }
  }

  private fail(error: Error): void {
    this.finish();
    this.onError?.(error);
  }

  private finish(): void {
    this.finished = true;
    this.records = Buffer.alloc(0);
    this.handshake = Buffer.alloc(0);
    this.sealed = [];
  }
}
