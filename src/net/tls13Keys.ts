/**
 * TLS 1.3 handshake record protection
 *
 * A TLS 1.3 server encrypts everything after ServerHello, the Certificate
 * message included, under keys derived from the server handshake traffic
 * secret. The client's TLS stack reports that secret through its key log;
 * this module turns it into a record decrypter (RFC 8446 §5.2, §7.1, §7.3).
 */

import { createDecipheriv, createHmac } from 'node:crypto';

export const SERVER_HANDSHAKE_SECRET_LABEL = 'SERVER_HANDSHAKE_TRAFFIC_SECRET';

const AUTH_TAG_LENGTH = 16;
const IV_LENGTH = 12;

type HashName = 'sha256' | 'sha384';
type AeadAlgorithm = 'aes-128-gcm' | 'aes-256-gcm' | 'chacha20-poly1305';

export interface CipherSuite {
  name: string;
  algorithm: AeadAlgorithm;
  hash: HashName;
  keyLength: number;
}

const CIPHER_SUITES = new Map<number, CipherSuite>([
  [0x1301, { name: 'TLS_AES_128_GCM_SHA256', algorithm: 'aes-128-gcm', hash: 'sha256', keyLength: 16 }],
  [0x1302, { name: 'TLS_AES_256_GCM_SHA384', algorithm: 'aes-256-gcm', hash: 'sha384', keyLength: 32 }],
  [0x1303, { name: 'TLS_CHACHA20_POLY1305_SHA256', algorithm: 'chacha20-poly1305', hash: 'sha256', keyLength: 32 }],
]);

export function lookupCipherSuite(code: number): CipherSuite | undefined {
  return CIPHER_SUITES.get(code);
}

/** HKDF-Expand (RFC 5869 §2.3) */
export function hkdfExpand(hash: HashName, prk: Buffer, info: Buffer, length: number): Buffer {
  const blocks: Buffer[] = [];
  let previous: Buffer = Buffer.alloc(0);
  let produced = 0;
  for (let counter = 1; produced < length; counter++) {
    previous = createHmac(hash, prk).update(previous).update(info).update(Buffer.from([counter])).digest();
    blocks.push(previous);
    produced += previous.length;
  }
  return Buffer.concat(blocks).subarray(0, length);
}

export function hkdfExpandLabel(hash: HashName, secret: Buffer, label: string, context: Buffer, length: number): Buffer {
  const fullLabel = Buffer.from(`tls13 ${label}`, 'ascii');
  const info = Buffer.concat([
    Buffer.from([length >> 8, length & 0xff, fullLabel.length]),
    fullLabel,
    Buffer.from([context.length]),
    context,
  ]);
  return hkdfExpand(hash, secret, info, length);
}

/**
 * Pull the secret for `label` out of one NSS key log line
 * (`LABEL <client random hex> <secret hex>`).
 */
export function readKeylogSecret(line: Buffer | string, label: string): Buffer | undefined {
  const [name, , secret] = line.toString().trim().split(' ');
  if (name !== label || secret === undefined || !/^(?:[0-9a-f]{2})+$/i.test(secret)) return undefined;
  return Buffer.from(secret, 'hex');
}

export interface InnerPlaintext {
  contentType: number;
  content: Buffer;
}

interface AeadDecipher {
  setAAD(buffer: Buffer, options: { plaintextLength: number }): unknown;
  setAuthTag(tag: Buffer): unknown;
  update(data: Buffer): Buffer;
  final(): Buffer;
}

function createAeadDecipher(algorithm: AeadAlgorithm, key: Buffer, nonce: Buffer): AeadDecipher {
  switch (algorithm) {
    case 'chacha20-poly1305':
      return createDecipheriv(algorithm, key, nonce, { authTagLength: AUTH_TAG_LENGTH });
    case 'aes-128-gcm':
    case 'aes-256-gcm':
      return createDecipheriv(algorithm, key, nonce);
  }
}

/**
 * Opens the records a server protects under one traffic secret, in the order
 * they were sent.
 */
export class RecordDecrypter {
  private readonly key: Buffer;
  private readonly iv: Buffer;
  private sequence = 0n;

  constructor(
    private readonly suite: CipherSuite,
    secret: Buffer,
  ) {
    this.key = hkdfExpandLabel(suite.hash, secret, 'key', Buffer.alloc(0), suite.keyLength);
    this.iv = hkdfExpandLabel(suite.hash, secret, 'iv', Buffer.alloc(0), IV_LENGTH);
  }

  /**
   * Decrypt one record. `header` is the 5-byte record header, which is also the
   * additional data. Throws when the record fails authentication.
   */
  open(header: Buffer, fragment: Buffer): InnerPlaintext {
    if (fragment.length < AUTH_TAG_LENGTH) {
      throw new Error(`encrypted record of ${fragment.length} bytes is shorter than its tag`);
    }
    const ciphertext = fragment.subarray(0, fragment.length - AUTH_TAG_LENGTH);
    const tag = fragment.subarray(fragment.length - AUTH_TAG_LENGTH);

    const decipher = createAeadDecipher(this.suite.algorithm, this.key, this.nextNonce());
    decipher.setAAD(header, { plaintextLength: ciphertext.length });
    decipher.setAuthTag(tag);
    const plaintext = Buffer.concat([decipher.update(ciphertext), decipher.final()]);

    // content, then the real content type, then zero padding
    let end = plaintext.length;
    while (end > 0 && plaintext[end - 1] === 0) end--;
    if (end === 0) {
      throw new Error('encrypted record carries no content type');
    }
    return { contentType: plaintext[end - 1], content: plaintext.subarray(0, end - 1) };
  }

  private nextNonce(): Buffer {
    const nonce = Buffer.from(this.iv);
    const sequence = Buffer.alloc(8);
    sequence.writeBigUInt64BE(this.sequence);
    this.sequence += 1n;
    for (let i = 0; i < sequence.length; i++) {
      nonce[IV_LENGTH - sequence.length + i] ^= sequence[i];
    }
    return nonce;
  }
}
