/* =============================================================================
 * MODULE: tlsProber.ts
 * =============================================================================
 * Opens one TLS connection to a host with peer verification switched off and
 * hands the certificate chain the server sent to a ChainInspector. Network
 * failures of any kind produce NO_ISSUE; nothing is retried.
 *
 * The server's bytes are read through a tap in front of the TLS socket: the
 * chain Node exposes after the handshake is rebuilt by issuer matching and
 * loses served certificates that do not link to the leaf. Under TLS 1.3 the
 * tapped Certificate message is encrypted, so the socket's key log supplies
 * the server handshake traffic secret needed to open it.
 * =============================================================================
 */

import net from 'node:net';
import tls from 'node:tls';
import { Duplex } from 'node:stream';
import { createModuleLogger } from '../core/logger.js';
import { NO_ISSUE, type AuditConfig, type Verdict } from '../core/types.js';
import { HandshakeReader } from '../net/tlsRecords.js';
import { readKeylogSecret, SERVER_HANDSHAKE_SECRET_LABEL } from '../net/tls13Keys.js';
import { decodeChain } from './chainDecoder.js';
import { auditChain } from './chainAudit.js';

const log = createModuleLogger('tlsProber');

/* ---------- Types --------------------------------------------------------- */

/** Receives the raw served chain, leaf first, in place of the transport's own verification. */
export type ChainInspector = (rawCerts: readonly Uint8Array[], hostname: string) => Verdict;

export type Prober = (hostname: string) => Promise<Verdict>;

export interface ProbeOptions {
  inspector: ChainInspector;
  /** Defaults to 443 */
  port?: number;
  /** Bounds connect and handshake together. Defaults to 1000 ms */
  timeoutMs?: number;
}

/* ---------- Config -------------------------------------------------------- */

export const DEFAULT_PROBE_PORT = 443;
export const DEFAULT_PROBE_TIMEOUT_MS = 1000;

/* ---------- Helpers ------------------------------------------------------- */

export function createChainInspector(config: AuditConfig): ChainInspector {
  return (rawCerts, hostname) =>
    auditChain(decodeChain(rawCerts), config, (rendered) => {
      log.info({ hostname, chain: rendered }, 'Audited chain');
    });
}

function inspectChain(inspector: ChainInspector, rawCerts: readonly Uint8Array[], hostname: string): Verdict {
  try {
    return inspector(rawCerts, hostname);
  } catch (error) {
    log.warn({ err: error, hostname }, 'Chain inspector failed');
    return NO_ISSUE;
  }
}

/**
 * Wrap a TCP socket in a Duplex that reports every inbound chunk to `onData`
 * before TLS sees it.
 */
function tapSocket(tcp: net.Socket, onData: (chunk: Buffer) => void): Duplex {
  const tap = new Duplex({
    read() {
      tcp.resume();
    },
    write(chunk: Buffer, _encoding, callback) {
      tcp.write(chunk, callback);
    },
    final(callback) {
      tcp.end(callback);
    },
    destroy(error, callback) {
      tcp.destroy();
      callback(error);
    },
  });

  tcp.on('data', (chunk: Buffer) => {
    onData(chunk);
    if (!tap.push(chunk)) tcp.pause();
  });
  tcp.on('end', () => tap.push(null));
  tcp.on('error', (error) => tap.destroy(error));
  tcp.on('close', () => tap.destroy());

  return tap;
}

/* ---------- Public entry-point ------------------------------------------- */

export function probeHostname(hostname: string, options: ProbeOptions): Promise<Verdict> {
  const port = options.port ?? DEFAULT_PROBE_PORT;
  const timeoutMs = options.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
  const start = Date.now();

  return new Promise<Verdict>((resolve) => {
    let verdict: Verdict = NO_ISSUE;
    let settled = false;

    const reader = new HandshakeReader(
      (rawCerts) => {
        log.debug({ hostname, certificates: rawCerts.length }, 'Received certificate chain');
        verdict = inspectChain(options.inspector, rawCerts, hostname);
      },
      (error) => log.debug({ err: error, hostname }, 'Could not read served chain'),
    );

    const tcp = net.connect({ host: hostname, port });
    const tap = tapSocket(tcp, (chunk) => reader.push(chunk));
    const socket = tls.connect({
      socket: tap,
      servername: net.isIP(hostname) === 0 ? hostname : undefined,
      rejectUnauthorized: false,
    });
    socket.on('keylog', (line) => {
      const secret = readKeylogSecret(line, SERVER_HANDSHAKE_SECRET_LABEL);
      if (secret !== undefined) reader.setServerHandshakeSecret(secret);
    });

    const finish = (outcome: string) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      socket.destroy();
      tcp.destroy();
      log.debug({ hostname, outcome, verdict, durationMs: Date.now() - start }, 'Probe completed');
      resolve(verdict);
    };

    const timer = setTimeout(() => finish('timeout'), timeoutMs);

    tap.on('error', (error) => {
      log.debug({ err: error, hostname }, 'Connection failed');
      finish('error');
    });
    socket.once('secureConnect', () => finish('handshake'));
    socket.on('error', (error) => {
      log.debug({ err: error, hostname }, 'Probe failed');
      finish('error');
    });
    socket.once('close', () => finish('closed'));
  });
}

export function createProber(options: ProbeOptions): Prober {
  return (hostname) => probeHostname(hostname, options);
}
