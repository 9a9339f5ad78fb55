/* =============================================================================
 * MODULE: chainDecoder.ts
 * =============================================================================
 * Turns the DER records a server sent during the handshake into Certificate
 * objects. Records that do not parse are skipped; order is preserved.
 * =============================================================================
 */

import { X509Certificate } from 'node:crypto';
import type { Certificate } from '../core/types.js';

/**
 * Read the CN attribute from a distinguished name as rendered by
 * X509Certificate (one `KEY=value` attribute per line). The last CN wins when
 * there are several; a name without one yields the empty string.
 */
export function commonNameOf(distinguishedName: string): string {
  let commonName = '';
  for (const line of distinguishedName.split('\n')) {
    if (line.startsWith('CN=')) {
      commonName = line.slice(3);
    }
  }
  return commonName;
}

function decodeCertificate(raw: Uint8Array): Certificate | null {
  try {
    const x509 = new X509Certificate(raw);
    return {
      subjectCommonName: commonNameOf(x509.subject),
      issuerCommonName: commonNameOf(x509.issuer),
    };
  } catch {
    return null;
  }
}

export function decodeChain(rawCerts: readonly Uint8Array[]): Certificate[] {
  const chain: Certificate[] = [];
  for (const raw of rawCerts) {
    const cert = decodeCertificate(raw);
    if (cert) chain.push(cert);
  }
  return chain;
}
