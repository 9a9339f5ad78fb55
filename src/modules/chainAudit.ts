/* =============================================================================
 * MODULE: chainAudit.ts
 * =============================================================================
 * A leaf that names the audit target as its issuer must be served together
 * with a certificate whose subject is that target. This is a name-containment
 * check only; signatures, validity periods and revocation are not examined.
 * =============================================================================
 */

import { NO_ISSUE, type AuditConfig, type Chain, type Verdict } from '../core/types.js';

export type ChainTrace = (rendered: string) => void;

/** Render each certificate's subject and issuer CN, leaf first. */
export function describeChain(chain: Chain): string {
  return chain
    .map((cert, index) => {
      const label = index === 0 ? 'leaf' : `chain[${index}]`;
      return `${label} [subject: ${cert.subjectCommonName} | issuer: ${cert.issuerCommonName}]`;
    })
    .join(' -> ');
}

/**
 * Returns the leaf subject CN when the leaf claims the audit target as issuer
 * but no served non-leaf certificate carries it, otherwise NO_ISSUE.
 */
export function auditChain(chain: Chain, config: AuditConfig, trace?: ChainTrace): Verdict {
  if (chain.length <= 1) return NO_ISSUE;

  if (config.diagnosticsEnabled && trace) {
    trace(describeChain(chain));
  }

  const [leaf, ...rest] = chain;
  if (leaf.issuerCommonName !== config.auditTargetIdentity) return NO_ISSUE;

  const served = rest.some((cert) => cert.subjectCommonName === config.auditTargetIdentity);
  return served ? NO_ISSUE : leaf.subjectCommonName;
}
