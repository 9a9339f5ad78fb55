/**
 * Shared type definitions used across the auditor
 */

// =============================================================================
// Certificates
// =============================================================================

/**
 * The identity fields of one parsed X.509 certificate
 */
export type Certificate = Readonly<{
  subjectCommonName: string;
  issuerCommonName: string;
}>;

/**
 * Certificates in served order, leaf first
 */
export type Chain = readonly Certificate[];

// =============================================================================
// Audit
// =============================================================================

export interface AuditConfig {
  /** Subject CN of the intermediate a leaf must be served with when it names it as issuer */
  readonly auditTargetIdentity: string;
  /** Emit a trace of every audited chain */
  readonly diagnosticsEnabled: boolean;
}

/**
 * Per-host audit outcome: the empty string for "no issue", otherwise the leaf subject CN
 */
export type Verdict = string;

export const NO_ISSUE: Verdict = '';

export function isFinding(verdict: Verdict): boolean {
  return verdict !== NO_ISSUE;
}
