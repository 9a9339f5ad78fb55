/**
 * Centralized environment configuration for the chain auditor
 *
 * All environment variables should be accessed through this module to ensure:
 * - Type safety with proper parsing
 * - Sensible defaults
 * - Single source of truth
 *
 * Values are read when the accessor is called, so a `.env` file loaded by the
 * CLI before the first call is honoured.
 */

// =============================================================================
// Helper Functions
// =============================================================================

export function parseIntEnv(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

export function parseBoolEnv(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true' || value === '1';
}

export function parseStringEnv(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

// =============================================================================
// Audit Configuration
// =============================================================================

export interface AuditEnv {
  /** Intermediate subject CN the leaf issuer is checked against */
  AUDIT_TARGET_CN: string;
  /** Log a trace of every audited chain */
  AUDIT_DEBUG: boolean;
  /** Number of concurrent probe workers */
  PROBE_WORKERS: number;
  /** Per-host TCP/TLS timeout in milliseconds */
  PROBE_TIMEOUT_MS: number;
  /** Port probed on every host */
  PROBE_PORT: number;
}

export const AUDIT_DEFAULTS: AuditEnv = {
  AUDIT_TARGET_CN: 'R3',
  AUDIT_DEBUG: false,
  PROBE_WORKERS: 10,
  PROBE_TIMEOUT_MS: 1000,
  PROBE_PORT: 443,
};

export function readAuditEnv(): AuditEnv {
  return {
    AUDIT_TARGET_CN: parseStringEnv('AUDIT_TARGET_CN', AUDIT_DEFAULTS.AUDIT_TARGET_CN),
    AUDIT_DEBUG: parseBoolEnv('AUDIT_DEBUG', AUDIT_DEFAULTS.AUDIT_DEBUG),
    PROBE_WORKERS: parseIntEnv('PROBE_WORKERS', AUDIT_DEFAULTS.PROBE_WORKERS),
    PROBE_TIMEOUT_MS: parseIntEnv('PROBE_TIMEOUT_MS', AUDIT_DEFAULTS.PROBE_TIMEOUT_MS),
    PROBE_PORT: parseIntEnv('PROBE_PORT', AUDIT_DEFAULTS.PROBE_PORT),
  };
}
