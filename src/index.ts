export { auditChain, describeChain, type ChainTrace } from './modules/chainAudit.js';
export { commonNameOf, decodeChain } from './modules/chainDecoder.js';
export {
  createChainInspector,
  createProber,
  probeHostname,
  DEFAULT_PROBE_PORT,
  DEFAULT_PROBE_TIMEOUT_MS,
  type ChainInspector,
  type ProbeOptions,
  type Prober,
} from './modules/tlsProber.js';
export { auditHostnames, DEFAULT_WORKER_COUNT, type AuditRunOptions } from './scan/auditHostnames.js';
export { createTextReporter, COMPLETION_MARKER, type AuditSummary, type Reporter } from './scan/reporter.js';
export { parseHostnameTsv, readHostnameTsv, reverseHostname } from './util/hostnameSource.js';
export {
  HandshakeReader,
  parseCertificateList,
  parseServerHello,
  parseTls13CertificateList,
  type ServerHello,
} from './net/tlsRecords.js';
export {
  hkdfExpandLabel,
  lookupCipherSuite,
  readKeylogSecret,
  RecordDecrypter,
  SERVER_HANDSHAKE_SECRET_LABEL,
  type CipherSuite,
} from './net/tls13Keys.js';
export { Channel } from './core/channel.js';
export { AuditorError, ErrorCode, Errors, isAuditorError, type ErrorCodeType } from './core/errors.js';
export { NO_ISSUE, isFinding, type AuditConfig, type Certificate, type Chain, type Verdict } from './core/types.js';
