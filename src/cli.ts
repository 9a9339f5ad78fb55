import { parseArgs } from 'node:util';
import { readAuditEnv, type AuditEnv } from './core/env.js';
import { Errors, isAuditorError } from './core/errors.js';
import { createModuleLogger } from './core/logger.js';
import type { AuditConfig } from './core/types.js';
import { createChainInspector, createProber, type Prober } from './modules/tlsProber.js';
import { auditHostnames } from './scan/auditHostnames.js';
import { createTextReporter } from './scan/reporter.js';
import { readHostnameTsv } from './util/hostnameSource.js';

const log = createModuleLogger('cli');

export const USAGE = `Usage: chain-auditor [options] [hostname ...]

Reports every host whose leaf certificate names the audit target as issuer
while the served chain does not contain the audit target.

Options:
  --tsv-file <path>    read hostnames (labels reversed) from the first column of a tsv file
  --target <cn>        subject CN of the intermediate to check for (default: R3)
  --workers <n>        concurrent probes (default: 10)
  --timeout-ms <ms>    per-host connection timeout (default: 1000)
  --port <port>        port to probe (default: 443)
  --debug              log every audited chain
  -h, --help           show this message
`;

export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

export interface CliOptions {
  hostnames: string[];
  tsvFile?: string;
  help: boolean;
  debug: boolean;
  target: string;
  workers: number;
  timeoutMs: number;
  port: number;
}

function parsePositiveInt(option: string, value: string, max: number): number {
  if (!/^\d+$/.test(value)) {
    throw Errors.invalidOption(option, `Expected a positive integer`, value);
  }
  const parsed = Number.parseInt(value, 10);
  if (parsed < 1 || parsed > max) {
    throw Errors.invalidOption(option, `Expected an integer between 1 and ${max}`, value);
  }
  return parsed;
}

/** The flag wins over the environment; either way the value is range-checked. */
function resolvePositiveInt(
  option: string,
  flag: string | undefined,
  envKey: keyof AuditEnv,
  envValue: number,
  max = Number.MAX_SAFE_INTEGER,
): number {
  if (flag !== undefined) return parsePositiveInt(option, flag, max);
  if (!Number.isInteger(envValue) || envValue < 1 || envValue > max) {
    throw Errors.invalidOption(option, `${envKey} must be an integer between 1 and ${max}`, String(envValue));
  }
  return envValue;
}

function readArgs(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: true,
      options: {
        'tsv-file': { type: 'string' },
        target: { type: 'string' },
        workers: { type: 'string' },
        'timeout-ms': { type: 'string' },
        port: { type: 'string' },
        debug: { type: 'boolean' },
        help: { type: 'boolean', short: 'h' },
      },
    });
  } catch (error) {
    throw Errors.invalidOption('arguments', error instanceof Error ? error.message : String(error));
  }
}

export function parseCliArgs(argv: readonly string[], env: AuditEnv = readAuditEnv()): CliOptions {
  const { values, positionals } = readArgs(argv);
  return {
    hostnames: positionals,
    tsvFile: values['tsv-file'] || undefined,
    help: values.help ?? false,
    debug: values.debug ?? env.AUDIT_DEBUG,
    target: values.target ?? env.AUDIT_TARGET_CN,
    workers: resolvePositiveInt('workers', values.workers, 'PROBE_WORKERS', env.PROBE_WORKERS),
    timeoutMs: resolvePositiveInt('timeout-ms', values['timeout-ms'], 'PROBE_TIMEOUT_MS', env.PROBE_TIMEOUT_MS),
    port: resolvePositiveInt('port', values.port, 'PROBE_PORT', env.PROBE_PORT, 65535),
  };
}

/** A tsv file, when given, takes precedence over positional hostnames. */
export async function resolveHostnames(options: Pick<CliOptions, 'hostnames' | 'tsvFile'>): Promise<string[]> {
  if (options.tsvFile) {
    return readHostnameTsv(options.tsvFile);
  }
  return options.hostnames;
}

export async function runCli(argv: readonly string[], io: CliIo, overrides: { prober?: Prober } = {}): Promise<number> {
  let options: CliOptions;
  let hostnames: string[];
  try {
    options = parseCliArgs(argv);
    if (options.help) {
      io.stdout(USAGE);
      return 0;
    }
    hostnames = await resolveHostnames(options);
    if (hostnames.length === 0) {
      throw Errors.noHostnames();
    }
  } catch (error) {
    if (!isAuditorError(error)) throw error;
    log.debug({ code: error.code, details: error.details }, 'Rejected input');
    io.stderr(`${error.message}\n\n${USAGE}`);
    return 1;
  }

  const config: AuditConfig = {
    auditTargetIdentity: options.target,
    diagnosticsEnabled: options.debug,
  };
  const prober =
    overrides.prober ??
    createProber({
      inspector: createChainInspector(config),
      port: options.port,
      timeoutMs: options.timeoutMs,
    });

  await auditHostnames(hostnames, {
    prober,
    reporter: createTextReporter(io.stdout),
    workerCount: options.workers,
  });
  return 0;
}
