/**
 * Probe scheduler
 *
 * producer -> work channel -> N workers -> result channel -> collector
 *
 * The producer queues every hostname once and closes the work channel. Each
 * worker probes until the work channel is drained and forwards every verdict,
 * empty ones included. The result channel is closed only after all workers
 * have returned, and the run completes only after the collector has drained it.
 */

import { Channel } from '../core/channel.js';
import { createModuleLogger } from '../core/logger.js';
import { NO_ISSUE, isFinding, type Verdict } from '../core/types.js';
import type { Prober } from '../modules/tlsProber.js';
import type { AuditSummary, Reporter } from './reporter.js';

const log = createModuleLogger('auditHostnames');

export const DEFAULT_WORKER_COUNT = 10;

export interface AuditRunOptions {
  prober: Prober;
  reporter: Reporter;
  /** Defaults to 10 */
  workerCount?: number;
}

interface ProbeResult {
  hostname: string;
  verdict: Verdict;
}

export async function auditHostnames(hostnames: readonly string[], options: AuditRunOptions): Promise<AuditSummary> {
  const workerCount = options.workerCount ?? DEFAULT_WORKER_COUNT;
  if (!Number.isInteger(workerCount) || workerCount < 1) {
    throw new Error(`worker count must be a positive integer (got ${workerCount})`);
  }

  const start = Date.now();
  const work = new Channel<string>(hostnames.length);
  const results = new Channel<ProbeResult>();
  const summary: AuditSummary = { probed: 0, findings: 0 };
  let reporterError: unknown;

  log.info({ hostnames: hostnames.length, workerCount }, 'Starting audit');

  const producer = (async () => {
    for (const hostname of hostnames) {
      await work.send(hostname);
    }
    work.close();
  })();

  const worker = async (workerId: number) => {
    for await (const hostname of work) {
      let verdict: Verdict;
      try {
        verdict = await options.prober(hostname);
      } catch (error) {
        log.warn({ err: error, hostname, workerId }, 'Probe threw, treating as no finding');
        verdict = NO_ISSUE;
      }
      await results.send({ hostname, verdict });
    }
  };
  const workers = Array.from({ length: workerCount }, (_, workerId) => worker(workerId));

  const collector = (async () => {
    for await (const { hostname, verdict } of results) {
      summary.probed++;
      if (!isFinding(verdict)) continue;
      summary.findings++;
      try {
        options.reporter.finding(verdict, hostname);
      } catch (error) {
        // keep draining so no worker is left blocked on a send
        reporterError ??= error;
      }
    }
  })();

  await Promise.all([producer, ...workers]);
  results.close();
  await collector;

  if (reporterError !== undefined) {
    throw reporterError;
  }

  options.reporter.done(summary);
  log.info({ ...summary, durationMs: Date.now() - start }, 'Audit complete');
  return summary;
}
