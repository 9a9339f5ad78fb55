import { describe, it, expect, vi } from 'vitest';
import { auditHostnames } from '../src/scan/auditHostnames.js';
import { createTextReporter, type AuditSummary, type Reporter } from '../src/scan/reporter.js';
import type { Verdict } from '../src/core/types.js';

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

function hostList(count: number): string[] {
  return Array.from({ length: count }, (_, i) => `host${i}.example`);
}

function recordingReporter() {
  const findings: Array<{ verdict: Verdict; hostname: string }> = [];
  const summaries: AuditSummary[] = [];
  const reporter: Reporter = {
    finding(verdict, hostname) {
      findings.push({ verdict, hostname });
    },
    done(summary) {
      summaries.push(summary);
    },
  };
  return { reporter, findings, summaries };
}

describe('auditHostnames', () => {
  it('probes every hostname exactly once', async () => {
    const hostnames = hostList(25);
    const calls: string[] = [];
    const { reporter, findings, summaries } = recordingReporter();

    const summary = await auditHostnames(hostnames, {
      reporter,
      workerCount: 10,
      prober: async (hostname) => {
        calls.push(hostname);
        await sleep(calls.length % 3);
        return hostname.endsWith('0.example') ? `leaf-of-${hostname}` : '';
      },
    });

    expect([...calls].sort()).toEqual([...hostnames].sort());
    expect(findings.map((f) => f.hostname).sort()).toEqual(['host0.example', 'host10.example', 'host20.example']);
    expect(summary).toEqual({ probed: 25, findings: 3 });
    expect(summaries).toEqual([{ probed: 25, findings: 3 }]);
  });

  it('finishes immediately with no hostnames', async () => {
    const prober = vi.fn(async () => '');
    const { reporter, summaries } = recordingReporter();

    const summary = await auditHostnames([], { prober, reporter });

    expect(prober).not.toHaveBeenCalled();
    expect(summary).toEqual({ probed: 0, findings: 0 });
    expect(summaries).toEqual([{ probed: 0, findings: 0 }]);
  });

  it('finishes with fewer hostnames than workers', async () => {
    const prober = vi.fn(async (hostname: string) => hostname);
    const { reporter, findings } = recordingReporter();

    const summary = await auditHostnames(['a.com', 'b.com', 'c.com'], { prober, reporter, workerCount: 10 });

    expect(prober).toHaveBeenCalledTimes(3);
    expect(findings.map((f) => f.verdict).sort()).toEqual(['a.com', 'b.com', 'c.com']);
    expect(summary).toEqual({ probed: 3, findings: 3 });
  });

  it('never runs more probes at once than there are workers', async () => {
    let active = 0;
    let peak = 0;
    const { reporter } = recordingReporter();

    await auditHostnames(hostList(20), {
      reporter,
      workerCount: 4,
      prober: async () => {
        active++;
        peak = Math.max(peak, active);
        await sleep(5);
        active--;
        return '';
      },
    });

    expect(peak).toBe(4);
  });

  it('keeps input order with a single worker', async () => {
    const { reporter, findings } = recordingReporter();

    await auditHostnames(['c.com', 'a.com', 'b.com'], {
      reporter,
      workerCount: 1,
      prober: async (hostname) => hostname.toUpperCase(),
    });

    expect(findings.map((f) => f.verdict)).toEqual(['C.COM', 'A.COM', 'B.COM']);
  });

  it('prints each finding then the completion marker last', async () => {
    const lines: string[] = [];

    await auditHostnames(['a.com', 'b.com'], {
      reporter: createTextReporter((line) => lines.push(line)),
      prober: async (hostname) => (hostname === 'a.com' ? 'a.com' : ''),
    });

    expect(lines).toEqual(['a.com\n', 'Done\n']);
  });

  it('treats a probe that throws as no finding', async () => {
    const { reporter, findings } = recordingReporter();

    const summary = await auditHostnames(['bad.com', 'good.com'], {
      reporter,
      prober: async (hostname) => {
        if (hostname === 'bad.com') throw new Error('socket exploded');
        return 'good.com';
      },
    });

    expect(findings).toEqual([{ verdict: 'good.com', hostname: 'good.com' }]);
    expect(summary).toEqual({ probed: 2, findings: 1 });
  });

  it('drains the pipeline before surfacing a reporter failure', async () => {
    const prober = vi.fn(async (hostname: string) => hostname);
    const done = vi.fn();
    const failure = new Error('stdout closed');
    const reporter: Reporter = {
      finding() {
        throw failure;
      },
      done,
    };

    await expect(auditHostnames(hostList(15), { prober, reporter, workerCount: 3 })).rejects.toBe(failure);
    expect(prober).toHaveBeenCalledTimes(15);
    expect(done).not.toHaveBeenCalled();
  });

  it('rejects a worker count below one', async () => {
    const { reporter } = recordingReporter();
    await expect(auditHostnames(['a.com'], { prober: async () => '', reporter, workerCount: 0 })).rejects.toThrow(
      'worker count must be a positive integer (got 0)',
    );
  });
});
