import type { Verdict } from '../core/types.js';

export interface AuditSummary {
  /** Hostnames probed */
  probed: number;
  /** Non-empty verdicts reported */
  findings: number;
}

export interface Reporter {
  finding(verdict: Verdict, hostname: string): void;
  done(summary: AuditSummary): void;
}

export const COMPLETION_MARKER = 'Done';

/**
 * One line per misconfigured leaf (its subject CN), then the completion marker.
 */
export function createTextReporter(write: (line: string) => void): Reporter {
  return {
    finding(verdict) {
      write(`${verdict}\n`);
    },
    done() {
      write(`${COMPLETION_MARKER}\n`);
    },
  };
}
