import { BoundaryResult } from './cuts.types';

export interface RunReport {
  total: number;
  applied: number;
  skippedIneligible: number;
  skippedInfeasible: number;
  failed: number;
  /** Any failed boundary points at a broken model; output should not be written. */
  suspect: boolean;
  results: BoundaryResult[];
}

export function summarizeResults(results: readonly BoundaryResult[]): RunReport {
  const count = (outcome: BoundaryResult['outcome']) =>
    results.filter((result) => result.outcome === outcome).length;

  const failed = count('failed');
  return {
    total: results.length,
    applied: count('applied'),
    skippedIneligible: count('skipped-ineligible'),
    skippedInfeasible: count('skipped-infeasible'),
    failed,
    suspect: failed > 0,
    results: [...results],
  };
}

export function mergeRunReports(reports: readonly RunReport[]): RunReport {
  return summarizeResults(reports.flatMap((report) => report.results));
}

/** Boundaries that passed detection, whatever happened to them afterwards. */
export function eligibleCount(report: RunReport): number {
  return report.total - report.skippedIneligible;
}

const OUTCOME_MARKS: Record<BoundaryResult['outcome'], string> = {
  applied: '✓',
  'skipped-ineligible': '-',
  'skipped-infeasible': '!',
  failed: '✗',
};

/**
 * One line per boundary followed by a totals line, e.g.
 *
 *   ✓ frame 100: J-cut: audio edit moved from frame 100 to 92
 *   - frame 250: audio gap
 *   1 applied, 1 skipped (1 ineligible, 0 infeasible), 0 failed
 */
export function formatRunReport(report: RunReport): string[] {
  const lines = report.results.map(
    (result) => `${OUTCOME_MARKS[result.outcome]} frame ${result.boundary.frame}: ${result.reason}`,
  );
  const skipped = report.skippedIneligible + report.skippedInfeasible;
  lines.push(
    `${report.applied} applied, ${skipped} skipped ` +
      `(${report.skippedIneligible} ineligible, ${report.skippedInfeasible} infeasible), ` +
      `${report.failed} failed`,
  );
  return lines;
}
