import { CheckStatus, Severity } from './types';

const SEVERITY_ORDER: Record<Severity, number> = {
  [Severity.INFO]: 0,
  [Severity.WARNING]: 1,
  [Severity.CRITICAL]: 2,
};

// Ranking used when folding many results into one summary status.
// ERROR sits above OK so a failed measurement is never reported as healthy,
// and below WARNING so it never outranks a real finding.
const SUMMARY_ORDER: Record<CheckStatus, number> = {
  [CheckStatus.NO_DATA]: 0,
  [CheckStatus.OK]: 1,
  [CheckStatus.ERROR]: 2,
  [CheckStatus.WARNING]: 3,
  [CheckStatus.CRITICAL]: 4,
};

function compareSeverity(a: Severity, b: Severity): number {
  return SEVERITY_ORDER[a] - SEVERITY_ORDER[b];
}

export function maxSeverity(a: Severity, b: Severity): Severity {
  return compareSeverity(a, b) >= 0 ? a : b;
}

/**
 * True for WARNING and CRITICAL only.
 */
export function isBreach(status: CheckStatus): boolean {
  return status === CheckStatus.WARNING || status === CheckStatus.CRITICAL;
}

export function worstStatus(statuses: CheckStatus[]): CheckStatus {
  let worst = CheckStatus.NO_DATA;
  for (const status of statuses) {
    if (SUMMARY_ORDER[status] > SUMMARY_ORDER[worst]) {
      worst = status;
    }
  }
  return worst;
}

export function severityForStatus(status: CheckStatus): Severity {
  switch (status) {
    case CheckStatus.CRITICAL:
      return Severity.CRITICAL;
    case CheckStatus.WARNING:
      return Severity.WARNING;
    default:
      return Severity.INFO;
  }
}
