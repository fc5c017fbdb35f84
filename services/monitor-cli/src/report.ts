/**
 * Terminal output and exit codes for the CLI
 */

import pc from 'picocolors';
import { CheckStatus, type CheckResult, type CheckSummary } from '@sentinel/shared-types';

export type Colors = ReturnType<typeof pc.createColors>;

export const EXIT_OK = 0;
export const EXIT_UNHEALTHY = 1;
export const EXIT_CRITICAL = 2;

/**
 * 0 healthy or nothing to measure, 1 warning or failed measurement,
 * 2 critical. Usage and fatal errors also exit 2.
 */
export function exitCodeFor(status: CheckStatus): number {
  switch (status) {
    case CheckStatus.CRITICAL:
      return EXIT_CRITICAL;
    case CheckStatus.WARNING:
    case CheckStatus.ERROR:
      return EXIT_UNHEALTHY;
    default:
      return EXIT_OK;
  }
}

export function formatStatus(status: CheckStatus, colors: Colors): string {
  const label = status.toUpperCase();
  switch (status) {
    case CheckStatus.OK:
      return colors.green(label);
    case CheckStatus.WARNING:
      return colors.yellow(label);
    case CheckStatus.CRITICAL:
      return colors.red(colors.bold(label));
    case CheckStatus.ERROR:
      return colors.magenta(label);
    case CheckStatus.NO_DATA:
      return colors.dim(label);
  }
}

function formatResult(result: CheckResult, colors: Colors): string {
  return `  ${formatStatus(result.status, colors)} ${result.message}`;
}

export function formatSummary(summary: CheckSummary, colors: Colors): string {
  const lines = [`${colors.bold(`${summary.detector} ${summary.businessDate}`)}: ${formatStatus(summary.status, colors)}`];
  if (summary.results.length === 0) {
    lines.push(colors.dim('  nothing to check'));
  }
  for (const result of summary.results) {
    lines.push(formatResult(result, colors));
  }
  if (summary.alerted) {
    lines.push(colors.dim('  alert sent'));
  }
  return lines.join('\n');
}

export function formatOverall(status: CheckStatus, exitCode: number, colors: Colors): string {
  return `Overall: ${formatStatus(status, colors)} (exit ${exitCode})`;
}
