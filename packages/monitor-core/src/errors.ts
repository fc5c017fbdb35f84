import type { ZodIssue } from 'zod';

export class ConfigError extends Error {
  constructor(message: string, public readonly issues: ZodIssue[] = []) {
    super(
      issues.length > 0
        ? `${message}: ${issues.map((issue) => `${issue.path.join('.')} ${issue.message}`).join('; ')}`
        : message
    );
    this.name = 'ConfigError';
  }
}

/**
 * Raised for misuse of a detector (unknown key, unknown detector name), as
 * opposed to a failed measurement, which becomes an ERROR result.
 */
export class DetectorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DetectorError';
  }
}

export class TimeoutError extends Error {
  constructor(label: string, public readonly timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}
