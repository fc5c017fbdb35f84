import { describe, it, expect } from 'vitest';
import { CheckStatus, Severity } from '../types';
import { isBreach, maxSeverity, severityForStatus, worstStatus } from '../status';

describe('worstStatus', () => {
  it('returns NO_DATA for an empty list', () => {
    expect(worstStatus([])).toBe(CheckStatus.NO_DATA);
  });

  it('picks CRITICAL over everything else', () => {
    expect(
      worstStatus([CheckStatus.OK, CheckStatus.CRITICAL, CheckStatus.ERROR, CheckStatus.WARNING])
    ).toBe(CheckStatus.CRITICAL);
  });

  it('ranks ERROR above OK but below WARNING', () => {
    expect(worstStatus([CheckStatus.OK, CheckStatus.ERROR])).toBe(CheckStatus.ERROR);
    expect(worstStatus([CheckStatus.ERROR, CheckStatus.WARNING])).toBe(CheckStatus.WARNING);
  });

  it('reports OK when only OK and NO_DATA are present', () => {
    expect(worstStatus([CheckStatus.NO_DATA, CheckStatus.OK])).toBe(CheckStatus.OK);
  });
});

describe('status helpers', () => {
  it('treats only WARNING and CRITICAL as breaches', () => {
    expect(isBreach(CheckStatus.WARNING)).toBe(true);
    expect(isBreach(CheckStatus.CRITICAL)).toBe(true);
    expect(isBreach(CheckStatus.NO_DATA)).toBe(false);
    expect(isBreach(CheckStatus.ERROR)).toBe(false);
    expect(isBreach(CheckStatus.OK)).toBe(false);
  });

  it('maps statuses to alert severities', () => {
    expect(severityForStatus(CheckStatus.CRITICAL)).toBe(Severity.CRITICAL);
    expect(severityForStatus(CheckStatus.WARNING)).toBe(Severity.WARNING);
    expect(severityForStatus(CheckStatus.NO_DATA)).toBe(Severity.INFO);
  });

  it('keeps the louder severity', () => {
    expect(maxSeverity(Severity.WARNING, Severity.CRITICAL)).toBe(Severity.CRITICAL);
    expect(maxSeverity(Severity.WARNING, Severity.INFO)).toBe(Severity.WARNING);
  });
});
