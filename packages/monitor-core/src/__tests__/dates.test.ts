import { describe, it, expect } from 'vitest';
import { addDays, dateRange, isBusinessDate, yesterday } from '../dates';

describe('dates', () => {
  it('validates calendar dates', () => {
    expect(isBusinessDate('2024-02-29')).toBe(true);
    expect(isBusinessDate('2023-02-29')).toBe(false);
    expect(isBusinessDate('2024-3-9')).toBe(false);
  });

  it('adds days across month boundaries', () => {
    expect(addDays('2024-02-28', 2)).toBe('2024-03-01');
    expect(addDays('2024-03-01', -1)).toBe('2024-02-29');
  });

  it('builds inclusive ranges', () => {
    expect(dateRange('2024-03-08', '2024-03-10')).toEqual(['2024-03-08', '2024-03-09', '2024-03-10']);
    expect(dateRange('2024-03-10', '2024-03-08')).toEqual([]);
  });

  it('targets the previous UTC day by default', () => {
    expect(yesterday(new Date('2024-03-10T01:30:00Z'))).toBe('2024-03-09');
  });
});
