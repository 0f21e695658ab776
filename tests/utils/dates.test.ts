import { describe, it, expect } from 'vitest';
import { formatCompactTimestamp, formatDateTime } from '../../src/utils/dates.js';

describe('date formatting', () => {
  const date = new Date(2024, 2, 5, 9, 7, 3, 42);

  it('formats a readable local date and time', () => {
    expect(formatDateTime(date)).toBe('2024-03-05 09:07:03');
  });

  it('formats a compact timestamp with milliseconds', () => {
    expect(formatCompactTimestamp(date)).toBe('20240305_090703_042');
  });
});
