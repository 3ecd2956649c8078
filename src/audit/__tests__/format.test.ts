import { describe, it, expect } from 'vitest';
import { formatAuditLine, formatClock } from '../format';

describe('formatClock', () => {
  it('should format morning times', () => {
    expect(formatClock(new Date(2024, 0, 5, 10, 42))).toBe('10:42 AM');
    expect(formatClock(new Date(2024, 0, 5, 9, 5))).toBe('09:05 AM');
  });

  it('should show midnight and noon as 12', () => {
    expect(formatClock(new Date(2024, 0, 5, 0, 5))).toBe('12:05 AM');
    expect(formatClock(new Date(2024, 0, 5, 12, 0))).toBe('12:00 PM');
  });

  it('should format afternoon times', () => {
    expect(formatClock(new Date(2024, 0, 5, 13, 7))).toBe('01:07 PM');
    expect(formatClock(new Date(2024, 0, 5, 23, 59))).toBe('11:59 PM');
  });
});

describe('formatAuditLine', () => {
  it('should prefix the message with the clock time', () => {
    const line = formatAuditLine({
      message: 'AppService started in WestEurope',
      timestamp: new Date(2024, 0, 5, 10, 42)
    });

    expect(line).toBe('[10:42 AM] AppService started in WestEurope');
  });
});
