import { AuditEntry } from '../types';

/**
 * Format a time as zero-padded 12-hour local clock time, e.g. `09:05 PM`
 */
export function formatClock(date: Date): string {
  const hours24 = date.getHours();
  const hours12 = hours24 % 12 === 0 ? 12 : hours24 % 12;
  const minutes = date.getMinutes();
  const period = hours24 < 12 ? 'AM' : 'PM';
  return `${pad(hours12)}:${pad(minutes)} ${period}`;
}

export function formatAuditLine(entry: Pick<AuditEntry, 'message' | 'timestamp'>): string {
  return `[${formatClock(entry.timestamp)}] ${entry.message}`;
}

function pad(value: number): string {
  return value.toString().padStart(2, '0');
}
