import { formatAuditLine } from './format';
import { AuditSink } from './types';

/**
 * Keeps formatted audit lines in memory. Used when no log directory is wanted.
 */
export class MemoryAuditSink implements AuditSink {
  private entries: Map<string, string[]> = new Map();

  append(resourceName: string, message: string, at: Date = new Date()): void {
    const lines = this.entries.get(resourceName) ?? [];
    lines.push(formatAuditLine({ message, timestamp: at }));
    this.entries.set(resourceName, lines);
  }

  lines(resourceName: string): string[] {
    return [...(this.entries.get(resourceName) ?? [])];
  }
}
