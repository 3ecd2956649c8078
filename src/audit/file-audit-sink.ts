import { appendFileSync, mkdirSync } from 'fs';
import { join } from 'path';
import { formatAuditLine } from './format';
import { AuditSink } from './types';

/**
 * Appends audit lines to `<directory>/<resource>.log`. The directory is
 * created on the first append.
 */
export class FileAuditSink implements AuditSink {
  readonly directory: string;

  constructor(directory: string = 'logs') {
    this.directory = directory;
  }

  getLogPath(resourceName: string): string {
    return join(this.directory, `${resourceName}.log`);
  }

  append(resourceName: string, message: string, at: Date = new Date()): void {
    mkdirSync(this.directory, { recursive: true });
    appendFileSync(this.getLogPath(resourceName), `${formatAuditLine({ message, timestamp: at })}\n`);
  }
}
