import { randomUUID } from 'node:crypto';
import type { AuditEntry, AuditSink } from './types.js';

export interface AuditLoggerOptions {
  /** Defaults to stderr so stdout stays free for command output. */
  output?: NodeJS.WritableStream;
  now?: () => Date;
}

/**
 * JSON-lines audit trail. Byte arrays in `details` are replaced by their
 * length: digests and signatures never reach the log.
 */
export class AuditLogger implements AuditSink {
  private readonly output: NodeJS.WritableStream;
  private readonly now: () => Date;

  constructor(options: AuditLoggerOptions = {}) {
    this.output = options.output ?? process.stderr;
    this.now = options.now ?? (() => new Date());
  }

  log(entry: Omit<AuditEntry, 'timestamp' | 'traceId'>): AuditEntry {
    const full: AuditEntry = {
      timestamp: this.now().toISOString(),
      traceId: this.createTraceId(),
      ...entry,
    };
    if (entry.details) full.details = redactBytes(entry.details);

    this.output.write(JSON.stringify(full) + '\n');
    return full;
  }

  createTraceId(): string {
    return randomUUID();
  }
}

function redactBytes(details: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(details)) {
    out[key] = value instanceof Uint8Array ? `<${value.length} bytes>` : value;
  }
  return out;
}
