export type AuditAction = 'get_public_key' | 'sign' | 'retry' | 'health_check';

export interface AuditEntry {
  timestamp: string; // ISO 8601
  traceId: string; // UUID v4
  service: string; // 'kms-key-source'
  action: AuditAction;
  who: string; // caller identity (host framework, cli)
  what: string; // human-readable description; never digests or signatures
  result: 'success' | 'error';
  details?: Record<string, unknown>;
}

export interface AuditSink {
  log(entry: Omit<AuditEntry, 'timestamp' | 'traceId'>): unknown;
}
