export { AuditLogger, type AuditLoggerOptions } from './logger.js';
export type { AuditAction, AuditEntry, AuditSink } from './types.js';
