import mongoose from 'mongoose';
import createAuditLogModel, { AuditAction } from '../models/AuditLog';
import { errorMessage } from './errors';

export interface AuditEntry {
  actor?: string | null;
  sessionId?: string;
  details?: Record<string, unknown>;
}

const CONNECTED = 1;

/**
 * Writes an audit line to the console and, when a MongoDB connection is open,
 * to the audit log collection. A failed write is reported but never changes
 * the outcome of the operation being audited.
 */
export const logAction = async (action: AuditAction, entry: AuditEntry = {}): Promise<void> => {
  const line = {
    action,
    actor: entry.actor ?? null,
    sessionId: entry.sessionId,
    details: entry.details ?? {},
    timestamp: new Date().toISOString(),
  };

  if (action === 'TOKEN_NOT_FOUND' || action === 'TAMPERED_PAYLOAD') {
    console.warn('[AUDIT_LOG] Possible misuse:', line);
  } else {
    console.log('[AUDIT_LOG]', line);
  }

  if (mongoose.connection.readyState !== CONNECTED) {
    return;
  }

  try {
    const AuditLog = createAuditLogModel();
    await AuditLog.create({
      action,
      actor: line.actor,
      sessionId: line.sessionId,
      details: line.details,
    });
  } catch (err) {
    console.error('[AUDIT_LOG] Failed to persist audit entry:', {
      action,
      error: errorMessage(err),
    });
  }
};
