import { Schema, model, Document, Model } from 'mongoose';

export type AuditAction =
  | 'SESSION_OPENED'
  | 'SESSION_CLOSED'
  | 'TOKEN_ISSUED'
  | 'TOKEN_REVOKED'
  | 'CHECK_IN_ACCEPTED'
  | 'CHECK_IN_REJECTED'
  | 'TOKEN_NOT_FOUND'
  | 'TAMPERED_PAYLOAD'
  | 'MANUAL_ATTENDANCE';

export interface IAuditLog extends Document {
  action: AuditAction;
  actor: string | null;
  sessionId?: string;
  details: Record<string, unknown>;
  createdAt: Date;
}

const AuditLogSchema: Schema = new Schema({
  action: { type: String, required: true, index: true },
  actor: { type: String, default: null },
  sessionId: { type: String, index: true },
  // Free-form context for the entry (outcome, distance, reason...)
  details: { type: Schema.Types.Mixed, default: {} },
}, { timestamps: { createdAt: true, updatedAt: false } });

const createAuditLogModel = (collectionName = 'attendance_audit_logs'): Model<IAuditLog> => {
  return model<IAuditLog>(collectionName, AuditLogSchema, collectionName);
};

export default createAuditLogModel;
