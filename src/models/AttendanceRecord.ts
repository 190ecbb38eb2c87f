import { Schema, model, Document, Model } from 'mongoose';
import { AttendanceMethod } from '../types/attendance';

export interface IAttendanceRecord extends Document {
  sessionId: string;
  attendeeIdentity: string;
  tokenId: string | null;
  verifiedAt: Date;
  distanceMeters: number | null;
  method: AttendanceMethod;
  markedBy: string | null;
}

export interface AttendanceRecordLean {
  sessionId: string;
  attendeeIdentity: string;
  tokenId?: string | null;
  verifiedAt: Date;
  distanceMeters?: number | null;
  method: AttendanceMethod;
  markedBy?: string | null;
}

const AttendanceRecordSchema: Schema = new Schema({
  sessionId: { type: String, required: true },
  attendeeIdentity: { type: String, required: true, index: true },
  tokenId: { type: String, default: null }, // null for manual marks
  verifiedAt: { type: Date, required: true },
  distanceMeters: { type: Number, default: null },
  method: { type: String, enum: ['scan', 'manual'], default: 'scan' },
  markedBy: { type: String, default: null },
}, { timestamps: true });

// One record per attendee per session, whichever token (or instructor) produced it
AttendanceRecordSchema.index({ sessionId: 1, attendeeIdentity: 1 }, { unique: true });

const createAttendanceRecordModel = (collectionName = 'attendance_records'): Model<IAttendanceRecord> => {
  return model<IAttendanceRecord>(collectionName, AttendanceRecordSchema, collectionName);
};

export default createAttendanceRecordModel;
