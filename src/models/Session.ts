import { Schema, model, Document, Model } from 'mongoose';
import { SessionStatus } from '../types/attendance';

// Interface for an attendance session document (_id is the session UUID)
export interface ISession extends Document<string> {
  ownerIdentity: string;
  label: string | null;
  opensAt: Date;
  closesAt: Date;
  closedAt: Date | null;
  allowedRadiusMeters: number;
  origin: {
    latitude: number;
    longitude: number;
  };
  status: SessionStatus;
}

// Shape returned by .lean() queries
export interface SessionLean {
  _id: string;
  ownerIdentity: string;
  label?: string | null;
  opensAt: Date;
  closesAt: Date;
  closedAt?: Date | null;
  allowedRadiusMeters: number;
  origin: {
    latitude: number;
    longitude: number;
  };
  status: SessionStatus;
}

const SessionSchema: Schema = new Schema({
  _id: { type: String, required: true },
  ownerIdentity: { type: String, required: true, index: true },
  label: { type: String, default: null },
  opensAt: { type: Date, required: true },
  closesAt: { type: Date, required: true },
  closedAt: { type: Date, default: null },
  allowedRadiusMeters: { type: Number, required: true, min: 0 },
  origin: {
    latitude: { type: Number, required: true },
    longitude: { type: Number, required: true },
  },
  status: { type: String, enum: ['Open', 'Closed'], default: 'Open' },
}, { timestamps: true });

// Sweep query: open sessions whose deadline has passed
SessionSchema.index({ status: 1, closesAt: 1 });

const createSessionModel = (collectionName = 'attendance_sessions'): Model<ISession> => {
  return model<ISession>(collectionName, SessionSchema, collectionName);
};

export default createSessionModel;
