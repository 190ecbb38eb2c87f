import { Schema, model, Document, Model } from 'mongoose';
import { TokenStatus } from '../types/attendance';

export interface IToken extends Document<string> {
  sessionId: string;
  payload: string;
  issuedAt: Date;
  expiresAt: Date;
  consumedBy: string[]; // Append-only, via $addToSet
  status: TokenStatus;
}

export interface TokenLean {
  _id: string;
  sessionId: string;
  payload: string;
  issuedAt: Date;
  expiresAt: Date;
  consumedBy: string[];
  status: TokenStatus;
}

const TokenSchema: Schema = new Schema({
  // Random id, never reused; doubles as the primary key so uniqueness is enforced by _id
  _id: { type: String, required: true },
  sessionId: { type: String, required: true },
  payload: { type: String, required: true },
  issuedAt: { type: Date, required: true },
  expiresAt: { type: Date, required: true },
  consumedBy: { type: [String], default: [] },
  status: { type: String, enum: ['Active', 'Expired', 'Revoked'], default: 'Active' },
}, { timestamps: true });

TokenSchema.index({ sessionId: 1, status: 1, issuedAt: -1 });
TokenSchema.index({ status: 1, expiresAt: 1 });

const createTokenModel = (collectionName = 'attendance_tokens'): Model<IToken> => {
  return model<IToken>(collectionName, TokenSchema, collectionName);
};

export default createTokenModel;
