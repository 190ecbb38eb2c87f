import { createHmac, randomBytes, timingSafeEqual } from 'crypto';

export const PAYLOAD_PREFIX = 'attendance_token:';

const TOKEN_ID_BYTES = 32;
const TAG_LENGTH = 16;
const PAYLOAD_PATTERN = /^attendance_token:([A-Za-z0-9_-]{20,128})\.([A-Za-z0-9_-]+)$/;

/**
 * 256-bit random, base64url-encoded. Ids are never derived from a counter or a
 * timestamp, so a valid id cannot be guessed from another one.
 */
export const generateTokenId = (): string => randomBytes(TOKEN_ID_BYTES).toString('base64url');

const integrityTag = (secret: string, tokenId: string): string =>
  createHmac('sha256', secret).update(tokenId).digest('base64url').slice(0, TAG_LENGTH);

/**
 * Builds the string embedded in the QR code: `attendance_token:<id>.<tag>`.
 */
export const encodePayload = (secret: string, tokenId: string): string =>
  `${PAYLOAD_PREFIX}${tokenId}.${integrityTag(secret, tokenId)}`;

/**
 * Returns the token id of a well-formed payload whose tag matches, null for
 * anything else (foreign QR codes, edited ids, forged tags).
 */
export const parsePayload = (secret: string, payload: unknown): string | null => {
  if (typeof payload !== 'string') return null;

  const match = PAYLOAD_PATTERN.exec(payload.trim());
  if (!match) return null;

  const [, tokenId, tag] = match;
  const expected = Buffer.from(integrityTag(secret, tokenId));
  const received = Buffer.from(tag);
  if (expected.length !== received.length || !timingSafeEqual(expected, received)) {
    return null;
  }
  return tokenId;
};
