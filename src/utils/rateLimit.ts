/**
 * Rate limiting utility for Cloud Functions
 *
 * Per-user rate limiting using Firestore to track request counts.
 * Rate limit data is stored in the 'rateLimits' collection, keyed by a
 * domain-separated hash of the UID. Every document carries an `expiresAt`
 * timestamp so a Firestore TTL policy can delete it after the window closes.
 */

import { Firestore } from "firebase-admin/firestore";
import { CONSTANTS } from "../types";
import { hashForRateLimit } from "./crypto/hashing";
import { getDb } from "./database";

/**
 * Rate limit types for different operations
 */
export type RateLimitType = "exposure_upload" | "status_acknowledge" | "countries_update";

/**
 * Rate limit configuration per type (requests per hour)
 */
const RATE_LIMITS: Record<RateLimitType, number> = {
  exposure_upload: 3,
  status_acknowledge: 20,
  countries_update: 10,
};

/**
 * Rate limit document structure
 */
interface RateLimitDoc {
  count: number;
  windowStart: number;
  /**
   * Timestamp when this document should be auto-deleted by Firestore TTL policy.
   * Set to windowStart + windowDuration + buffer.
   */
  expiresAt: number;
}

/**
 * Rate limit window duration in milliseconds (1 hour)
 */
const WINDOW_DURATION_MS = 60 * 60 * 1000;

/**
 * Buffer time after window expires before document is eligible for TTL deletion.
 */
const TTL_BUFFER_MS = 60 * 60 * 1000;

function calculateExpiresAt(windowStart: number): number {
  return windowStart + WINDOW_DURATION_MS + TTL_BUFFER_MS;
}

function newWindow(now: number): RateLimitDoc {
  return {
    count: 1,
    windowStart: now,
    expiresAt: calculateExpiresAt(now),
  };
}

function rateLimitRef(db: Firestore, uid: string, limitType: RateLimitType) {
  return db
    .collection(CONSTANTS.COLLECTIONS.RATE_LIMITS)
    .doc(`${hashForRateLimit(uid)}_${limitType}`);
}

/**
 * Check and update rate limit for a user.
 *
 * @param uid - The raw Firebase UID
 * @param limitType - The type of operation being rate limited
 * @returns true if request is allowed, false if rate limited
 */
export async function checkRateLimit(
  uid: string,
  limitType: RateLimitType,
): Promise<boolean> {
  const db = getDb();
  const docRef = rateLimitRef(db, uid, limitType);

  const maxRequests = RATE_LIMITS[limitType];
  const now = Date.now();

  try {
    return await db.runTransaction(async (transaction) => {
      const doc = await transaction.get(docRef);
      const data = doc.exists ? doc.data() : undefined;

      if (data === undefined || typeof data.count !== "number" || typeof data.windowStart !== "number") {
        // First request (or unreadable entry) starts a new window
        transaction.set(docRef, newWindow(now));
        return true;
      }

      // Window has expired
      if (now - data.windowStart > WINDOW_DURATION_MS) {
        transaction.set(docRef, newWindow(now));
        return true;
      }

      if (data.count >= maxRequests) {
        return false;
      }

      // expiresAt stays the same since the window hasn't reset
      transaction.update(docRef, {
        count: data.count + 1,
      });
      return true;
    });
  } catch (error) {
    // On error, allow the request but log the issue
    console.error(`Rate limit check failed for ${limitType}:`, error);
    return true;
  }
}
