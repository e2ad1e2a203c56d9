/**
 * Domain-separated hashing functions for privacy protection
 *
 * Exposure documents never carry the raw Firebase UID. Each collection keys
 * its documents with a hash salted by a domain prefix, so a database breach
 * cannot join the status of a user to their exposure history:
 * - exposureStatus/{id}: SHA256("status:" + uid)
 * - exposureSummaries.ownerId, exposureReporting/{id}: SHA256("summary:" + uid)
 * - rateLimits/{id}: SHA256("ratelimit:" + uid)
 */

import * as crypto from "crypto";

function hashWithDomain(domain: string, uid: string): string {
  return crypto.createHash("sha256").update(`${domain}:${uid}`, "utf8").digest("hex");
}

/**
 * Hash a UID for the exposureStatus document id.
 * Formula: SHA256("status:" + uid)
 *
 * @param uid - The raw Firebase UID
 * @returns The domain-separated SHA-256 hash (lowercase hex string)
 */
export function hashForStatus(uid: string): string {
  return hashWithDomain("status", uid);
}

/**
 * Hash a UID for the summary history (exposureSummaries.ownerId and the
 * exposureReporting document id).
 * Formula: SHA256("summary:" + uid)
 *
 * @param uid - The raw Firebase UID
 * @returns The domain-separated SHA-256 hash (lowercase hex string)
 */
export function hashForSummary(uid: string): string {
  return hashWithDomain("summary", uid);
}

/**
 * Hash a UID for rate limit bookkeeping.
 * Formula: SHA256("ratelimit:" + uid)
 */
export function hashForRateLimit(uid: string): string {
  return hashWithDomain("ratelimit", uid);
}
