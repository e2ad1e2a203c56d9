/**
 * cleanupExpiredData Cloud Function
 *
 * Trigger: Scheduled (daily)
 * - Deletes exposure checks older than the retention window
 * - Deletes their per-key details
 * - Deletes recorded exposure summaries
 * - Logs cleanup statistics
 *
 * Older summaries are never uploaded, so nothing past the window is kept.
 */

import * as functionsV1 from "firebase-functions/v1";
import { FieldValue, Firestore } from "firebase-admin/firestore";
import { CleanupStats, CONSTANTS } from "../types";
import { getDb } from "../utils/database";

/**
 * Calculate the cutoff timestamp
 */
export function getCutoffTimestamp(now: number = Date.now()): number {
  return now - CONSTANTS.RETENTION_DAYS * CONSTANTS.MS_PER_DAY;
}

/**
 * Delete documents older than cutoff in batches
 */
export async function deleteOldDocuments(
  db: Firestore,
  collectionName: string,
  timestampField: string,
  cutoff: number,
): Promise<number> {
  let totalDeleted = 0;
  let hasMore = true;

  while (hasMore) {
    const snapshot = await db
      .collection(collectionName)
      .where(timestampField, "<", cutoff)
      .limit(CONSTANTS.BATCH_SIZE)
      .get();

    if (snapshot.empty) {
      break;
    }

    const batch = db.batch();
    snapshot.docs.forEach((doc) => {
      batch.delete(doc.ref);
    });

    await batch.commit();
    totalDeleted += snapshot.size;

    console.log(`Deleted ${snapshot.size} documents from ${collectionName}, total: ${totalDeleted}`);

    // A short page means nothing is left
    if (snapshot.size < CONSTANTS.BATCH_SIZE) {
      hasMore = false;
    }
  }

  return totalDeleted;
}

/**
 * Log cleanup statistics to Firestore
 */
async function logCleanupStats(stats: CleanupStats): Promise<void> {
  const db = getDb();

  await db.collection(CONSTANTS.COLLECTIONS.CLEANUP_LOGS).add({
    ...stats,
    loggedAt: FieldValue.serverTimestamp(),
  });
}

/**
 * Delete every expired exposure document, filling in stats as it goes
 */
export async function runCleanup(stats: CleanupStats, cutoff: number): Promise<void> {
  const db = getDb();

  stats.checksDeleted = await deleteOldDocuments(
    db,
    CONSTANTS.COLLECTIONS.EXPOSURE_CHECKS,
    "serverDate",
    cutoff,
  );

  stats.checkDetailsDeleted = await deleteOldDocuments(
    db,
    CONSTANTS.COLLECTIONS.EXPOSURE_CHECK_DETAILS,
    "recordedAt",
    cutoff,
  );

  stats.summariesDeleted = await deleteOldDocuments(
    db,
    CONSTANTS.COLLECTIONS.EXPOSURE_SUMMARIES,
    "recordedAt",
    cutoff,
  );
}

function emptyStats(): CleanupStats {
  return {
    checksDeleted: 0,
    checkDetailsDeleted: 0,
    summariesDeleted: 0,
    timestamp: Date.now(),
  };
}

/**
 * Scheduled function to cleanup expired data
 * Runs daily at 3:00 AM UTC
 */
export const cleanupExpiredData = functionsV1
  .region(CONSTANTS.REGION)
  .pubsub
  .schedule("0 3 * * *")
  .timeZone("UTC")
  .onRun(async (_context) => {
    const cutoff = getCutoffTimestamp();

    console.log(`Starting cleanup for data older than ${new Date(cutoff).toISOString()}`);

    const stats = emptyStats();

    try {
      await runCleanup(stats, cutoff);
      await logCleanupStats(stats);

      console.log("Cleanup completed:", stats);
    } catch (error) {
      console.error("Error during cleanup:", error);

      // Still log the partial stats
      await logCleanupStats({
        ...stats,
        timestamp: Date.now(),
      });

      throw error;
    }
  });

/**
 * Callable to trigger cleanup manually (admin only)
 */
export const triggerCleanup = functionsV1
  .region(CONSTANTS.REGION)
  .https.onCall(async (_data: unknown, context) => {
    if (!context.auth) {
      throw new functionsV1.https.HttpsError("unauthenticated", "User must be authenticated");
    }

    if (!context.auth.token.admin) {
      throw new functionsV1.https.HttpsError("permission-denied", "Only admins can trigger cleanup");
    }

    const cutoff = getCutoffTimestamp();

    console.log(`Manual cleanup triggered for data older than ${new Date(cutoff).toISOString()}`);

    const stats = emptyStats();

    try {
      await runCleanup(stats, cutoff);
      await logCleanupStats(stats);

      return {
        success: true,
        stats,
      };
    } catch (error) {
      console.error("Error during manual cleanup:", error);
      throw new functionsV1.https.HttpsError(
        "internal",
        "An error occurred during cleanup. Please try again.",
      );
    }
  });
