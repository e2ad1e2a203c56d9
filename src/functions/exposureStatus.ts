/**
 * Exposure status Cloud Functions
 *
 * FUNCTIONS:
 * - getExposureStatus: Read the caller's status and check history markers
 * - acknowledgeExposure: Mark the caller's current exposure as viewed
 * - updateCountriesOfInterest: Store the countries included in future uploads
 * - resetExposureStatus: Reset a user's status to NONE (admin only)
 * - clearExposureHistory: Drop a user's summary history (admin only)
 */

import * as functionsV1 from "firebase-functions/v1";
import { CONSTANTS, ExposureStatus, ExposureStatusType } from "../types";
import { assertNever } from "../utils/exposure/status";
import { getExposureManager } from "../utils/exposureService";
import { checkRateLimit } from "../utils/rateLimit";
import { validateCountryCodes } from "../utils/validation";

/**
 * Status as returned to the client
 */
export interface ExposureStatusResponse {
  type: ExposureStatusType;
  lastExposureDate?: number;
  acknowledged?: boolean;
}

export function toStatusResponse(status: ExposureStatus): ExposureStatusResponse {
  switch (status.type) {
    case ExposureStatusType.NONE:
    case ExposureStatusType.POSITIVE:
      return { type: status.type };
    case ExposureStatusType.EXPOSED:
      return {
        type: status.type,
        lastExposureDate: status.lastExposureDate,
        acknowledged: status.acknowledged,
      };
    default:
      return assertNever(status);
  }
}

function requireAuth(context: functionsV1.https.CallableContext): string {
  if (!context.auth) {
    throw new functionsV1.https.HttpsError("unauthenticated", "User must be authenticated");
  }
  return context.auth.uid;
}

/**
 * Admin functions act on the user named in the request
 */
function requireAdminTarget(data: unknown, context: functionsV1.https.CallableContext): string {
  if (!context.auth) {
    throw new functionsV1.https.HttpsError("unauthenticated", "User must be authenticated");
  }

  if (!context.auth.token.admin) {
    throw new functionsV1.https.HttpsError("permission-denied", "Only admins can perform this action");
  }

  const uid = typeof data === "object" && data !== null && "uid" in data ? data.uid : undefined;
  if (
    typeof uid !== "string" ||
    uid.trim().length === 0 ||
    uid.length > CONSTANTS.MAX_INPUT_LENGTH.OWNER_ID
  ) {
    throw new functionsV1.https.HttpsError("invalid-argument", "uid is required");
  }

  return uid;
}

async function enforceRateLimit(
  userId: string,
  limitType: Parameters<typeof checkRateLimit>[1],
): Promise<void> {
  const allowed = await checkRateLimit(userId, limitType);
  if (!allowed) {
    throw new functionsV1.https.HttpsError(
      "resource-exhausted",
      "Too many requests. Please try again later.",
    );
  }
}

function internalError(action: string, error: unknown): functionsV1.https.HttpsError {
  console.error(`Error ${action}:`, error);
  return new functionsV1.https.HttpsError(
    "internal",
    `An error occurred while ${action}. Please try again.`,
  );
}

export const getExposureStatus = functionsV1
  .region(CONSTANTS.REGION)
  .https.onCall(async (_data: unknown, context) => {
    const userId = requireAuth(context);
    const manager = getExposureManager();

    try {
      const [status, hasSummaries, lastSuccessfulCheckDate] = await Promise.all([
        manager.getExposureStatus(userId),
        manager.hasSummaries(userId),
        manager.getLastSuccessfulCheckDate(userId),
      ]);

      return {
        status: toStatusResponse(status),
        hasSummaries,
        lastSuccessfulCheckDate,
      };
    } catch (error) {
      throw internalError("reading exposure status", error);
    }
  });

export const acknowledgeExposure = functionsV1
  .region(CONSTANTS.REGION)
  .https.onCall(async (_data: unknown, context) => {
    const userId = requireAuth(context);
    await enforceRateLimit(userId, "status_acknowledge");

    try {
      const status = await getExposureManager().acknowledgeExposure(userId);
      return { success: true, status: toStatusResponse(status) };
    } catch (error) {
      throw internalError("acknowledging exposure", error);
    }
  });

export const updateCountriesOfInterest = functionsV1
  .region(CONSTANTS.REGION)
  .https.onCall(async (data: unknown, context) => {
    const userId = requireAuth(context);
    await enforceRateLimit(userId, "countries_update");

    const countries = typeof data === "object" && data !== null && "countries" in data ?
      data.countries :
      undefined;
    const validation = validateCountryCodes(countries);
    if (!validation.valid) {
      throw new functionsV1.https.HttpsError("invalid-argument", validation.error);
    }

    try {
      const stored = await getExposureManager().setCountriesOfInterest(userId, validation.value);
      return { success: true, countries: stored };
    } catch (error) {
      throw internalError("updating countries of interest", error);
    }
  });

export const resetExposureStatus = functionsV1
  .region(CONSTANTS.REGION)
  .https.onCall(async (data: unknown, context) => {
    const targetUid = requireAdminTarget(data, context);

    console.log(`Admin ${context.auth?.uid} resetting exposure status of ${targetUid}`);

    try {
      await getExposureManager().resetExposureStatus(targetUid);
      return { success: true };
    } catch (error) {
      throw internalError("resetting exposure status", error);
    }
  });

export const clearExposureHistory = functionsV1
  .region(CONSTANTS.REGION)
  .https.onCall(async (data: unknown, context) => {
    const targetUid = requireAdminTarget(data, context);

    console.log(`Admin ${context.auth?.uid} clearing exposure history of ${targetUid}`);

    try {
      const summariesDeleted = await getExposureManager().clearExposureHistory(targetUid);
      return { success: true, summariesDeleted };
    } catch (error) {
      throw internalError("clearing exposure history", error);
    }
  });
