/**
 * uploadExposureData Cloud Function
 *
 * HTTPS callable used after a confirmed positive diagnosis. Uploads the
 * caller's temporary exposure keys with the ranked, bounded exposure
 * summaries and sets the caller's status to POSITIVE.
 *
 * Request: { token: { otp | cun, serverDate }, teks: [...] }
 * Response: { success: true, uploadedSummaries, uploadedInfos }
 */

import * as functionsV1 from "firebase-functions/v1";
import { CONSTANTS } from "../types";
import { UploadFailureReason, UploadResult } from "../utils/exposure";
import { getExposureManager } from "../utils/exposureService";
import { checkRateLimit } from "../utils/rateLimit";
import { validateUploadRequest } from "../utils/validation";

type HttpsErrorCode = ConstructorParameters<typeof functionsV1.https.HttpsError>[0];

const FAILURE_ERRORS: Record<UploadFailureReason, { code: HttpsErrorCode; message: string }> = {
  "configuration-unavailable": {
    code: "unavailable",
    message: "Upload is temporarily unavailable. Please try again later.",
  },
  "profile-unavailable": {
    code: "failed-precondition",
    message: "A province must be set in the user profile before uploading.",
  },
  "profile-lookup-failed": {
    code: "unavailable",
    message: "The user profile could not be read. Please try again later.",
  },
  "key-history-unavailable": {
    code: "failed-precondition",
    message: "The key history could not be read.",
  },
  "transport-rejected": {
    code: "permission-denied",
    message: "The upload was rejected.",
  },
  "transport-error": {
    code: "unavailable",
    message: "The upload could not be delivered. Please try again later.",
  },
};

export const uploadExposureData = functionsV1
  .region(CONSTANTS.REGION)
  .https.onCall(async (data: unknown, context) => {
    // Verify authentication
    if (!context.auth) {
      throw new functionsV1.https.HttpsError("unauthenticated", "User must be authenticated");
    }

    const userId = context.auth.uid;

    // Rate limiting check
    const allowed = await checkRateLimit(userId, "exposure_upload");
    if (!allowed) {
      throw new functionsV1.https.HttpsError(
        "resource-exhausted",
        "Too many requests. Please try again later.",
      );
    }

    const validation = validateUploadRequest(data);
    if (!validation.valid) {
      throw new functionsV1.https.HttpsError("invalid-argument", validation.error);
    }

    const { token, teks } = validation.value;

    console.log(`User ${userId} uploading ${teks.length} keys (${token.kind})`);

    let result: UploadResult;
    try {
      result = await getExposureManager().uploadTeks(userId, token, async () => teks);
    } catch (error) {
      console.error("Error uploading exposure data:", error);
      throw new functionsV1.https.HttpsError(
        "internal",
        "An error occurred while uploading. Please try again.",
      );
    }

    if (!result.success) {
      const failure = FAILURE_ERRORS[result.reason];
      console.warn(`Upload for user ${userId} failed: ${result.reason}`);
      throw new functionsV1.https.HttpsError(failure.code, failure.message);
    }

    return {
      success: true,
      uploadedSummaries: result.uploadedSummaries,
      uploadedInfos: result.uploadedInfos,
    };
  });
