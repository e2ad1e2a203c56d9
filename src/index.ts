/**
 * Exposure Status Cloud Functions
 *
 * Functions:
 * - processExposureCheck: Process exposure checks written by devices
 * - uploadExposureData: HTTPS callable to upload keys after a positive diagnosis
 * - getExposureStatus: HTTPS callable to read the caller's exposure status
 * - acknowledgeExposure: HTTPS callable to mark an exposure as viewed
 * - updateCountriesOfInterest: HTTPS callable to set countries included in uploads
 * - resetExposureStatus: Reset a user's status (admin only)
 * - clearExposureHistory: Clear a user's summary history (admin only)
 * - cleanupExpiredData: Daily cleanup of data past the retention window
 * - triggerCleanup: Manual cleanup trigger (admin only)
 */

import * as admin from "firebase-admin";

// Uses default credentials when running in Cloud Functions
admin.initializeApp();

export { processExposureCheck } from "./functions/processExposureCheck";
export { uploadExposureData } from "./functions/uploadExposureData";
export {
  getExposureStatus,
  acknowledgeExposure,
  updateCountriesOfInterest,
  resetExposureStatus,
  clearExposureHistory,
} from "./functions/exposureStatus";
export { cleanupExpiredData, triggerCleanup } from "./functions/cleanupExpiredData";
