/**
 * Shared ExposureManager for all functions in this instance.
 *
 * One manager per instance means one serial queue, so work for the same user
 * that lands on the same instance never interleaves.
 */

import { ExposureManager } from "./exposure";
import { FcmExposureNotifier } from "./pushNotification";
import { loadRiskPolicy } from "./riskPolicy";
import {
  FirestoreExposureReportingStore,
  FirestoreExposureStatusStore,
  FirestoreIngestionTransport,
  FirestoreUserProfileStore,
} from "./stores";

let manager: ExposureManager | null = null;

export function getExposureManager(): ExposureManager {
  if (manager === null) {
    manager = new ExposureManager({
      statusStore: new FirestoreExposureStatusStore(),
      reportingStore: new FirestoreExposureReportingStore(),
      profileStore: new FirestoreUserProfileStore(),
      notifier: new FcmExposureNotifier(),
      transport: new FirestoreIngestionTransport(),
      getPolicy: loadRiskPolicy,
    });
  }
  return manager;
}

/**
 * Testing utilities
 */
export const _testing = {
  setExposureManager: (replacement: ExposureManager | null): void => {
    manager = replacement;
  },
};
