/**
 * Firestore implementations of the exposure collaborators
 */
export {
  FirestoreExposureStatusStore,
  statusFromDocument,
  statusToDocument,
} from "./statusStore";
export {
  FirestoreExposureReportingStore,
  summaryFromDocument,
  summaryToDocument,
} from "./reportingStore";
export { FirestoreIngestionTransport } from "./ingestionTransport";
export { FirestoreUserProfileStore } from "./userProfileStore";
export {
  getCheckExposureInfos,
  checkExposureInfoProvider,
  exposureInfoFromDetail,
} from "./checkDetails";
