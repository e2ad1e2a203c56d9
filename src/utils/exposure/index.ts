/**
 * Exposure status and upload preparation
 */

// Status variants
export {
  noExposure,
  exposed,
  positive,
  isExposed,
  statusEquals,
} from "./status";

// Status engine
export {
  evaluate,
  computeExposureStatus,
  shouldSendNotification,
  isQualifying,
  buildExposureSummary,
  validateRawSummary,
  type StatusEvaluation,
  type SummaryRejection,
} from "./statusEngine";

// Upload preparation
export {
  prepareForUpload,
  selectRecentSummaries,
  rankExposureInfos,
  compareByRisk,
  toUploadExposureSummary,
  type RankedExposureInfo,
} from "./uploadPreparer";

// Orchestration
export {
  ExposureManager,
  normalizeCountryCodes,
  type CheckOutcome,
  type CheckOptions,
  type UploadResult,
  type UploadFailureReason,
  type ExposureManagerDependencies,
} from "./exposureManager";

export type {
  ExposureStatusStore,
  ExposureReportingStore,
  UserProfileStore,
  ExposureNotifier,
  IngestionTransport,
  RiskPolicyProvider,
  ExposureInfoProvider,
  TekHistoryProvider,
  StatusUpdate,
} from "./repositories";
