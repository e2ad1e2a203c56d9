/**
 * Type definitions for the exposure status Cloud Functions
 * Matches the Firestore collection structure written by the mobile client
 */

/**
 * Exposure status variants
 */
export enum ExposureStatusType {
  NONE = "NONE",
  EXPOSED = "EXPOSED",
  POSITIVE = "POSITIVE",
}

/**
 * No qualifying exposure has ever been recorded
 */
export interface NoExposureStatus {
  readonly type: ExposureStatusType.NONE;
}

/**
 * At least one qualifying exposure was recorded
 */
export interface ExposedStatus {
  readonly type: ExposureStatusType.EXPOSED;
  /** Start of the UTC day of the most recent qualifying exposure */
  readonly lastExposureDate: number;
  /** Set once the user has viewed the exposure */
  readonly acknowledged: boolean;
}

/**
 * The user uploaded a confirmed positive diagnosis
 */
export interface PositiveStatus {
  readonly type: ExposureStatusType.POSITIVE;
}

/**
 * Current exposure status of a user.
 *
 * Transitions only move towards higher severity: POSITIVE is absorbing and
 * EXPOSED.lastExposureDate never decreases. Only an explicit reset returns to NONE.
 */
export type ExposureStatus = NoExposureStatus | ExposedStatus | PositiveStatus;

/**
 * Per-key detail reported by the matching engine
 */
export interface ExposureInfo {
  /** Start of the UTC day of the exposure */
  readonly date: number;
  readonly durationMinutes: number;
  readonly attenuationValue: number;
  /** Minutes spent in each attenuation bucket: [low, medium, high] attenuation */
  readonly attenuationDurationsInMinutes: readonly number[];
  readonly transmissionRiskLevel: number;
  readonly totalRiskScore: number;
}

/**
 * Summary of one exposure check cycle.
 * Created once per cycle and never mutated afterwards.
 */
export interface ExposureSummary {
  /** Server timestamp of the check */
  readonly date: number;
  /** Start of the UTC day of the last exposure: day(date) - daysSinceLastExposure */
  readonly lastExposureDate: number;
  readonly matchedKeyCount: number;
  readonly maximumRiskScore: number;
  readonly highRiskAttenuationDurationMinutes: number;
  readonly mediumRiskAttenuationDurationMinutes: number;
  readonly lowRiskAttenuationDurationMinutes: number;
  readonly riskScoreSum: number;
  readonly exposureInfos: readonly ExposureInfo[];
}

/**
 * Summary as reported by the matching engine for a single check
 */
export interface RawExposureSummary {
  daysSinceLastExposure: number;
  matchedKeyCount: number;
  maximumRiskScore: number;
  attenuationDurationMinutes: {
    high: number;
    medium: number;
    low: number;
  };
  riskScoreSum: number;
}

/**
 * Configuration snapshot governing qualification and upload caps
 */
export interface RiskPolicy {
  /** Summaries with a lower maximumRiskScore cannot start or extend an exposure */
  readonly minimumRiskScore: number;
  /** Maximum number of summaries included in an upload */
  readonly maxSummaryCount: number;
  /** Maximum number of exposure infos across all uploaded summaries */
  readonly maxInfoCount: number;
}

/**
 * Temporary exposure key as collected by the device
 */
export interface TemporaryExposureKey {
  keyData: string;
  rollingStartIntervalNumber: number;
  rollingPeriod: number;
}

/**
 * Diagnosis token validated by the health authority before the upload.
 * serverDate is the server time associated with the token.
 */
export type DiagnosisToken =
  | { kind: "otp"; otp: string; serverDate: number }
  | { kind: "cun"; cun: string; serverDate: number };

/**
 * Exposure info in the ingestion payload
 */
export interface UploadExposureInfo {
  date: string;
  duration: number;
  attenuationValue: number;
  attenuationDurations: number[];
  transmissionRiskLevel: number;
  totalRiskScore: number;
}

/**
 * Exposure summary in the ingestion payload
 */
export interface UploadExposureSummary {
  /** Day of the check (YYYY-MM-DD) */
  date: string;
  matchedKeyCount: number;
  /** Whole days between the last exposure and the upload server date */
  daysSinceLastExposure: number;
  /** [high, medium, low] risk attenuation minutes */
  attenuationDurations: number[];
  maximumRiskScore: number;
  exposureInfo: UploadExposureInfo[];
}

/**
 * Payload handed to the ingestion transport
 */
export interface IngestionPayload {
  token: DiagnosisToken;
  province: string;
  teks: TemporaryExposureKey[];
  exposureSummaries: UploadExposureSummary[];
  countries: string[];
}

/**
 * Check processing status values
 */
export enum CheckStatus {
  PENDING = "pending",
  PROCESSING = "processing",
  COMPLETED = "completed",
  FAILED = "failed",
}

/**
 * Exposure check document in Firestore, written by the device after each matching run
 */
export interface ExposureCheckDocument {
  ownerId: string;
  serverDate: number;
  daysSinceLastExposure: number;
  matchedKeyCount: number;
  maximumRiskScore: number;
  attenuationDurationMinutes: {
    high: number;
    medium: number;
    low: number;
  };
  riskScoreSum: number;
  /** Index of the last key chunk the device matched in this run */
  lastProcessedChunk?: number;
  status: CheckStatus;
  processedAt?: number;
  /** Whether the check changed the user's status */
  qualifying?: boolean;
  notified?: boolean;
  error?: string;
}

/**
 * Detailed exposure info document, one per matched key.
 * Only read when the check changes the user-visible status.
 */
export interface ExposureCheckDetailDocument {
  checkId: string;
  date: number;
  durationMinutes: number;
  attenuationValue: number;
  attenuationDurationsInMinutes: number[];
  transmissionRiskLevel: number;
  totalRiskScore: number;
  recordedAt: number;
}

/**
 * Exposure status document in Firestore
 */
export interface ExposureStatusDocument {
  type: ExposureStatusType;
  lastExposureDate?: number;
  acknowledged?: boolean;
  updatedAt: number;
}

/**
 * Stored summary document in Firestore
 */
export interface ExposureSummaryDocument {
  ownerId: string;
  date: number;
  lastExposureDate: number;
  matchedKeyCount: number;
  maximumRiskScore: number;
  highRiskAttenuationDurationMinutes: number;
  mediumRiskAttenuationDurationMinutes: number;
  lowRiskAttenuationDurationMinutes: number;
  riskScoreSum: number;
  exposureInfos: ExposureInfo[];
  recordedAt: number;
}

/**
 * Per-user reporting bookkeeping document
 */
export interface ExposureReportingDocument {
  countriesOfInterest?: string[];
  lastProcessedChunk?: number | null;
  lastSuccessfulCheckDate?: number | null;
}

/**
 * Anonymous ingestion document. Carries no user identifier.
 */
export interface IngestionDocument extends IngestionPayload {
  createdAt: number;
  status: "pending";
}

/**
 * User profile document in Firestore
 */
export interface UserDocument {
  province?: string;
  fcmToken?: string;
}

/**
 * Cleanup statistics
 */
export interface CleanupStats {
  checksDeleted: number;
  checkDetailsDeleted: number;
  summariesDeleted: number;
  timestamp: number;
}

/**
 * Constants for the application
 */
export const CONSTANTS = {
  /** Exposure history retention period in days */
  RETENTION_DAYS: 14,

  /** Collection names */
  COLLECTIONS: {
    USERS: "users",
    EXPOSURE_CHECKS: "exposureChecks",
    EXPOSURE_CHECK_DETAILS: "exposureCheckDetails",
    EXPOSURE_STATUS: "exposureStatus",
    EXPOSURE_SUMMARIES: "exposureSummaries",
    EXPOSURE_REPORTING: "exposureReporting",
    INGESTIONS: "ingestions",
    CLEANUP_LOGS: "cleanupLogs",
    RATE_LIMITS: "rateLimits",
  },

  /** Region all functions are deployed to */
  REGION: "europe-west1",

  /** Batch size for Firestore operations */
  BATCH_SIZE: 500,

  /** Input validation limits */
  MAX_INPUT_LENGTH: {
    OWNER_ID: 128,
    TOKEN: 64,
    KEY_DATA: 64,
  },

  /** Maximum number of temporary exposure keys in one upload */
  MAX_TEKS_PER_UPLOAD: 14,

  /** Maximum number of countries of interest */
  MAX_COUNTRIES_OF_INTEREST: 30,

  /** Milliseconds per day */
  MS_PER_DAY: 24 * 60 * 60 * 1000,
} as const;
