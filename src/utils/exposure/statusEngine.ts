/**
 * Exposure status engine
 *
 * Pure decision logic for a single exposure check cycle:
 * - Builds the immutable summary for the check
 * - Decides whether the summary qualifies to affect the status
 * - Computes the new status (monotonic: POSITIVE is absorbing, the
 *   last exposure date never moves backwards)
 * - Decides whether the user must be notified, which is also the only
 *   case in which detailed exposure infos are fetched
 *
 * Nothing here performs I/O. Persisting the results is the caller's job
 * (see ExposureManager).
 */

import {
  ExposureStatus,
  ExposureStatusType,
  ExposureSummary,
  RawExposureSummary,
  RiskPolicy,
} from "../../types";
import { daysBefore, isRepresentableDate } from "./dates";
import { assertNever, exposed } from "./status";

/**
 * Reason a summary did not qualify
 */
export type SummaryRejection =
  | "invalid-summary"
  | "configuration-unavailable"
  | "no-matched-keys"
  | "below-minimum-risk-score";

/**
 * Outcome of evaluating one check
 */
export interface StatusEvaluation {
  /** Summary to record, or null when no day can be derived from the input */
  summary: ExposureSummary | null;
  /** Status after the check; equal to the current status unless qualifying */
  status: ExposureStatus;
  qualifying: boolean;
  /** True when the user must be notified and detailed infos fetched */
  shouldFetchDetails: boolean;
  rejection?: SummaryRejection;
  /** Validation message for invalid summaries */
  error?: string;
}

function isNonNegativeInteger(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

function isNonNegativeNumber(value: number): boolean {
  return Number.isFinite(value) && value >= 0;
}

/**
 * Validate the numeric fields of a raw summary.
 * A summary failing validation never changes the status.
 */
export function validateRawSummary(
  raw: RawExposureSummary,
): { valid: boolean; error?: string } {
  if (!isNonNegativeInteger(raw.daysSinceLastExposure)) {
    return { valid: false, error: "Invalid daysSinceLastExposure" };
  }
  if (!isNonNegativeInteger(raw.matchedKeyCount)) {
    return { valid: false, error: "Invalid matchedKeyCount" };
  }
  if (!isNonNegativeInteger(raw.maximumRiskScore)) {
    return { valid: false, error: "Invalid maximumRiskScore" };
  }

  const { high, medium, low } = raw.attenuationDurationMinutes;
  if (!isNonNegativeNumber(high) || !isNonNegativeNumber(medium) || !isNonNegativeNumber(low)) {
    return { valid: false, error: "Invalid attenuationDurationMinutes" };
  }
  if (!isNonNegativeNumber(raw.riskScoreSum)) {
    return { valid: false, error: "Invalid riskScoreSum" };
  }

  return { valid: true };
}

/**
 * Build the summary record for a check, with no exposure infos attached
 */
export function buildExposureSummary(
  serverDate: number,
  raw: RawExposureSummary,
): ExposureSummary {
  return {
    date: serverDate,
    lastExposureDate: daysBefore(serverDate, raw.daysSinceLastExposure),
    matchedKeyCount: raw.matchedKeyCount,
    maximumRiskScore: raw.maximumRiskScore,
    highRiskAttenuationDurationMinutes: raw.attenuationDurationMinutes.high,
    mediumRiskAttenuationDurationMinutes: raw.attenuationDurationMinutes.medium,
    lowRiskAttenuationDurationMinutes: raw.attenuationDurationMinutes.low,
    riskScoreSum: raw.riskScoreSum,
    exposureInfos: [],
  };
}

/**
 * Qualification test: at least one matched key and a maximum risk score
 * at or above the configured minimum.
 */
export function isQualifying(summary: ExposureSummary, policy: RiskPolicy): boolean {
  return summary.matchedKeyCount > 0 && summary.maximumRiskScore >= policy.minimumRiskScore;
}

/**
 * Compute the status after a qualifying summary
 */
export function computeExposureStatus(
  summary: ExposureSummary,
  oldStatus: ExposureStatus,
): ExposureStatus {
  switch (oldStatus.type) {
    case ExposureStatusType.POSITIVE:
      return oldStatus;
    case ExposureStatusType.EXPOSED:
      if (summary.lastExposureDate <= oldStatus.lastExposureDate) {
        return oldStatus;
      }
      // acknowledged carries over to a more recent exposure
      return exposed(summary.lastExposureDate, oldStatus.acknowledged);
    case ExposureStatusType.NONE:
      return exposed(summary.lastExposureDate, false);
    default:
      return assertNever(oldStatus);
  }
}

/**
 * Notify on the first exposure, and on an exposure strictly more recent
 * than the one already known. Never on transitions touching POSITIVE.
 */
export function shouldSendNotification(
  oldStatus: ExposureStatus,
  newStatus: ExposureStatus,
): boolean {
  switch (oldStatus.type) {
    case ExposureStatusType.NONE:
      return newStatus.type === ExposureStatusType.EXPOSED;
    case ExposureStatusType.EXPOSED:
      return (
        newStatus.type === ExposureStatusType.EXPOSED &&
        newStatus.lastExposureDate > oldStatus.lastExposureDate
      );
    case ExposureStatusType.POSITIVE:
      return false;
    default:
      return assertNever(oldStatus);
  }
}

/**
 * Evaluate one check against the current status.
 *
 * @param serverDate - Server timestamp of the check
 * @param raw - Summary reported by the matching engine
 * @param currentStatus - Status before the check
 * @param policy - Risk policy, or null when configuration is unavailable
 */
export function evaluate(
  serverDate: number,
  raw: RawExposureSummary,
  currentStatus: ExposureStatus,
  policy: RiskPolicy | null,
): StatusEvaluation {
  const unchanged = {
    status: currentStatus,
    qualifying: false,
    shouldFetchDetails: false,
  };

  if (
    serverDate <= 0 ||
    !isRepresentableDate(serverDate) ||
    !Number.isFinite(raw.daysSinceLastExposure) ||
    !isRepresentableDate(daysBefore(serverDate, raw.daysSinceLastExposure))
  ) {
    return { ...unchanged, summary: null, rejection: "invalid-summary", error: "Invalid check dates" };
  }

  const summary = buildExposureSummary(serverDate, raw);

  const validation = validateRawSummary(raw);
  if (!validation.valid) {
    return { ...unchanged, summary, rejection: "invalid-summary", error: validation.error };
  }

  // Fail closed: without a threshold nothing qualifies
  if (policy === null) {
    return { ...unchanged, summary, rejection: "configuration-unavailable" };
  }

  if (summary.matchedKeyCount === 0) {
    return { ...unchanged, summary, rejection: "no-matched-keys" };
  }

  if (!isQualifying(summary, policy)) {
    return { ...unchanged, summary, rejection: "below-minimum-risk-score" };
  }

  const status = computeExposureStatus(summary, currentStatus);

  return {
    summary,
    status,
    qualifying: true,
    shouldFetchDetails: shouldSendNotification(currentStatus, status),
  };
}
