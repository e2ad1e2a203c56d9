/**
 * Input validation for documents written by the device and for callable requests.
 *
 * Every validator returns either the typed value or the first problem found.
 */

import {
  CONSTANTS,
  DiagnosisToken,
  RawExposureSummary,
  TemporaryExposureKey,
} from "../types";

export type ValidationResult<T> =
  | { valid: true; value: T }
  | { valid: false; error: string };

/**
 * A validated exposure check
 */
export interface ValidatedCheck {
  ownerId: string;
  serverDate: number;
  summary: RawExposureSummary;
  lastProcessedChunk?: number;
}

/**
 * A validated upload request
 */
export interface ValidatedUploadRequest {
  token: DiagnosisToken;
  teks: TemporaryExposureKey[];
}

type UnknownRecord = { [key: string]: unknown };

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

function isNonEmptyString(value: unknown, maxLength: number): value is string {
  return typeof value === "string" && value.trim().length > 0 && value.length <= maxLength;
}

const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;
const COUNTRY_CODE_PATTERN = /^[A-Za-z]{2}$/;

/**
 * Validate an exposureChecks document.
 *
 * Only the shape is checked here: numbers must be numbers. Semantic problems
 * (negative counts and the like) are left to the status engine, which records
 * the check as non-qualifying instead of rejecting it.
 */
export function validateCheckDocument(data: unknown): ValidationResult<ValidatedCheck> {
  if (!isRecord(data)) {
    return { valid: false, error: "Check document is empty" };
  }

  if (!isNonEmptyString(data.ownerId, CONSTANTS.MAX_INPUT_LENGTH.OWNER_ID)) {
    return { valid: false, error: "Missing or invalid ownerId" };
  }

  if (!isFiniteNumber(data.serverDate)) {
    return { valid: false, error: "Missing or invalid serverDate" };
  }

  const attenuation = data.attenuationDurationMinutes;
  if (
    !isRecord(attenuation) ||
    !isFiniteNumber(attenuation.high) ||
    !isFiniteNumber(attenuation.medium) ||
    !isFiniteNumber(attenuation.low)
  ) {
    return { valid: false, error: "Missing or invalid attenuationDurationMinutes" };
  }

  const { daysSinceLastExposure, matchedKeyCount, maximumRiskScore, riskScoreSum } = data;
  if (
    !isFiniteNumber(daysSinceLastExposure) ||
    !isFiniteNumber(matchedKeyCount) ||
    !isFiniteNumber(maximumRiskScore) ||
    !isFiniteNumber(riskScoreSum)
  ) {
    return { valid: false, error: "Missing or invalid summary counts" };
  }

  let lastProcessedChunk: number | undefined;
  if (data.lastProcessedChunk !== undefined) {
    if (
      !isFiniteNumber(data.lastProcessedChunk) ||
      !Number.isInteger(data.lastProcessedChunk) ||
      data.lastProcessedChunk < 0
    ) {
      return { valid: false, error: "Invalid lastProcessedChunk" };
    }
    lastProcessedChunk = data.lastProcessedChunk;
  }

  return {
    valid: true,
    value: {
      ownerId: data.ownerId,
      serverDate: data.serverDate,
      summary: {
        daysSinceLastExposure,
        matchedKeyCount,
        maximumRiskScore,
        attenuationDurationMinutes: {
          high: attenuation.high,
          medium: attenuation.medium,
          low: attenuation.low,
        },
        riskScoreSum,
      },
      lastProcessedChunk,
    },
  };
}

/**
 * Validate the diagnosis token of an upload request.
 * Exactly one of otp and cun must be given.
 */
export function validateDiagnosisToken(data: unknown): ValidationResult<DiagnosisToken> {
  if (!isRecord(data)) {
    return { valid: false, error: "Missing token" };
  }

  const { otp, cun, serverDate } = data;

  if (!isFiniteNumber(serverDate) || serverDate <= 0) {
    return { valid: false, error: "Missing or invalid token serverDate" };
  }

  if (otp !== undefined && cun !== undefined) {
    return { valid: false, error: "Token must carry either otp or cun, not both" };
  }

  if (isNonEmptyString(otp, CONSTANTS.MAX_INPUT_LENGTH.TOKEN)) {
    return { valid: true, value: { kind: "otp", otp, serverDate } };
  }

  if (isNonEmptyString(cun, CONSTANTS.MAX_INPUT_LENGTH.TOKEN)) {
    return { valid: true, value: { kind: "cun", cun, serverDate } };
  }

  return { valid: false, error: "Missing or invalid otp/cun" };
}

/**
 * Validate a temporary exposure key
 */
function validateTek(data: unknown): ValidationResult<TemporaryExposureKey> {
  if (!isRecord(data)) {
    return { valid: false, error: "Invalid key" };
  }

  const { keyData, rollingStartIntervalNumber, rollingPeriod } = data;

  if (
    !isNonEmptyString(keyData, CONSTANTS.MAX_INPUT_LENGTH.KEY_DATA) ||
    !BASE64_PATTERN.test(keyData)
  ) {
    return { valid: false, error: "Invalid keyData" };
  }

  if (
    !isFiniteNumber(rollingStartIntervalNumber) ||
    !Number.isInteger(rollingStartIntervalNumber) ||
    rollingStartIntervalNumber < 0
  ) {
    return { valid: false, error: "Invalid rollingStartIntervalNumber" };
  }

  // A key covers at most one day of 10-minute intervals
  if (
    !isFiniteNumber(rollingPeriod) ||
    !Number.isInteger(rollingPeriod) ||
    rollingPeriod < 1 ||
    rollingPeriod > 144
  ) {
    return { valid: false, error: "Invalid rollingPeriod" };
  }

  return { valid: true, value: { keyData, rollingStartIntervalNumber, rollingPeriod } };
}

/**
 * Validate an uploadExposureData request
 */
export function validateUploadRequest(data: unknown): ValidationResult<ValidatedUploadRequest> {
  if (!isRecord(data)) {
    return { valid: false, error: "Missing request data" };
  }

  const token = validateDiagnosisToken(data.token);
  if (!token.valid) {
    return token;
  }

  if (!Array.isArray(data.teks)) {
    return { valid: false, error: "Missing teks" };
  }

  if (data.teks.length > CONSTANTS.MAX_TEKS_PER_UPLOAD) {
    return { valid: false, error: `At most ${CONSTANTS.MAX_TEKS_PER_UPLOAD} keys can be uploaded` };
  }

  const teks: TemporaryExposureKey[] = [];
  for (const [index, rawTek] of data.teks.entries()) {
    const tek = validateTek(rawTek);
    if (!tek.valid) {
      return { valid: false, error: `teks[${index}]: ${tek.error}` };
    }
    teks.push(tek.value);
  }

  return { valid: true, value: { token: token.value, teks } };
}

/**
 * Validate a list of ISO 3166-1 alpha-2 country codes
 */
export function validateCountryCodes(data: unknown): ValidationResult<string[]> {
  if (!Array.isArray(data)) {
    return { valid: false, error: "countries must be an array" };
  }

  if (data.length > CONSTANTS.MAX_COUNTRIES_OF_INTEREST) {
    return {
      valid: false,
      error: `At most ${CONSTANTS.MAX_COUNTRIES_OF_INTEREST} countries are allowed`,
    };
  }

  const codes: string[] = [];
  for (const code of data) {
    if (typeof code !== "string" || !COUNTRY_CODE_PATTERN.test(code.trim())) {
      return { valid: false, error: `Invalid country code: ${String(code)}` };
    }
    codes.push(code);
  }

  return { valid: true, value: codes };
}
