/**
 * Collaborator interfaces used by ExposureManager.
 *
 * Firestore implementations live in utils/stores; tests use in-memory ones.
 * All ownerId parameters are raw user ids; stores derive their own
 * domain-separated document keys.
 */

import {
  ExposureInfo,
  ExposureStatus,
  ExposureSummary,
  IngestionPayload,
  RiskPolicy,
  TemporaryExposureKey,
} from "../../types";

/**
 * Result of a status read-modify-write. A null status leaves the stored value as is.
 */
export interface StatusUpdate<T> {
  status: ExposureStatus | null;
  result: T;
}

export interface ExposureStatusStore {
  /** Current status, NONE when nothing was ever stored */
  getStatus(ownerId: string): Promise<ExposureStatus>;
  setStatus(ownerId: string, status: ExposureStatus): Promise<void>;
  /**
   * Atomically read the current status, compute, and write the computed status.
   * The compute function may run more than once and must be pure.
   */
  updateStatus<T>(
    ownerId: string,
    compute: (current: ExposureStatus) => StatusUpdate<T>,
  ): Promise<T>;
}

export interface ExposureReportingStore {
  addSummary(ownerId: string, summary: ExposureSummary): Promise<void>;
  getSummaries(ownerId: string): Promise<ExposureSummary[]>;
  hasSummaries(ownerId: string): Promise<boolean>;
  /** Delete every stored summary, returning how many were deleted */
  resetSummaries(ownerId: string): Promise<number>;
  getCountriesOfInterest(ownerId: string): Promise<string[]>;
  setCountriesOfInterest(ownerId: string, countries: string[]): Promise<void>;
  getLastProcessedChunk(ownerId: string): Promise<number | null>;
  setLastProcessedChunk(ownerId: string, chunk: number | null): Promise<void>;
  getLastSuccessfulCheckDate(ownerId: string): Promise<number | null>;
  setLastSuccessfulCheckDate(ownerId: string, date: number): Promise<void>;
}

export interface UserProfileStore {
  /** Province of residence declared by the user, null when unknown */
  getProvince(ownerId: string): Promise<string | null>;
}

export interface ExposureNotifier {
  /** Tell the user about a new or more recent exposure. Resolves false when nothing was delivered. */
  notifyExposure(ownerId: string): Promise<boolean>;
}

export interface IngestionTransport {
  /** Submit a diagnosis upload. Resolves false when the server rejects it. */
  uploadTeks(payload: IngestionPayload): Promise<boolean>;
}

export type RiskPolicyProvider = () => RiskPolicy | null;

export type ExposureInfoProvider = () => Promise<ExposureInfo[]>;

export type TekHistoryProvider = () => Promise<TemporaryExposureKey[]>;
