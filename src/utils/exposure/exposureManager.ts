/**
 * ExposureManager
 *
 * Sequences the two operations that read and write a user's exposure status:
 *
 * CHECK CYCLE (processKeys):
 * 1. Evaluate the check against the current status (statusEngine)
 * 2. Commit the new status for qualifying summaries, atomically
 * 3. Only when the user must be notified: fetch the detailed infos and
 *    attach them to the summary
 * 4. Append the summary to the history, qualifying or not
 * 5. Notify the user (best effort)
 *
 * UPLOAD (uploadTeks):
 * 1. Fetch the key history, stored summaries and countries of interest
 * 2. Prepare the bounded upload (uploadPreparer)
 * 3. Submit; on success the status becomes POSITIVE, on failure nothing changes
 *
 * Every operation for one user runs through the same serial queue, so check
 * cycles, uploads, acknowledgements and resets never interleave.
 */

import {
  DiagnosisToken,
  ExposureInfo,
  ExposureStatus,
  ExposureSummary,
  RawExposureSummary,
  TemporaryExposureKey,
} from "../../types";
import { createLogger } from "../logger";
import { KeyedSerialQueue } from "../serialQueue";
import {
  ExposureInfoProvider,
  ExposureNotifier,
  ExposureReportingStore,
  ExposureStatusStore,
  IngestionTransport,
  RiskPolicyProvider,
  TekHistoryProvider,
  UserProfileStore,
} from "./repositories";
import { exposed, isExposed, noExposure, positive } from "./status";
import { SummaryRejection, evaluate } from "./statusEngine";
import { prepareForUpload } from "./uploadPreparer";

const log = createLogger("ExposureManager");

export interface ExposureManagerDependencies {
  statusStore: ExposureStatusStore;
  reportingStore: ExposureReportingStore;
  profileStore: UserProfileStore;
  notifier: ExposureNotifier;
  transport: IngestionTransport;
  getPolicy: RiskPolicyProvider;
  queue?: KeyedSerialQueue;
}

/**
 * Outcome of one check cycle
 */
export interface CheckOutcome {
  status: ExposureStatus;
  qualifying: boolean;
  /** The notify decision fired for this check */
  notified: boolean;
  summaryRecorded: boolean;
  exposureInfoCount: number;
  rejection?: SummaryRejection;
}

export interface CheckOptions {
  /** Index of the last key chunk the device matched in this run */
  lastProcessedChunk?: number;
}

export type UploadFailureReason =
  | "configuration-unavailable"
  | "profile-unavailable"
  | "profile-lookup-failed"
  | "key-history-unavailable"
  | "transport-rejected"
  | "transport-error";

export type UploadResult =
  | { success: true; uploadedSummaries: number; uploadedInfos: number }
  | { success: false; reason: UploadFailureReason };

/**
 * Uppercase, trim and de-duplicate country codes, keeping first-seen order
 */
export function normalizeCountryCodes(codes: readonly string[]): string[] {
  const normalized = codes.map((code) => code.trim().toUpperCase()).filter((code) => code.length > 0);
  return [...new Set(normalized)];
}

export class ExposureManager {
  private readonly statusStore: ExposureStatusStore;
  private readonly reportingStore: ExposureReportingStore;
  private readonly profileStore: UserProfileStore;
  private readonly notifier: ExposureNotifier;
  private readonly transport: IngestionTransport;
  private readonly getPolicy: RiskPolicyProvider;
  private readonly queue: KeyedSerialQueue;

  constructor(deps: ExposureManagerDependencies) {
    this.statusStore = deps.statusStore;
    this.reportingStore = deps.reportingStore;
    this.profileStore = deps.profileStore;
    this.notifier = deps.notifier;
    this.transport = deps.transport;
    this.getPolicy = deps.getPolicy;
    this.queue = deps.queue ?? new KeyedSerialQueue();
  }

  /**
   * Process one exposure check cycle.
   *
   * @param ownerId - The user the check belongs to
   * @param serverDate - Server timestamp of the check
   * @param rawSummary - Summary reported by the matching engine
   * @param getInfos - Fetches the detailed per-key infos; only called when the user is notified
   */
  processKeys(
    ownerId: string,
    serverDate: number,
    rawSummary: RawExposureSummary,
    getInfos: ExposureInfoProvider,
    options: CheckOptions = {},
  ): Promise<CheckOutcome> {
    return this.queue.run(ownerId, async () => {
      const policy = this.getPolicy();

      const evaluation = await this.statusStore.updateStatus(ownerId, (current) => {
        const result = evaluate(serverDate, rawSummary, current, policy);
        return { status: result.qualifying ? result.status : null, result };
      });

      if (!evaluation.qualifying) {
        log.info(
          `Check is not qualifying (${evaluation.rejection})` +
          (evaluation.error ? `: ${evaluation.error}` : ""),
        );
      }

      // Status is committed at this point; a failed fetch only loses the infos
      let summary: ExposureSummary | null = evaluation.summary;
      if (evaluation.shouldFetchDetails && summary !== null) {
        const infos = await this.fetchExposureInfos(getInfos);
        summary = { ...summary, exposureInfos: infos };
      }

      if (summary !== null) {
        await this.reportingStore.addSummary(ownerId, summary);
        await this.reportingStore.setLastSuccessfulCheckDate(ownerId, summary.date);
        if (options.lastProcessedChunk !== undefined) {
          await this.reportingStore.setLastProcessedChunk(ownerId, options.lastProcessedChunk);
        }
      } else {
        log.warn("Check has no usable date, summary not recorded");
      }

      if (evaluation.shouldFetchDetails) {
        await this.notifyExposure(ownerId);
      }

      return {
        status: evaluation.status,
        qualifying: evaluation.qualifying,
        notified: evaluation.shouldFetchDetails,
        summaryRecorded: summary !== null,
        exposureInfoCount: summary?.exposureInfos.length ?? 0,
        rejection: evaluation.rejection,
      };
    });
  }

  /**
   * Upload the key history and the prepared exposure summaries for a confirmed
   * positive diagnosis. Status and history are untouched unless the upload succeeds.
   *
   * @param ownerId - The user uploading
   * @param token - Validated diagnosis token; its serverDate stamps the summaries
   * @param requestTekHistory - Supplies the temporary exposure keys to upload
   */
  uploadTeks(
    ownerId: string,
    token: DiagnosisToken,
    requestTekHistory: TekHistoryProvider,
  ): Promise<UploadResult> {
    return this.queue.run(ownerId, async (): Promise<UploadResult> => {
      const policy = this.getPolicy();
      if (policy === null) {
        log.error("Risk policy unavailable, refusing to prepare upload");
        return { success: false, reason: "configuration-unavailable" };
      }

      let province: string | null;
      try {
        province = await this.profileStore.getProvince(ownerId);
      } catch (error) {
        log.error("Failed to read user profile:", error);
        return { success: false, reason: "profile-lookup-failed" };
      }
      if (!province) {
        log.warn("No province in user profile, refusing to upload");
        return { success: false, reason: "profile-unavailable" };
      }

      let teks: TemporaryExposureKey[];
      try {
        teks = await requestTekHistory();
      } catch (error) {
        log.error("Failed to obtain key history:", error);
        return { success: false, reason: "key-history-unavailable" };
      }

      const [summaries, countries] = await Promise.all([
        this.reportingStore.getSummaries(ownerId),
        this.reportingStore.getCountriesOfInterest(ownerId),
      ]);

      const exposureSummaries = prepareForUpload(summaries, policy, token.serverDate);
      const uploadedInfos = exposureSummaries.reduce(
        (count, summary) => count + summary.exposureInfo.length,
        0,
      );

      let accepted: boolean;
      try {
        accepted = await this.transport.uploadTeks({
          token,
          province,
          teks,
          exposureSummaries,
          countries,
        });
      } catch (error) {
        log.error("Upload transport failed:", error);
        return { success: false, reason: "transport-error" };
      }

      if (!accepted) {
        log.warn("Upload rejected by ingestion");
        return { success: false, reason: "transport-rejected" };
      }

      // A confirmed diagnosis overrides any exposure
      await this.statusStore.setStatus(ownerId, positive());

      log.info(
        `Uploaded ${teks.length} keys, ${exposureSummaries.length} summaries, ${uploadedInfos} infos`,
      );

      return { success: true, uploadedSummaries: exposureSummaries.length, uploadedInfos };
    });
  }

  /**
   * Mark the current exposure as viewed by the user
   *
   * @returns The status after the update
   */
  acknowledgeExposure(ownerId: string): Promise<ExposureStatus> {
    return this.queue.run(ownerId, () =>
      this.statusStore.updateStatus(ownerId, (current) => {
        if (isExposed(current) && !current.acknowledged) {
          const acknowledged = exposed(current.lastExposureDate, true);
          return { status: acknowledged, result: acknowledged };
        }
        return { status: null, result: current };
      }),
    );
  }

  /**
   * Reset the status to NONE, outside the normal cycle flow
   */
  resetExposureStatus(ownerId: string): Promise<void> {
    return this.queue.run(ownerId, () => this.statusStore.setStatus(ownerId, noExposure()));
  }

  getExposureStatus(ownerId: string): Promise<ExposureStatus> {
    return this.statusStore.getStatus(ownerId);
  }

  hasSummaries(ownerId: string): Promise<boolean> {
    return this.reportingStore.hasSummaries(ownerId);
  }

  getLastSuccessfulCheckDate(ownerId: string): Promise<number | null> {
    return this.reportingStore.getLastSuccessfulCheckDate(ownerId);
  }

  /**
   * Store the countries of interest included in future uploads
   *
   * @returns The normalized codes that were stored
   */
  setCountriesOfInterest(ownerId: string, codes: readonly string[]): Promise<string[]> {
    const countries = normalizeCountryCodes(codes);
    return this.queue.run(ownerId, async () => {
      await this.reportingStore.setCountriesOfInterest(ownerId, countries);
      return countries;
    });
  }

  /**
   * Drop the summary history and its bookkeeping. The status is left as is.
   *
   * @returns Number of summaries deleted
   */
  clearExposureHistory(ownerId: string): Promise<number> {
    return this.queue.run(ownerId, async () => {
      const deleted = await this.reportingStore.resetSummaries(ownerId);
      await this.reportingStore.setLastProcessedChunk(ownerId, null);
      await this.reportingStore.setCountriesOfInterest(ownerId, []);
      return deleted;
    });
  }

  private async fetchExposureInfos(getInfos: ExposureInfoProvider): Promise<ExposureInfo[]> {
    try {
      return await getInfos();
    } catch (error) {
      // Not retried: the next check cycle is the next signal
      log.error("Failed to fetch exposure infos, storing summary without them:", error);
      return [];
    }
  }

  private async notifyExposure(ownerId: string): Promise<void> {
    try {
      const delivered = await this.notifier.notifyExposure(ownerId);
      if (!delivered) {
        log.warn("Exposure notification was not delivered");
      }
    } catch (error) {
      log.error("Exposure notification failed:", error);
    }
  }
}
