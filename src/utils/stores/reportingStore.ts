/**
 * Firestore-backed exposure reporting store
 *
 * - exposureSummaries/: one append-only document per check, ownerId = hashForSummary(uid)
 * - exposureReporting/{hashForSummary(uid)}: countries of interest, last processed
 *   chunk and last successful check date
 */

import { DocumentData, Firestore } from "firebase-admin/firestore";
import {
  CONSTANTS,
  ExposureInfo,
  ExposureReportingDocument,
  ExposureSummary,
  ExposureSummaryDocument,
} from "../../types";
import { hashForSummary } from "../crypto/hashing";
import { getDb } from "../database";
import { ExposureReportingStore } from "../exposure/repositories";
import { logWarn } from "../logger";

function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

function isRecord(value: unknown): value is { [key: string]: unknown } {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function infoFromData(info: unknown): ExposureInfo | null {
  if (!isRecord(info)) {
    return null;
  }
  const durations = info.attenuationDurationsInMinutes;
  if (
    !isFiniteNumber(info.date) ||
    !isFiniteNumber(info.durationMinutes) ||
    !isFiniteNumber(info.attenuationValue) ||
    !Array.isArray(durations) ||
    !durations.every(isFiniteNumber) ||
    !isFiniteNumber(info.transmissionRiskLevel) ||
    !isFiniteNumber(info.totalRiskScore)
  ) {
    return null;
  }
  return {
    date: info.date,
    durationMinutes: info.durationMinutes,
    attenuationValue: info.attenuationValue,
    attenuationDurationsInMinutes: durations,
    transmissionRiskLevel: info.transmissionRiskLevel,
    totalRiskScore: info.totalRiskScore,
  };
}

/**
 * Read a summary from its stored document, or null when malformed
 */
export function summaryFromDocument(data: DocumentData): ExposureSummary | null {
  const numericFields = [
    data.date,
    data.lastExposureDate,
    data.matchedKeyCount,
    data.maximumRiskScore,
    data.highRiskAttenuationDurationMinutes,
    data.mediumRiskAttenuationDurationMinutes,
    data.lowRiskAttenuationDurationMinutes,
    data.riskScoreSum,
  ];
  if (!numericFields.every(isFiniteNumber)) {
    return null;
  }

  const rawInfos: unknown[] = Array.isArray(data.exposureInfos) ? data.exposureInfos : [];
  const exposureInfos: ExposureInfo[] = [];
  for (const rawInfo of rawInfos) {
    const info = infoFromData(rawInfo);
    if (info !== null) {
      exposureInfos.push(info);
    }
  }

  return {
    date: data.date,
    lastExposureDate: data.lastExposureDate,
    matchedKeyCount: data.matchedKeyCount,
    maximumRiskScore: data.maximumRiskScore,
    highRiskAttenuationDurationMinutes: data.highRiskAttenuationDurationMinutes,
    mediumRiskAttenuationDurationMinutes: data.mediumRiskAttenuationDurationMinutes,
    lowRiskAttenuationDurationMinutes: data.lowRiskAttenuationDurationMinutes,
    riskScoreSum: data.riskScoreSum,
    exposureInfos,
  };
}

/**
 * Build the stored document for a summary
 */
export function summaryToDocument(
  hashedOwnerId: string,
  summary: ExposureSummary,
  now: number,
): ExposureSummaryDocument {
  return {
    ownerId: hashedOwnerId,
    date: summary.date,
    lastExposureDate: summary.lastExposureDate,
    matchedKeyCount: summary.matchedKeyCount,
    maximumRiskScore: summary.maximumRiskScore,
    highRiskAttenuationDurationMinutes: summary.highRiskAttenuationDurationMinutes,
    mediumRiskAttenuationDurationMinutes: summary.mediumRiskAttenuationDurationMinutes,
    lowRiskAttenuationDurationMinutes: summary.lowRiskAttenuationDurationMinutes,
    riskScoreSum: summary.riskScoreSum,
    exposureInfos: summary.exposureInfos.map((info) => ({
      ...info,
      attenuationDurationsInMinutes: [...info.attenuationDurationsInMinutes],
    })),
    recordedAt: now,
  };
}

export class FirestoreExposureReportingStore implements ExposureReportingStore {
  constructor(private readonly dbProvider: () => Firestore = getDb) {}

  private summariesQuery(ownerId: string) {
    return this.dbProvider()
      .collection(CONSTANTS.COLLECTIONS.EXPOSURE_SUMMARIES)
      .where("ownerId", "==", hashForSummary(ownerId));
  }

  private reportingRef(ownerId: string) {
    return this.dbProvider()
      .collection(CONSTANTS.COLLECTIONS.EXPOSURE_REPORTING)
      .doc(hashForSummary(ownerId));
  }

  private async getReporting(ownerId: string): Promise<ExposureReportingDocument> {
    const snapshot = await this.reportingRef(ownerId).get();
    const data = snapshot.exists ? snapshot.data() : undefined;
    if (data === undefined) {
      return {};
    }
    return {
      countriesOfInterest: Array.isArray(data.countriesOfInterest)
        ? data.countriesOfInterest.filter((code: unknown): code is string => typeof code === "string")
        : undefined,
      lastProcessedChunk: isFiniteNumber(data.lastProcessedChunk) ? data.lastProcessedChunk : null,
      lastSuccessfulCheckDate: isFiniteNumber(data.lastSuccessfulCheckDate)
        ? data.lastSuccessfulCheckDate
        : null,
    };
  }

  private async updateReporting(
    ownerId: string,
    fields: ExposureReportingDocument,
  ): Promise<void> {
    await this.reportingRef(ownerId).set(fields, { merge: true });
  }

  async addSummary(ownerId: string, summary: ExposureSummary): Promise<void> {
    await this.dbProvider()
      .collection(CONSTANTS.COLLECTIONS.EXPOSURE_SUMMARIES)
      .add(summaryToDocument(hashForSummary(ownerId), summary, Date.now()));
  }

  async getSummaries(ownerId: string): Promise<ExposureSummary[]> {
    const snapshot = await this.summariesQuery(ownerId).get();

    const summaries: ExposureSummary[] = [];
    for (const doc of snapshot.docs) {
      const summary = summaryFromDocument(doc.data());
      if (summary === null) {
        logWarn(`Skipping malformed summary document ${doc.id}`);
        continue;
      }
      summaries.push(summary);
    }
    return summaries;
  }

  async hasSummaries(ownerId: string): Promise<boolean> {
    const snapshot = await this.summariesQuery(ownerId).limit(1).get();
    return !snapshot.empty;
  }

  async resetSummaries(ownerId: string): Promise<number> {
    const db = this.dbProvider();
    let totalDeleted = 0;

    // Delete in batches until the query comes back short
    for (;;) {
      const snapshot = await this.summariesQuery(ownerId).limit(CONSTANTS.BATCH_SIZE).get();
      if (snapshot.empty) {
        break;
      }

      const batch = db.batch();
      snapshot.docs.forEach((doc) => {
        batch.delete(doc.ref);
      });
      await batch.commit();
      totalDeleted += snapshot.size;

      if (snapshot.size < CONSTANTS.BATCH_SIZE) {
        break;
      }
    }

    return totalDeleted;
  }

  async getCountriesOfInterest(ownerId: string): Promise<string[]> {
    const reporting = await this.getReporting(ownerId);
    return reporting.countriesOfInterest ?? [];
  }

  async setCountriesOfInterest(ownerId: string, countries: string[]): Promise<void> {
    await this.updateReporting(ownerId, { countriesOfInterest: countries });
  }

  async getLastProcessedChunk(ownerId: string): Promise<number | null> {
    const reporting = await this.getReporting(ownerId);
    return reporting.lastProcessedChunk ?? null;
  }

  async setLastProcessedChunk(ownerId: string, chunk: number | null): Promise<void> {
    await this.updateReporting(ownerId, { lastProcessedChunk: chunk });
  }

  async getLastSuccessfulCheckDate(ownerId: string): Promise<number | null> {
    const reporting = await this.getReporting(ownerId);
    return reporting.lastSuccessfulCheckDate ?? null;
  }

  async setLastSuccessfulCheckDate(ownerId: string, date: number): Promise<void> {
    await this.updateReporting(ownerId, { lastSuccessfulCheckDate: date });
  }
}
