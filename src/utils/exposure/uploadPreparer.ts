/**
 * Upload preparation
 *
 * Selects the bounded subset of stored exposure history that accompanies a
 * positive diagnosis upload. Three passes, each with its own invariant:
 *
 * 1. selectRecentSummaries: newest summaries first, at most maxSummaryCount
 * 2. rankExposureInfos: infos of the retained summaries, tagged with the
 *    position of their parent in pass 1, ordered by totalRiskScore DESC then
 *    date ASC, at most maxInfoCount
 * 3. rebuild: each retained summary keeps only its surviving infos
 *
 * Local storage is never touched; entries that are not selected are omitted.
 */

import {
  ExposureInfo,
  ExposureSummary,
  RiskPolicy,
  UploadExposureInfo,
  UploadExposureSummary,
} from "../../types";
import { isoDateString, wholeDaysBetween } from "./dates";

/**
 * Exposure info tagged with the position of its parent summary
 */
export interface RankedExposureInfo {
  summaryIndex: number;
  info: ExposureInfo;
}

/**
 * Pass 1: sort by check date descending and keep the most recent summaries
 */
export function selectRecentSummaries(
  summaries: readonly ExposureSummary[],
  maxSummaryCount: number,
): ExposureSummary[] {
  return [...summaries]
    .sort((a, b) => b.date - a.date)
    .slice(0, Math.max(0, maxSummaryCount));
}

/**
 * Order by totalRiskScore descending; equal scores put the older exposure first
 */
export function compareByRisk(a: ExposureInfo, b: ExposureInfo): number {
  const riskComparison = b.totalRiskScore - a.totalRiskScore;
  return riskComparison !== 0 ? riskComparison : a.date - b.date;
}

/**
 * Pass 2: rank every info of the retained summaries globally and keep the top ones
 */
export function rankExposureInfos(
  summaries: readonly ExposureSummary[],
  maxInfoCount: number,
): RankedExposureInfo[] {
  return summaries
    .flatMap((summary, summaryIndex) =>
      summary.exposureInfos.map((info) => ({ summaryIndex, info })),
    )
    .sort((a, b) => compareByRisk(a.info, b.info))
    .slice(0, Math.max(0, maxInfoCount));
}

function toUploadExposureInfo(info: ExposureInfo): UploadExposureInfo {
  return {
    date: isoDateString(info.date),
    duration: info.durationMinutes,
    attenuationValue: info.attenuationValue,
    attenuationDurations: [...info.attenuationDurationsInMinutes],
    transmissionRiskLevel: info.transmissionRiskLevel,
    totalRiskScore: info.totalRiskScore,
  };
}

/**
 * Convert a summary to its ingestion representation, relative to the
 * server date of the diagnosis token rather than the original check date.
 */
export function toUploadExposureSummary(
  summary: ExposureSummary,
  serverDate: number,
): UploadExposureSummary {
  return {
    date: isoDateString(summary.date),
    matchedKeyCount: summary.matchedKeyCount,
    daysSinceLastExposure: Math.max(0, wholeDaysBetween(summary.lastExposureDate, serverDate)),
    attenuationDurations: [
      summary.highRiskAttenuationDurationMinutes,
      summary.mediumRiskAttenuationDurationMinutes,
      summary.lowRiskAttenuationDurationMinutes,
    ],
    maximumRiskScore: summary.maximumRiskScore,
    exposureInfo: summary.exposureInfos.map(toUploadExposureInfo),
  };
}

/**
 * Prepare stored summaries for a diagnosis upload.
 *
 * @param summaries - All locally stored summaries, in any order
 * @param policy - Upload caps
 * @param serverDate - Server date associated with the diagnosis token
 * @returns Upload summaries, most recent check first
 */
export function prepareForUpload(
  summaries: readonly ExposureSummary[],
  policy: RiskPolicy,
  serverDate: number,
): UploadExposureSummary[] {
  const retained = selectRecentSummaries(summaries, policy.maxSummaryCount);
  const ranked = rankExposureInfos(retained, policy.maxInfoCount);

  // Ranked order is kept inside each summary
  const infosBySummary = new Map<number, ExposureInfo[]>();
  for (const { summaryIndex, info } of ranked) {
    const infos = infosBySummary.get(summaryIndex) ?? [];
    infos.push(info);
    infosBySummary.set(summaryIndex, infos);
  }

  return retained.map((summary, index) =>
    toUploadExposureSummary(
      { ...summary, exposureInfos: infosBySummary.get(index) ?? [] },
      serverDate,
    ),
  );
}
