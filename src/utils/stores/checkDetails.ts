/**
 * Detailed exposure infos of a check
 *
 * The device writes one exposureCheckDetails document per matched key next
 * to its check. They are only read when the check changes what the user sees.
 */

import { DocumentData } from "firebase-admin/firestore";
import { CONSTANTS, ExposureInfo } from "../../types";
import { getDb } from "../database";
import { ExposureInfoProvider } from "../exposure/repositories";
import { isRepresentableDate, startOfUtcDay } from "../exposure/dates";

function isNonNegativeNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value) && value >= 0;
}

/**
 * Read an exposure info from a detail document, or null when malformed
 */
export function exposureInfoFromDetail(data: DocumentData): ExposureInfo | null {
  const durations: unknown = data.attenuationDurationsInMinutes;
  if (
    typeof data.date !== "number" ||
    !isRepresentableDate(data.date) ||
    !isNonNegativeNumber(data.durationMinutes) ||
    !isNonNegativeNumber(data.attenuationValue) ||
    !Array.isArray(durations) ||
    !durations.every(isNonNegativeNumber) ||
    !isNonNegativeNumber(data.transmissionRiskLevel) ||
    !isNonNegativeNumber(data.totalRiskScore)
  ) {
    return null;
  }

  return {
    date: startOfUtcDay(data.date),
    durationMinutes: data.durationMinutes,
    attenuationValue: data.attenuationValue,
    attenuationDurationsInMinutes: durations,
    transmissionRiskLevel: data.transmissionRiskLevel,
    totalRiskScore: data.totalRiskScore,
  };
}

/**
 * Fetch the detailed infos recorded for a check
 *
 * @param checkId - The exposureChecks document id
 */
export async function getCheckExposureInfos(checkId: string): Promise<ExposureInfo[]> {
  const snapshot = await getDb()
    .collection(CONSTANTS.COLLECTIONS.EXPOSURE_CHECK_DETAILS)
    .where("checkId", "==", checkId)
    .get();

  const infos: ExposureInfo[] = [];
  for (const doc of snapshot.docs) {
    const info = exposureInfoFromDetail(doc.data());
    if (info === null) {
      console.warn(`Skipping malformed exposure detail ${doc.id} of check ${checkId}`);
      continue;
    }
    infos.push(info);
  }

  console.log(`Fetched ${infos.length} exposure infos for check ${checkId}`);
  return infos;
}

/**
 * Lazy provider for the infos of a check
 */
export function checkExposureInfoProvider(checkId: string): ExposureInfoProvider {
  return () => getCheckExposureInfos(checkId);
}
