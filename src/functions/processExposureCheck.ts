/**
 * processExposureCheck Cloud Function
 *
 * Trigger: Firestore document create in exposureChecks/
 *
 * The device writes one check document per matching run, carrying the
 * aggregated summary. The function:
 * - Validates the document shape
 * - Runs the check cycle for the owner (status update, history, notification)
 * - Reads the per-key details from exposureCheckDetails only when the owner
 *   is notified
 * - Marks the check completed or failed
 */

import { onDocumentCreated } from "firebase-functions/v2/firestore";
import { CheckStatus, CONSTANTS, ExposureCheckDocument } from "../types";
import { getExposureManager } from "../utils/exposureService";
import { checkExposureInfoProvider } from "../utils/stores";
import { validateCheckDocument } from "../utils/validation";

/**
 * The part of a document reference the handler writes through
 */
export interface CheckDocumentRef {
  update(data: Partial<ExposureCheckDocument>): Promise<unknown>;
}

/**
 * Process one check document
 *
 * @param checkId - ID of the exposureChecks document
 * @param data - Document contents as written by the device
 * @param ref - Reference used to record the processing state
 */
export async function handleExposureCheck(
  checkId: string,
  data: unknown,
  ref: CheckDocumentRef,
): Promise<void> {
  console.log(`Processing exposure check: ${checkId}`);

  await ref.update({ status: CheckStatus.PROCESSING });

  try {
    const validation = validateCheckDocument(data);
    if (!validation.valid) {
      console.error(`Invalid exposure check ${checkId}: ${validation.error}`);
      await ref.update({
        status: CheckStatus.FAILED,
        error: validation.error,
      });
      return;
    }

    const check = validation.value;
    const outcome = await getExposureManager().processKeys(
      check.ownerId,
      check.serverDate,
      check.summary,
      checkExposureInfoProvider(checkId),
      { lastProcessedChunk: check.lastProcessedChunk },
    );

    console.log(
      `Exposure check ${checkId} completed: status=${outcome.status.type}, ` +
      `qualifying=${outcome.qualifying}, notified=${outcome.notified}`,
    );

    await ref.update({
      status: CheckStatus.COMPLETED,
      processedAt: Date.now(),
      qualifying: outcome.qualifying,
      notified: outcome.notified,
    });
  } catch (error) {
    console.error(`Error processing exposure check ${checkId}:`, error);

    await ref.update({
      status: CheckStatus.FAILED,
      error: error instanceof Error ? error.message : "Unknown error",
    });
  }
}

export const processExposureCheck = onDocumentCreated(
  {
    document: `${CONSTANTS.COLLECTIONS.EXPOSURE_CHECKS}/{checkId}`,
    region: CONSTANTS.REGION,
  },
  async (event) => {
    const snapshot = event.data;
    if (!snapshot) {
      console.error("No data in event");
      return;
    }

    await handleExposureCheck(event.params.checkId, snapshot.data(), snapshot.ref);
  },
);
