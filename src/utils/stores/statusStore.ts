/**
 * Firestore-backed exposure status store
 *
 * One document per user in exposureStatus/, keyed by hashForStatus(uid).
 * A missing document means NONE.
 */

import { DocumentData, Firestore } from "firebase-admin/firestore";
import {
  CONSTANTS,
  ExposureStatus,
  ExposureStatusDocument,
  ExposureStatusType,
} from "../../types";
import { hashForStatus } from "../crypto/hashing";
import { getDb } from "../database";
import { ExposureStatusStore, StatusUpdate } from "../exposure/repositories";
import { assertNever, exposed, noExposure, positive } from "../exposure/status";

/**
 * Read a status from its stored document.
 *
 * @throws Error if the document is malformed; callers must not overwrite it
 */
export function statusFromDocument(data: DocumentData | undefined): ExposureStatus {
  if (data === undefined) {
    return noExposure();
  }

  switch (data.type) {
    case ExposureStatusType.NONE:
      return noExposure();
    case ExposureStatusType.POSITIVE:
      return positive();
    case ExposureStatusType.EXPOSED:
      if (typeof data.lastExposureDate !== "number" || !Number.isFinite(data.lastExposureDate)) {
        throw new Error("Malformed exposure status document: missing lastExposureDate");
      }
      return exposed(data.lastExposureDate, data.acknowledged === true);
    default:
      throw new Error(`Malformed exposure status document: unknown type ${String(data.type)}`);
  }
}

/**
 * Build the stored document for a status
 */
export function statusToDocument(status: ExposureStatus, now: number): ExposureStatusDocument {
  switch (status.type) {
    case ExposureStatusType.NONE:
    case ExposureStatusType.POSITIVE:
      return { type: status.type, updatedAt: now };
    case ExposureStatusType.EXPOSED:
      return {
        type: status.type,
        lastExposureDate: status.lastExposureDate,
        acknowledged: status.acknowledged,
        updatedAt: now,
      };
    default:
      return assertNever(status);
  }
}

export class FirestoreExposureStatusStore implements ExposureStatusStore {
  constructor(private readonly dbProvider: () => Firestore = getDb) {}

  private statusRef(ownerId: string) {
    return this.dbProvider()
      .collection(CONSTANTS.COLLECTIONS.EXPOSURE_STATUS)
      .doc(hashForStatus(ownerId));
  }

  async getStatus(ownerId: string): Promise<ExposureStatus> {
    const snapshot = await this.statusRef(ownerId).get();
    return statusFromDocument(snapshot.exists ? snapshot.data() : undefined);
  }

  async setStatus(ownerId: string, status: ExposureStatus): Promise<void> {
    await this.statusRef(ownerId).set(statusToDocument(status, Date.now()));
  }

  async updateStatus<T>(
    ownerId: string,
    compute: (current: ExposureStatus) => StatusUpdate<T>,
  ): Promise<T> {
    const docRef = this.statusRef(ownerId);

    return this.dbProvider().runTransaction(async (transaction) => {
      const snapshot = await transaction.get(docRef);
      const current = statusFromDocument(snapshot.exists ? snapshot.data() : undefined);

      const { status, result } = compute(current);
      if (status !== null) {
        transaction.set(docRef, statusToDocument(status, Date.now()));
      }

      return result;
    });
  }
}
