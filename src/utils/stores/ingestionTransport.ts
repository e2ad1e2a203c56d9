/**
 * Firestore-backed ingestion transport
 *
 * Queues the upload payload in ingestions/ for the ingestion backend, which
 * validates the diagnosis token and publishes the keys. The document carries
 * no user identifier.
 */

import { Firestore } from "firebase-admin/firestore";
import { CONSTANTS, IngestionDocument, IngestionPayload } from "../../types";
import { getDb } from "../database";
import { IngestionTransport } from "../exposure/repositories";

export class FirestoreIngestionTransport implements IngestionTransport {
  constructor(private readonly dbProvider: () => Firestore = getDb) {}

  async uploadTeks(payload: IngestionPayload): Promise<boolean> {
    const ingestion: IngestionDocument = {
      ...payload,
      createdAt: Date.now(),
      status: "pending",
    };

    const docRef = await this.dbProvider()
      .collection(CONSTANTS.COLLECTIONS.INGESTIONS)
      .add(ingestion);

    console.log(`Queued ingestion ${docRef.id} with ${payload.teks.length} keys`);
    return true;
  }
}
