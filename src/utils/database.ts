/**
 * Database utility for the exposure status Cloud Functions
 * Provides access to the default Firestore database
 */

import { getFirestore, Firestore } from "firebase-admin/firestore";

/**
 * Get the Firestore instance used by every store.
 * Resolved on each call so that modules can be loaded before initializeApp().
 */
export function getDb(): Firestore {
  return getFirestore();
}
