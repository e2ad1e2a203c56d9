/**
 * User query utilities
 *
 * Reads the parts of the user profile the exposure functions need:
 * the declared province (sent with uploads) and the FCM token.
 */

import { DocumentReference, FieldValue } from "firebase-admin/firestore";
import { getDb } from "../database";
import { CONSTANTS } from "../../types";

/**
 * User data returned from lookup
 */
export interface UserLookupResult {
  province?: string;
  fcmToken?: string;
  docRef: DocumentReference;
}

/**
 * Read a user's profile by UID. Read errors propagate.
 *
 * @param uid - The raw Firebase UID (users documents are keyed by UID)
 * @returns Object with user data, or null if no profile exists
 */
export async function readUserByUid(uid: string): Promise<UserLookupResult | null> {
  const userDoc = await getDb().collection(CONSTANTS.COLLECTIONS.USERS).doc(uid).get();

  if (!userDoc.exists) {
    console.log("No user profile found for request");
    return null;
  }

  const userData = userDoc.data();

  return {
    province: typeof userData?.province === "string" ? userData.province : undefined,
    fcmToken: typeof userData?.fcmToken === "string" ? userData.fcmToken : undefined,
    docRef: userDoc.ref,
  };
}

/**
 * Look up a user's profile by UID, treating read errors as a missing profile.
 *
 * @param uid - The raw Firebase UID
 * @returns Object with user data, or null if not found or unreadable
 */
export async function getUserByUid(uid: string): Promise<UserLookupResult | null> {
  try {
    return await readUserByUid(uid);
  } catch (error) {
    console.error("Error looking up user by UID:", error);
    return null;
  }
}

/**
 * Clear a user's FCM token, e.g. after FCM reports it as invalid.
 *
 * @param docRef - The user document reference
 */
export async function clearUserFcmToken(docRef: DocumentReference): Promise<void> {
  try {
    await docRef.update({
      fcmToken: FieldValue.delete(),
    });
    console.log("Cleared invalid FCM token for user");
  } catch (error) {
    console.error("Error clearing FCM token:", error);
  }
}
