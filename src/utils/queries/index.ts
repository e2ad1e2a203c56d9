/**
 * Query utilities
 */
export {
  getUserByUid,
  readUserByUid,
  clearUserFcmToken,
  type UserLookupResult,
} from "./userQueries";
