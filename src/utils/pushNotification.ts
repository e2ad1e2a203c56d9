/**
 * Push notification helper using FCM Admin SDK
 *
 * Uses FCM localization keys so clients display notifications using their local translations.
 * This avoids server-side language detection and ensures notifications match device language.
 *
 * Privacy: the exposure date is NOT included in the push payload. Users must
 * open the app to see details, so nothing sensitive reaches the lock screen.
 */

import * as admin from "firebase-admin";
import { ExposureNotifier } from "./exposure/repositories";
import { clearUserFcmToken, getUserByUid } from "./queries";

/**
 * Localization keys for FCM notifications.
 *
 * These keys must match the string resource names in the Android and iOS apps.
 */
const NOTIFICATION_LOC_KEYS = {
  EXPOSURE: {
    titleKey: "notification_exposure_title",
    bodyKey: "notification_exposure_body",
  },
} as const;

/**
 * Notification payload with localization keys
 */
interface LocalizedNotificationPayload {
  titleLocKey: string;
  bodyLocKey: string;
  data?: Record<string, string>;
}

/**
 * Build FCM message with localization keys for both Android and iOS.
 *
 * @param token - FCM token to send to
 * @param payload - Notification payload with localization keys
 * @returns FCM message object
 */
export function buildFcmMessage(
  token: string,
  payload: LocalizedNotificationPayload,
): admin.messaging.Message {
  return {
    token,
    android: {
      priority: "high",
      notification: {
        channelId: "exposure_notifications",
        titleLocKey: payload.titleLocKey,
        bodyLocKey: payload.bodyLocKey,
        defaultSound: true,
        defaultVibrateTimings: true,
      },
    },
    apns: {
      payload: {
        aps: {
          alert: {
            titleLocKey: payload.titleLocKey,
            locKey: payload.bodyLocKey,
          },
          sound: "default",
        },
      },
    },
    // Data payload for deep linking (available on both platforms)
    data: payload.data || {},
  };
}

function isInvalidTokenError(error: unknown): boolean {
  if (typeof error !== "object" || error === null) {
    return false;
  }
  const code = "code" in error ? error.code : undefined;
  return (
    code === "messaging/invalid-registration-token" ||
    code === "messaging/registration-token-not-registered"
  );
}

/**
 * Send a push notification to a user via FCM using localization keys.
 *
 * @param uid - The raw Firebase UID
 * @param payload - The notification payload with localization keys
 * @returns True if notification was sent successfully, false otherwise
 */
export async function sendPushNotification(
  uid: string,
  payload: LocalizedNotificationPayload,
): Promise<boolean> {
  const user = await getUserByUid(uid);

  if (!user) {
    console.log("User not found, skipping push notification");
    return false;
  }

  if (!user.fcmToken) {
    console.log("No FCM token for user, skipping push notification");
    return false;
  }

  try {
    const message = buildFcmMessage(user.fcmToken, payload);
    const response = await admin.messaging().send(message);
    console.log(`Successfully sent notification: ${response}`);
    return true;
  } catch (error: unknown) {
    if (isInvalidTokenError(error)) {
      await clearUserFcmToken(user.docRef);
      console.log("Invalid FCM token for user, cleared token");
      return false;
    }
    console.error("Error sending notification:", error);
    return false;
  }
}

/**
 * Send exposure notification to a user using localization keys.
 * The client will display the notification in the device's language.
 *
 * @param uid - The raw Firebase UID
 */
export async function sendExposureNotification(uid: string): Promise<boolean> {
  return sendPushNotification(uid, {
    titleLocKey: NOTIFICATION_LOC_KEYS.EXPOSURE.titleKey,
    bodyLocKey: NOTIFICATION_LOC_KEYS.EXPOSURE.bodyKey,
    data: {
      type: "EXPOSURE",
    },
  });
}

/**
 * ExposureNotifier that delivers through FCM
 */
export class FcmExposureNotifier implements ExposureNotifier {
  notifyExposure(ownerId: string): Promise<boolean> {
    return sendExposureNotification(ownerId);
  }
}
