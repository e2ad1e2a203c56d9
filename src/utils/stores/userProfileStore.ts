/**
 * User profile store backed by the users collection
 */

import { UserProfileStore } from "../exposure/repositories";
import { readUserByUid } from "../queries";

export class FirestoreUserProfileStore implements UserProfileStore {
  async getProvince(ownerId: string): Promise<string | null> {
    const user = await readUserByUid(ownerId);
    const province = user?.province?.trim();
    return province ? province : null;
  }
}
