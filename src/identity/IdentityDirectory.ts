/**
 * User profiles held by the external identity provider
 */

export interface UserProfile {
  id: string;
  email: string | null;
  name: string | null;
  picture: string | null;
}

export interface IdentityDirectory {
  /**
   * Fetch a profile by subject id; null when the directory has no such user
   */
  getUser(id: string): Promise<UserProfile | null>;

  setUserPicture(id: string, url: string): Promise<void>;
}
