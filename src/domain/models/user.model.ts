/**
 * Domain model for mirrored directory users.
 *
 * `username` is the stable directory identifier and the only key. The
 * manager link is a weak self-reference: it may only point at a user that
 * exists in the store, so ingest paths null it rather than keep it dangling.
 */
export interface UserRecord {
  username: string;
  employeeId: string | null;
  firstName: string;
  lastName: string;
  title: string | null;
  /** Directory distinguished name; carries the home-office / branch placement. */
  distinguishedName: string | null;
  country: string | null;
  managerUsername: string | null;
  active: boolean;
}

export type UserUpdateInput = Partial<Omit<UserRecord, 'username'>>;
