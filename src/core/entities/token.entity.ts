import type { Timestamp, UserId } from "../types/index.js";

/**
 * Opaque bearer token. Valid for as long as it exists in the TokenStore;
 * revocation is deletion.
 */
export interface Token {
  readonly key: string;
  readonly userId: UserId;
  readonly createdAt: Timestamp;
}
