/**
 * Copyright (c) OpenLoaf. All rights reserved.
 *
 * This source code is licensed under the AGPLv3 license found in the
 * LICENSE file in the root directory of this source tree.
 *
 * Project: OpenLoaf
 * Repository: https://github.com/OpenLoaf/OpenLoaf
 */

/**
 * One in-flight OAuth login, keyed by an opaque handle.
 */
export type AuthSession = {
  /** Opaque handle carried by the pkce-session cookie. */
  handle: string;
  /** PKCE verifier for the pending code exchange. */
  verifier: string;
  /** Creation timestamp (ms). */
  createdAt: number;
};

/**
 * Short-lived storage for PKCE verifiers between login initiation and callback.
 */
export interface AuthSessionStore {
  /**
   * Store a verifier and return the handle that retrieves it.
   */
  put(verifier: string): Promise<string>;

  /**
   * Destructively read a verifier. The entry is gone after the first call,
   * whether or not the caller's exchange succeeds; expired or unknown handles
   * return null.
   */
  take(handle: string): Promise<string | null>;

  /**
   * Drop entries older than the TTL and return how many were removed.
   */
  sweep(): Promise<number>;
}
