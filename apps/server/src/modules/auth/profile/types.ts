/**
 * Copyright (c) OpenLoaf. All rights reserved.
 *
 * This source code is licensed under the AGPLv3 license found in the
 * LICENSE file in the root directory of this source tree.
 *
 * Project: OpenLoaf
 * Repository: https://github.com/OpenLoaf/OpenLoaf
 */

export type Profile = {
  /** Provider subject identifier (primary key). */
  id: string;
  /** Email at creation time. */
  email: string | null;
  /** Whether onboarding finished; only ever moves false -> true. */
  onboarded: boolean;
  /** Creation time ISO string. */
  createdAt: string;
  /** Last update time ISO string. */
  updatedAt: string;
};

export type NewProfile = {
  id: string;
  email: string | null;
};

export type ProfileInsertResult =
  | { status: "created"; profile: Profile }
  | { status: "conflict" };

/**
 * Profile persistence. Inserts run under a uniqueness constraint on `id`;
 * losing a race reports `conflict` instead of throwing.
 */
export interface ProfileStore {
  findById(id: string): Promise<Profile | null>;
  insert(input: NewProfile): Promise<ProfileInsertResult>;
  /** Set onboarded=true for one profile; returns null when it does not exist. */
  markOnboarded(id: string): Promise<Profile | null>;
  /** Cheap connectivity check. */
  ping(): Promise<boolean>;
}

/** Raised for store failures other than insert conflicts. */
export class ProfileStoreError extends Error {
  constructor(
    message: string,
    readonly status?: number,
  ) {
    super(message);
    this.name = "ProfileStoreError";
  }
}
