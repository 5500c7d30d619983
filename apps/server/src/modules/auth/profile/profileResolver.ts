/**
 * Copyright (c) OpenLoaf. All rights reserved.
 *
 * This source code is licensed under the AGPLv3 license found in the
 * LICENSE file in the root directory of this source tree.
 *
 * Project: OpenLoaf
 * Repository: https://github.com/OpenLoaf/OpenLoaf
 */
import { logger } from "@/common/logger";
import { ProfileStoreError, type Profile, type ProfileStore } from "./types";

export type ResolvedProfile = {
  profile: Profile;
  /** True only for the request that created the row. */
  isNew: boolean;
};

/**
 * Get the profile of a subject, creating it with onboarded=false on first login.
 *
 * Concurrent first logins race on the insert; the losers read back the winner's row.
 */
export async function resolveOrCreateProfile(
  store: ProfileStore,
  input: { subjectId: string; email: string | null },
): Promise<ResolvedProfile> {
  const existing = await store.findById(input.subjectId);
  if (existing) return { profile: existing, isNew: false };

  const inserted = await store.insert({ id: input.subjectId, email: input.email });
  if (inserted.status === "created") {
    logger.info({ subjectId: input.subjectId }, "Profile created");
    return { profile: inserted.profile, isNew: true };
  }

  logger.info({ subjectId: input.subjectId }, "Profile insert conflicted, reading existing row");
  const winner = await store.findById(input.subjectId);
  if (!winner) {
    throw new ProfileStoreError("Profile missing after insert conflict");
  }
  return { profile: winner, isNew: false };
}
