/**
 * Copyright (c) OpenLoaf. All rights reserved.
 *
 * This source code is licensed under the AGPLv3 license found in the
 * LICENSE file in the root directory of this source tree.
 *
 * Project: OpenLoaf
 * Repository: https://github.com/OpenLoaf/OpenLoaf
 */
export { MemoryProfileStore } from "./memoryProfileStore";
export { PostgrestProfileStore } from "./postgrestProfileStore";
export type { PostgrestProfileStoreOptions } from "./postgrestProfileStore";
export { resolveOrCreateProfile } from "./profileResolver";
export type { ResolvedProfile } from "./profileResolver";
export { ProfileStoreError } from "./types";
export type { NewProfile, Profile, ProfileInsertResult, ProfileStore } from "./types";
