/**
 * Copyright (c) OpenLoaf. All rights reserved.
 *
 * This source code is licensed under the AGPLv3 license found in the
 * LICENSE file in the root directory of this source tree.
 *
 * Project: OpenLoaf
 * Repository: https://github.com/OpenLoaf/OpenLoaf
 */
import type { AuthConfig } from "@/config/authConfig";
import type { Profile, ProfileStore } from "./profile/types";
import type { IdentityProviderClient, SubjectRef } from "./provider/types";
import type { AuthSessionStore } from "./session/types";

/** Collaborators shared by every auth route. */
export type AuthDependencies = {
  config: AuthConfig;
  sessions: AuthSessionStore;
  provider: IdentityProviderClient;
  profiles: ProfileStore;
};

/** Hono env carrying the values set by the auth guards. */
export type AuthEnv = {
  Variables: {
    /** Verified caller, set by requireSession. */
    subject: SubjectRef;
    /** Caller profile, set by requireOnboarded. */
    profile: Profile;
  };
};
