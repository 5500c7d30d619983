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
import type { AuthConfig } from "@/config/authConfig";
import type { AuthDependencies } from "@/modules/auth/authContext";
import { MemoryProfileStore, PostgrestProfileStore, type ProfileStore } from "@/modules/auth/profile";
import { GoTrueIdentityProvider } from "@/modules/auth/provider";
import { MemoryAuthSessionStore } from "@/modules/auth/session";

export type ServerDependencies = {
  deps: AuthDependencies;
  /** Stop background timers. */
  stop: () => void;
};

/**
 * Wire stores and the provider client from configuration and start the
 * PKCE sweeper.
 */
export function createDependencies(config: AuthConfig): ServerDependencies {
  const sessions = new MemoryAuthSessionStore({ ttlMs: config.pkce.ttlSeconds * 1000 });
  const provider = new GoTrueIdentityProvider({
    baseUrl: config.identityProvider.url,
    apiKey: config.identityProvider.anonKey,
    timeoutMs: config.identityProvider.timeoutMs,
    minPasswordLength: config.identityProvider.minPasswordLength,
    defaultExpiresIn: config.cookies.accessTokenTtlSeconds,
  });

  const stopSweeper = sessions.startSweeper(config.pkce.sweepIntervalSeconds * 1000, (error) => {
    logger.error({ err: error }, "PKCE session sweep failed");
  });

  return {
    deps: { config, sessions, provider, profiles: createProfileStore(config) },
    stop: stopSweeper,
  };
}

function createProfileStore(config: AuthConfig): ProfileStore {
  const { profileStore } = config;
  if (profileStore.mode === "memory") {
    logger.warn("Using in-memory profile store");
    return new MemoryProfileStore();
  }
  return new PostgrestProfileStore({
    baseUrl: profileStore.url,
    serviceKey: profileStore.serviceKey ?? "",
    table: profileStore.table,
    timeoutMs: config.identityProvider.timeoutMs,
  });
}
