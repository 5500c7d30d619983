/**
 * Copyright (c) OpenLoaf. All rights reserved.
 *
 * This source code is licensed under the AGPLv3 license found in the
 * LICENSE file in the root directory of this source tree.
 *
 * Project: OpenLoaf
 * Repository: https://github.com/OpenLoaf/OpenLoaf
 */
import type { Hono } from "hono";
import { logger } from "@/common/logger";
import { countDiagnostics, diagnoseAuthConfig } from "@/config/authConfigDiagnostics";
import type { AuthDependencies, AuthEnv } from "@/modules/auth/authContext";

/** Register the health probe. */
export function registerHealthRoutes(
  app: Hono<AuthEnv>,
  deps: Pick<AuthDependencies, "config" | "profiles">,
): void {
  const diagnostics = countDiagnostics(diagnoseAuthConfig(deps.config));

  app.get("/health", async (c) => {
    const profileStoreUp = await deps.profiles.ping();
    if (!profileStoreUp) {
      logger.warn("Health check: profile store unreachable");
    }
    return c.json(
      {
        status: profileStoreUp ? "ok" : "degraded",
        profileStore: profileStoreUp ? "up" : "down",
        diagnostics,
      },
      profileStoreUp ? 200 : 503,
    );
  });
}
