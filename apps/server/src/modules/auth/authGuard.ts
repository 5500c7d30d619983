/**
 * Copyright (c) OpenLoaf. All rights reserved.
 *
 * This source code is licensed under the AGPLv3 license found in the
 * LICENSE file in the root directory of this source tree.
 *
 * Project: OpenLoaf
 * Repository: https://github.com/OpenLoaf/OpenLoaf
 */
import { createMiddleware } from "hono/factory";
import { logger } from "@/common/logger";
import type { AuthDependencies, AuthEnv } from "./authContext";
import { ACCESS_TOKEN_COOKIE, readCookie } from "./sessionCookies";

/**
 * Verify the access cookie with the provider and expose the caller as `subject`.
 */
export function requireSession(deps: Pick<AuthDependencies, "provider">) {
  return createMiddleware<AuthEnv>(async (c, next) => {
    const accessToken = readCookie(c, ACCESS_TOKEN_COOKIE);
    if (!accessToken) {
      return c.json({ error: "auth_required" }, 401);
    }
    const verified = await deps.provider.verify(accessToken);
    if (!verified.ok) {
      logger.debug({ kind: verified.error.kind }, "Session rejected");
      return c.json({ error: "auth_required" }, 401);
    }
    c.set("subject", verified.value);
    await next();
  });
}

/**
 * Load the caller's profile; callers that have not finished onboarding are
 * sent back to it. Mount after requireSession.
 */
export function requireOnboarded(deps: Pick<AuthDependencies, "profiles" | "config">) {
  return createMiddleware<AuthEnv>(async (c, next) => {
    const subject = c.get("subject");
    const profile = await deps.profiles.findById(subject.id);
    if (!profile || !profile.onboarded) {
      return c.redirect(deps.config.paths.onboarding, 307);
    }
    c.set("profile", profile);
    await next();
  });
}
