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
import type { AuthDependencies, AuthEnv } from "@/modules/auth/authContext";
import { requireOnboarded, requireSession } from "@/modules/auth/authGuard";

/**
 * Register the page-context routes behind the auth guards. The page renderer
 * only receives identity and profile data here, never tokens.
 */
export function registerOnboardingRoutes(app: Hono<AuthEnv>, deps: AuthDependencies): void {
  const session = requireSession(deps);

  app.get("/onboarding/context", session, async (c) => {
    const subject = c.get("subject");
    const profile = await deps.profiles.findById(subject.id);
    return c.json({ user: subject, profile });
  });

  app.post("/onboarding/complete", session, async (c) => {
    const subject = c.get("subject");
    // 逻辑：只能更新调用者自己的资料，id 取自已验证的会话而不是请求体。
    const profile = await deps.profiles.markOnboarded(subject.id);
    if (!profile) {
      return c.json({ error: "profile_not_found" }, 404);
    }
    logger.info({ subjectId: subject.id }, "Onboarding completed");
    return c.json({ next: deps.config.paths.dashboard });
  });

  app.get("/dashboard/context", session, requireOnboarded(deps), (c) => {
    return c.json({ user: c.get("subject"), profile: c.get("profile") });
  });
}
