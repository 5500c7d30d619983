/**
 * Copyright (c) OpenLoaf. All rights reserved.
 *
 * This source code is licensed under the AGPLv3 license found in the
 * LICENSE file in the root directory of this source tree.
 *
 * Project: OpenLoaf
 * Repository: https://github.com/OpenLoaf/OpenLoaf
 */
import type { Context, Hono } from "hono";
import { z } from "zod";
import { logger } from "@/common/logger";
import { callbackUrlOf } from "@/config/authConfig";
import type { AuthDependencies, AuthEnv } from "./authContext";
import { toCallbackError, toJsonError, type CallbackErrorParams } from "./authErrors";
import { beginOAuthLogin, completeOAuthLogin, completePasswordLogin } from "./loginFlow";
import type { SubjectRef } from "./provider/types";
import { destinationPath } from "./routing";
import {
  ACCESS_TOKEN_COOKIE,
  applyCookies,
  buildLogoutCookies,
  buildPkceClearCookie,
  buildPkceCookie,
  buildSessionCookies,
  PKCE_SESSION_COOKIE,
  readCookie,
  REFRESH_TOKEN_COOKIE,
} from "./sessionCookies";

const PasswordAuthBodySchema = z.object({
  email: z.string(),
  password: z.string(),
  action: z.enum(["login", "signup"]).default("login"),
});

/** Message returned after a successful signup. */
export const SIGNUP_CONFIRMATION_MESSAGE = "Check your email for confirmation link.";

const UNSUPPORTED_PROVIDER: CallbackErrorParams = {
  error: "unsupported_provider",
  msg: "This sign in method is not available",
};

type SessionResponse = {
  /** Whether the caller holds a valid session. */
  authenticated: boolean;
  /** Caller identity when authenticated. */
  user?: SubjectRef;
};

/**
 * Register login, callback, password, logout, status and refresh routes.
 */
export function registerAuthRoutes(app: Hono<AuthEnv>, deps: AuthDependencies): void {
  const { config } = deps;

  app.get("/auth/login/:provider", async (c) => {
    const provider = c.req.param("provider").toLowerCase();
    if (!config.identityProvider.providers.includes(provider)) {
      logger.warn({ provider }, "Login requested for unsupported provider");
      return c.redirect(loginErrorPath(config.paths.login, UNSUPPORTED_PROVIDER), 302);
    }
    const started = await beginOAuthLogin(deps, {
      provider,
      redirectTo: callbackUrlOf(config),
    });
    applyCookies(c, [buildPkceCookie(started.sessionHandle, config.pkce.ttlSeconds)]);
    return c.redirect(started.authorizeUrl, 302);
  });

  app.get("/auth/callback", async (c) => {
    const outcome = await completeOAuthLogin(deps, {
      code: c.req.query("code"),
      providerError: c.req.query("error"),
      sessionHandle: readCookie(c, PKCE_SESSION_COOKIE),
    });
    if (outcome.status === "failed") {
      logger.warn(
        { trace: outcome.trace, kind: outcome.error.kind, detail: outcome.error.detail },
        "OAuth callback failed",
      );
      // 逻辑：失败时只清理 PKCE 句柄，不写任何凭证 cookie。
      applyCookies(c, [buildPkceClearCookie()]);
      return c.redirect(loginErrorPath(config.paths.login, toCallbackError(outcome.error)), 302);
    }
    applyCookies(c, buildSessionCookies(outcome.tokens, config.cookies, { clearPkce: true }));
    logger.info(
      {
        trace: outcome.trace,
        subjectId: outcome.profile.id,
        provider: outcome.tokens.provider,
        destination: outcome.decision.destination,
      },
      "OAuth callback completed",
    );
    return c.redirect(destinationPath(outcome.decision, config.paths), 302);
  });

  app.post("/auth/password", async (c) => {
    const body: unknown = await c.req.json().catch(() => null);
    const parsed = PasswordAuthBodySchema.safeParse(body);
    if (!parsed.success) {
      return c.json({ error: "Invalid request" }, 400);
    }
    const { email, password, action } = parsed.data;

    if (action === "signup") {
      const created = await deps.provider.passwordSignup(email, password);
      if (!created.ok) {
        const mapped = toJsonError(created.error);
        return c.json(mapped.body, mapped.status);
      }
      logger.info({ subjectId: created.value.id }, "Password signup accepted");
      return c.json({ next: config.paths.login, msg: SIGNUP_CONFIRMATION_MESSAGE });
    }

    const outcome = await completePasswordLogin(deps, { email, password });
    if (outcome.status === "failed") {
      logger.info({ trace: outcome.trace, kind: outcome.error.kind }, "Password login failed");
      const mapped = toJsonError(outcome.error);
      return c.json(mapped.body, mapped.status);
    }
    applyCookies(c, buildSessionCookies(outcome.tokens, config.cookies, { clearPkce: false }));
    logger.info(
      { trace: outcome.trace, subjectId: outcome.profile.id, destination: outcome.decision.destination },
      "Password login completed",
    );
    return c.json({
      next: destinationPath(outcome.decision, config.paths),
      session: {
        user: { id: outcome.tokens.subjectId, email: outcome.tokens.email },
        expiresIn: outcome.tokens.expiresIn,
      },
    });
  });

  app.get("/auth/logout", (c) => {
    applyCookies(c, buildLogoutCookies());
    return c.redirect(config.paths.login, 302);
  });

  app.get("/auth/status", async (c) => {
    const accessToken = readCookie(c, ACCESS_TOKEN_COOKIE);
    if (accessToken) {
      const verified = await deps.provider.verify(accessToken);
      if (verified.ok) {
        return c.json({ authenticated: true, user: verified.value } satisfies SessionResponse);
      }
      const { kind } = verified.error;
      if (kind !== "token_expired" && kind !== "token_invalid") {
        logger.warn({ kind }, "Session check failed upstream");
        return c.json({ authenticated: false } satisfies SessionResponse, 401);
      }
    }
    // 逻辑：access token 缺失或失效时，如果有 refresh token 则在服务端续期。
    if (!readCookie(c, REFRESH_TOKEN_COOKIE)) {
      return c.json({ authenticated: false } satisfies SessionResponse, 401);
    }
    return refreshSession(c, deps);
  });

  app.post("/auth/refresh", (c) => refreshSession(c, deps));
}

/**
 * Trade the refresh cookie for a new token set. Success re-issues both
 * cookies; any failure clears them.
 */
async function refreshSession(c: Context<AuthEnv>, deps: AuthDependencies): Promise<Response> {
  const refreshToken = readCookie(c, REFRESH_TOKEN_COOKIE);
  const refreshed = refreshToken
    ? await deps.provider.refresh(refreshToken)
    : null;
  if (!refreshed || !refreshed.ok) {
    if (refreshed) logger.info({ kind: refreshed.error.kind }, "Session refresh failed");
    applyCookies(c, buildLogoutCookies());
    return c.json({ authenticated: false } satisfies SessionResponse, 401);
  }
  const tokens = refreshed.value;
  applyCookies(c, buildSessionCookies(tokens, deps.config.cookies, { clearPkce: false }));
  return c.json({
    authenticated: true,
    user: { id: tokens.subjectId, email: tokens.email },
  } satisfies SessionResponse);
}

/** Login page path carrying a sanitized error. */
export function loginErrorPath(loginPath: string, params: CallbackErrorParams): string {
  const query = new URLSearchParams({ error: params.error, msg: params.msg });
  return `${loginPath}?${query.toString()}`;
}
