/**
 * Copyright (c) OpenLoaf. All rights reserved.
 *
 * This source code is licensed under the AGPLv3 license found in the
 * LICENSE file in the root directory of this source tree.
 *
 * Project: OpenLoaf
 * Repository: https://github.com/OpenLoaf/OpenLoaf
 */
import type { Context } from "hono";
import { getCookie } from "hono/cookie";
import { serialize } from "hono/utils/cookie";
import type { TokenSet } from "./provider/types";

/** Access token cookie name. */
export const ACCESS_TOKEN_COOKIE = "access-token";
/** Refresh token cookie name. */
export const REFRESH_TOKEN_COOKIE = "refresh-token";
/** PKCE session handle cookie name; only lives during the OAuth leg. */
export const PKCE_SESSION_COOKIE = "pkce-session";

/** One cookie to write; maxAge 0 expires it on the client. */
export type IssuedCookie = {
  readonly name: string;
  readonly value: string;
  readonly maxAge: number;
};

export type CookieTtls = {
  /** Access cookie lifetime in seconds. */
  accessTokenTtlSeconds: number;
  /** Refresh cookie lifetime in seconds. */
  refreshTokenTtlSeconds: number;
};

/** Attributes shared by every auth cookie. */
const COOKIE_ATTRIBUTES = {
  httpOnly: true,
  secure: true,
  sameSite: "Lax",
  path: "/",
} as const;

/**
 * Build the full credential cookie set for a token set. Access and refresh
 * are always emitted together; `clearPkce` adds the expiry of the handle cookie.
 */
export function buildSessionCookies(
  tokens: TokenSet,
  ttls: CookieTtls,
  options: { clearPkce: boolean },
): readonly IssuedCookie[] {
  const cookies: IssuedCookie[] = [
    {
      name: ACCESS_TOKEN_COOKIE,
      value: tokens.accessToken,
      // 逻辑：cookie 寿命不超过 provider 声明的 token 寿命。
      maxAge: Math.min(tokens.expiresIn, ttls.accessTokenTtlSeconds),
    },
    {
      name: REFRESH_TOKEN_COOKIE,
      value: tokens.refreshToken,
      maxAge: ttls.refreshTokenTtlSeconds,
    },
  ];
  if (options.clearPkce) cookies.push(expiredCookie(PKCE_SESSION_COOKIE));
  return cookies;
}

/** Cookie carrying the PKCE session handle. */
export function buildPkceCookie(handle: string, ttlSeconds: number): IssuedCookie {
  return { name: PKCE_SESSION_COOKIE, value: handle, maxAge: ttlSeconds };
}

/** Expire only the PKCE handle cookie (failed callback). */
export function buildPkceClearCookie(): IssuedCookie {
  return expiredCookie(PKCE_SESSION_COOKIE);
}

/** Expire every auth cookie (logout, failed refresh). */
export function buildLogoutCookies(): readonly IssuedCookie[] {
  return [
    expiredCookie(ACCESS_TOKEN_COOKIE),
    expiredCookie(REFRESH_TOKEN_COOKIE),
    expiredCookie(PKCE_SESSION_COOKIE),
  ];
}

/**
 * Write a cookie set onto the response. Every cookie is serialized before the
 * first header is appended, so a rejected cookie leaves the response untouched.
 */
export function applyCookies(c: Context, cookies: readonly IssuedCookie[]): void {
  const headers = cookies.map((cookie) =>
    serialize(cookie.name, cookie.value, { ...COOKIE_ATTRIBUTES, maxAge: cookie.maxAge }),
  );
  for (const header of headers) {
    c.header("Set-Cookie", header, { append: true });
  }
}

/** Read a cookie, treating an empty value as absent. */
export function readCookie(c: Context, name: string): string | undefined {
  const value = getCookie(c, name);
  return value ? value : undefined;
}

function expiredCookie(name: string): IssuedCookie {
  return { name, value: "", maxAge: 0 };
}
