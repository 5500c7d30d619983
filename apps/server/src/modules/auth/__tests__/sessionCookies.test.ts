/**
 * Copyright (c) OpenLoaf. All rights reserved.
 *
 * This source code is licensed under the AGPLv3 license found in the
 * LICENSE file in the root directory of this source tree.
 *
 * Project: OpenLoaf
 * Repository: https://github.com/OpenLoaf/OpenLoaf
 */
import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { Hono } from "hono";

import type { TokenSet } from "../provider/types";
import {
  ACCESS_TOKEN_COOKIE,
  applyCookies,
  buildLogoutCookies,
  buildSessionCookies,
  PKCE_SESSION_COOKIE,
  REFRESH_TOKEN_COOKIE,
  type IssuedCookie,
} from "../sessionCookies";
import { parseSetCookies } from "./testHarness";

const TOKENS: TokenSet = {
  accessToken: "access-1",
  refreshToken: "refresh-1",
  expiresIn: 3600,
  subjectId: "sub-123",
  email: "a@b.com",
  provider: "google",
  issuedAt: 0,
};

const TTLS = { accessTokenTtlSeconds: 3600, refreshTokenTtlSeconds: 2592000 };

async function render(cookies: readonly IssuedCookie[]) {
  const app = new Hono();
  app.get("/", (c) => {
    applyCookies(c, cookies);
    return c.text("ok");
  });
  return parseSetCookies(await app.request("/"));
}

describe("buildSessionCookies", () => {
  it("emits access and refresh together with their lifetimes", () => {
    assert.deepEqual(buildSessionCookies(TOKENS, TTLS, { clearPkce: false }), [
      { name: ACCESS_TOKEN_COOKIE, value: "access-1", maxAge: 3600 },
      { name: REFRESH_TOKEN_COOKIE, value: "refresh-1", maxAge: 2592000 },
    ]);
  });

  it("caps the access cookie at the token lifetime", () => {
    const cookies = buildSessionCookies({ ...TOKENS, expiresIn: 900 }, TTLS, { clearPkce: false });
    assert.equal(cookies[0]?.maxAge, 900);
  });

  it("expires the PKCE cookie on the OAuth leg", () => {
    const cookies = buildSessionCookies(TOKENS, TTLS, { clearPkce: true });
    assert.deepEqual(cookies[2], { name: PKCE_SESSION_COOKIE, value: "", maxAge: 0 });
  });
});

describe("applyCookies", () => {
  it("writes HttpOnly, Secure, SameSite=Lax cookies on path /", async () => {
    const cookies = await render(buildSessionCookies(TOKENS, TTLS, { clearPkce: false }));
    const access = cookies.get(ACCESS_TOKEN_COOKIE);
    assert.ok(access);
    assert.equal(access.value, "access-1");
    assert.equal(access.maxAge, 3600);
    assert.ok(access.attributes.includes("httponly"));
    assert.ok(access.attributes.includes("secure"));
    assert.ok(access.attributes.includes("samesite=lax"));
    assert.ok(access.attributes.includes("path=/"));
    assert.equal(cookies.get(REFRESH_TOKEN_COOKIE)?.maxAge, 2592000);
  });

  it("expires every auth cookie on logout", async () => {
    const cookies = await render(buildLogoutCookies());
    assert.deepEqual([...cookies.keys()].sort(), [
      ACCESS_TOKEN_COOKIE,
      PKCE_SESSION_COOKIE,
      REFRESH_TOKEN_COOKIE,
    ]);
    for (const cookie of cookies.values()) {
      assert.equal(cookie.value, "");
      assert.equal(cookie.maxAge, 0);
    }
  });

  it("writes nothing when one cookie of the set is rejected", async () => {
    const app = new Hono();
    app.get("/", (c) => {
      try {
        applyCookies(c, [
          { name: ACCESS_TOKEN_COOKIE, value: "access-1", maxAge: 3600 },
          { name: REFRESH_TOKEN_COOKIE, value: "refresh-1", maxAge: 40000000 },
        ]);
      } catch {
        return c.text("rejected", 500);
      }
      return c.text("ok");
    });
    const response = await app.request("/");
    assert.equal(response.status, 500);
    assert.deepEqual(response.headers.getSetCookie(), []);
  });
});
