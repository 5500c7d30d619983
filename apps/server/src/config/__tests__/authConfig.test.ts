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

import {
  AuthConfigError,
  callbackUrlOf,
  loadAuthConfig,
  MAX_COOKIE_TTL_SECONDS,
} from "../authConfig";

const BASE_ENV = {
  IDENTITY_PROVIDER_URL: "https://id.example.test",
  IDENTITY_PROVIDER_ANON_KEY: "test-anon-key",
  PROFILE_STORE_SERVICE_KEY: "test-service-key",
  PUBLIC_BASE_URL: "https://app.example.test/",
};

describe("loadAuthConfig", () => {
  it("applies defaults", () => {
    const config = loadAuthConfig(BASE_ENV);
    assert.equal(config.nodeEnv, "development");
    assert.deepEqual(config.server, {
      host: "127.0.0.1",
      port: 3000,
      corsOrigins: [
        "http://localhost:3000",
        "http://localhost:3001",
        "http://127.0.0.1:3000",
        "http://127.0.0.1:3001",
      ],
    });
    assert.deepEqual(config.identityProvider, {
      url: "https://id.example.test",
      anonKey: "test-anon-key",
      providers: ["google", "github"],
      timeoutMs: 5000,
      minPasswordLength: 6,
    });
    assert.deepEqual(config.profileStore, {
      mode: "postgrest",
      url: "https://id.example.test",
      serviceKey: "test-service-key",
      table: "profiles",
    });
    assert.deepEqual(config.pkce, { ttlSeconds: 600, sweepIntervalSeconds: 60 });
    assert.deepEqual(config.cookies, { accessTokenTtlSeconds: 3600, refreshTokenTtlSeconds: 2592000 });
    assert.deepEqual(config.paths, { login: "/login", onboarding: "/onboarding", dashboard: "/dashboard" });
  });

  it("builds the callback URL without a double slash", () => {
    assert.equal(callbackUrlOf(loadAuthConfig(BASE_ENV)), "https://app.example.test/auth/callback");
  });

  it("reads overrides", () => {
    const config = loadAuthConfig({
      ...BASE_ENV,
      AUTH_PROVIDERS: "GitHub, azure",
      PKCE_SESSION_TTL_SECONDS: "300",
      PROFILE_STORE_URL: "https://db.example.test",
      DASHBOARD_PATH: "/app",
    });
    assert.deepEqual(config.identityProvider.providers, ["github", "azure"]);
    assert.equal(config.pkce.ttlSeconds, 300);
    assert.equal(config.profileStore.url, "https://db.example.test");
    assert.equal(config.paths.dashboard, "/app");
  });

  it("lists every problem at once", () => {
    try {
      loadAuthConfig({ PUBLIC_BASE_URL: "not a url", ACCESS_TOKEN_TTL_SECONDS: "soon" });
      assert.fail("expected loadAuthConfig to throw");
    } catch (error) {
      assert.ok(error instanceof AuthConfigError);
      const paths = error.issues.map((issue) => issue.split(":")[0]);
      assert.ok(paths.includes("identityProvider.url"));
      assert.ok(paths.includes("identityProvider.anonKey"));
      assert.ok(paths.includes("publicBaseUrl"));
      assert.ok(paths.includes("cookies.accessTokenTtlSeconds"));
    }
  });

  it("rejects cookie lifetimes longer than 400 days", () => {
    assert.throws(
      () => loadAuthConfig({ ...BASE_ENV, REFRESH_TOKEN_TTL_SECONDS: "40000000" }),
      /cookies\.refreshTokenTtlSeconds/,
    );
    assert.throws(
      () => loadAuthConfig({ ...BASE_ENV, ACCESS_TOKEN_TTL_SECONDS: "34560001" }),
      /cookies\.accessTokenTtlSeconds/,
    );
    assert.throws(
      () => loadAuthConfig({ ...BASE_ENV, PKCE_SESSION_TTL_SECONDS: "34560001" }),
      /pkce\.ttlSeconds/,
    );
    const config = loadAuthConfig({
      ...BASE_ENV,
      REFRESH_TOKEN_TTL_SECONDS: String(MAX_COOKIE_TTL_SECONDS),
    });
    assert.equal(config.cookies.refreshTokenTtlSeconds, 34560000);
  });

  it("requires the service key only for the postgrest store", () => {
    const { PROFILE_STORE_SERVICE_KEY: _unused, ...withoutKey } = BASE_ENV;
    assert.throws(() => loadAuthConfig(withoutKey), /profileStore\.serviceKey/);
    assert.equal(loadAuthConfig({ ...withoutKey, PROFILE_STORE_MODE: "memory" }).profileStore.mode, "memory");
  });
});
