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

import { beginOAuthLogin, completeOAuthLogin, completePasswordLogin } from "../loginFlow";
import { MemoryProfileStore, ProfileStoreError, type ProfileStore } from "../profile";
import { MemoryAuthSessionStore } from "../session";
import { FakeIdentityProvider } from "./testHarness";

const SUBJECT = { id: "sub-123", email: "a@b.com" };

function createDeps(profiles: ProfileStore = new MemoryProfileStore()) {
  const clock = { now: 0 };
  const sessions = new MemoryAuthSessionStore({ ttlMs: 600_000, now: () => clock.now });
  const provider = new FakeIdentityProvider();
  return { deps: { sessions, provider, profiles }, clock, provider };
}

async function startLogin(deps: ReturnType<typeof createDeps>["deps"]) {
  return beginOAuthLogin(deps, {
    provider: "google",
    redirectTo: "https://app.example.test/auth/callback",
  });
}

describe("beginOAuthLogin", () => {
  it("parks the verifier and returns the provider redirect", async () => {
    const { deps, provider } = createDeps();
    const started = await startLogin(deps);
    assert.deepEqual(started.trace, ["init", "awaiting_provider"]);
    const url = new URL(started.authorizeUrl);
    assert.equal(url.searchParams.get("code_challenge"), provider.lastChallenge);
    assert.equal(deps.sessions.size, 1);
  });
});

describe("completeOAuthLogin", () => {
  it("walks every state on a first login", async () => {
    const { deps, provider } = createDeps();
    const started = await startLogin(deps);
    provider.issueCode("code-1", SUBJECT);
    const outcome = await completeOAuthLogin(deps, { code: "code-1", sessionHandle: started.sessionHandle });
    assert.equal(outcome.status, "routed");
    if (outcome.status !== "routed") return;
    assert.deepEqual(outcome.trace, [
      "awaiting_provider",
      "code_received",
      "exchanging",
      "profile_resolved",
      "routed",
    ]);
    assert.deepEqual(outcome.decision, { destination: "onboarding", state: "new" });
    assert.equal(outcome.isNewProfile, true);
    assert.equal(outcome.tokens.subjectId, "sub-123");
  });

  it("fails with missing_code and still consumes the handle", async () => {
    const { deps } = createDeps();
    const started = await startLogin(deps);
    const outcome = await completeOAuthLogin(deps, { sessionHandle: started.sessionHandle });
    assert.equal(outcome.status, "failed");
    if (outcome.status !== "failed") return;
    assert.equal(outcome.error.kind, "missing_code");
    assert.deepEqual(outcome.trace, ["awaiting_provider", "failed"]);
    assert.equal(deps.sessions.size, 0);
  });

  it("maps a provider error param to provider_denied", async () => {
    const { deps, provider } = createDeps();
    const started = await startLogin(deps);
    const outcome = await completeOAuthLogin(deps, {
      providerError: "access_denied",
      sessionHandle: started.sessionHandle,
    });
    assert.equal(outcome.status === "failed" ? outcome.error.kind : outcome.status, "provider_denied");
    assert.deepEqual(provider.calls, []);
  });

  it("fails with session_expired after the TTL without calling the provider", async () => {
    const { deps, clock, provider } = createDeps();
    const started = await startLogin(deps);
    provider.issueCode("code-1", SUBJECT);
    clock.now = 600_000;
    const outcome = await completeOAuthLogin(deps, { code: "code-1", sessionHandle: started.sessionHandle });
    assert.equal(outcome.status, "failed");
    if (outcome.status !== "failed") return;
    assert.equal(outcome.error.kind, "session_expired");
    assert.deepEqual(outcome.trace, ["awaiting_provider", "code_received", "failed"]);
    assert.deepEqual(provider.calls, []);
  });

  it("exchanges a code at most once", async () => {
    const { deps, provider } = createDeps();
    const started = await startLogin(deps);
    provider.issueCode("code-1", SUBJECT);
    const input = { code: "code-1", sessionHandle: started.sessionHandle };
    const [first, second] = await Promise.all([
      completeOAuthLogin(deps, input),
      completeOAuthLogin(deps, input),
    ]);
    const statuses = [first.status, second.status].sort();
    assert.deepEqual(statuses, ["failed", "routed"]);
    const failed = first.status === "failed" ? first : second;
    assert.equal(failed.status === "failed" ? failed.error.kind : "", "session_expired");
    assert.deepEqual(provider.calls, ["exchangeCode"]);
  });

  it("fails with profile_unavailable when the store is down", async () => {
    const brokenStore: ProfileStore = {
      findById: async () => {
        throw new ProfileStoreError("Profile store unreachable");
      },
      insert: async () => ({ status: "conflict" }),
      markOnboarded: async () => null,
      ping: async () => false,
    };
    const { deps, provider } = createDeps(brokenStore);
    const started = await startLogin(deps);
    provider.issueCode("code-1", SUBJECT);
    const outcome = await completeOAuthLogin(deps, { code: "code-1", sessionHandle: started.sessionHandle });
    assert.equal(outcome.status, "failed");
    if (outcome.status !== "failed") return;
    assert.equal(outcome.error.kind, "profile_unavailable");
    assert.deepEqual(outcome.trace, ["awaiting_provider", "code_received", "exchanging", "failed"]);
  });
});

describe("completePasswordLogin", () => {
  it("skips the PKCE states", async () => {
    const { deps, provider } = createDeps();
    provider.addAccount("a@b.com", "correct-password", "sub-123");
    const outcome = await completePasswordLogin(deps, { email: "a@b.com", password: "correct-password" });
    assert.deepEqual(outcome.trace, ["init", "exchanging", "profile_resolved", "routed"]);
  });

  it("routes an onboarded subject to the dashboard", async () => {
    const profiles = new MemoryProfileStore();
    await profiles.insert({ id: "sub-123", email: "a@b.com" });
    await profiles.markOnboarded("sub-123");
    const { deps, provider } = createDeps(profiles);
    provider.addAccount("a@b.com", "correct-password", "sub-123");
    const outcome = await completePasswordLogin(deps, { email: "a@b.com", password: "correct-password" });
    assert.equal(outcome.status === "routed" ? outcome.decision.destination : outcome.status, "dashboard");
  });

  it("fails with invalid_credentials", async () => {
    const { deps } = createDeps();
    const outcome = await completePasswordLogin(deps, { email: "a@b.com", password: "wrong-password" });
    assert.equal(outcome.status, "failed");
    if (outcome.status !== "failed") return;
    assert.equal(outcome.error.kind, "invalid_credentials");
    assert.deepEqual(outcome.trace, ["init", "exchanging", "failed"]);
  });
});
