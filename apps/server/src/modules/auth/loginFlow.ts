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
import { failure, success, type AuthError, type AuthResult } from "./authErrors";
import { createPkcePair } from "./pkce";
import { ProfileStoreError, resolveOrCreateProfile, type Profile, type ProfileStore } from "./profile";
import type { IdentityProviderClient, TokenSet } from "./provider/types";
import { decideRoute, type RouteDecision } from "./routing";
import type { AuthSessionStore } from "./session/types";

/**
 * Login flow states. The OAuth leg walks every state; the password leg jumps
 * from init straight to exchanging.
 */
export type FlowState =
  | "init"
  | "awaiting_provider"
  | "code_received"
  | "exchanging"
  | "profile_resolved"
  | "routed"
  | "failed";

const TRANSITIONS: Record<FlowState, readonly FlowState[]> = {
  init: ["awaiting_provider", "exchanging", "failed"],
  awaiting_provider: ["code_received", "failed"],
  code_received: ["exchanging", "failed"],
  exchanging: ["profile_resolved", "failed"],
  profile_resolved: ["routed", "failed"],
  routed: [],
  failed: [],
};

export type LoginFlowDependencies = {
  sessions: AuthSessionStore;
  provider: IdentityProviderClient;
  profiles: ProfileStore;
};

export type RoutedOutcome = {
  status: "routed";
  tokens: TokenSet;
  profile: Profile;
  isNewProfile: boolean;
  decision: RouteDecision;
  trace: readonly FlowState[];
};

export type FailedOutcome = {
  status: "failed";
  error: AuthError;
  trace: readonly FlowState[];
};

export type FlowOutcome = RoutedOutcome | FailedOutcome;

export type CallbackInput = {
  /** `code` query param. */
  code?: string;
  /** `error` query param sent by the provider. */
  providerError?: string;
  /** Handle from the pkce-session cookie. */
  sessionHandle?: string;
};

/**
 * Records the state trace of one flow instance and rejects illegal moves.
 */
class FlowTracker {
  private readonly states: FlowState[];

  constructor(start: FlowState) {
    this.states = [start];
  }

  get current(): FlowState {
    return this.states[this.states.length - 1] ?? "init";
  }

  get trace(): readonly FlowState[] {
    return [...this.states];
  }

  moveTo(next: FlowState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Illegal login flow transition ${this.current} -> ${next}`);
    }
    this.states.push(next);
  }

  fail(error: AuthError): FailedOutcome {
    this.moveTo("failed");
    return { status: "failed", error, trace: this.trace };
  }
}

/**
 * INIT -> AWAITING_PROVIDER: create a PKCE pair, park the verifier and build
 * the provider redirect.
 */
export async function beginOAuthLogin(
  deps: Pick<LoginFlowDependencies, "sessions" | "provider">,
  input: { provider: string; redirectTo: string },
): Promise<{ authorizeUrl: string; sessionHandle: string; trace: readonly FlowState[] }> {
  const flow = new FlowTracker("init");
  const pkce = createPkcePair();
  const sessionHandle = await deps.sessions.put(pkce.verifier);
  const authorizeUrl = deps.provider.buildAuthorizeUrl({
    provider: input.provider,
    redirectTo: input.redirectTo,
    codeChallenge: pkce.challenge,
  });
  flow.moveTo("awaiting_provider");
  logger.info({ provider: input.provider }, "OAuth login initiated");
  return { authorizeUrl, sessionHandle, trace: flow.trace };
}

/**
 * Callback leg: AWAITING_PROVIDER -> CODE_RECEIVED -> EXCHANGING ->
 * PROFILE_RESOLVED -> ROUTED, or FAILED from any of them.
 */
export async function completeOAuthLogin(
  deps: LoginFlowDependencies,
  input: CallbackInput,
): Promise<FlowOutcome> {
  const flow = new FlowTracker("awaiting_provider");

  // 逻辑：无论成功与否，先销毁 PKCE 句柄，防止同一个回调被重放。
  const verifier = input.sessionHandle ? await deps.sessions.take(input.sessionHandle) : null;

  if (input.providerError) {
    return flow.fail({ kind: "provider_denied", detail: input.providerError });
  }
  if (!input.code) {
    return flow.fail({ kind: "missing_code" });
  }
  flow.moveTo("code_received");

  if (!verifier) {
    return flow.fail({ kind: "session_expired" });
  }

  flow.moveTo("exchanging");
  const exchanged = await deps.provider.exchangeCode(input.code, verifier);
  return finishLogin(deps, flow, exchanged);
}

/**
 * Password leg: INIT -> EXCHANGING -> PROFILE_RESOLVED -> ROUTED.
 */
export async function completePasswordLogin(
  deps: Pick<LoginFlowDependencies, "provider" | "profiles">,
  input: { email: string; password: string },
): Promise<FlowOutcome> {
  const flow = new FlowTracker("init");
  flow.moveTo("exchanging");
  const granted = await deps.provider.passwordGrant(input.email, input.password);
  return finishLogin(deps, flow, granted);
}

/** Shared tail: resolve the profile and route. */
async function finishLogin(
  deps: Pick<LoginFlowDependencies, "profiles">,
  flow: FlowTracker,
  tokens: AuthResult<TokenSet>,
): Promise<FlowOutcome> {
  if (!tokens.ok) return flow.fail(tokens.error);

  const resolved = await resolveProfile(deps.profiles, tokens.value);
  if (!resolved.ok) return flow.fail(resolved.error);
  flow.moveTo("profile_resolved");

  const { profile, isNew } = resolved.value;
  const decision = decideRoute(!isNew, profile.onboarded);
  flow.moveTo("routed");
  return {
    status: "routed",
    tokens: tokens.value,
    profile,
    isNewProfile: isNew,
    decision,
    trace: flow.trace,
  };
}

async function resolveProfile(
  profiles: ProfileStore,
  tokens: TokenSet,
): Promise<AuthResult<{ profile: Profile; isNew: boolean }>> {
  try {
    return success(
      await resolveOrCreateProfile(profiles, { subjectId: tokens.subjectId, email: tokens.email }),
    );
  } catch (error) {
    if (error instanceof ProfileStoreError) {
      logger.error({ err: error, subjectId: tokens.subjectId }, "Profile resolution failed");
      return failure("profile_unavailable", { detail: error.message });
    }
    throw error;
  }
}
