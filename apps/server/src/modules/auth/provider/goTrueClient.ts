/**
 * Copyright (c) OpenLoaf. All rights reserved.
 *
 * This source code is licensed under the AGPLv3 license found in the
 * LICENSE file in the root directory of this source tree.
 *
 * Project: OpenLoaf
 * Repository: https://github.com/OpenLoaf/OpenLoaf
 */
import { z } from "zod";
import { logger } from "@/common/logger";
import { createTimeoutFetcher, isTimeoutError, readJsonBody } from "@/common/timeoutFetch";
import { failure, success, type AuthResult } from "../authErrors";
import {
  errorCodesOf,
  errorTextOf,
  GoTrueErrorSchema,
  GoTrueSessionSchema,
  GoTrueSignupSchema,
  GoTrueUserSchema,
  type GoTrueError,
  type GoTrueUser,
} from "./goTrueResponses";
import type {
  AuthorizeUrlInput,
  IdentityProviderClient,
  SubjectRef,
  TokenSet,
} from "./types";

export type GoTrueClientOptions = {
  /** Provider project URL, e.g. https://project.supabase.co. */
  baseUrl: string;
  /** Public (anon) API key sent as `apikey`. */
  apiKey: string;
  /** Per-request timeout in milliseconds. */
  timeoutMs: number;
  /** Minimum password length checked before any network call. */
  minPasswordLength: number;
  /** Fallback when the token response omits expires_in. */
  defaultExpiresIn: number;
  /** Fetch override for tests. */
  fetcher?: typeof fetch;
  /** Clock override for tests. */
  now?: () => number;
};

type Credentials = { email: string; password: string };

type FetchOutcome =
  | { kind: "response"; status: number; body: unknown }
  | { kind: "timeout" }
  | { kind: "network"; detail: string };

type RequestInput = {
  method: "GET" | "POST";
  json?: Record<string, string>;
  accessToken?: string;
};

/** Upstream codes meaning the authorization code or verifier was rejected. */
const INVALID_GRANT_CODES = new Set([
  "invalid_grant",
  "flow_state_not_found",
  "flow_state_expired",
  "bad_code_verifier",
  "bad_oauth_state",
]);

/** Upstream codes meaning the email is already registered. */
const DUPLICATE_ACCOUNT_CODES = new Set(["user_already_exists", "email_exists"]);

const EmailSchema = z.string().email();

/**
 * Identity provider client for the GoTrue (Supabase Auth) HTTP API.
 */
export class GoTrueIdentityProvider implements IdentityProviderClient {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly minPasswordLength: number;
  private readonly defaultExpiresIn: number;
  private readonly fetcher: typeof fetch;
  private readonly now: () => number;

  constructor(options: GoTrueClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.apiKey = options.apiKey;
    this.minPasswordLength = options.minPasswordLength;
    this.defaultExpiresIn = options.defaultExpiresIn;
    this.fetcher = createTimeoutFetcher(options.timeoutMs, options.fetcher ?? fetch);
    this.now = options.now ?? Date.now;
  }

  buildAuthorizeUrl(input: AuthorizeUrlInput): string {
    const url = new URL(`${this.baseUrl}/auth/v1/authorize`);
    url.searchParams.set("provider", input.provider);
    url.searchParams.set("redirect_to", input.redirectTo);
    url.searchParams.set("code_challenge", input.codeChallenge);
    url.searchParams.set("code_challenge_method", "s256");
    return url.toString();
  }

  async exchangeCode(code: string, verifier: string): Promise<AuthResult<TokenSet>> {
    const outcome = await this.request("/auth/v1/token?grant_type=pkce", {
      method: "POST",
      json: { auth_code: code, code_verifier: verifier },
    });
    if (outcome.kind !== "response") return this.transportFailure("exchange", outcome);
    if (!isSuccessStatus(outcome.status)) {
      const codes = errorCodesOf(parseErrorBody(outcome.body));
      logger.warn({ status: outcome.status, codes }, "Provider rejected code exchange");
      if (outcome.status < 500 && codes.some((value) => INVALID_GRANT_CODES.has(value))) {
        return failure("invalid_grant", { detail: codes.join(",") });
      }
      return failure("provider_error", { detail: `exchange status ${outcome.status}` });
    }
    return this.toTokenSet(outcome.body, "oauth");
  }

  async passwordGrant(email: string, password: string): Promise<AuthResult<TokenSet>> {
    const credentials = this.validateCredentials(email, password);
    if (!credentials.ok) return credentials;
    const outcome = await this.request("/auth/v1/token?grant_type=password", {
      method: "POST",
      json: { email: credentials.value.email, password: credentials.value.password },
    });
    if (outcome.kind !== "response") return this.transportFailure("password_grant", outcome);
    if (!isSuccessStatus(outcome.status)) {
      logger.info({ status: outcome.status }, "Provider rejected password grant");
      // 逻辑：4xx 一律视为凭证错误，不区分“邮箱不存在”与“密码错误”。
      if (outcome.status < 500) return failure("invalid_credentials");
      return failure("provider_error", { detail: `password grant status ${outcome.status}` });
    }
    return this.toTokenSet(outcome.body, "email");
  }

  async passwordSignup(email: string, password: string): Promise<AuthResult<SubjectRef>> {
    const credentials = this.validateCredentials(email, password);
    if (!credentials.ok) return credentials;
    const outcome = await this.request("/auth/v1/signup", {
      method: "POST",
      json: { email: credentials.value.email, password: credentials.value.password },
    });
    if (outcome.kind !== "response") return this.transportFailure("signup", outcome);
    if (!isSuccessStatus(outcome.status)) {
      const body = parseErrorBody(outcome.body);
      const codes = errorCodesOf(body);
      logger.info({ status: outcome.status, codes }, "Provider rejected signup");
      if (
        codes.some((value) => DUPLICATE_ACCOUNT_CODES.has(value)) ||
        /already (been )?registered/i.test(errorTextOf(body))
      ) {
        return failure("duplicate_account");
      }
      if (codes.includes("weak_password")) {
        return failure("validation_error", { message: "Password is too weak" });
      }
      return failure("provider_error", { detail: `signup status ${outcome.status}` });
    }
    const parsed = GoTrueSignupSchema.safeParse(outcome.body);
    if (!parsed.success) {
      logger.warn({ issues: parsed.error.issues.length }, "Malformed signup response");
      return failure("provider_error", { detail: "invalid_response" });
    }
    return success(toSubjectRef(parsed.data));
  }

  async verify(accessToken: string): Promise<AuthResult<SubjectRef>> {
    if (!accessToken) return failure("token_invalid");
    const outcome = await this.request("/auth/v1/user", { method: "GET", accessToken });
    if (outcome.kind !== "response") return this.transportFailure("verify", outcome);
    if (!isSuccessStatus(outcome.status)) {
      if (outcome.status >= 500) {
        return failure("provider_error", { detail: `verify status ${outcome.status}` });
      }
      return classifyTokenFailure(parseErrorBody(outcome.body));
    }
    const parsed = GoTrueUserSchema.safeParse(outcome.body);
    if (!parsed.success) return failure("provider_error", { detail: "invalid_response" });
    return success(toSubjectRef(parsed.data));
  }

  async refresh(refreshToken: string): Promise<AuthResult<TokenSet>> {
    if (!refreshToken) return failure("token_invalid");
    const outcome = await this.request("/auth/v1/token?grant_type=refresh_token", {
      method: "POST",
      json: { refresh_token: refreshToken },
    });
    if (outcome.kind !== "response") return this.transportFailure("refresh", outcome);
    if (!isSuccessStatus(outcome.status)) {
      if (outcome.status >= 500) {
        return failure("provider_error", { detail: `refresh status ${outcome.status}` });
      }
      return classifyTokenFailure(parseErrorBody(outcome.body));
    }
    return this.toTokenSet(outcome.body, "email");
  }

  /**
   * Check email format and password length locally.
   */
  private validateCredentials(email: string, password: string): AuthResult<Credentials> {
    const normalizedEmail = email.trim().toLowerCase();
    if (!EmailSchema.safeParse(normalizedEmail).success) {
      return failure("validation_error", { message: "Invalid email address" });
    }
    if (password.length < this.minPasswordLength) {
      return failure("validation_error", {
        message: `Password must be at least ${this.minPasswordLength} characters`,
      });
    }
    return success({ email: normalizedEmail, password });
  }

  private toTokenSet(body: unknown, fallbackProvider: string): AuthResult<TokenSet> {
    const parsed = GoTrueSessionSchema.safeParse(body);
    if (!parsed.success) {
      logger.warn({ issues: parsed.error.issues.length }, "Malformed token response");
      return failure("provider_error", { detail: "invalid_response" });
    }
    const session = parsed.data;
    return success({
      accessToken: session.access_token,
      refreshToken: session.refresh_token,
      expiresIn: session.expires_in ?? this.defaultExpiresIn,
      subjectId: session.user.id,
      email: normalizeEmail(session.user.email),
      provider: session.user.app_metadata?.provider ?? fallbackProvider,
      issuedAt: this.now(),
    });
  }

  private transportFailure<T>(
    operation: string,
    outcome: Exclude<FetchOutcome, { kind: "response" }>,
  ): AuthResult<T> {
    if (outcome.kind === "timeout") {
      logger.error({ operation }, "Identity provider request timed out");
      return failure("network_timeout");
    }
    logger.error({ operation, detail: outcome.detail }, "Identity provider request failed");
    return failure("provider_error", { detail: outcome.detail });
  }

  private async request(path: string, input: RequestInput): Promise<FetchOutcome> {
    const headers: Record<string, string> = {
      apikey: this.apiKey,
      Accept: "application/json",
    };
    if (input.json) headers["Content-Type"] = "application/json";
    if (input.accessToken) headers.Authorization = `Bearer ${input.accessToken}`;
    try {
      const response = await this.fetcher(`${this.baseUrl}${path}`, {
        method: input.method,
        headers,
        body: input.json ? JSON.stringify(input.json) : undefined,
      });
      const body = await readJsonBody(response);
      return { kind: "response", status: response.status, body };
    } catch (error) {
      if (isTimeoutError(error)) return { kind: "timeout" };
      return { kind: "network", detail: error instanceof Error ? error.message : String(error) };
    }
  }
}

function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

function parseErrorBody(body: unknown): GoTrueError {
  const parsed = GoTrueErrorSchema.safeParse(body);
  return parsed.success ? parsed.data : {};
}

/** Split 4xx token failures into expired and otherwise invalid. */
function classifyTokenFailure<T>(body: GoTrueError): AuthResult<T> {
  const codes = errorCodesOf(body);
  if (codes.includes("session_expired") || /expired/i.test(errorTextOf(body))) {
    return failure("token_expired", { detail: codes.join(",") });
  }
  return failure("token_invalid", { detail: codes.join(",") });
}

function normalizeEmail(email: string | null | undefined): string | null {
  const trimmed = email?.trim().toLowerCase();
  return trimmed ? trimmed : null;
}

function toSubjectRef(user: GoTrueUser): SubjectRef {
  return { id: user.id, email: normalizeEmail(user.email) };
}
