/**
 * Copyright (c) OpenLoaf. All rights reserved.
 *
 * This source code is licensed under the AGPLv3 license found in the
 * LICENSE file in the root directory of this source tree.
 *
 * Project: OpenLoaf
 * Repository: https://github.com/OpenLoaf/OpenLoaf
 */
import type { ContentfulStatusCode } from "hono/utils/http-status";

/** Every failure a login flow can end in. */
export type AuthErrorKind =
  | "missing_code"
  | "session_expired"
  | "invalid_grant"
  | "network_timeout"
  | "provider_error"
  | "provider_denied"
  | "validation_error"
  | "invalid_credentials"
  | "duplicate_account"
  | "token_invalid"
  | "token_expired"
  | "profile_unavailable";

export type AuthError = {
  /** Failure kind. */
  kind: AuthErrorKind;
  /** Internal detail for logs; never sent to the client. */
  detail?: string;
  /** Client-safe message, only set for local validation failures. */
  message?: string;
};

export type AuthResult<T> = { ok: true; value: T } | { ok: false; error: AuthError };

export function success<T>(value: T): AuthResult<T> {
  return { ok: true, value };
}

export function failure<T = never>(
  kind: AuthErrorKind,
  extra: { detail?: string; message?: string } = {},
): AuthResult<T> {
  return { ok: false, error: { kind, ...extra } };
}

/** Redirect error code and message for failures on the OAuth leg. */
export type CallbackErrorParams = {
  error: string;
  msg: string;
};

const CALLBACK_ERRORS: Record<AuthErrorKind, CallbackErrorParams> = {
  missing_code: { error: "no_code", msg: "Authorization failed" },
  session_expired: { error: "session_expired", msg: "Login session expired, please try again" },
  invalid_grant: { error: "token_failed", msg: "Could not complete sign in, please try again" },
  network_timeout: { error: "timeout", msg: "Server timeout - try again" },
  provider_error: { error: "server_error", msg: "Sign in is temporarily unavailable" },
  provider_denied: { error: "access_denied", msg: "Authorization was cancelled" },
  validation_error: { error: "login_failed", msg: "Sign in failed" },
  invalid_credentials: { error: "login_failed", msg: "Sign in failed" },
  duplicate_account: { error: "login_failed", msg: "Sign in failed" },
  token_invalid: { error: "token_failed", msg: "Could not complete sign in, please try again" },
  token_expired: { error: "session_expired", msg: "Login session expired, please try again" },
  profile_unavailable: { error: "server_error", msg: "Sign in is temporarily unavailable" },
};

/** Map a failure to the sanitized redirect params of the callback leg. */
export function toCallbackError(error: AuthError): CallbackErrorParams {
  return CALLBACK_ERRORS[error.kind];
}

export const INVALID_CREDENTIALS_MESSAGE = "Invalid login credentials";
export const DUPLICATE_ACCOUNT_MESSAGE = "A user with this email address has already been registered";
export const SERVICE_UNAVAILABLE_MESSAGE = "Authentication service unavailable";

/** JSON status and body for failures on the password endpoint. */
export function toJsonError(error: AuthError): { status: ContentfulStatusCode; body: { error: string } } {
  switch (error.kind) {
    case "validation_error":
      return { status: 400, body: { error: error.message ?? "Invalid request" } };
    case "duplicate_account":
      return { status: 400, body: { error: DUPLICATE_ACCOUNT_MESSAGE } };
    case "network_timeout":
      return { status: 504, body: { error: SERVICE_UNAVAILABLE_MESSAGE } };
    case "provider_error":
    case "profile_unavailable":
      return { status: 502, body: { error: SERVICE_UNAVAILABLE_MESSAGE } };
    case "invalid_credentials":
    case "invalid_grant":
    case "token_invalid":
    case "token_expired":
    case "session_expired":
    case "missing_code":
    case "provider_denied":
      // 逻辑：登录失败统一返回同一文案，避免暴露邮箱是否存在。
      return { status: 401, body: { error: INVALID_CREDENTIALS_MESSAGE } };
  }
}
