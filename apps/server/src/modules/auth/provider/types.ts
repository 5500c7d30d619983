/**
 * Copyright (c) OpenLoaf. All rights reserved.
 *
 * This source code is licensed under the AGPLv3 license found in the
 * LICENSE file in the root directory of this source tree.
 *
 * Project: OpenLoaf
 * Repository: https://github.com/OpenLoaf/OpenLoaf
 */
import type { AuthResult } from "../authErrors";

/** Authenticated identity as reported by the provider. */
export type SubjectRef = {
  /** Provider subject identifier. */
  id: string;
  /** Subject email, when the provider knows one. */
  email: string | null;
};

export type TokenSet = {
  /** Short-lived access token. */
  accessToken: string;
  /** Long-lived refresh token. */
  refreshToken: string;
  /** Access token lifetime in seconds. */
  expiresIn: number;
  /** Provider subject identifier. */
  subjectId: string;
  /** Subject email. */
  email: string | null;
  /** Upstream identity provider (google, github, email). */
  provider: string;
  /** Issue timestamp (ms). */
  issuedAt: number;
};

export type AuthorizeUrlInput = {
  /** Upstream provider name, e.g. google. */
  provider: string;
  /** Absolute callback URL. */
  redirectTo: string;
  /** S256 PKCE challenge. */
  codeChallenge: string;
};

/**
 * Network operations the login core needs from the identity provider.
 * Every failure comes back as a tagged result; nothing here retries.
 */
export interface IdentityProviderClient {
  buildAuthorizeUrl(input: AuthorizeUrlInput): string;
  exchangeCode(code: string, verifier: string): Promise<AuthResult<TokenSet>>;
  passwordGrant(email: string, password: string): Promise<AuthResult<TokenSet>>;
  passwordSignup(email: string, password: string): Promise<AuthResult<SubjectRef>>;
  verify(accessToken: string): Promise<AuthResult<SubjectRef>>;
  refresh(refreshToken: string): Promise<AuthResult<TokenSet>>;
}
