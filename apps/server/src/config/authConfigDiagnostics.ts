/**
 * Copyright (c) OpenLoaf. All rights reserved.
 *
 * This source code is licensed under the AGPLv3 license found in the
 * LICENSE file in the root directory of this source tree.
 *
 * Project: OpenLoaf
 * Repository: https://github.com/OpenLoaf/OpenLoaf
 */
import { callbackUrlOf, type AuthConfig } from "./authConfig";

export type DiagnosticSeverity = "critical" | "warning" | "info";

export type ConfigDiagnostic = {
  category: "environment" | "redirect_url" | "provider_config" | "session" | "cookies";
  severity: DiagnosticSeverity;
  issue: string;
  solution: string;
};

export type DiagnosticCounts = Record<DiagnosticSeverity, number>;

/** PKCE handles older than this widen the replay window without helping users. */
const MAX_RECOMMENDED_PKCE_TTL_SECONDS = 15 * 60;

const LOCAL_HOSTNAMES = new Set(["localhost", "127.0.0.1", "[::1]"]);

/**
 * Inspect a validated configuration for settings that work but are unsafe or
 * likely wrong.
 */
export function diagnoseAuthConfig(config: AuthConfig): ConfigDiagnostic[] {
  const findings: ConfigDiagnostic[] = [];
  const providerUrl = new URL(config.identityProvider.url);
  const publicUrl = new URL(config.publicBaseUrl);
  const isProduction = config.nodeEnv === "production";

  if (providerUrl.protocol !== "https:") {
    findings.push({
      category: "environment",
      severity: isProduction ? "critical" : "warning",
      issue: "IDENTITY_PROVIDER_URL does not use HTTPS",
      solution: "Point IDENTITY_PROVIDER_URL at the https:// URL of the identity provider",
    });
  }

  if (publicUrl.protocol !== "https:" && !LOCAL_HOSTNAMES.has(publicUrl.hostname)) {
    findings.push({
      category: "redirect_url",
      severity: "critical",
      issue: "PUBLIC_BASE_URL is not HTTPS; secure cookies will not be stored by browsers",
      solution: `Serve the app over HTTPS and register ${callbackUrlOf(config)} with https://`,
    });
  }

  if (isProduction && config.profileStore.mode === "memory") {
    findings.push({
      category: "environment",
      severity: "critical",
      issue: "Profile store runs in memory; profiles are lost on restart",
      solution: "Set PROFILE_STORE_MODE=postgrest with PROFILE_STORE_SERVICE_KEY",
    });
  }

  if (config.identityProvider.providers.length === 0) {
    findings.push({
      category: "provider_config",
      severity: "warning",
      issue: "AUTH_PROVIDERS is empty; only password login is available",
      solution: "List the enabled OAuth providers, e.g. AUTH_PROVIDERS=google,github",
    });
  }

  if (config.pkce.ttlSeconds > MAX_RECOMMENDED_PKCE_TTL_SECONDS) {
    findings.push({
      category: "session",
      severity: "warning",
      issue: `PKCE_SESSION_TTL_SECONDS=${config.pkce.ttlSeconds} exceeds 15 minutes`,
      solution: "Keep the login handshake window at or below 900 seconds",
    });
  }

  if (config.cookies.accessTokenTtlSeconds > config.cookies.refreshTokenTtlSeconds) {
    findings.push({
      category: "cookies",
      severity: "warning",
      issue: "ACCESS_TOKEN_TTL_SECONDS is longer than REFRESH_TOKEN_TTL_SECONDS",
      solution: "Give the refresh cookie the longer lifetime",
    });
  }

  findings.push({
    category: "redirect_url",
    severity: "info",
    issue: "OAuth callback URL",
    solution: `Allow ${callbackUrlOf(config)} as a redirect URL in the identity provider settings`,
  });

  return findings;
}

/** Count findings per severity. */
export function countDiagnostics(findings: readonly ConfigDiagnostic[]): DiagnosticCounts {
  const counts: DiagnosticCounts = { critical: 0, warning: 0, info: 0 };
  for (const finding of findings) counts[finding.severity] += 1;
  return counts;
}
