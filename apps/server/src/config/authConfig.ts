/**
 * Copyright (c) OpenLoaf. All rights reserved.
 *
 * This source code is licensed under the AGPLv3 license found in the
 * LICENSE file in the root directory of this source tree.
 *
 * Project: OpenLoaf
 * Repository: https://github.com/OpenLoaf/OpenLoaf
 */
import { getEnvList, getEnvString, type EnvSource } from "@portico/config";
import { z } from "zod";

const DEFAULT_CORS_ORIGINS = [
  "http://localhost:3000",
  "http://localhost:3001",
  "http://127.0.0.1:3000",
  "http://127.0.0.1:3001",
];

const positiveInt = z.coerce.number().int().positive();

/** Browsers cap cookie Max-Age at 400 days and hono refuses to write more. */
export const MAX_COOKIE_TTL_SECONDS = 400 * 24 * 60 * 60;

const cookieTtl = positiveInt.max(MAX_COOKIE_TTL_SECONDS);

const PathSchema = z.string().startsWith("/");

const AuthConfigSchema = z
  .object({
    nodeEnv: z.string(),
    server: z.object({
      host: z.string().min(1),
      port: z.coerce.number().int().min(0).max(65535),
      corsOrigins: z.array(z.string()),
    }),
    identityProvider: z.object({
      url: z.string().url(),
      anonKey: z.string().min(1),
      providers: z.array(z.string().min(1)),
      timeoutMs: positiveInt,
      minPasswordLength: positiveInt,
    }),
    profileStore: z.object({
      mode: z.enum(["postgrest", "memory"]),
      url: z.string().url(),
      serviceKey: z.string().optional(),
      table: z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, "Table must be a plain identifier"),
    }),
    publicBaseUrl: z.string().url(),
    pkce: z.object({
      ttlSeconds: cookieTtl,
      sweepIntervalSeconds: positiveInt,
    }),
    cookies: z.object({
      accessTokenTtlSeconds: cookieTtl,
      refreshTokenTtlSeconds: cookieTtl,
    }),
    paths: z.object({
      login: PathSchema,
      onboarding: PathSchema,
      dashboard: PathSchema,
    }),
  })
  .superRefine((value, ctx) => {
    if (value.profileStore.mode === "postgrest" && !value.profileStore.serviceKey) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["profileStore", "serviceKey"],
        message: "PROFILE_STORE_SERVICE_KEY is required when PROFILE_STORE_MODE=postgrest",
      });
    }
  });

export type AuthConfig = z.infer<typeof AuthConfigSchema>;

/** Raised when the environment does not describe a usable configuration. */
export class AuthConfigError extends Error {
  constructor(readonly issues: readonly string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join("\n")}`);
    this.name = "AuthConfigError";
  }
}

/**
 * Assemble and validate the service configuration from an env record.
 */
export function loadAuthConfig(env: EnvSource): AuthConfig {
  const read = (key: string, defaultValue?: string) => getEnvString(env, key, { defaultValue });
  const providerUrl = read("IDENTITY_PROVIDER_URL");

  const raw = {
    nodeEnv: read("NODE_ENV", "development"),
    server: {
      host: read("HOST", "127.0.0.1"),
      port: read("PORT", "3000"),
      corsOrigins: getEnvList(env, "CORS_ORIGIN", DEFAULT_CORS_ORIGINS),
    },
    identityProvider: {
      url: providerUrl,
      anonKey: read("IDENTITY_PROVIDER_ANON_KEY"),
      providers: getEnvList(env, "AUTH_PROVIDERS", ["google", "github"]).map((name) =>
        name.toLowerCase(),
      ),
      timeoutMs: read("AUTH_REQUEST_TIMEOUT_MS", "5000"),
      minPasswordLength: read("MIN_PASSWORD_LENGTH", "6"),
    },
    profileStore: {
      mode: read("PROFILE_STORE_MODE", "postgrest"),
      // 逻辑：未单独配置时，资料表与身份服务同属一个项目。
      url: read("PROFILE_STORE_URL", providerUrl),
      serviceKey: read("PROFILE_STORE_SERVICE_KEY"),
      table: read("PROFILE_STORE_TABLE", "profiles"),
    },
    publicBaseUrl: read("PUBLIC_BASE_URL")?.replace(/\/+$/, ""),
    pkce: {
      ttlSeconds: read("PKCE_SESSION_TTL_SECONDS", "600"),
      sweepIntervalSeconds: read("PKCE_SWEEP_INTERVAL_SECONDS", "60"),
    },
    cookies: {
      accessTokenTtlSeconds: read("ACCESS_TOKEN_TTL_SECONDS", "3600"),
      refreshTokenTtlSeconds: read("REFRESH_TOKEN_TTL_SECONDS", "2592000"),
    },
    paths: {
      login: read("LOGIN_PATH", "/login"),
      onboarding: read("ONBOARDING_PATH", "/onboarding"),
      dashboard: read("DASHBOARD_PATH", "/dashboard"),
    },
  };

  const parsed = AuthConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new AuthConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }
  return parsed.data;
}

/** Absolute URL the provider redirects back to. */
export function callbackUrlOf(config: Pick<AuthConfig, "publicBaseUrl">): string {
  return `${config.publicBaseUrl}/auth/callback`;
}
