/**
 * Copyright (c) OpenLoaf. All rights reserved.
 *
 * This source code is licensed under the AGPLv3 license found in the
 * LICENSE file in the root directory of this source tree.
 *
 * Project: OpenLoaf
 * Repository: https://github.com/OpenLoaf/OpenLoaf
 */
export type EnvSource = Record<string, string | undefined>;

export type EnvStringOptions = {
  defaultValue?: string;
  required?: boolean;
};

export const getEnvString = (
  env: EnvSource,
  key: string,
  opts: EnvStringOptions = {}
): string | undefined => {
  const value = env[key];
  if (value != null && value !== "") return value;
  if (opts.defaultValue != null) return opts.defaultValue;
  if (opts.required) throw new Error(`Missing required env var: ${key}`);
  return undefined;
};

/**
 * Split a comma separated env var, dropping empty entries. A blank value falls
 * back to the default; a value of only commas yields an empty list.
 */
export const getEnvList = (env: EnvSource, key: string, defaultValue: string[] = []): string[] => {
  const raw = env[key];
  if (raw == null || raw.trim() === "") return defaultValue;
  return raw
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
};
