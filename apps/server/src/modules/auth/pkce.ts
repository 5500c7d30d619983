/**
 * Copyright (c) OpenLoaf. All rights reserved.
 *
 * This source code is licensed under the AGPLv3 license found in the
 * LICENSE file in the root directory of this source tree.
 *
 * Project: OpenLoaf
 * Repository: https://github.com/OpenLoaf/OpenLoaf
 */
import crypto from "node:crypto";

export type PkcePair = {
  /** Secret kept server side until the code exchange. */
  verifier: string;
  /** S256 challenge sent to the provider. */
  challenge: string;
};

/** Random bytes behind one verifier (86 base64url chars). */
const VERIFIER_BYTES = 64;

/**
 * Create a fresh PKCE verifier/challenge pair for one login attempt.
 */
export function createPkcePair(): PkcePair {
  const verifier = base64UrlEncode(crypto.randomBytes(VERIFIER_BYTES));
  return { verifier, challenge: deriveChallenge(verifier) };
}

/**
 * Derive the S256 challenge of a verifier.
 */
export function deriveChallenge(verifier: string): string {
  return base64UrlEncode(crypto.createHash("sha256").update(verifier).digest());
}

/**
 * Encode bytes into base64url format.
 */
function base64UrlEncode(input: Buffer): string {
  return input
    .toString("base64")
    .replace(/=/g, "")
    .replace(/\+/g, "-")
    .replace(/\//g, "_");
}
