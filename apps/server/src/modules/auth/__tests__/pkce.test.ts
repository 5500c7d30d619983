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
import crypto from "node:crypto";
import { describe, it } from "node:test";

import { createPkcePair, deriveChallenge } from "../pkce";

describe("createPkcePair", () => {
  it("creates an 86 character base64url verifier", () => {
    const { verifier } = createPkcePair();
    assert.equal(verifier.length, 86);
    assert.match(verifier, /^[A-Za-z0-9_-]+$/);
  });

  it("derives the challenge as base64url(sha256(verifier))", () => {
    const { verifier, challenge } = createPkcePair();
    const expected = crypto.createHash("sha256").update(verifier).digest("base64url");
    assert.equal(challenge, expected);
    assert.equal(challenge.length, 43);
  });

  it("never repeats a verifier", () => {
    const verifiers = new Set(Array.from({ length: 50 }, () => createPkcePair().verifier));
    assert.equal(verifiers.size, 50);
  });
});

describe("deriveChallenge", () => {
  it("matches the RFC 7636 appendix B example", () => {
    assert.equal(
      deriveChallenge("dBjftJeZ4CVP-mB92K27uhbUJU1p1r_wW1gFWFOEjXk"),
      "E9Melhoa2OwvFrEMTJguCHaoeK1t8URWbuGMSstw-cM",
    );
  });
});
