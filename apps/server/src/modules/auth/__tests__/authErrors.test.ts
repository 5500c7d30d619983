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

import {
  DUPLICATE_ACCOUNT_MESSAGE,
  INVALID_CREDENTIALS_MESSAGE,
  SERVICE_UNAVAILABLE_MESSAGE,
  toCallbackError,
  toJsonError,
} from "../authErrors";

describe("toCallbackError", () => {
  it("maps flow failures to redirect codes", () => {
    assert.equal(toCallbackError({ kind: "missing_code" }).error, "no_code");
    assert.equal(toCallbackError({ kind: "session_expired" }).error, "session_expired");
    assert.equal(toCallbackError({ kind: "invalid_grant" }).error, "token_failed");
    assert.equal(toCallbackError({ kind: "network_timeout" }).error, "timeout");
    assert.equal(toCallbackError({ kind: "provider_error" }).error, "server_error");
    assert.equal(toCallbackError({ kind: "provider_denied" }).error, "access_denied");
    assert.equal(toCallbackError({ kind: "profile_unavailable" }).error, "server_error");
  });

  it("never echoes the internal detail", () => {
    const params = toCallbackError({ kind: "provider_error", detail: "upstream said no" });
    assert.deepEqual(params, { error: "server_error", msg: "Sign in is temporarily unavailable" });
  });
});

describe("toJsonError", () => {
  it("maps password endpoint failures to status and message", () => {
    assert.deepEqual(toJsonError({ kind: "invalid_credentials" }), {
      status: 401,
      body: { error: INVALID_CREDENTIALS_MESSAGE },
    });
    assert.deepEqual(toJsonError({ kind: "duplicate_account" }), {
      status: 400,
      body: { error: DUPLICATE_ACCOUNT_MESSAGE },
    });
    assert.deepEqual(toJsonError({ kind: "validation_error", message: "Invalid email address" }), {
      status: 400,
      body: { error: "Invalid email address" },
    });
    assert.deepEqual(toJsonError({ kind: "network_timeout" }), {
      status: 504,
      body: { error: SERVICE_UNAVAILABLE_MESSAGE },
    });
    assert.equal(toJsonError({ kind: "profile_unavailable" }).status, 502);
  });
});
