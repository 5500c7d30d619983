/**
 * Copyright (c) OpenLoaf. All rights reserved.
 *
 * This source code is licensed under the AGPLv3 license found in the
 * LICENSE file in the root directory of this source tree.
 *
 * Project: OpenLoaf
 * Repository: https://github.com/OpenLoaf/OpenLoaf
 */
import { AsyncLocalStorage } from "node:async_hooks";

export type RequestContext = {
  /** Correlation id for log lines of one request. */
  requestId: string;
  /** Request method. */
  method: string;
  /** Request path without query. */
  path: string;
};

const storage = new AsyncLocalStorage<RequestContext>();

/** Run a callback inside a request context. */
export function runWithRequestContext<T>(ctx: RequestContext, fn: () => T): T {
  return storage.run(ctx, fn);
}

/** 获取本次请求上下文（可能为空）。 */
export function getRequestContext(): RequestContext | undefined {
  return storage.getStore();
}
