/**
 * Copyright (c) OpenLoaf. All rights reserved.
 *
 * This source code is licensed under the AGPLv3 license found in the
 * LICENSE file in the root directory of this source tree.
 *
 * Project: OpenLoaf
 * Repository: https://github.com/OpenLoaf/OpenLoaf
 */
export type { AuthSession, AuthSessionStore } from "./types";
export { MemoryAuthSessionStore } from "./memoryAuthSessionStore";
export type { MemoryAuthSessionStoreOptions } from "./memoryAuthSessionStore";
