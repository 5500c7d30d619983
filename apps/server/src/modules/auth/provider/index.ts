/**
 * Copyright (c) OpenLoaf. All rights reserved.
 *
 * This source code is licensed under the AGPLv3 license found in the
 * LICENSE file in the root directory of this source tree.
 *
 * Project: OpenLoaf
 * Repository: https://github.com/OpenLoaf/OpenLoaf
 */
export { GoTrueIdentityProvider } from "./goTrueClient";
export type { GoTrueClientOptions } from "./goTrueClient";
export type { AuthorizeUrlInput, IdentityProviderClient, SubjectRef, TokenSet } from "./types";
