/**
 * Copyright (c) OpenLoaf. All rights reserved.
 *
 * This source code is licensed under the AGPLv3 license found in the
 * LICENSE file in the root directory of this source tree.
 *
 * Project: OpenLoaf
 * Repository: https://github.com/OpenLoaf/OpenLoaf
 */

/** Post-login navigation target. */
export type Destination = "onboarding" | "dashboard";

/** new = no profile before this login, incomplete = profile not onboarded, complete = onboarded. */
export type OnboardingState = "new" | "incomplete" | "complete";

export type RouteDecision = {
  destination: Destination;
  state: OnboardingState;
};

export type DestinationPaths = Record<Destination, string>;

/**
 * Map profile state to a navigation target.
 *
 * | profile exists | onboarded | result |
 * |---|---|---|
 * | no  | any   | onboarding (new) |
 * | yes | false | onboarding (incomplete) |
 * | yes | true  | dashboard (complete) |
 */
export function decideRoute(profileExists: boolean, onboarded: boolean): RouteDecision {
  if (!profileExists) return { destination: "onboarding", state: "new" };
  if (!onboarded) return { destination: "onboarding", state: "incomplete" };
  return { destination: "dashboard", state: "complete" };
}

/** Resolve a decision to its configured path. */
export function destinationPath(decision: RouteDecision, paths: DestinationPaths): string {
  return paths[decision.destination];
}
