/**
 * Copyright (c) OpenLoaf. All rights reserved.
 *
 * This source code is licensed under the AGPLv3 license found in the
 * LICENSE file in the root directory of this source tree.
 *
 * Project: OpenLoaf
 * Repository: https://github.com/OpenLoaf/OpenLoaf
 */
import { z } from "zod";

/** Schema for the user object returned by /user and inside sessions. */
export const GoTrueUserSchema = z.object({
  id: z.string().min(1).describe("Subject identifier."),
  email: z.string().nullish().describe("Primary email."),
  app_metadata: z
    .object({
      provider: z.string().optional().describe("Upstream provider of the last sign in."),
    })
    .optional(),
});

/** Schema for a token endpoint success body. */
export const GoTrueSessionSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1),
  expires_in: z.number().int().positive().optional(),
  token_type: z.string().optional(),
  user: GoTrueUserSchema,
});

/** Schema for /signup; the body is a user or a session depending on confirmation settings. */
export const GoTrueSignupSchema = z.union([
  GoTrueSessionSchema.transform((session) => session.user),
  GoTrueUserSchema,
]);

/** Schema for error bodies, covering both legacy and current shapes. */
export const GoTrueErrorSchema = z.object({
  error: z.string().optional(),
  error_description: z.string().optional(),
  error_code: z.string().optional(),
  msg: z.string().optional(),
  message: z.string().optional(),
});

export type GoTrueUser = z.infer<typeof GoTrueUserSchema>;
export type GoTrueError = z.infer<typeof GoTrueErrorSchema>;

/** Collect the machine readable codes of an error body. */
export function errorCodesOf(body: GoTrueError): string[] {
  return [body.error, body.error_code].filter((code): code is string => Boolean(code));
}

/** Collect the human readable text of an error body. */
export function errorTextOf(body: GoTrueError): string {
  return [body.error_description, body.msg, body.message].filter(Boolean).join(" ");
}
