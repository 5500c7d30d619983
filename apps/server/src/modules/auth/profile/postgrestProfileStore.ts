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
import { logger } from "@/common/logger";
import { createTimeoutFetcher, isTimeoutError, readJsonBody } from "@/common/timeoutFetch";
import {
  ProfileStoreError,
  type NewProfile,
  type Profile,
  type ProfileInsertResult,
  type ProfileStore,
} from "./types";

/** Schema for one `profiles` row as PostgREST returns it. */
const ProfileRowSchema = z.object({
  id: z.string().min(1),
  email: z.string().nullish(),
  onboarded: z.boolean().nullish(),
  created_at: z.string(),
  updated_at: z.string().nullish(),
});

const ProfileRowsSchema = z.array(ProfileRowSchema);

type ProfileRow = z.infer<typeof ProfileRowSchema>;

export type PostgrestProfileStoreOptions = {
  /** Project URL; requests go to `${baseUrl}/rest/v1/${table}`. */
  baseUrl: string;
  /** Service role key, sent as both apikey and bearer token. */
  serviceKey: string;
  /** Table name. */
  table: string;
  /** Per-request timeout in milliseconds. */
  timeoutMs: number;
  /** Fetch override for tests. */
  fetcher?: typeof fetch;
};

/**
 * Profile store backed by a PostgREST endpoint with a primary key on `id`.
 */
export class PostgrestProfileStore implements ProfileStore {
  private readonly endpoint: string;
  private readonly serviceKey: string;
  private readonly fetcher: typeof fetch;

  constructor(options: PostgrestProfileStoreOptions) {
    this.endpoint = `${options.baseUrl.replace(/\/+$/, "")}/rest/v1/${options.table}`;
    this.serviceKey = options.serviceKey;
    this.fetcher = createTimeoutFetcher(options.timeoutMs, options.fetcher ?? fetch);
  }

  async findById(id: string): Promise<Profile | null> {
    const response = await this.send(`?id=eq.${encodeURIComponent(id)}&select=*`, { method: "GET" });
    if (!response.ok) {
      throw new ProfileStoreError(`Profile lookup failed (${response.status})`, response.status);
    }
    const rows = await this.readRows(response);
    const row = rows[0];
    return row ? toProfile(row) : null;
  }

  async insert(input: NewProfile): Promise<ProfileInsertResult> {
    const response = await this.send("", {
      method: "POST",
      headers: { Prefer: "return=representation" },
      body: JSON.stringify({ id: input.id, email: input.email, onboarded: false }),
    });
    // 逻辑：409 表示主键冲突，另一个并发请求已经创建了该资料。
    if (response.status === 409) return { status: "conflict" };
    if (!response.ok) {
      throw new ProfileStoreError(`Profile insert failed (${response.status})`, response.status);
    }
    const rows = await this.readRows(response);
    const row = rows[0];
    if (!row) throw new ProfileStoreError("Profile insert returned no row");
    return { status: "created", profile: toProfile(row) };
  }

  async markOnboarded(id: string): Promise<Profile | null> {
    const response = await this.send(`?id=eq.${encodeURIComponent(id)}`, {
      method: "PATCH",
      headers: { Prefer: "return=representation" },
      // 逻辑：只允许写 onboarded 与 updated_at 两个字段。
      body: JSON.stringify({ onboarded: true, updated_at: new Date().toISOString() }),
    });
    if (!response.ok) {
      throw new ProfileStoreError(`Profile update failed (${response.status})`, response.status);
    }
    const rows = await this.readRows(response);
    const row = rows[0];
    return row ? toProfile(row) : null;
  }

  async ping(): Promise<boolean> {
    try {
      const response = await this.send("?select=id&limit=1", { method: "GET" });
      return response.ok;
    } catch (error) {
      logger.debug({ err: error }, "Profile store ping failed");
      return false;
    }
  }

  private async send(query: string, init: RequestInit): Promise<Response> {
    const headers = new Headers(init.headers);
    headers.set("apikey", this.serviceKey);
    headers.set("Authorization", `Bearer ${this.serviceKey}`);
    headers.set("Accept", "application/json");
    if (!headers.has("Content-Type") && init.body) headers.set("Content-Type", "application/json");
    try {
      return await this.fetcher(`${this.endpoint}${query}`, { ...init, headers });
    } catch (error) {
      throw transportError(error);
    }
  }

  private async readRows(response: Response): Promise<ProfileRow[]> {
    let body: unknown;
    try {
      body = await readJsonBody(response);
    } catch (error) {
      throw transportError(error);
    }
    const parsed = ProfileRowsSchema.safeParse(body);
    if (!parsed.success) throw new ProfileStoreError("Malformed profile rows");
    return parsed.data;
  }
}

function transportError(error: unknown): ProfileStoreError {
  const reason = isTimeoutError(error) ? "timed out" : "unreachable";
  return new ProfileStoreError(`Profile store ${reason}`);
}

function toProfile(row: ProfileRow): Profile {
  return {
    id: row.id,
    email: row.email ?? null,
    onboarded: row.onboarded === true,
    createdAt: row.created_at,
    updatedAt: row.updated_at ?? row.created_at,
  };
}
