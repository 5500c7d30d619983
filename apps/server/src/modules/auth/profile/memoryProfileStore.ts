/**
 * Copyright (c) OpenLoaf. All rights reserved.
 *
 * This source code is licensed under the AGPLv3 license found in the
 * LICENSE file in the root directory of this source tree.
 *
 * Project: OpenLoaf
 * Repository: https://github.com/OpenLoaf/OpenLoaf
 */
import type { NewProfile, Profile, ProfileInsertResult, ProfileStore } from "./types";

/**
 * In-process profile store for tests and single-node development.
 */
export class MemoryProfileStore implements ProfileStore {
  private readonly rows = new Map<string, Profile>();
  private readonly now: () => Date;

  constructor(options: { now?: () => Date } = {}) {
    this.now = options.now ?? (() => new Date());
  }

  async findById(id: string): Promise<Profile | null> {
    const row = this.rows.get(id);
    return row ? { ...row } : null;
  }

  async insert(input: NewProfile): Promise<ProfileInsertResult> {
    // 逻辑：检查与写入在同一同步片段内，等价于主键唯一约束。
    if (this.rows.has(input.id)) return { status: "conflict" };
    const timestamp = this.now().toISOString();
    const profile: Profile = {
      id: input.id,
      email: input.email,
      onboarded: false,
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    this.rows.set(input.id, profile);
    return { status: "created", profile: { ...profile } };
  }

  async markOnboarded(id: string): Promise<Profile | null> {
    const row = this.rows.get(id);
    if (!row) return null;
    const next: Profile = { ...row, onboarded: true, updatedAt: this.now().toISOString() };
    this.rows.set(id, next);
    return { ...next };
  }

  async ping(): Promise<boolean> {
    return true;
  }

  /** Number of stored profiles. */
  get size(): number {
    return this.rows.size;
  }
}
