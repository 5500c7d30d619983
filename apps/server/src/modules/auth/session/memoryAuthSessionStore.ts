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
import type { AuthSession, AuthSessionStore } from "./types";

export type MemoryAuthSessionStoreOptions = {
  /** Entry lifetime in milliseconds. */
  ttlMs: number;
  /** Clock override for tests. */
  now?: () => number;
  /** Handle generator override for tests. */
  createHandle?: () => string;
};

/**
 * In-memory PKCE session store for single-process deployments.
 */
export class MemoryAuthSessionStore implements AuthSessionStore {
  private readonly sessions = new Map<string, AuthSession>();
  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly createHandle: () => string;

  constructor(options: MemoryAuthSessionStoreOptions) {
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? Date.now;
    this.createHandle = options.createHandle ?? (() => crypto.randomUUID());
  }

  async put(verifier: string): Promise<string> {
    const handle = this.createHandle();
    this.sessions.set(handle, { handle, verifier, createdAt: this.now() });
    return handle;
  }

  async take(handle: string): Promise<string | null> {
    // 逻辑：读取与删除在同一个同步片段内完成，并发的第二次读取只能拿到 null。
    const entry = this.sessions.get(handle);
    this.sessions.delete(handle);
    if (!entry) return null;
    if (this.isExpired(entry)) return null;
    return entry.verifier;
  }

  async sweep(): Promise<number> {
    let removed = 0;
    for (const [handle, entry] of this.sessions) {
      if (this.isExpired(entry)) {
        this.sessions.delete(handle);
        removed += 1;
      }
    }
    return removed;
  }

  /** Number of live entries, expired ones included until swept. */
  get size(): number {
    return this.sessions.size;
  }

  /**
   * Sweep on an interval; returns a stop function.
   */
  startSweeper(intervalMs: number, onError?: (error: unknown) => void): () => void {
    const timer = setInterval(() => {
      this.sweep().catch((error: unknown) => onError?.(error));
    }, intervalMs);
    // 逻辑：定时清理不应阻止进程退出。
    timer.unref();
    return () => clearInterval(timer);
  }

  private isExpired(entry: AuthSession): boolean {
    return this.now() - entry.createdAt >= this.ttlMs;
  }
}
