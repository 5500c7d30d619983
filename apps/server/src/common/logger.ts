/**
 * Copyright (c) OpenLoaf. All rights reserved.
 *
 * This source code is licensed under the AGPLv3 license found in the
 * LICENSE file in the root directory of this source tree.
 *
 * Project: OpenLoaf
 * Repository: https://github.com/OpenLoaf/OpenLoaf
 */
import pino from "pino";
import { getRequestContext } from "./requestContext";

type LogLevel = pino.LevelWithSilent;

const allowedLevels: ReadonlySet<string> = new Set([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
] satisfies LogLevel[]);

function isLogLevel(value: string): value is LogLevel {
  return allowedLevels.has(value);
}

/**
 * Normalize and validate log level string for pino.
 */
export function normalizeLogLevel(raw: unknown): LogLevel | undefined {
  if (typeof raw !== "string") return;
  const level = raw.trim().toLowerCase();
  return isLogLevel(level) ? level : undefined;
}

const defaultLevel: LogLevel = process.env.NODE_ENV === "production" ? "info" : "debug";
const level: LogLevel = normalizeLogLevel(process.env.LOG_LEVEL) ?? defaultLevel;

// 统一 server 侧日志入口；请求上下文里的 requestId 会自动注入到每条日志，方便串联一次登录流程。
export const logger = pino({
  level,
  base: { service: "portico-server" },
  timestamp: pino.stdTimeFunctions.isoTime,
  mixin() {
    const ctx = getRequestContext();
    return ctx ? { requestId: ctx.requestId, method: ctx.method, path: ctx.path } : {};
  },
});
