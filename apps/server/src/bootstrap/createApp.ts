/**
 * Copyright (c) OpenLoaf. All rights reserved.
 *
 * This source code is licensed under the AGPLv3 license found in the
 * LICENSE file in the root directory of this source tree.
 *
 * Project: OpenLoaf
 * Repository: https://github.com/OpenLoaf/OpenLoaf
 */
import { randomUUID } from "node:crypto";
import { Hono } from "hono";
import { cors } from "hono/cors";
import { HTTPException } from "hono/http-exception";
import { logger as honoLogger } from "hono/logger";
import { logger } from "@/common/logger";
import { runWithRequestContext } from "@/common/requestContext";
import type { AuthDependencies, AuthEnv } from "@/modules/auth/authContext";
import { registerAuthRoutes } from "@/modules/auth/authRoutes";
import { registerHealthRoutes } from "@/modules/health/healthRoutes";
import { registerOnboardingRoutes } from "@/modules/onboarding/onboardingRoutes";

const ERROR_PAGE = `<!doctype html>
<html><head><title>Something went wrong</title></head>
<body><h1>Something went wrong</h1><p>Please try again later.</p></body></html>`;

/**
 * 创建 Hono app：
 * - 只负责组装中间件与路由
 * - listen 与定时任务在 startServer 中处理
 */
export function createApp(deps: AuthDependencies) {
  const app = new Hono<AuthEnv>();
  const corsOrigins = deps.config.server.corsOrigins;
  const isDev = deps.config.nodeEnv !== "production";

  app.use(async (c, next) => {
    const requestId = c.req.header("x-request-id") ?? randomUUID();
    c.header("x-request-id", requestId);
    await runWithRequestContext({ requestId, method: c.req.method, path: c.req.path }, next);
  });
  app.use(honoLogger((message) => logger.info(message)));
  app.use(
    "/*",
    cors({
      origin: (origin) => {
        if (!origin) return null;
        if (corsOrigins.includes(origin)) return origin;
        if (!isDev) return null;
        try {
          const url = new URL(origin);
          const isLocalhost = url.hostname === "localhost" || url.hostname === "127.0.0.1";
          if (url.protocol === "http:" && isLocalhost) return origin;
        } catch {
          return null;
        }
        return null;
      },
      allowMethods: ["GET", "POST", "OPTIONS"],
      credentials: true,
    }),
  );

  registerAuthRoutes(app, deps);
  registerOnboardingRoutes(app, deps);
  registerHealthRoutes(app, deps);

  app.notFound((c) => c.json({ error: "not_found" }, 404));

  app.onError((error, c) => {
    if (error instanceof HTTPException) return error.getResponse();
    logger.error({ err: error }, "Unhandled request error");
    // 逻辑：浏览器导航请求返回简单页面，其余返回 JSON。
    if (c.req.header("accept")?.includes("text/html")) {
      return c.html(ERROR_PAGE, 500);
    }
    return c.json({ error: "Internal server error" }, 500);
  });

  return app;
}
