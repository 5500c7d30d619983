/**
 * Copyright (c) OpenLoaf. All rights reserved.
 *
 * This source code is licensed under the AGPLv3 license found in the
 * LICENSE file in the root directory of this source tree.
 *
 * Project: OpenLoaf
 * Repository: https://github.com/OpenLoaf/OpenLoaf
 */
import { createAdaptorServer } from "@hono/node-server";
import { logger } from "@/common/logger";
import type { AuthConfig } from "@/config/authConfig";
import { diagnoseAuthConfig } from "@/config/authConfigDiagnostics";
import { createApp } from "./createApp";
import { createDependencies } from "./dependencies";

/**
 * 启动 HTTP server：
 * - 输出配置诊断
 * - 绑定 Hono fetch handler 并启动 PKCE 定时清理
 */
export function startServer(config: AuthConfig) {
  for (const finding of diagnoseAuthConfig(config)) {
    const payload = { category: finding.category, solution: finding.solution };
    if (finding.severity === "critical") logger.error(payload, finding.issue);
    else if (finding.severity === "warning") logger.warn(payload, finding.issue);
    else logger.info(payload, finding.issue);
  }

  const { deps, stop } = createDependencies(config);
  const app = createApp(deps);
  const { port, host: hostname } = config.server;

  const server = createAdaptorServer({
    fetch: app.fetch,
    hostname,
  });

  server.listen(port, hostname, () => {
    const info = server.address();
    const actualPort = typeof info === "object" && info ? info.port : port;
    logger.info({ hostname, port: actualPort }, `Server listening on http://${hostname}:${actualPort}`);
  });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, "Shutting down");
    stop();
    server.close((error) => {
      if (error) logger.error({ err: error }, "Server close failed");
      process.exit(error ? 1 : 0);
    });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  return { app, server };
}
