/**
 * Copyright (c) OpenLoaf. All rights reserved.
 *
 * This source code is licensed under the AGPLv3 license found in the
 * LICENSE file in the root directory of this source tree.
 *
 * Project: OpenLoaf
 * Repository: https://github.com/OpenLoaf/OpenLoaf
 */
import "dotenv/config";
import { startServer } from "@/bootstrap/startServer";
import { logger } from "@/common/logger";
import { AuthConfigError, loadAuthConfig } from "@/config/authConfig";

function loadConfigOrExit() {
  try {
    return loadAuthConfig(process.env);
  } catch (error) {
    if (error instanceof AuthConfigError) {
      logger.fatal({ issues: error.issues }, "Invalid configuration");
      process.exit(1);
    }
    throw error;
  }
}

const { app } = startServer(loadConfigOrExit());

export default app;
