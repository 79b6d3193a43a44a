#!/usr/bin/env node
import "dotenv/config";

import { runCli } from "./cli/cli-app.js";
import { formatError } from "./cli/error-handler.js";

runCli().catch((err: unknown) => {
  console.error(formatError(err));
  process.exitCode = 1;
});
