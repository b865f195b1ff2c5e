/**
 * Entry point: start the interactive CLI.
 */
import { startCLI } from "./cli.ts";
import { errorToString } from "./infra/errors.ts";
import { getLogger } from "./infra/logger.ts";

const logger = getLogger("main");

startCLI().catch((err: unknown) => {
  logger.fatal({ error: errorToString(err) }, "cli_start_failed");
  console.error(`Failed to start: ${errorToString(err)}`);
  process.exitCode = 1;
});
