import { readServerConfig, type ServerConfig } from "./config.js";
import { startBoard } from "./index.js";
import { describeError, logEvent } from "./log.js";

async function main(): Promise<void> {
  let config: ServerConfig;
  try {
    config = readServerConfig(process.env);
  } catch (err: unknown) {
    logEvent({ type: "startup_failed", error: describeError(err) });
    process.exitCode = 1;
    return;
  }

  const board = await startBoard(config);

  const shutdown = (signal: NodeJS.Signals) => {
    logEvent({ type: "shutdown", signal });
    board.stop().catch((err: unknown) => {
      logEvent({ type: "shutdown_failed", error: describeError(err) });
      process.exitCode = 1;
    });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((err: unknown) => {
  logEvent({ type: "startup_failed", error: describeError(err) });
  process.exit(1);
});
