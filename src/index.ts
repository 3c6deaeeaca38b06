#!/usr/bin/env node
import { buildApplication } from "./composition/container";
import { initializeLogging } from "./runtime/logging";
import { LOG_FILE } from "./env";
import { errorMessage } from "./shared/errors";

async function main(): Promise<number> {
  const loggingHandle = initializeLogging(LOG_FILE);
  if (loggingHandle.logPath) {
    console.info(`Logging output to ${loggingHandle.logPath}`);
  }

  const app = buildApplication();

  process.on("SIGINT", () => {
    process.stdout.write("\n");
    app.shutdown();
    loggingHandle.shutdown();
    process.exit(0);
  });

  try {
    await app.run();
    return 0;
  } catch (err) {
    app.showError(errorMessage(err));
    return 1;
  } finally {
    app.shutdown();
    loggingHandle.shutdown();
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err) => {
    console.error(err);
    process.exit(1);
  }
);
