#!/usr/bin/env node
import { errorMessage } from "./api/errors.js";
import { parseCliArgs, readPackageVersion, runApp, USAGE } from "./app.js";
import { loadEnv } from "./config/env.js";
import { createSecretStore } from "./credentials/keychainStore.js";
import { createLogger } from "./telemetry/logger.js";
import { ClackTerminal } from "./terminal/clackTerminal.js";

async function main(): Promise<number> {
  const command = parseCliArgs(process.argv.slice(2));
  switch (command.kind) {
    case "version":
      console.log(`hcloud-snapshots ${readPackageVersion()}`);
      return 0;
    case "help":
      console.log(USAGE);
      return 0;
    case "invalid":
      console.error(`Unknown argument: ${command.arg}\n\n${USAGE}`);
      return 1;
    case "run":
      break;
  }

  const env = loadEnv();
  const logger = createLogger({ level: env.logLevel, file: env.logFile });
  const secretStore = createSecretStore(process.platform, {
    service: env.keychain.service,
    account: env.keychain.account,
    logger
  });

  return runApp({ env, logger, secretStore, terminal: new ClackTerminal() });
}

main()
  .then((code) => process.exit(code))
  .catch((err) => {
    // eslint-disable-next-line no-console
    console.error("Fatal error", errorMessage(err));
    process.exit(1);
  });
