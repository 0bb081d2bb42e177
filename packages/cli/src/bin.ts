#!/usr/bin/env node

import { createGatewayClient, isGatewayError, makeGatewayUrl } from "@gatewire/core";
import { CliConfigError, loadCliConfig, type LoadedCliConfig } from "./config.js";
import { print, printError } from "./runtime-common.js";
import { runStart } from "./start.js";

function printHelp(): void {
  process.stdout.write(
    [
      "gatewire commands:",
      "  gatewire start          connect and print gateway events until interrupted",
      "  gatewire gateway-url    print the resolved gateway connection URL",
      "  gatewire help"
    ].join("\n") + "\n"
  );
}

async function main(): Promise<number> {
  const [command, ...args] = process.argv.slice(2);

  if (!command || command === "help" || command === "--help" || command === "-h") {
    printHelp();
    return 0;
  }

  if (command !== "start" && command !== "gateway-url") {
    printError(`Unknown command: ${command}`);
    printHelp();
    return 1;
  }
  if (args.length > 0) {
    printError(`Unexpected arguments for ${command}: ${args.join(" ")}`);
    return 1;
  }

  let loaded: LoadedCliConfig;
  try {
    loaded = loadCliConfig();
  } catch (error) {
    if (error instanceof CliConfigError) {
      printError(`[gatewire] ${error.message}`);
      return 1;
    }
    throw error;
  }

  if (command === "start") {
    return await runStart({ config: loaded.config });
  }

  try {
    print(await makeGatewayUrl(createGatewayClient(loaded.config)));
    return 0;
  } catch (error) {
    if (isGatewayError(error)) {
      printError(`[gatewire] ${error.code}: ${error.message}`);
      return 1;
    }
    throw error;
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    process.stderr.write(`${error instanceof Error ? error.stack ?? error.message : String(error)}\n`);
    process.exitCode = 1;
  });
