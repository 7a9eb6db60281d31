// Entry point: toolplan server
//
//   tsx packages/server/src/main.ts [tool-module ...]
//
// Each tool module default-exports `(agent: Agent) => void | Promise<void>`
// and registers its tools there.

import { resolve } from "node:path";
import { pathToFileURL } from "node:url";
import { ConsoleLogger, describeError, loadConfig, type Agent } from "@toolplan/core";
import { createServer } from "./server";

async function loadToolModule(specifier: string, agent: Agent): Promise<void> {
  const mod: { default?: unknown } = await import(pathToFileURL(resolve(specifier)).href);
  if (typeof mod.default !== "function") {
    throw new Error(`Tool module ${specifier} has no default-exported setup function`);
  }
  await Reflect.apply(mod.default, undefined, [agent]);
}

const configResult = loadConfig();
if (!configResult.ok) {
  console.error(configResult.error.message);
  process.exit(1);
}

const config = configResult.value;
const logger = new ConsoleLogger(config.logLevel);
const server = createServer(config, { logger });

try {
  for (const specifier of process.argv.slice(2)) {
    await loadToolModule(specifier, server.agent);
  }
  await server.start();
} catch (error) {
  logger.error("Failed to start", describeError(error));
  process.exit(1);
}

// Guard against double-fire when several signals arrive
let shuttingDown = false;
const shutdown = async () => {
  if (shuttingDown) return;
  shuttingDown = true;
  try {
    await server.stop();
  } catch (error) {
    logger.error("Shutdown failed", describeError(error));
    process.exitCode = 1;
  }
  process.exit();
};

process.on("SIGINT", () => void shutdown());
process.on("SIGTERM", () => void shutdown());
