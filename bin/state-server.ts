#!/usr/bin/env npx tsx
// bin/state-server.ts
// Serves a Person over HTTP + WebSocket for live viewing and editing
//
// Run:  npx tsx bin/state-server.ts [--config <file>] [--port <n>]

import { Person } from "../src/examples";
import { loadConfig, validateConfig, type PartialConfig } from "../src/config";
import { startStateServer } from "../src/server";

function parseArgs(args: string[]): { configFile?: string; overrides: PartialConfig } {
  let configFile: string | undefined;
  const server: PartialConfig["server"] = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--config" || arg === "-c") {
      configFile = args[++i];
    } else if (arg === "--port" || arg === "-p") {
      const port = parseInt(args[++i] ?? "", 10);
      if (!Number.isNaN(port)) server.port = port;
    } else if (arg === "--host") {
      server.host = args[++i];
    }
  }

  return { configFile, overrides: { server } };
}

async function main() {
  const { configFile, overrides } = parseArgs(process.argv.slice(2));
  const config = loadConfig({ configFile, overrides });

  const check = validateConfig(config);
  for (const warning of check.warnings) console.warn(`config: ${warning}`);
  if (!check.valid) {
    for (const error of check.errors) console.error(`config: ${error}`);
    process.exit(1);
  }

  const person = new Person("Alice", 25, 1.65);
  const server = await startStateServer(person, config.server);

  process.on("SIGINT", async () => {
    console.log("\nShutting down...");
    await server.stop();
    process.exit(0);
  });
}

main().catch((e) => {
  console.error(e instanceof Error ? e.message : String(e));
  process.exit(1);
});
