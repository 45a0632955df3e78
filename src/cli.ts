#!/usr/bin/env tsx
/**
 * caseflow CLI — entry point for the command-line interface.
 *
 * Commands:
 *   caseflow <data-path>            Start the MCP server
 *   caseflow init [<folder>]        Create a new data folder from template
 *   caseflow config [<data-path>]   Print MCP client config
 *   caseflow version                Print version
 */

import { resolve, join, basename } from "node:path";
import { cp, mkdir, access } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { startServer, VERSION } from "./index.ts";
import { loadServerConfig } from "./config/loader.ts";

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const command = args[0];

  if (!command || command === "--help" || command === "-h") {
    printUsage();
    return;
  }

  if (command === "version" || command === "--version" || command === "-v") {
    console.log(`caseflow v${VERSION}`);
    return;
  }

  if (command === "init") {
    await initDataFolder(args[1]);
    return;
  }

  if (command === "config") {
    await printMcpConfig(args[1]);
    return;
  }

  // Default: serve the data folder
  await startServer(resolve(command));
}

/** Create a new data folder from the template */
async function initDataFolder(target?: string): Promise<void> {
  const folder = target ?? "caseflow-data";
  const targetPath = resolve(folder);

  if (await exists(targetPath)) {
    console.error(`Error: "${folder}" already exists. Choose a different name.`);
    process.exitCode = 1;
    return;
  }

  const templatePath = fileURLToPath(new URL("../template", import.meta.url));
  if (!(await exists(templatePath))) {
    console.error(
      "Error: Template directory not found. Make sure the caseflow package is installed correctly.",
    );
    process.exitCode = 1;
    return;
  }

  await cp(templatePath, targetPath, { recursive: true });
  await mkdir(join(targetPath, "db"), { recursive: true });

  console.log(`Created data folder ./${folder}/`);
  console.log(`  ${folder}/config/server.md   LLM and orchestrator settings`);
  console.log(`  ${folder}/db/                case records (created on first start)`);
  console.log();
  console.log("Next steps:");
  console.log("  1. Set ANTHROPIC_API_KEY for LLM routing and summaries");
  console.log(`  2. Start the server: caseflow ${folder}`);
  console.log(`  3. Get MCP config:   caseflow config ${folder}`);
}

/** Output the MCP client config JSON needed to connect to a data folder */
async function printMcpConfig(target?: string): Promise<void> {
  const dataPath = resolve(target ?? ".");
  const config = await loadServerConfig(dataPath);
  const serverName = `caseflow-${basename(dataPath) || "data"}`;

  const mcpConfig = {
    mcpServers: {
      [serverName]: {
        command: "caseflow",
        args: [dataPath],
        env: { [config.llm.apiKeyEnvVar]: "<your-api-key>" },
      },
    },
  };

  console.log();
  console.log("Add this to your MCP client config to connect to this data folder.");
  console.log();
  console.log(JSON.stringify(mcpConfig, null, 2));
  console.log();
  console.log(
    `Orchestrator: poll every ${config.orchestrator.pollIntervalMs}ms, ` +
    `max ${config.orchestrator.maxSteps} steps per run, repeat policy ${config.orchestrator.repeatPolicy}`,
  );
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

function printUsage(): void {
  console.log(`
caseflow v${VERSION} — resumable case-workflow orchestrator

Usage:
  caseflow <data-path>            Start the MCP server
  caseflow init [<folder>]        Create a new data folder
  caseflow config [<data-path>]   Output MCP client connection config
  caseflow version                Print version

Examples:
  caseflow ./ward-data            Serve cases stored in ./ward-data
  caseflow init ward-data         Create ./ward-data with a default config
  `.trim());
}

main().catch((err: unknown) => {
  console.error("Error:", err);
  process.exit(1);
});
