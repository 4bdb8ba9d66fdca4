#!/usr/bin/env node
import { Command } from "commander";
import chalk from "chalk";
import fs from "fs";
import path from "path";
import { v4 as uuidv4 } from "uuid";
import { getConfig } from "./config.js";
import { validateIndexerConfig } from "./types.js";
import { IndexerProjectManager, type IndexerProject } from "./project-manager.js";
import { ImportError, loadPromptTable } from "./wizard/index.js";

console.log(chalk.bold.cyan("\nEnvio Import Driver"));
console.log(chalk.gray("================================\n"));

const abortController = new AbortController();
let devProject: IndexerProject | null = null;

function createManager(): IndexerProjectManager {
  const config = getConfig();
  return new IndexerProjectManager(config.PROJECTS_DIR, {
    envioBin: config.ENVIO_BIN,
    explorerFallbackUrl: config.ENVIO_API_URL,
    apiToken: config.HYPERSYNC_API_TOKEN,
    promptTable: config.PROMPT_TABLE_PATH
      ? loadPromptTable(config.PROMPT_TABLE_PATH)
      : undefined,
    readTimeoutMs: config.WIZARD_READ_TIMEOUT_MS,
    pollDelayMs: config.WIZARD_POLL_DELAY_MS,
    maxIdleReads: config.WIZARD_MAX_IDLE_READS,
    exitTimeoutMs: config.WIZARD_EXIT_TIMEOUT_MS,
    debug: config.DEBUG,
  });
}

function projectFromDir(dir: string): IndexerProject {
  const resolved = path.resolve(dir);
  return { id: path.basename(resolved), dir: resolved, process: null };
}

function reportError(error: unknown): void {
  if (error instanceof ImportError) {
    console.error(chalk.red(`\n❌ Import failed: ${error.describe()}`));
  } else if (error instanceof Error) {
    console.error(chalk.red(`\n❌ ${error.name}: ${error.message}`));
  } else {
    console.error(chalk.red("\n❌ Unexpected error:"), error);
  }
}

const program = new Command();

program
  .name("envio-import-driver")
  .description("Run the Envio contract-import wizard unattended");

program
  .command("import")
  .description("Create an indexer project from a JSON indexer config")
  .argument("<config>", "path to the indexer config JSON")
  .option("--id <id>", "project directory name (defaults to the config name)")
  .option("--codegen", "run envio codegen once the project is created")
  .action(async (configPath: string, opts: { id?: string; codegen?: boolean }) => {
    const indexer = validateIndexerConfig(
      JSON.parse(fs.readFileSync(configPath, "utf-8"))
    );
    const runId = uuidv4();
    const id = opts.id ?? indexer.name;
    console.log(
      chalk.cyan(
        `📋 Import ${runId.substring(0, 8)}: "${indexer.name}" with ${indexer.contracts.length} contract(s)`
      )
    );

    const manager = createManager();
    const project = await manager.initProject(id, indexer.contracts, abortController.signal);
    if (opts.codegen) {
      await manager.runCodegen(project);
    }
    console.log(chalk.green(`\n✅ ${project.dir}`));
  });

program
  .command("codegen")
  .description("Run envio codegen in an existing project")
  .argument("<dir>", "project directory")
  .action(async (dir: string) => {
    await createManager().runCodegen(projectFromDir(dir));
  });

program
  .command("dev")
  .description("Run the indexer of an existing project until interrupted")
  .argument("<dir>", "project directory")
  .action((dir: string) => {
    const project = projectFromDir(dir);
    createManager().startDev(project);
    devProject = project;
  });

// Handle graceful shutdown
async function handleShutdown(signal: string): Promise<void> {
  console.log(chalk.yellow(`\n\nShutting down (${signal})...`));
  abortController.abort();

  if (devProject) {
    const project = devProject;
    devProject = null;
    try {
      await createManager().stopDev(project);
    } catch (error) {
      reportError(error);
      process.exit(1);
    }
  }
  process.exit(130);
}

// Handle both SIGINT (Ctrl+C) and SIGTERM
process.on("SIGINT", () => void handleShutdown("SIGINT"));
process.on("SIGTERM", () => void handleShutdown("SIGTERM"));

program.parseAsync(process.argv).catch((error: unknown) => {
  reportError(error);
  process.exit(1);
});
