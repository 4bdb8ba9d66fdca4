import { spawn, type ChildProcess } from "child_process";
import fs from "fs";
import path from "path";
import chalk from "chalk";
import { resolveAbi, type FetchFn } from "./abi-resolver.js";
import {
  abiFilePath,
  ARTIFACT_FILE,
  runWizard,
  verifyArtifact,
  type PromptTable,
  type SessionFactory,
} from "./wizard/index.js";
import { isSafePathSegment, type ContractConfig } from "./types.js";

export class ProjectStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ProjectStateError";
  }
}

/**
 * An indexer project directory, with its `envio dev` process if one is running
 */
export interface IndexerProject {
  id: string;
  dir: string;
  process: ChildProcess | null;
}

export interface ProjectManagerOptions {
  envioBin: string;
  explorerFallbackUrl: string;
  apiToken?: string;
  promptTable?: PromptTable;
  readTimeoutMs?: number;
  pollDelayMs?: number;
  maxIdleReads?: number;
  exitTimeoutMs?: number;
  debug?: boolean;
  /** Overrides for tests */
  spawnSession?: SessionFactory;
  fetchFn?: FetchFn;
}

/**
 * Run a command to completion with inherited stdio, resolving its exit code
 */
function runCommand(command: string, args: string[], cwd: string): Promise<number | null> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { cwd, stdio: "inherit" });
    child.on("error", reject);
    child.on("close", (code) => resolve(code));
  });
}

/**
 * IndexerProjectManager - creates and runs Envio indexer projects
 *
 * Responsibilities:
 * - Lay out a project directory and write each contract's ABI
 * - Drive the contract-import wizard and check its output
 * - Run codegen and the dev indexer inside a project
 */
export class IndexerProjectManager {
  private baseDir: string;
  private options: ProjectManagerOptions;

  constructor(baseDir: string, options: ProjectManagerOptions) {
    this.baseDir = baseDir;
    this.options = options;
  }

  /**
   * Create `<baseDir>/<id>`, write ABIs and run the import wizard in it
   */
  public async initProject(
    id: string,
    contracts: ContractConfig[],
    signal?: AbortSignal
  ): Promise<IndexerProject> {
    if (contracts.length === 0) {
      throw new ProjectStateError("No contracts provided for initialization");
    }
    for (const name of [id, ...contracts.map((c) => c.name)]) {
      if (!isSafePathSegment(name)) {
        throw new ProjectStateError(`"${name}" cannot be used as a file name`);
      }
    }

    const projectDir = path.join(this.baseDir, id);
    fs.mkdirSync(path.join(projectDir, "abis"), { recursive: true });
    console.log(chalk.cyan(`\n📁 Initializing indexer project "${id}" in ${projectDir}`));

    for (const contract of contracts) {
      const abi = await resolveAbi(contract.source, {
        explorerFallbackUrl: this.options.explorerFallbackUrl,
        fetchFn: this.options.fetchFn,
      });
      if (abi === null) {
        console.log(chalk.gray(`  ${contract.name}: ABI left to the wizard`));
        continue;
      }
      const abiPath = abiFilePath(projectDir, contract.name);
      fs.writeFileSync(abiPath, abi);
      console.log(chalk.gray(`  Wrote ${contract.name} ABI to ${abiPath}`));
    }

    const result = await runWizard(contracts, {
      cwd: projectDir,
      command: this.options.envioBin,
      spawn: this.options.spawnSession,
      promptTable: this.options.promptTable,
      apiToken: this.options.apiToken,
      readTimeoutMs: this.options.readTimeoutMs,
      pollDelayMs: this.options.pollDelayMs,
      maxIdleReads: this.options.maxIdleReads,
      exitTimeoutMs: this.options.exitTimeoutMs,
      debug: this.options.debug,
      signal,
    });

    console.log(chalk.gray(`  Verifying project setup...`));
    verifyArtifact(projectDir, result);
    console.log(chalk.green(`✅ Project "${id}" ready (${result.steps.length} prompts answered)`));

    return { id, dir: projectDir, process: null };
  }

  public async runCodegen(project: IndexerProject): Promise<void> {
    if (!fs.existsSync(path.join(project.dir, ARTIFACT_FILE))) {
      throw new ProjectStateError(
        `${ARTIFACT_FILE} not found. Project may not be properly initialized`
      );
    }

    console.log(chalk.cyan(`⚙️  Running codegen for "${project.id}"...`));
    const code = await runCommand(this.options.envioBin, ["codegen"], project.dir);
    if (code !== 0) {
      throw new ProjectStateError(`Codegen failed (exit code ${code})`);
    }
    console.log(chalk.green(`✅ Codegen complete`));
  }

  public startDev(project: IndexerProject): void {
    if (project.process) {
      throw new ProjectStateError("Project already has a running process");
    }

    console.log(chalk.cyan(`🚀 Starting indexer for "${project.id}"...`));
    const child = spawn(this.options.envioBin, ["dev"], {
      cwd: project.dir,
      stdio: "inherit",
    });
    child.on("error", (error) => {
      console.error(chalk.red(`❌ Indexer for "${project.id}" failed:`), error);
    });
    child.on("exit", (code) => {
      console.log(chalk.gray(`Indexer for "${project.id}" exited (code ${code})`));
    });
    project.process = child;
  }

  public async stopDev(project: IndexerProject): Promise<void> {
    const child = project.process;
    if (!child) return;
    project.process = null;

    child.kill();
    const code = await runCommand(this.options.envioBin, ["stop"], project.dir);
    if (code !== 0) {
      throw new ProjectStateError("Failed to stop indexer cleanly");
    }
    console.log(chalk.green(`✅ Indexer for "${project.id}" stopped`));
  }

  /**
   * True while the dev process is running
   */
  public checkHealth(project: IndexerProject): boolean {
    const child = project.process;
    if (!child) return false;
    return child.exitCode === null && child.signalCode === null;
  }
}
