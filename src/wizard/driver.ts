/**
 * Wizard Driver
 *
 * Runs the read → classify → plan → act cycle against one wizard session
 * until the planner finishes, then tears the wizard down and reaps it.
 */

import fs from "fs";
import path from "path";
import chalk from "chalk";
import { classifyPrompt, DEFAULT_PROMPT_TABLE, type PromptTable } from "./prompt-classifier.js";
import { applyAdvance, planResponse } from "./response-planner.js";
import { spawnPtySession, type SessionFactory, type TerminalSession } from "./terminal-session.js";
import { ImportError, TerminalError, type ImportErrorKind } from "./errors.js";
import type { ContractConfig } from "../types.js";
import type {
  Cursor,
  DriverState,
  ExitOutcome,
  PromptKind,
  WizardAction,
} from "./types.js";

/** Arguments that start the local contract-import flow */
export const WIZARD_ARGS = ["init", "contract-import", "local"];

/** File the wizard must leave behind */
export const ARTIFACT_FILE = "config.yaml";

/** Lines kept while waiting for a prompt to complete */
const MAX_WINDOW_LINES = 200;

export interface WizardRunOptions {
  /** Working directory, already populated with abis/ */
  cwd: string;
  command?: string;
  args?: string[];
  spawn?: SessionFactory;
  promptTable?: PromptTable;
  apiToken?: string;
  readTimeoutMs?: number;
  pollDelayMs?: number;
  /** Consecutive reads without output before the wizard counts as hung */
  maxIdleReads?: number;
  exitTimeoutMs?: number;
  signal?: AbortSignal;
  debug?: boolean;
}

/** One answered prompt */
export interface WizardStep {
  prompt: PromptKind;
  line: string;
  cursor: Cursor;
  action: WizardAction;
}

export interface WizardRunResult {
  steps: WizardStep[];
  /** Every cursor position the run went through, in order */
  visited: Cursor[];
  exit: ExitOutcome;
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function describeExit(exit: ExitOutcome): string {
  switch (exit.type) {
    case "exited":
      return `exited with code ${exit.code}`;
    case "signaled":
      return `killed by signal ${exit.signal}`;
    case "unknown":
      return "did not report an exit status";
  }
}

/** Prompts whose answers are never written to the log */
const SECRET_PROMPTS: ReadonlySet<PromptKind["kind"]> = new Set(["api_token_value"]);

function describeAction(prompt: PromptKind, action: WizardAction): string {
  switch (action.type) {
    case "type_text":
      return SECRET_PROMPTS.has(prompt.kind) ? `type "***"` : `type "${action.value}"`;
    case "press_enter":
      return "press Enter";
    case "press_keys":
      return `${action.value.length} key(s) + Enter`;
    case "finish":
      return action.success ? "finish" : "give up";
  }
}

function perform(session: TerminalSession, action: WizardAction): void {
  switch (action.type) {
    case "type_text":
      session.sendText(action.value);
      session.sendControl("m");
      break;
    case "press_enter":
      session.sendControl("m");
      break;
    case "press_keys":
      for (const key of action.value) session.sendText(key);
      session.sendControl("m");
      break;
    case "finish":
      break;
  }
}

/**
 * Drive the wizard to completion. Resolves once the wizard has reported
 * success and exited; rejects with an ImportError otherwise. The session
 * is disposed on every path.
 */
export async function runWizard(
  contracts: readonly ContractConfig[],
  options: WizardRunOptions
): Promise<WizardRunResult> {
  const {
    cwd,
    command = "envio",
    args = WIZARD_ARGS,
    spawn = spawnPtySession,
    promptTable = DEFAULT_PROMPT_TABLE,
    apiToken,
    readTimeoutMs = 2000,
    pollDelayMs = 250,
    maxIdleReads = 30,
    exitTimeoutMs = 10000,
    signal,
    debug = false,
  } = options;

  let state: DriverState = "spawning";
  let cursor: Cursor = { contractIndex: 0, deploymentIndex: 0 };
  let lastPrompt: PromptKind | null = null;
  let lastLine = "";
  const steps: WizardStep[] = [];
  const visited: Cursor[] = [cursor];

  const fail = (kind: ImportErrorKind, message: string, cause?: unknown): ImportError =>
    new ImportError(
      kind,
      message,
      { lastPrompt, cursor, lastLine: lastLine || undefined },
      cause === undefined ? undefined : { cause }
    );

  if (contracts.length === 0 || contracts.some((c) => c.deployments.length === 0)) {
    throw new Error("Every import needs at least one contract with at least one deployment");
  }
  if (signal?.aborted) {
    throw fail("Cancelled", "Import was cancelled before the wizard started");
  }

  let session: TerminalSession;
  try {
    session = spawn(command, args, { cwd });
  } catch (error) {
    throw fail("SpawnFailure", `Could not start ${command}`, error);
  }

  const onAbort = () => {
    console.log(chalk.yellow(`⚠️  Import cancelled, stopping wizard (${state})`));
    session.dispose();
  };
  signal?.addEventListener("abort", onAbort, { once: true });

  try {
    state = "interacting";
    let window: string[] = [];
    let lastKey: string | null = null;
    let unsettledLine: string | null = null;
    let idleReads = 0;
    let finished = false;
    let ended = false;

    while (!finished && !ended) {
      const read = await session.readAvailable(readTimeoutMs);
      if (signal?.aborted) {
        throw fail("Cancelled", "Import was cancelled");
      }

      if (read.lines.length > 0) {
        idleReads = 0;
        window.push(...read.lines);
        if (window.length > MAX_WINDOW_LINES) window = window.slice(-MAX_WINDOW_LINES);
      }

      const classification = classifyPrompt(window, promptTable);
      const { prompt } = classification;
      const isTerminal = prompt.kind === "template_ready" || prompt.kind === "final_done";
      const hasPrompt = prompt.kind !== "unrecognized" || prompt.text !== "";
      // A redraw or echo of the prompt just answered is not a new prompt
      const isEcho = hasPrompt && !isTerminal && classification.key === lastKey;
      if (isEcho) window = [];
      // An unknown question may still be arriving; answer it once a read leaves it unchanged
      const isUnsettled: boolean =
        prompt.kind === "unrecognized" &&
        hasPrompt &&
        !isEcho &&
        classification.line !== unsettledLine;
      unsettledLine = isUnsettled ? classification.line : null;

      if (!hasPrompt || isEcho || isUnsettled) {
        if (read.ended) {
          ended = true;
          break;
        }
        if (read.lines.length === 0) {
          idleReads++;
          if (idleReads >= maxIdleReads) {
            throw fail(
              "HangDetected",
              `No output from the wizard after ${idleReads} reads`
            );
          }
        }
        await delay(pollDelayMs);
        continue;
      }

      lastPrompt = prompt;
      lastLine = classification.line;
      window = [];

      if (debug) {
        console.log(chalk.gray(`  Current prompt: ${classification.line}`));
        if (classification.options.length > 0) {
          console.log(chalk.gray(`  Available options:`));
          for (const option of classification.options) {
            console.log(chalk.gray(`    ${option}`));
          }
        }
      }

      const planned = planResponse(prompt, cursor, contracts, {
        projectDir: cwd,
        apiToken,
      });
      steps.push({ prompt, line: classification.line, cursor, action: planned.action });
      console.log(
        chalk.cyan(
          `❓ ${prompt.kind} [${cursor.contractIndex}/${cursor.deploymentIndex}] → ${describeAction(prompt, planned.action)}`
        )
      );

      if (planned.action.type === "finish") {
        if (!planned.action.success) {
          throw fail("UnexpectedTermination", "Wizard flow ended without success");
        }
        finished = true;
        break;
      }

      if (read.ended) {
        ended = true;
        break;
      }

      try {
        perform(session, planned.action);
      } catch (error) {
        if (error instanceof TerminalError) {
          throw fail("WriteFailure", `Could not answer ${prompt.kind}`, error);
        }
        throw error;
      }

      lastKey = classification.key;
      if (planned.advance) {
        cursor = applyAdvance(cursor, planned.advance, contracts);
        visited.push(cursor);
      }
    }

    if (!finished) {
      state = "reaping";
      const exit = await session.waitForExit(exitTimeoutMs);
      if (signal?.aborted) {
        throw fail("Cancelled", "Import was cancelled");
      }
      throw fail(
        "UnexpectedTermination",
        `Wizard ended before the project template was ready (${describeExit(exit)})`
      );
    }

    state = "draining";
    console.log(chalk.green(`✅ Project template ready, closing wizard`));
    try {
      session.sendControl("c");
      session.sendText("exit\r");
    } catch (error) {
      if (!(error instanceof TerminalError)) throw error;
      // Already gone: the wizard exits on its own once the template is written
      console.log(chalk.gray(`  Wizard terminal already closed`));
    }

    state = "reaping";
    console.log(chalk.gray(`  Waiting for wizard process to exit...`));
    const exit = await session.waitForExit(exitTimeoutMs);
    if (signal?.aborted) {
      throw fail("Cancelled", "Import was cancelled while the wizard was closing");
    }
    if (exit.type === "unknown") {
      throw fail("HangDetected", `Wizard did not exit within ${exitTimeoutMs}ms after finishing`);
    }
    if (exit.type === "exited" && exit.code !== 0) {
      console.log(chalk.yellow(`⚠️  Wizard ${describeExit(exit)} after interrupt`));
    } else {
      console.log(chalk.gray(`  Wizard ${describeExit(exit)}`));
    }

    return { steps, visited, exit };
  } finally {
    signal?.removeEventListener("abort", onAbort);
    session.dispose();
    state = "done";
  }
}

/**
 * The wizard's own success message is not trusted: the generated config
 * file has to be there.
 */
export function verifyArtifact(
  projectDir: string,
  result: WizardRunResult,
  file: string = ARTIFACT_FILE
): string {
  const artifactPath = path.join(projectDir, file);
  if (!fs.existsSync(artifactPath)) {
    const lastStep = result.steps[result.steps.length - 1];
    throw new ImportError(
      "ArtifactMissing",
      `Wizard reported success but ${file} was not created`,
      {
        lastPrompt: lastStep?.prompt ?? null,
        cursor: lastStep?.cursor ?? { contractIndex: 0, deploymentIndex: 0 },
        lastLine: lastStep?.line,
      }
    );
  }
  return artifactPath;
}
