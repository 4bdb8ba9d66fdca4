import * as pty from "node-pty";
import fs from "fs";
import path from "path";
import chalk from "chalk";
import { TerminalError } from "./errors.js";
import type { ExitOutcome, ReadResult } from "./types.js";

/** Raw key sequences understood by the wizard's menus */
export const KEYS = {
  ENTER: "\r",
  DOWN: "\x1b[B",
  UP: "\x1b[A",
  CTRL_C: "\x03",
} as const;

/** Default terminal size for wizard sessions */
const DEFAULT_COLS = 120;
const DEFAULT_ROWS = 40;

/** Output must be quiet this long before a burst is handed to the reader */
const DEFAULT_SETTLE_MS = 150;

/** Keep at most this many unread lines (a runaway wizard must not grow memory) */
const MAX_QUEUED_LINES = 5000;

/** The parts of a node-pty process the session uses */
export type PtyProcess = Pick<pty.IPty, "pid" | "onData" | "onExit" | "write" | "kill">;

/**
 * A child process attached to a pseudo-terminal
 */
export interface TerminalSession {
  readonly pid: number;

  /**
   * Lines that arrived within `timeoutMs`. A partial line (a prompt waiting
   * for input has no newline) is flushed once output has been quiet for the
   * settle time; if it grows afterwards it is returned again in full. Never
   * blocks past the timeout.
   */
  readAvailable(timeoutMs: number): Promise<ReadResult>;

  /** Write raw text, no newline appended */
  sendText(text: string): void;

  /** Send Ctrl-<letter>; 'c' interrupts, 'm' is Enter */
  sendControl(letter: string): void;

  /** Resolve with the exit status, or `unknown` if not exited within `timeoutMs` */
  waitForExit(timeoutMs: number): Promise<ExitOutcome>;

  /** Kill the child if still running and release the terminal. Idempotent. */
  dispose(): void;
}

export interface SpawnOptions {
  cwd: string;
  env?: NodeJS.ProcessEnv;
  cols?: number;
  rows?: number;
  settleMs?: number;
}

/**
 * Callback type for spawning sessions (swapped for a scripted terminal in tests)
 */
export type SessionFactory = (
  command: string,
  args: string[],
  options: SpawnOptions
) => TerminalSession;

/**
 * Map a letter to its control byte, the way a terminal does (Ctrl-C = 0x03)
 */
export function controlByte(letter: string): string {
  const upper = letter.toUpperCase();
  if (upper.length !== 1 || upper < "@" || upper > "_") {
    throw new Error(`No control sequence for "${letter}"`);
  }
  return String.fromCharCode(upper.charCodeAt(0) - 64);
}

/**
 * Split a chunk of terminal output into complete lines plus the trailing partial
 */
export function splitLines(
  pending: string,
  chunk: string
): { lines: string[]; rest: string } {
  const parts = (pending + chunk).split(/\r\n|\n|\r/);
  const rest = parts.pop() ?? "";
  return { lines: parts, rest };
}

/**
 * Find an executable on PATH so a missing CLI fails before a terminal is opened
 */
export function resolveExecutable(
  command: string,
  env: NodeJS.ProcessEnv = process.env
): string | null {
  const isExecutable = (candidate: string): boolean => {
    try {
      fs.accessSync(candidate, fs.constants.X_OK);
      return fs.statSync(candidate).isFile();
    } catch {
      return false;
    }
  };

  if (command.includes(path.sep)) {
    return isExecutable(command) ? path.resolve(command) : null;
  }

  for (const dir of (env.PATH ?? "").split(path.delimiter)) {
    if (!dir) continue;
    const candidate = path.join(dir, command);
    if (isExecutable(candidate)) return candidate;
  }
  return null;
}

/**
 * PtyTerminalSession - one wizard process on a node-pty terminal
 *
 * Responsibilities:
 * - Buffer output into lines until the driver asks for them
 * - Report end-of-input separately from an idle timeout
 * - Kill the child on dispose if it is still running
 */
export class PtyTerminalSession implements TerminalSession {
  private ptyProcess: PtyProcess;
  private queuedLines: string[] = [];
  private pending: string = "";
  /** Length of `pending` already handed out as a partial line */
  private flushedLength: number = 0;
  private lastDataAt: number = 0;
  private ended: boolean = false;
  private exitOutcome: ExitOutcome | null = null;
  private disposed: boolean = false;
  private wake: (() => void) | null = null;
  private exitWaiters: Array<(outcome: ExitOutcome) => void> = [];
  private subscriptions: pty.IDisposable[] = [];
  private settleMs: number;

  constructor(ptyProcess: PtyProcess, settleMs: number = DEFAULT_SETTLE_MS) {
    this.ptyProcess = ptyProcess;
    this.settleMs = settleMs;

    this.subscriptions.push(
      ptyProcess.onData((data: string) => this.handleData(data)),
      ptyProcess.onExit(({ exitCode, signal }) =>
        this.handleExit(exitCode, signal)
      )
    );
  }

  get pid(): number {
    return this.ptyProcess.pid;
  }

  private handleData(data: string): void {
    const { lines, rest } = splitLines(this.pending, data);
    this.pending = rest;
    if (lines.length > 0) this.flushedLength = 0;
    this.queuedLines.push(...lines);
    if (this.queuedLines.length > MAX_QUEUED_LINES) {
      this.queuedLines = this.queuedLines.slice(-MAX_QUEUED_LINES);
    }
    this.lastDataAt = Date.now();
    this.notify();
  }

  private handleExit(exitCode: number, signal?: number): void {
    this.exitOutcome =
      signal !== undefined && signal !== 0
        ? { type: "signaled", signal }
        : { type: "exited", code: exitCode };
    this.ended = true;
    this.notify();

    const waiters = this.exitWaiters;
    this.exitWaiters = [];
    for (const resolve of waiters) resolve(this.exitOutcome);
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }

  private waitForData(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.wake = null;
        resolve();
      }, ms);
      this.wake = () => {
        clearTimeout(timer);
        resolve();
      };
    });
  }

  public async readAvailable(timeoutMs: number): Promise<ReadResult> {
    const deadline = Date.now() + timeoutMs;

    while (!this.ended && !this.disposed) {
      const now = Date.now();
      const hasOutput =
        this.queuedLines.length > 0 || this.pending.length > this.flushedLength;
      if (hasOutput && now - this.lastDataAt >= this.settleMs) break;
      if (now >= deadline) break;
      await this.waitForData(Math.min(deadline - now, this.settleMs));
    }

    const quiet = Date.now() - this.lastDataAt >= this.settleMs;
    const unread = this.pending.length > this.flushedLength;
    if (unread && (this.ended || this.disposed || quiet)) {
      this.queuedLines.push(this.pending);
      this.flushedLength = this.pending.length;
    }

    const lines = this.queuedLines;
    this.queuedLines = [];
    return { lines, ended: this.ended || this.disposed };
  }

  private write(data: string): void {
    if (this.ended || this.disposed) {
      throw new TerminalError("WriteFailure", "Terminal is closed");
    }
    try {
      this.ptyProcess.write(data);
    } catch (error) {
      throw new TerminalError("WriteFailure", "Failed to write to terminal", {
        cause: error,
      });
    }
  }

  public sendText(text: string): void {
    this.write(text);
  }

  public sendControl(letter: string): void {
    this.write(controlByte(letter));
  }

  public waitForExit(timeoutMs: number): Promise<ExitOutcome> {
    if (this.exitOutcome) return Promise.resolve(this.exitOutcome);
    if (this.disposed) return Promise.resolve({ type: "unknown" });

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.exitWaiters = this.exitWaiters.filter((w) => w !== onExit);
        resolve({ type: "unknown" });
      }, timeoutMs);
      const onExit = (outcome: ExitOutcome) => {
        clearTimeout(timer);
        resolve(outcome);
      };
      this.exitWaiters.push(onExit);
    });
  }

  public dispose(): void {
    if (this.disposed) return;
    this.disposed = true;

    if (!this.exitOutcome) {
      try {
        this.ptyProcess.kill();
        console.log(chalk.gray(`  Killed wizard process ${this.pid}`));
      } catch (error) {
        console.error(
          chalk.yellow(`  ⚠️ Failed to kill wizard process ${this.pid}:`),
          error
        );
      }
    }

    for (const subscription of this.subscriptions) subscription.dispose();
    this.subscriptions = [];
    this.notify();

    // The exit event can no longer arrive once unsubscribed
    const waiters = this.exitWaiters;
    this.exitWaiters = [];
    for (const resolve of waiters) resolve({ type: "unknown" });
  }
}

/**
 * Spawn a command on a fresh pseudo-terminal
 */
export const spawnPtySession: SessionFactory = (command, args, options) => {
  const env = options.env ?? process.env;
  const executable = resolveExecutable(command, env);
  if (!executable) {
    throw new TerminalError("SpawnFailure", `Executable not found: ${command}`);
  }

  const ptyEnv: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) ptyEnv[key] = value;
  }
  ptyEnv.TERM = "xterm-256color";

  try {
    const ptyProcess = pty.spawn(executable, args, {
      name: "xterm-256color",
      cols: options.cols ?? DEFAULT_COLS,
      rows: options.rows ?? DEFAULT_ROWS,
      cwd: options.cwd,
      env: ptyEnv,
    });
    console.log(
      chalk.cyan(
        `🖥️  Spawned ${command} ${args.join(" ")} (pid ${ptyProcess.pid}) in ${options.cwd}`
      )
    );
    return new PtyTerminalSession(ptyProcess, options.settleMs);
  } catch (error) {
    throw new TerminalError("SpawnFailure", `Failed to spawn ${command}`, {
      cause: error,
    });
  }
};
