import type { Cursor, PromptKind } from "./types.js";

export type ImportErrorKind =
  | "SpawnFailure"
  | "WriteFailure"
  | "HangDetected"
  | "UnexpectedTermination"
  | "ArtifactMissing"
  | "Cancelled";

/** Where the automation was when it failed */
export interface ImportDiagnostics {
  lastPrompt: PromptKind | null;
  cursor: Cursor;
  /** Last question line seen, verbatim */
  lastLine?: string;
}

function describePrompt(prompt: PromptKind | null): string {
  if (!prompt) return "none";
  if (prompt.kind === "unrecognized") return `unrecognized("${prompt.text}")`;
  return prompt.kind;
}

/**
 * Terminal failure of an import run. Never retried by the driver.
 */
export class ImportError extends Error {
  readonly kind: ImportErrorKind;
  readonly diagnostics: ImportDiagnostics;

  constructor(
    kind: ImportErrorKind,
    message: string,
    diagnostics: ImportDiagnostics,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ImportError";
    this.kind = kind;
    this.diagnostics = diagnostics;
  }

  /** One-line diagnostic context for operators */
  describe(): string {
    const { lastPrompt, cursor, lastLine } = this.diagnostics;
    const parts = [
      `${this.kind}: ${this.message}`,
      `last prompt: ${describePrompt(lastPrompt)}`,
      `contract #${cursor.contractIndex}, deployment #${cursor.deploymentIndex}`,
    ];
    if (lastLine) parts.push(`line: "${lastLine}"`);
    return parts.join(" | ");
  }
}

/**
 * Raised by a terminal session when its pseudo-terminal cannot be used.
 * The driver wraps it into an ImportError with diagnostics.
 */
export class TerminalError extends Error {
  readonly kind: "SpawnFailure" | "WriteFailure";

  constructor(
    kind: "SpawnFailure" | "WriteFailure",
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "TerminalError";
    this.kind = kind;
  }
}
