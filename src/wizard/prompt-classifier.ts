import fs from "fs";
import stripAnsi from "strip-ansi";
import type { Classification, PromptKindName } from "./types.js";

/**
 * One row of the prompt table.
 * "question" rules are tested against the most recent line containing a "?",
 * "window" rules against every line of the window (status messages that are
 * not phrased as questions, such as the template-ready banner).
 */
export interface PromptRule {
  kind: PromptKindName;
  scope: "question" | "window";
  /** Case-insensitive substrings; any one matching selects the rule */
  match: string[];
}

export interface PromptTable {
  /** Wizard release the wording was taken from */
  version: string;
  rules: PromptRule[];
}

/**
 * Known wizard prompts, in precedence order. Window rules are checked
 * first; among question rules the first match wins, so specific wording
 * must come before anything it contains.
 */
export const DEFAULT_PROMPT_TABLE: PromptTable = {
  version: "envio-2",
  rules: [
    { kind: "template_ready", scope: "window", match: ["Project template ready"] },
    {
      kind: "final_done",
      scope: "window",
      match: ["add a token later to your .env file"],
    },
    { kind: "folder_name", scope: "question", match: ["Specify a folder name"] },
    { kind: "language", scope: "question", match: ["Which language would you like to use"] },
    { kind: "event_selection", scope: "question", match: ["Which events would you like to index"] },
    { kind: "abi_path", scope: "question", match: ["What is the path to your json abi file"] },
    {
      kind: "import_source",
      scope: "question",
      match: ["import from a block explorer or a local abi"],
    },
    {
      kind: "blockchain_from_list",
      scope: "question",
      match: ["Which blockchain would you like to import a contract from"],
    },
    { kind: "network_choice", scope: "question", match: ["Choose network:", "<Enter Network Id>"] },
    { kind: "network_id", scope: "question", match: ["Enter the network id"] },
    { kind: "rpc_url", scope: "question", match: ["provide an rpc url", "Enter the rpc url"] },
    { kind: "start_block", scope: "question", match: ["start block"] },
    { kind: "contract_name", scope: "question", match: ["What is the name of this contract"] },
    { kind: "contract_address", scope: "question", match: ["What is the address of the contract"] },
    {
      kind: "add_another_contract",
      scope: "question",
      match: ["Would you like to add another contract"],
    },
    {
      kind: "api_token",
      scope: "question",
      match: ["Add an API token for HyperSync to your .env file"],
    },
    { kind: "api_token_value", scope: "question", match: ["Add your API token"] },
  ],
};

const PROMPT_KINDS: readonly PromptKindName[] = [
  "folder_name",
  "language",
  "event_selection",
  "abi_path",
  "import_source",
  "blockchain_from_list",
  "network_choice",
  "network_id",
  "contract_name",
  "contract_address",
  "add_another_contract",
  "api_token",
  "api_token_value",
  "rpc_url",
  "start_block",
  "template_ready",
  "final_done",
];

function isPromptKind(value: unknown): value is PromptKindName {
  return typeof value === "string" && PROMPT_KINDS.some((kind) => kind === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validate a prompt table read from JSON
 */
export function parsePromptTable(value: unknown): PromptTable {
  if (!isRecord(value) || typeof value.version !== "string" || !Array.isArray(value.rules)) {
    throw new Error('Prompt table needs a "version" string and a "rules" array');
  }

  const rawRules: unknown[] = value.rules;
  const rules = rawRules.map((rule, i): PromptRule => {
    if (!isRecord(rule) || !isPromptKind(rule.kind)) {
      throw new Error(`rules[${i}].kind is not a known prompt kind`);
    }
    if (rule.scope !== "question" && rule.scope !== "window") {
      throw new Error(`rules[${i}].scope must be "question" or "window"`);
    }
    const match: unknown = rule.match;
    if (
      !Array.isArray(match) ||
      match.length === 0 ||
      !match.every((m): m is string => typeof m === "string" && m.length > 0)
    ) {
      throw new Error(`rules[${i}].match must be a non-empty array of strings`);
    }
    return { kind: rule.kind, scope: rule.scope, match };
  });

  return { version: value.version, rules };
}

export function loadPromptTable(file: string): PromptTable {
  return parsePromptTable(JSON.parse(fs.readFileSync(file, "utf-8")));
}

/** Strip escape sequences and surrounding whitespace from a terminal line */
export function cleanLine(line: string): string {
  return stripAnsi(line).trim();
}

/**
 * The question part of a prompt line: prefix glyphs ("?", ">", "✔") removed
 * and anything typed after the question mark or colon dropped, so a redraw
 * of an answered prompt has the same key as the prompt itself.
 */
export function questionKey(line: string): string {
  const text = cleanLine(line).replace(/^[^\p{L}\p{N}<]+/u, "");
  const mark = text.indexOf("?");
  if (mark >= 0) return text.slice(0, mark + 1);
  const colon = text.indexOf(":");
  if (colon >= 0) return text.slice(0, colon + 1);
  return text;
}

function matches(rule: PromptRule, text: string): boolean {
  const lower = text.toLowerCase();
  return rule.match.some((m) => lower.includes(m.toLowerCase()));
}

/**
 * Classify the accumulated wizard output. Pure: same window, same result.
 */
export function classifyPrompt(
  window: readonly string[],
  table: PromptTable = DEFAULT_PROMPT_TABLE
): Classification {
  const lines = window.map(cleanLine).filter((line) => line.length > 0);

  for (const rule of table.rules) {
    if (rule.scope !== "window") continue;
    const line = lines.find((l) => matches(rule, l));
    if (line !== undefined) {
      return { prompt: { kind: rule.kind }, line, key: questionKey(line), options: [] };
    }
  }

  let questionIndex = -1;
  for (let i = lines.length - 1; i >= 0; i--) {
    if (lines[i].includes("?")) {
      questionIndex = i;
      break;
    }
  }

  if (questionIndex < 0) {
    return { prompt: { kind: "unrecognized", text: "" }, line: "", key: "", options: [] };
  }

  const line = lines[questionIndex];
  const options = lines
    .slice(questionIndex + 1)
    .map((option) => option.replace(/^[>❯]\s*/u, ""));

  for (const rule of table.rules) {
    if (rule.scope === "question" && matches(rule, line)) {
      return { prompt: { kind: rule.kind }, line, key: questionKey(line), options };
    }
  }

  return {
    prompt: { kind: "unrecognized", text: line },
    line,
    key: questionKey(line),
    options,
  };
}
