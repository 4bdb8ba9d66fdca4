import fs from "fs";
import path from "path";
import { KEYS, TerminalError, type ExitOutcome, type ReadResult, type TerminalSession } from "../wizard/index.js";
import type { ContractConfig, ContractDeployment } from "../types.js";

/** What the fake wizard recorded for each address it accepted */
export interface AcceptedEntry {
  name: string;
  networkId: string;
  address: string;
  source: "explorer" | "local";
  abiPath?: string;
}

interface Question {
  text: string;
  options?: string[];
  handle: (answer: Submission) => void;
}

interface Submission {
  text: string;
  downs: number;
}

export interface FakeWizardOptions {
  /** Write config.yaml here when the template is ready */
  artifactDir?: string;
  /** Stop (end-of-input, exit code 1) after this many answered prompts */
  crashAfter?: number;
  /** Exit status reported after the driver interrupts the finished wizard */
  exitAfterInterrupt?: ExitOutcome;
  /** Exit on its own right after printing the template banner */
  exitWithTemplate?: ExitOutcome;
}

/**
 * In-process stand-in for the contract-import wizard.
 *
 * Prints prompts the way the real one does (a "? " prefix, the active
 * prompt without a trailing newline, menus as option lines, an echo of
 * every answer) and follows its flow from the keys it receives, so a
 * wrong menu offset takes it down the wrong branch.
 */
export class FakeWizard implements TerminalSession {
  readonly pid = 4242;
  readonly accepted: AcceptedEntry[] = [];
  readonly received: string[] = [];
  readonly questionsAsked: string[] = [];
  apiToken: string | undefined;
  disposed = false;

  private chunks: string[][] = [];
  private input = "";
  private ended = false;
  private exitOutcome: ExitOutcome | null = null;
  private current: Question | null = null;
  private answered = 0;
  private draft: Partial<AcceptedEntry> = {};
  private options: FakeWizardOptions;

  constructor(options: FakeWizardOptions = {}) {
    this.options = options;
    this.ask({
      text: "Specify a folder name (ENTER to skip):",
      handle: () => this.askLanguage(),
    });
  }

  private ask(question: Question): void {
    this.current = question;
    this.questionsAsked.push(question.text);
    const lines = [`? ${question.text}`, ...(question.options ?? []).map((o, i) => (i === 0 ? `> ${o}` : `  ${o}`))];
    this.chunks.push(lines);
  }

  private say(line: string): void {
    this.chunks.push([line]);
  }

  private askLanguage(): void {
    this.ask({
      text: "Which language would you like to use?",
      options: ["TypeScript", "JavaScript", "ReScript"],
      handle: () => this.askImportSource(),
    });
  }

  private askImportSource(): void {
    this.draft = {};
    this.ask({
      text: "Would you like to import from a block explorer or a local abi?",
      options: ["Block Explorer", "Local ABI"],
      handle: ({ downs }) => {
        if (downs === 0) {
          this.draft.source = "explorer";
          this.askEvents();
        } else {
          this.draft.source = "local";
          this.ask({
            text: "What is the path to your json abi file?",
            handle: ({ text }) => {
              this.draft.abiPath = text;
              this.askEvents();
            },
          });
        }
      },
    });
  }

  private askEvents(): void {
    this.ask({
      text: "Which events would you like to index?",
      options: ["[x] Transfer", "[x] Approval"],
      handle: () =>
        this.ask({
          text: "What is the name of this contract?",
          handle: ({ text }) => {
            this.draft.name = text;
            this.askNetwork();
          },
        }),
    });
  }

  private askNetwork(): void {
    this.ask({
      text: "Choose network:",
      options: ["<Enter Network Id>", "ethereum-mainnet", "optimism"],
      handle: () =>
        this.ask({
          text: "Enter the network id:",
          handle: ({ text }) => {
            this.draft.networkId = text;
            this.askAddress();
          },
        }),
    });
  }

  private askAddress(): void {
    this.ask({
      text: "What is the address of the contract?",
      handle: ({ text }) => {
        const { name, networkId, source, abiPath } = this.draft;
        if (name === undefined || networkId === undefined || source === undefined) {
          throw new Error("Fake wizard asked for an address out of order");
        }
        this.accepted.push({ name, networkId, source, address: text, abiPath });
        this.askAddAnother();
      },
    });
  }

  private askAddAnother(): void {
    this.ask({
      text: "Would you like to add another contract?",
      options: [
        "I'm finished",
        "Add a new address for same contract on same network",
        "Add a new network for same contract",
        "Add a new contract (with a different ABI)",
      ],
      handle: ({ downs }) => {
        switch (downs) {
          case 0:
            return this.askApiToken();
          case 1:
            return this.askAddress();
          case 2:
            return this.askNetwork();
          case 3:
            return this.askImportSource();
          default:
            throw new Error(`Fake wizard menu has no entry ${downs}`);
        }
      },
    });
  }

  private askApiToken(): void {
    this.ask({
      text: "Add an API token for HyperSync to your .env file?",
      options: ["Create a new API token", "Add an existing API token", "Skip for now"],
      handle: ({ downs }) => {
        if (downs !== 1) return this.finishTemplate();
        this.ask({
          text: "Add your API token:",
          handle: ({ text }) => {
            this.apiToken = text;
            this.finishTemplate();
          },
        });
      },
    });
  }

  private finishTemplate(): void {
    this.current = null;
    if (this.options.artifactDir) {
      fs.writeFileSync(path.join(this.options.artifactDir, "config.yaml"), "name: test\n");
    }
    this.say("Project template ready");
    if (this.options.exitWithTemplate) this.exit(this.options.exitWithTemplate);
  }

  private exit(outcome: ExitOutcome): void {
    this.ended = true;
    this.exitOutcome = outcome;
  }

  private submit(raw: string): void {
    const downs = raw.split(KEYS.DOWN).length - 1;
    const text = raw.split(KEYS.DOWN).join("");
    const question = this.current;
    if (!question) return;

    // inquire redraws the prompt with the answer, then prints it as answered
    this.chunks.push([`? ${question.text} ${text}`, `> ${question.text} ${text}`]);
    this.answered++;
    if (this.options.crashAfter !== undefined && this.answered >= this.options.crashAfter) {
      this.current = null;
      this.exit({ type: "exited", code: 1 });
      return;
    }
    question.handle({ text, downs });
  }

  async readAvailable(_timeoutMs: number): Promise<ReadResult> {
    const lines = this.chunks.shift() ?? [];
    return { lines, ended: this.ended && this.chunks.length === 0 };
  }

  private write(data: string): void {
    if (this.ended || this.disposed) {
      throw new TerminalError("WriteFailure", "Terminal is closed");
    }
    this.received.push(data);
  }

  sendText(text: string): void {
    this.write(text);
    this.input += text;
  }

  sendControl(letter: string): void {
    this.write(`^${letter}`);
    if (letter === "m") {
      const raw = this.input;
      this.input = "";
      this.submit(raw);
    } else if (letter === "c") {
      this.exit(this.options.exitAfterInterrupt ?? { type: "signaled", signal: 2 });
    }
  }

  async waitForExit(_timeoutMs: number): Promise<ExitOutcome> {
    return this.exitOutcome ?? { type: "unknown" };
  }

  dispose(): void {
    this.disposed = true;
  }
}

/** Build a deployment with placeholder RPC */
export function deployment(networkId: string, address: string, extra: Partial<ContractDeployment> = {}): ContractDeployment {
  return { networkId, address, rpcUrl: "http://localhost:8545", ...extra };
}

export function localContract(name: string, deployments: ContractDeployment[]): ContractConfig {
  return { name, source: { kind: "abi", abi: "[]" }, deployments };
}

export function explorerContract(name: string, deployments: ContractDeployment[]): ContractConfig {
  return { name, source: { kind: "explorer", apiUrl: "" }, deployments };
}
