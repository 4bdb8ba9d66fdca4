import path from "path";
import chalk from "chalk";
import { KEYS } from "./terminal-session.js";
import { resolveNetworkToName, resolveNetworkToNumber } from "../networks.js";
import type { ContractConfig, ContractDeployment } from "../types.js";
import type {
  Cursor,
  CursorAdvance,
  PlannedResponse,
  PromptKind,
  WizardAction,
} from "./types.js";

export interface PlannerContext {
  /** Directory the wizard runs in; ABI files live under ./abis */
  projectDir: string;
  /** HyperSync token to hand to the wizard, if any */
  apiToken?: string;
}

/** Menu offsets of "Would you like to add another contract?" */
export const ADD_ANOTHER_OFFSETS = {
  FINISHED: 0,
  SAME_NETWORK: 1,
  OTHER_NETWORK: 2,
  NEW_CONTRACT: 3,
} as const;

/** Menu offsets of the HyperSync token question */
const API_TOKEN_OFFSETS = {
  EXISTING: 1,
  SKIP: 2,
} as const;

/**
 * Where the ABI of a contract is written before the wizard starts
 */
export function abiFilePath(projectDir: string, contractName: string): string {
  return path.join(projectDir, "abis", `${contractName}_abi.json`);
}

/**
 * Prefix an address with 0x unless it already has one. Idempotent.
 */
export function normalizeAddress(address: string): string {
  const trimmed = address.trim();
  if (/^0x/i.test(trimmed)) return `0x${trimmed.slice(2)}`;
  return `0x${trimmed}`;
}

function typeText(value: string): WizardAction {
  return { type: "type_text", value };
}

function pressEnter(): WizardAction {
  return { type: "press_enter" };
}

function moveDown(times: number): WizardAction {
  if (times === 0) return pressEnter();
  return { type: "press_keys", value: Array<string>(times).fill(KEYS.DOWN) };
}

/** Number of "move down" keystrokes an action sends before Enter */
export function downPresses(action: WizardAction): number {
  if (action.type !== "press_keys") return 0;
  return action.value.filter((key) => key === KEYS.DOWN).length;
}

function currentContract(cursor: Cursor, contracts: readonly ContractConfig[]): ContractConfig {
  const contract = contracts[cursor.contractIndex];
  if (!contract) {
    throw new Error(`Cursor contract index ${cursor.contractIndex} is out of range`);
  }
  return contract;
}

function currentDeployment(
  cursor: Cursor,
  contracts: readonly ContractConfig[]
): ContractDeployment {
  const deployment = currentContract(cursor, contracts).deployments[cursor.deploymentIndex];
  if (!deployment) {
    throw new Error(`Cursor deployment index ${cursor.deploymentIndex} is out of range`);
  }
  return deployment;
}

/**
 * Pick the "add another contract" menu entry for whatever comes next.
 * The choice is made from the next item, and only then is the cursor moved.
 */
function planAddAnother(
  cursor: Cursor,
  contracts: readonly ContractConfig[]
): PlannedResponse {
  const contract = currentContract(cursor, contracts);
  const deployment = currentDeployment(cursor, contracts);
  const next = contract.deployments[cursor.deploymentIndex + 1];

  if (next) {
    const sameNetwork =
      resolveNetworkToNumber(next.networkId) === resolveNetworkToNumber(deployment.networkId);
    return {
      action: moveDown(
        sameNetwork ? ADD_ANOTHER_OFFSETS.SAME_NETWORK : ADD_ANOTHER_OFFSETS.OTHER_NETWORK
      ),
      advance: "next_deployment",
    };
  }

  if (cursor.contractIndex + 1 < contracts.length) {
    return {
      action: moveDown(ADD_ANOTHER_OFFSETS.NEW_CONTRACT),
      advance: "next_contract",
    };
  }

  return { action: moveDown(ADD_ANOTHER_OFFSETS.FINISHED) };
}

/**
 * Decide how to answer a prompt. Never touches the terminal or the cursor;
 * the driver applies both.
 */
export function planResponse(
  prompt: PromptKind,
  cursor: Cursor,
  contracts: readonly ContractConfig[],
  context: PlannerContext
): PlannedResponse {
  switch (prompt.kind) {
    case "folder_name":
      return { action: typeText(".") };

    case "language":
    case "event_selection":
    case "network_choice":
      return { action: pressEnter() };

    case "abi_path":
      return {
        action: typeText(
          abiFilePath(context.projectDir, currentContract(cursor, contracts).name)
        ),
      };

    case "import_source": {
      const { source } = currentContract(cursor, contracts);
      // Block explorer is the default entry, local ABI sits one below it
      return { action: moveDown(source.kind === "abi" ? 1 : 0) };
    }

    case "blockchain_from_list":
      // The list filters as you type
      return {
        action: typeText(resolveNetworkToName(currentDeployment(cursor, contracts).networkId)),
      };

    case "network_id":
      return {
        action: typeText(resolveNetworkToNumber(currentDeployment(cursor, contracts).networkId)),
      };

    case "rpc_url": {
      const { rpcUrl } = currentDeployment(cursor, contracts);
      return { action: rpcUrl ? typeText(rpcUrl) : pressEnter() };
    }

    case "start_block": {
      const { startBlock } = currentDeployment(cursor, contracts);
      return { action: startBlock !== undefined ? typeText(String(startBlock)) : pressEnter() };
    }

    case "contract_name":
      return { action: typeText(currentContract(cursor, contracts).name) };

    case "contract_address": {
      // The wizard wants the proxy when the ABI belongs to an implementation
      const { address, proxyAddress } = currentDeployment(cursor, contracts);
      return { action: typeText(normalizeAddress(proxyAddress ?? address)) };
    }

    case "add_another_contract":
      return planAddAnother(cursor, contracts);

    case "api_token":
      return {
        action: moveDown(context.apiToken ? API_TOKEN_OFFSETS.EXISTING : API_TOKEN_OFFSETS.SKIP),
      };

    case "api_token_value":
      return { action: context.apiToken ? typeText(context.apiToken) : pressEnter() };

    case "template_ready":
    case "final_done":
      return { action: { type: "finish", success: true } };

    case "unrecognized":
      console.log(chalk.yellow(`⚠️  Unrecognized prompt, accepting default: "${prompt.text}"`));
      return { action: pressEnter() };
  }
}

/**
 * Apply a planner advance, keeping the cursor inside the contract list
 */
export function applyAdvance(
  cursor: Cursor,
  advance: CursorAdvance,
  contracts: readonly ContractConfig[]
): Cursor {
  const next: Cursor =
    advance === "next_deployment"
      ? { contractIndex: cursor.contractIndex, deploymentIndex: cursor.deploymentIndex + 1 }
      : { contractIndex: cursor.contractIndex + 1, deploymentIndex: 0 };

  const contract = contracts[next.contractIndex];
  if (!contract || next.deploymentIndex >= contract.deployments.length) {
    throw new Error(
      `Cannot advance cursor to contract #${next.contractIndex}, deployment #${next.deploymentIndex}`
    );
  }
  return next;
}
