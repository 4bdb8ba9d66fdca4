/**
 * Wizard Types for the Envio contract-import session
 *
 * These types describe what the wizard asked (PromptKind), how the planner
 * answers it (WizardAction) and where the driver is in the contract list
 * (Cursor).
 */

/** Prompt kinds recognised in wizard output */
export type PromptKindName =
  | "folder_name"
  | "language"
  | "event_selection"
  | "abi_path"
  | "import_source"
  | "blockchain_from_list"
  | "network_choice"
  | "network_id"
  | "contract_name"
  | "contract_address"
  | "add_another_contract"
  | "api_token"
  | "api_token_value"
  | "rpc_url"
  | "start_block"
  | "template_ready"
  | "final_done";

export type PromptKind =
  | { kind: PromptKindName }
  | { kind: "unrecognized"; text: string };

/** Result of classifying a text window */
export interface Classification {
  prompt: PromptKind;
  /** The question line the classification was made from ("" if none) */
  line: string;
  /** Question text with prefix glyphs and typed answer removed */
  key: string;
  /** Option lines seen after the question (menus) */
  options: string[];
}

/** Action type literals */
export type ActionType = "type_text" | "press_enter" | "press_keys" | "finish";

/** Base action interface */
interface BaseAction {
  type: ActionType;
}

/** Type a value, then press Enter */
export interface TypeTextAction extends BaseAction {
  type: "type_text";
  value: string;
}

/** Accept whatever the wizard currently has selected */
export interface PressEnterAction extends BaseAction {
  type: "press_enter";
}

/** Send raw key sequences (arrows etc.), then press Enter */
export interface PressKeysAction extends BaseAction {
  type: "press_keys";
  value: string[];
}

/** Stop answering prompts */
export interface FinishAction extends BaseAction {
  type: "finish";
  success: boolean;
}

/** Union type of all possible actions */
export type WizardAction =
  | TypeTextAction
  | PressEnterAction
  | PressKeysAction
  | FinishAction;

/** Position in the (contract × deployment) iteration */
export interface Cursor {
  contractIndex: number;
  deploymentIndex: number;
}

/** Cursor movement requested by the planner, applied by the driver */
export type CursorAdvance = "next_deployment" | "next_contract";

export interface PlannedResponse {
  action: WizardAction;
  advance?: CursorAdvance;
}

/** Outcome of one bounded read from the terminal */
export interface ReadResult {
  lines: string[];
  /** Stream reached end-of-input */
  ended: boolean;
}

export type ExitOutcome =
  | { type: "exited"; code: number }
  | { type: "signaled"; signal: number }
  | { type: "unknown" };

/** Driver loop states */
export type DriverState =
  | "spawning"
  | "interacting"
  | "draining"
  | "reaping"
  | "done";
